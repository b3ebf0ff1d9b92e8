import { buildPaginationMeta, normalizePage, type PaginationMeta } from '../../domain/user/pagination.js';
import type { UserStore } from './userStore.js';
import { toUserResponse, type UserResponse } from './userResponse.js';

export interface ListUsersQuery {
  page?: number;
  limit?: number;
}

export interface ListUsersResult {
  users: UserResponse[];
  meta: PaginationMeta;
}

export class ListUsersUseCase {
  constructor(private userStore: UserStore) {}

  async execute(query: ListUsersQuery, signal?: AbortSignal): Promise<ListUsersResult> {
    const { page, limit, offset } = normalizePage(query.page, query.limit);
    const { users, total } = await this.userStore.list(offset, limit, signal);

    return {
      users: users.map(toUserResponse),
      meta: buildPaginationMeta(page, limit, total),
    };
  }
}
