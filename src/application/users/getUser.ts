import type { UserStore } from './userStore.js';
import { toUserResponse, type UserResponse } from './userResponse.js';
import { NotFoundError } from '../errors.js';

export class GetUserUseCase {
  constructor(private userStore: UserStore) {}

  async execute(id: number, signal?: AbortSignal): Promise<UserResponse> {
    const user = await this.userStore.findById(id, signal);
    if (!user) {
      throw new NotFoundError('user not found');
    }
    return toUserResponse(user);
  }
}
