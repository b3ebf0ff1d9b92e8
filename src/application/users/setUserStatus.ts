import type { UserStore } from './userStore.js';
import { toUserResponse, type UserResponse } from './userResponse.js';
import { NotFoundError } from '../errors.js';

/**
 * Admin toggle between active and inactive. Inactive users cannot log in,
 * but tokens issued before the change stay valid until they expire.
 */
export class SetUserStatusUseCase {
  constructor(private userStore: UserStore) {}

  async execute(id: number, isActive: boolean, signal?: AbortSignal): Promise<UserResponse> {
    const user = await this.userStore.findById(id, signal);
    if (!user) {
      throw new NotFoundError('user not found');
    }

    const updated = await this.userStore.update({ ...user, isActive }, signal);
    return toUserResponse(updated);
  }
}
