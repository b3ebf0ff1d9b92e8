import type { UserStore } from './userStore.js';
import { NotFoundError } from '../errors.js';

export class DeleteUserUseCase {
  constructor(private userStore: UserStore) {}

  async execute(id: number, signal?: AbortSignal): Promise<void> {
    const user = await this.userStore.findById(id, signal);
    if (!user) {
      throw new NotFoundError('user not found');
    }

    await this.userStore.delete(id, signal);
  }
}
