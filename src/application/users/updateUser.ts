import type { PasswordHasher } from '../../domain/user/password.js';
import type { UserStore } from './userStore.js';
import { toUserResponse, type UserResponse } from './userResponse.js';
import { ConflictError, NotFoundError } from '../errors.js';

export interface UpdateUserCommand {
  name?: string;
  email?: string;
  password?: string;
}

/**
 * Applies each supplied, non-empty field. Fields left out keep their value.
 */
export class UpdateUserUseCase {
  constructor(
    private userStore: UserStore,
    private passwordHasher: PasswordHasher
  ) {}

  async execute(id: number, command: UpdateUserCommand, signal?: AbortSignal): Promise<UserResponse> {
    const user = await this.userStore.findById(id, signal);
    if (!user) {
      throw new NotFoundError('user not found');
    }

    let { name, email, passwordHash } = user;

    if (command.name) {
      name = command.name;
    }

    if (command.email) {
      const owner = await this.userStore.findByEmail(command.email, signal);
      if (owner && owner.id !== id) {
        throw new ConflictError('email already taken');
      }
      email = command.email;
    }

    if (command.password) {
      passwordHash = await this.passwordHasher.hash(command.password);
    }

    const updated = await this.userStore.update({ ...user, name, email, passwordHash }, signal);
    return toUserResponse(updated);
  }
}
