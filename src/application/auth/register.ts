import type { PasswordHasher } from '../../domain/user/password.js';
import { Roles } from '../../domain/user/user.js';
import type { UserStore } from '../users/userStore.js';
import { toUserResponse, type UserResponse } from '../users/userResponse.js';
import { ConflictError } from '../errors.js';

export interface RegisterCommand {
  name: string;
  email: string;
  password: string;
}

export class RegisterUseCase {
  constructor(
    private userStore: UserStore,
    private passwordHasher: PasswordHasher
  ) {}

  async execute(command: RegisterCommand, signal?: AbortSignal): Promise<UserResponse> {
    // Fast path only: the store's unique index decides races
    const existing = await this.userStore.findByEmail(command.email, signal);
    if (existing) {
      throw new ConflictError('email already registered');
    }

    const passwordHash = await this.passwordHasher.hash(command.password);

    const user = await this.userStore.create(
      {
        name: command.name,
        email: command.email,
        passwordHash,
        role: Roles.User,
        isActive: true,
      },
      signal
    );

    return toUserResponse(user);
  }
}
