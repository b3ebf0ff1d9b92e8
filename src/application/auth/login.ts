import type { PasswordHasher } from '../../domain/user/password.js';
import type { UserStore } from '../users/userStore.js';
import { toUserResponse, type UserResponse } from '../users/userResponse.js';
import type { TokenService } from './tokenService.js';
import { ForbiddenError, UnauthorizedError } from '../errors.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export interface LoginResult {
  token: string;
  user: UserResponse;
}

const INVALID_CREDENTIALS = 'invalid email or password';

export class LoginUseCase {
  constructor(
    private userStore: UserStore,
    private passwordHasher: PasswordHasher,
    private tokenService: TokenService
  ) {}

  async execute(command: LoginCommand, signal?: AbortSignal): Promise<LoginResult> {
    // Find user
    const user = await this.userStore.findByEmail(command.email, signal);
    if (!user) {
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }

    // Verify password
    const isValid = await this.passwordHasher.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }

    if (!user.isActive) {
      throw new ForbiddenError('account is not active');
    }

    const token = this.tokenService.issue(user.id, user.email, user.role);

    return {
      token,
      user: toUserResponse(user),
    };
  }
}
