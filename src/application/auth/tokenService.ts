import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { UnauthorizedError } from '../errors.js';

export interface TokenClaims {
  userId: number;
  email: string;
  role: string;
}

export interface TokenService {
  issue(userId: number, email: string, role: string): string;
  verify(token: string): TokenClaims;
}

export type TokenErrorReason = 'expired' | 'invalid';

export class TokenError extends UnauthorizedError {
  constructor(
    public readonly reason: TokenErrorReason,
    message = reason === 'expired' ? 'Token has expired' : 'Invalid token'
  ) {
    super(message);
    this.name = 'TokenError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface JwtTokenServiceOptions {
  secret: string;
  expiresInSeconds: number;
  /** Milliseconds since epoch. Defaults to Date.now. */
  now?: () => number;
}

const ALGORITHM = 'HS256';

const claimsSchema = z.object({
  sub: z.string().regex(/^\d+$/),
  email: z.string(),
  role: z.string(),
  iat: z.number(),
  exp: z.number(),
});

/**
 * HS256 JWTs signed with a single shared secret. Holds no mutable state.
 */
export class JwtTokenService implements TokenService {
  private readonly now: () => number;

  constructor(private readonly options: JwtTokenServiceOptions) {
    this.now = options.now ?? Date.now;
  }

  issue(userId: number, email: string, role: string): string {
    return jwt.sign(
      {
        email,
        role,
        iat: this.nowSeconds(),
      },
      this.options.secret,
      {
        algorithm: ALGORITHM,
        subject: String(userId),
        expiresIn: this.options.expiresInSeconds,
      }
    );
  }

  verify(token: string): TokenClaims {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new TokenError('expired');
      }
      throw new TokenError('invalid');
    }

    const claims = claimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new TokenError('invalid');
    }

    return {
      userId: Number(claims.data.sub),
      email: claims.data.email,
      role: claims.data.role,
    };
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }
}
