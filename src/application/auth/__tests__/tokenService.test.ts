import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { JwtTokenService, TokenError } from '../tokenService.js';

const SECRET = 'test-secret';
const ONE_HOUR = 3600;

function captureTokenError(fn: () => unknown): TokenError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TokenError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a TokenError');
}

describe('JwtTokenService', () => {
  it('should round-trip the claims it issued', () => {
    const service = new JwtTokenService({ secret: SECRET, expiresInSeconds: ONE_HOUR });

    const token = service.issue(42, 'ada@example.com', 'admin');

    expect(service.verify(token)).toEqual({ userId: 42, email: 'ada@example.com', role: 'admin' });
  });

  it('should sign with HS256 and put the user id in sub', () => {
    const now = Date.UTC(2026, 0, 1);
    const service = new JwtTokenService({ secret: SECRET, expiresInSeconds: ONE_HOUR, now: () => now });

    const decoded = jwt.decode(service.issue(7, 'bob@example.com', 'user'), { complete: true });

    expect(decoded?.header.alg).toBe('HS256');
    expect(decoded?.payload).toMatchObject({
      sub: '7',
      email: 'bob@example.com',
      role: 'user',
      iat: now / 1000,
      exp: now / 1000 + ONE_HOUR,
    });
  });

  it('should reject an expired token with reason expired', () => {
    let now = Date.UTC(2026, 0, 1);
    const service = new JwtTokenService({ secret: SECRET, expiresInSeconds: ONE_HOUR, now: () => now });
    const token = service.issue(1, 'ada@example.com', 'user');

    now += (ONE_HOUR + 1) * 1000;
    const error = captureTokenError(() => service.verify(token));

    expect(error.reason).toBe('expired');
    expect(error.message).toBe('Token has expired');
  });

  it('should still accept a token just before expiry', () => {
    let now = Date.UTC(2026, 0, 1);
    const service = new JwtTokenService({ secret: SECRET, expiresInSeconds: ONE_HOUR, now: () => now });
    const token = service.issue(1, 'ada@example.com', 'user');

    now += (ONE_HOUR - 1) * 1000;

    expect(service.verify(token).userId).toBe(1);
  });

  it('should reject a token signed with another secret', () => {
    const issuer = new JwtTokenService({ secret: 'other-secret', expiresInSeconds: ONE_HOUR });
    const verifier = new JwtTokenService({ secret: SECRET, expiresInSeconds: ONE_HOUR });

    const error = captureTokenError(() => verifier.verify(issuer.issue(1, 'ada@example.com', 'user')));

    expect(error.reason).toBe('invalid');
    expect(error.message).toBe('Invalid token');
  });

  it('should reject malformed tokens', () => {
    const service = new JwtTokenService({ secret: SECRET, expiresInSeconds: ONE_HOUR });

    expect(captureTokenError(() => service.verify('not.a.jwt')).reason).toBe('invalid');
    expect(captureTokenError(() => service.verify('')).reason).toBe('invalid');
  });

  it('should reject a token that uses a different algorithm', () => {
    const service = new JwtTokenService({ secret: SECRET, expiresInSeconds: ONE_HOUR });
    const token = jwt.sign({ email: 'ada@example.com', role: 'user' }, SECRET, {
      algorithm: 'HS512',
      subject: '1',
      expiresIn: ONE_HOUR,
    });

    expect(captureTokenError(() => service.verify(token)).reason).toBe('invalid');
  });

  it('should reject a correctly signed token without the expected claims', () => {
    const service = new JwtTokenService({ secret: SECRET, expiresInSeconds: ONE_HOUR });
    const token = jwt.sign({ role: 'user' }, SECRET, { algorithm: 'HS256', subject: 'abc', expiresIn: ONE_HOUR });

    expect(captureTokenError(() => service.verify(token)).reason).toBe('invalid');
  });
});
