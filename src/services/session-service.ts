// src/services/session-service.ts
import { AuthenticationError } from '@/middleware/error';
import { systemClock, type Clock, type Result } from '@/types/common';
import type { JWTConfig } from '@/types/config';
import { formatError } from '@/utils/error-formatter';
import { log } from '@/utils/logger';
import { createSecretKey, type KeyObject } from 'crypto';
import { SignJWT, errors, jwtVerify } from 'jose';

const ALGORITHM = 'HS256';

export interface SessionPayload {
  userId: string;
  /** Issue time, epoch seconds */
  iat: number;
  /** Expiry, epoch seconds */
  exp: number;
}

const toEpochSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

/**
 * Mints and verifies stateless session tokens (HS256 JWT) bound to an internal user ID.
 * Nothing is stored server-side; rotating the secret invalidates every outstanding token.
 */
export class SessionService {
  private readonly secretKey: KeyObject;

  constructor(
    private readonly options: JWTConfig,
    private readonly clock: Clock = systemClock
  ) {
    if (!options.secret) {
      throw new Error('JWT secret is not configured');
    }
    this.secretKey = createSecretKey(Buffer.from(options.secret, 'utf-8'));
  }

  /**
   * Creates a session token for a given user ID.
   *
   * @param userId The ID of the user for whom to create the session.
   * @returns The signed token, or the signing error.
   */
  async createSessionToken(userId: string): Promise<Result<string>> {
    try {
      const issuedAt = toEpochSeconds(this.clock());
      const token = await new SignJWT({ userId })
        .setProtectedHeader({ alg: ALGORITHM })
        .setIssuer(this.options.issuer)
        .setIssuedAt(issuedAt)
        .setExpirationTime(issuedAt + this.options.expiresInSeconds)
        .sign(this.secretKey);

      log.debug('Session token created', { userId });
      return { success: true, data: token };
    } catch (error) {
      log.error('Error creating session token', { userId, error: formatError(error) });
      return { success: false, error: new Error('Failed to create session token') };
    }
  }

  /**
   * Verifies signature, algorithm, issuer and expiry. A token is rejected from its `exp` second on.
   */
  async verifySessionToken(token: string): Promise<Result<SessionPayload, AuthenticationError>> {
    try {
      const { payload } = await jwtVerify(token, this.secretKey, {
        algorithms: [ALGORITHM],
        issuer: this.options.issuer,
        currentDate: this.clock(),
      });

      const { userId, iat, exp } = payload;
      if (typeof userId !== 'string' || !userId || typeof iat !== 'number' || typeof exp !== 'number') {
        log.warn('Session token payload is missing claims');
        return { success: false, error: new AuthenticationError('Invalid token payload') };
      }

      return { success: true, data: { userId, iat, exp } };
    } catch (error) {
      log.warn('Session token verification failed', {
        error: formatError(error),
        errorName: error instanceof Error ? error.name : 'unknown',
      });

      if (error instanceof errors.JWTExpired) {
        return { success: false, error: new AuthenticationError('Token expired') };
      }
      if (error instanceof errors.JWSSignatureVerificationFailed || error instanceof errors.JWSInvalid) {
        return { success: false, error: new AuthenticationError('Invalid token signature') };
      }
      if (error instanceof errors.JWTClaimValidationFailed) {
        return { success: false, error: new AuthenticationError(`Token claim validation failed: ${error.message}`) };
      }

      return { success: false, error: new AuthenticationError('Token verification failed') };
    }
  }
}
