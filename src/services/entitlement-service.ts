import { systemClock, type Clock } from '@/types/common';
import { formatError } from '@/utils/error-formatter';
import { log } from '@/utils/logger';
import type { SessionService } from './session-service';
import type { SubscriptionLedger } from './subscription-ledger';

export interface EntitlementStatus {
  isActive: boolean;
  subscription?: {
    productId: string;
    expiresAt: Date;
  };
}

const NOT_ENTITLED: EntitlementStatus = { isActive: false };

/**
 * Answers "is this user entitled right now". Expiry is lazy: every call compares the stored
 * expiration with the clock, nothing ever moves a record from active to expired.
 */
export class EntitlementService {
  constructor(
    private readonly sessions: SessionService,
    private readonly ledger: SubscriptionLedger,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Current status for an already-authenticated user. Storage errors report not entitled.
   */
  async getStatus(userId: string): Promise<EntitlementStatus> {
    try {
      const record = await this.ledger.activeSubscriptionFor(userId, this.clock());
      if (!record) {
        log.debug("User does not have an active subscription", { userId });
        return NOT_ENTITLED;
      }

      log.debug("User has an active subscription", {
        userId,
        productId: record.productId,
        expires: record.expiresAt.toISOString(),
      });
      return {
        isActive: true,
        subscription: { productId: record.productId, expiresAt: record.expiresAt },
      };
    } catch (error) {
      log.error("Database error checking subscription status", { userId, error: formatError(error) });
      return NOT_ENTITLED;
    }
  }

  /**
   * Verifies the bearer token and checks for an unexpired subscription.
   * An invalid or expired token is never entitled.
   */
  async isEntitled(token: string): Promise<boolean> {
    const verification = await this.sessions.verifySessionToken(token);
    if (!verification.success) {
      return false;
    }
    const status = await this.getStatus(verification.data.userId);
    return status.isActive;
  }
}
