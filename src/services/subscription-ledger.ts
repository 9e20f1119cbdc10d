import { and, desc, eq, gt, sql } from 'drizzle-orm';
import type { AppDatabase } from '@/database';
import { subscriptions, type Subscription } from '@/database/schema';
import { systemClock, type Clock, type Result } from '@/types/common';
import { formatError, toError } from '@/utils/error-formatter';
import { log } from '@/utils/logger';

/**
 * Durable record of verified purchases, keyed by the App Store transaction ID.
 * Entitlement is never stored here; it is derived from expiresAt at read time.
 */
export class SubscriptionLedger {
  constructor(
    private readonly db: AppDatabase,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Insert the purchase, or overwrite the row that already holds this transaction ID.
   * Replaying a receipt never creates a second row.
   */
  async upsert(
    userId: string,
    transactionId: string,
    productId: string,
    expiresAt: Date
  ): Promise<Result<Subscription>> {
    const now = this.clock();
    try {
      const record = this.db
        .insert(subscriptions)
        .values({
          userId,
          transactionId,
          productId,
          expiresAt,
          createdAt: now,
          updatedAt: now,
        })
        .onConflictDoUpdate({
          target: subscriptions.transactionId,
          set: {
            userId: sql`excluded.userId`,
            productId: sql`excluded.productId`,
            expiresAt: sql`excluded.expiresAt`,
            updatedAt: sql`excluded.updatedAt`,
          },
        })
        .returning()
        .get();

      if (!record) {
        throw new Error('Upsert returned no subscription row');
      }

      log.info("Recorded subscription", {
        userId,
        transactionId,
        productId,
        expiresAt: expiresAt.toISOString(),
      });
      return { success: true, data: record };
    } catch (error) {
      log.error("Database error recording subscription", { userId, transactionId, error: formatError(error) });
      return { success: false, error: toError(error) };
    }
  }

  /**
   * The latest-expiring record whose expiry is strictly after `now`, or null.
   */
  async activeSubscriptionFor(userId: string, now: Date = this.clock()): Promise<Subscription | null> {
    const record = this.db
      .select()
      .from(subscriptions)
      .where(and(eq(subscriptions.userId, userId), gt(subscriptions.expiresAt, now)))
      .orderBy(desc(subscriptions.expiresAt))
      .limit(1)
      .get();

    return record ?? null;
  }

  async listForUser(userId: string): Promise<Subscription[]> {
    return this.db
      .select()
      .from(subscriptions)
      .where(eq(subscriptions.userId, userId))
      .orderBy(desc(subscriptions.expiresAt))
      .all();
  }
}
