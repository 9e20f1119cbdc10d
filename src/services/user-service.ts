import { eq, sql } from 'drizzle-orm';
import type { AppDatabase } from '@/database';
import { users, type User } from '@/database/schema';
import { systemClock, type Clock, type Result } from '@/types/common';
import { formatError, toError } from '@/utils/error-formatter';
import { log } from '@/utils/logger';

export const normalizeEmail = (email: string | null | undefined): string =>
  (email ?? '').trim().toLowerCase();

/**
 * Maps a platform identity subject (the Apple user identifier) to the internal user record.
 */
export class UserService {
  constructor(
    private readonly db: AppDatabase,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Get a user by internal ID
   * @returns User object or null if not found
   */
  async getUser(id: string): Promise<User | null> {
    try {
      return this.db.select().from(users).where(eq(users.id, id)).get() ?? null;
    } catch (error) {
      log.error("Error fetching user", { userId: id, error: formatError(error) });
      throw error;
    }
  }

  /**
   * Find or create the user for a platform subject.
   *
   * A single INSERT ... ON CONFLICT statement does the lookup and the insert, so concurrent
   * first sign-ins for one subject all land on the same row. The only update ever applied
   * to an existing user is filling in an email that was stored empty.
   */
  async resolveUser(platformUserId: string, email?: string | null): Promise<Result<User>> {
    const subject = platformUserId.trim();
    if (!subject) {
      return { success: false, error: new Error('Platform user ID is required'), code: 'INVALID_SUBJECT' };
    }
    const normalizedEmail = normalizeEmail(email);
    const now = this.clock();

    try {
      const user = this.db
        .insert(users)
        .values({
          platformUserId: subject,
          email: normalizedEmail,
          createdAt: now,
          updatedAt: now,
        })
        .onConflictDoUpdate({
          target: users.platformUserId,
          set: {
            email: sql`CASE WHEN ${users.email} = '' THEN excluded.email ELSE ${users.email} END`,
            updatedAt: sql`CASE WHEN ${users.email} = '' AND excluded.email <> '' THEN excluded.updatedAt ELSE ${users.updatedAt} END`,
          },
        })
        .returning()
        .get();

      if (!user) {
        throw new Error('Upsert returned no user row');
      }

      log.debug("Resolved user for platform subject", { userId: user.id });
      return { success: true, data: user };
    } catch (error) {
      log.error("Error resolving user", { error: formatError(error) });
      return { success: false, error: toError(error) };
    }
  }
}
