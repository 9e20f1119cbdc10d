import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { UserFactory } from '@/test/factories';
import { TestClock } from '@/test/utils/clock';
import { TestDatabase } from '@/test/utils/database';
import { UserService, normalizeEmail } from '../user-service';

describe('UserService', () => {
  let testDb: TestDatabase;
  let clock: TestClock;
  let service: UserService;

  beforeEach(() => {
    testDb = TestDatabase.create();
    clock = new TestClock();
    service = new UserService(testDb.db, clock.now);
  });

  afterEach(() => {
    testDb.destroy();
  });

  describe('normalizeEmail', () => {
    it('trims and lowercases', () => {
      expect(normalizeEmail('  Alice@Example.COM ')).toBe('alice@example.com');
    });

    it('maps absent values to an empty string', () => {
      expect(normalizeEmail(undefined)).toBe('');
      expect(normalizeEmail(null)).toBe('');
    });
  });

  describe('resolveUser', () => {
    it('creates a user on first sign-in', async () => {
      const result = await service.resolveUser('001234.abc.0001', 'a@x.com');

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.platformUserId).toBe('001234.abc.0001');
      expect(result.data.email).toBe('a@x.com');
      expect(result.data.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(result.data.createdAt.getTime()).toBe(clock.now().getTime());
      expect(testDb.countUsers()).toBe(1);
    });

    it('returns the same user for a returning subject', async () => {
      const first = await service.resolveUser('subject-1', 'a@x.com');
      const second = await service.resolveUser('subject-1', 'a@x.com');

      expect(first.success && second.success).toBe(true);
      if (!first.success || !second.success) return;
      expect(second.data.id).toBe(first.data.id);
      expect(testDb.countUsers()).toBe(1);
    });

    it('never overwrites a stored email', async () => {
      await service.resolveUser('subject-1', 'first@x.com');
      const again = await service.resolveUser('subject-1', 'second@x.com');

      expect(again.success).toBe(true);
      if (!again.success) return;
      expect(again.data.email).toBe('first@x.com');
    });

    it('keeps the stored email when a later sign-in omits it', async () => {
      await service.resolveUser('subject-1', 'first@x.com');
      const again = await service.resolveUser('subject-1', '');

      expect(again.success).toBe(true);
      if (!again.success) return;
      expect(again.data.email).toBe('first@x.com');
    });

    it('fills in an email that was stored empty', async () => {
      const created = await service.resolveUser('subject-1', '');
      clock.advance(60_000);
      const backfilled = await service.resolveUser('subject-1', 'Late@X.com');

      expect(created.success && backfilled.success).toBe(true);
      if (!created.success || !backfilled.success) return;
      expect(created.data.email).toBe('');
      expect(backfilled.data.id).toBe(created.data.id);
      expect(backfilled.data.email).toBe('late@x.com');
      expect(backfilled.data.updatedAt.getTime()).toBe(clock.now().getTime());
      expect(backfilled.data.createdAt.getTime()).toBe(created.data.createdAt.getTime());
    });

    it('allows two subjects to share an email', async () => {
      const a = await service.resolveUser('subject-a', 'shared@x.com');
      const b = await service.resolveUser('subject-b', 'shared@x.com');

      expect(a.success && b.success).toBe(true);
      if (!a.success || !b.success) return;
      expect(a.data.id).not.toBe(b.data.id);
      expect(testDb.countUsers()).toBe(2);
    });

    it('resolves concurrent first sign-ins to one user', async () => {
      const results = await Promise.all([
        service.resolveUser('subject-1', 'Case@X.com'),
        service.resolveUser('subject-1', 'case@x.com'),
        service.resolveUser('subject-1', 'CASE@X.COM'),
      ]);

      const ids = results.map((result) => (result.success ? result.data.id : null));
      expect(ids[0]).not.toBeNull();
      expect(new Set(ids).size).toBe(1);
      expect(testDb.countUsers()).toBe(1);
    });

    it('rejects an empty subject', async () => {
      const result = await service.resolveUser('   ', 'a@x.com');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.code).toBe('INVALID_SUBJECT');
      expect(testDb.countUsers()).toBe(0);
    });

    it('returns a failure when the database is unavailable', async () => {
      testDb.destroy();
      const result = await service.resolveUser('subject-1', 'a@x.com');

      expect(result.success).toBe(false);
      // Reopen so afterEach can close it again
      testDb = TestDatabase.create();
    });
  });

  describe('getUser', () => {
    it('finds a user by internal id', async () => {
      const user = UserFactory.create(testDb.db);
      const found = await service.getUser(user.id);
      expect(found?.platformUserId).toBe(user.platformUserId);
    });

    it('returns null for an unknown id', async () => {
      expect(await service.getUser('missing')).toBeNull();
    });
  });
});
