import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import type { User } from '@/database/schema';
import { MONTHLY_PRODUCT_ID, SubscriptionFactory, UserFactory, YEARLY_PRODUCT_ID } from '@/test/factories';
import { DAY_MS, MINUTE_MS, TestClock } from '@/test/utils/clock';
import { TestDatabase } from '@/test/utils/database';
import { SubscriptionLedger } from '../subscription-ledger';

describe('SubscriptionLedger', () => {
  let testDb: TestDatabase;
  let clock: TestClock;
  let ledger: SubscriptionLedger;
  let user: User;

  beforeEach(() => {
    testDb = TestDatabase.create();
    clock = new TestClock();
    ledger = new SubscriptionLedger(testDb.db, clock.now);
    user = UserFactory.create(testDb.db);
  });

  afterEach(() => {
    testDb.destroy();
  });

  describe('upsert', () => {
    it('records a new transaction', async () => {
      const expiresAt = clock.offset(30 * DAY_MS);
      const result = await ledger.upsert(user.id, 'txn-1', MONTHLY_PRODUCT_ID, expiresAt);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data).toMatchObject({
        userId: user.id,
        transactionId: 'txn-1',
        productId: MONTHLY_PRODUCT_ID,
        status: 'recorded',
      });
      expect(result.data.expiresAt.getTime()).toBe(expiresAt.getTime());
    });

    it('replaying a transaction keeps a single row', async () => {
      const expiresAt = clock.offset(30 * DAY_MS);
      const first = await ledger.upsert(user.id, 'txn-1', MONTHLY_PRODUCT_ID, expiresAt);
      const second = await ledger.upsert(user.id, 'txn-1', MONTHLY_PRODUCT_ID, expiresAt);

      expect(first.success && second.success).toBe(true);
      if (!first.success || !second.success) return;
      expect(second.data.id).toBe(first.data.id);
      expect(testDb.countSubscriptions()).toBe(1);
    });

    it('overwrites product and expiry of an existing transaction', async () => {
      await ledger.upsert(user.id, 'txn-1', MONTHLY_PRODUCT_ID, clock.offset(DAY_MS));
      clock.advance(MINUTE_MS);
      const updated = await ledger.upsert(user.id, 'txn-1', YEARLY_PRODUCT_ID, clock.offset(365 * DAY_MS));

      expect(updated.success).toBe(true);
      if (!updated.success) return;
      expect(updated.data.productId).toBe(YEARLY_PRODUCT_ID);
      expect(updated.data.expiresAt.getTime()).toBe(clock.offset(365 * DAY_MS).getTime());
      expect(updated.data.updatedAt.getTime()).toBe(clock.now().getTime());
      expect(testDb.countSubscriptions()).toBe(1);
    });

    it('rebinds a transaction replayed by another user', async () => {
      const other = UserFactory.create(testDb.db);
      await ledger.upsert(user.id, 'txn-1', MONTHLY_PRODUCT_ID, clock.offset(DAY_MS));
      const rebound = await ledger.upsert(other.id, 'txn-1', MONTHLY_PRODUCT_ID, clock.offset(DAY_MS));

      expect(rebound.success && rebound.data.userId).toBe(other.id);
      expect(await ledger.activeSubscriptionFor(user.id)).toBeNull();
    });

    it('fails for an unknown user', async () => {
      const result = await ledger.upsert('no-such-user', 'txn-1', MONTHLY_PRODUCT_ID, clock.offset(DAY_MS));

      expect(result.success).toBe(false);
      expect(testDb.countSubscriptions()).toBe(0);
    });
  });

  describe('activeSubscriptionFor', () => {
    it('is active one minute before expiry', async () => {
      await ledger.upsert(user.id, 'txn-1', MONTHLY_PRODUCT_ID, clock.offset(MINUTE_MS));

      const active = await ledger.activeSubscriptionFor(user.id);
      expect(active?.transactionId).toBe('txn-1');
    });

    it('is inactive at the exact expiry instant', async () => {
      await ledger.upsert(user.id, 'txn-1', MONTHLY_PRODUCT_ID, clock.now());

      expect(await ledger.activeSubscriptionFor(user.id)).toBeNull();
    });

    it('is inactive one minute after expiry', async () => {
      await ledger.upsert(user.id, 'txn-1', MONTHLY_PRODUCT_ID, clock.offset(-MINUTE_MS));

      expect(await ledger.activeSubscriptionFor(user.id)).toBeNull();
    });

    it('lapses as time passes without any write', async () => {
      await ledger.upsert(user.id, 'txn-1', MONTHLY_PRODUCT_ID, clock.offset(DAY_MS));
      expect(await ledger.activeSubscriptionFor(user.id)).not.toBeNull();

      clock.advance(DAY_MS);
      expect(await ledger.activeSubscriptionFor(user.id)).toBeNull();
    });

    it('returns the latest-expiring record', async () => {
      const now = clock.now();
      SubscriptionFactory.createActive(testDb.db, user.id, now, 10);
      const latest = SubscriptionFactory.createActive(testDb.db, user.id, now, 40);
      SubscriptionFactory.createExpired(testDb.db, user.id, now);

      const active = await ledger.activeSubscriptionFor(user.id);
      expect(active?.id).toBe(latest.id);
    });

    it('ignores other users', async () => {
      const other = UserFactory.create(testDb.db);
      SubscriptionFactory.createActive(testDb.db, other.id, clock.now());

      expect(await ledger.activeSubscriptionFor(user.id)).toBeNull();
    });
  });

  describe('listForUser', () => {
    it('lists records newest expiry first', async () => {
      const now = clock.now();
      const expired = SubscriptionFactory.createExpired(testDb.db, user.id, now);
      const active = SubscriptionFactory.createActive(testDb.db, user.id, now);

      const records = await ledger.listForUser(user.id);
      expect(records.map((record) => record.id)).toEqual([active.id, expired.id]);
    });
  });
});
