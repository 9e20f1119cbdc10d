import type { AppDatabase } from '@/database';
import { systemClock, type Clock } from '@/types/common';
import type { AppConfig } from '@/types/config';
import { EntitlementService } from './entitlement-service';
import { ReceiptValidator, postReceiptWithFetch, type ReceiptTransport } from './receipt-validator';
import { SessionService } from './session-service';
import { SubscriptionLedger } from './subscription-ledger';
import { UserService } from './user-service';

export interface AppServices {
  users: UserService;
  receipts: ReceiptValidator;
  ledger: SubscriptionLedger;
  sessions: SessionService;
  entitlements: EntitlementService;
}

export interface ServiceOverrides {
  clock?: Clock;
  receiptTransport?: ReceiptTransport;
}

/**
 * Wires every service to one database handle and one clock.
 */
export const createServices = (
  config: AppConfig,
  db: AppDatabase,
  { clock = systemClock, receiptTransport = postReceiptWithFetch }: ServiceOverrides = {}
): AppServices => {
  const users = new UserService(db, clock);
  const ledger = new SubscriptionLedger(db, clock);
  const sessions = new SessionService(config.jwt, clock);

  return {
    users,
    ledger,
    sessions,
    receipts: new ReceiptValidator(config.appleReceipt, receiptTransport),
    entitlements: new EntitlementService(sessions, ledger, clock),
  };
};

export { EntitlementService, ReceiptValidator, SessionService, SubscriptionLedger, UserService };
