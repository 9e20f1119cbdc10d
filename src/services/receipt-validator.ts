import fetch from 'node-fetch';
import { z } from 'zod';
import { ExternalServiceError, ValidationError } from '@/middleware/error';
import type { AppleReceiptConfig, ReceiptEnvironment } from '@/types/config';
import { formatError } from '@/utils/error-formatter';
import { log } from '@/utils/logger';

// Apple verification endpoints
export const APPLE_VERIFICATION_ENDPOINTS = {
  production: 'https://buy.itunes.apple.com/verifyReceipt',
  sandbox: 'https://sandbox.itunes.apple.com/verifyReceipt',
} as const satisfies Record<ReceiptEnvironment, string>;

const SERVICE_NAME = 'App Store receipt verification';

export const APPLE_STATUS = {
  OK: 0,
  BAD_JSON: 21000,
  MALFORMED_RECEIPT: 21002,
  NOT_AUTHENTICATED: 21003,
  SHARED_SECRET_MISMATCH: 21004,
  SERVER_UNAVAILABLE: 21005,
  SUBSCRIPTION_EXPIRED: 21006,
  SANDBOX_RECEIPT: 21007,
  PRODUCTION_RECEIPT: 21008,
  INTERNAL_DATA_ACCESS: 21009,
  UNAUTHORIZED_RECEIPT: 21010,
} as const;

// Statuses that blame the receipt itself rather than the verification service
const CALLER_FAULT_STATUSES: ReadonlySet<number> = new Set([
  APPLE_STATUS.BAD_JSON,
  APPLE_STATUS.MALFORMED_RECEIPT,
  APPLE_STATUS.NOT_AUTHENTICATED,
  APPLE_STATUS.UNAUTHORIZED_RECEIPT,
]);

// 21006 still carries the decoded receipt; the lapsed expiry is handled by the ledger query
const VERIFIED_STATUSES: ReadonlySet<number> = new Set([
  APPLE_STATUS.OK,
  APPLE_STATUS.SUBSCRIPTION_EXPIRED,
]);

const STATUS_MESSAGES: Record<number, string> = {
  21000: 'The App Store could not read the JSON object you provided.',
  21002: 'The data in the receipt-data property was malformed.',
  21003: 'The receipt could not be authenticated.',
  21004: 'The shared secret you provided does not match the shared secret on file for your account.',
  21005: 'The receipt server is not currently available.',
  21007: 'This receipt is from the test environment, but it was sent to the production environment for verification.',
  21008: 'This receipt is from the production environment, but it was sent to the test environment for verification.',
  21009: 'Internal data access error.',
  21010: 'This receipt could not be authorized.',
};

export const describeAppleStatus = (status: number): string => {
  if (STATUS_MESSAGES[status]) return STATUS_MESSAGES[status];
  if (status >= 21100 && status <= 21199) return 'Internal data access error.';
  return `Unknown status code: ${status}`;
};

export interface VerifyReceiptRequestBody {
  'receipt-data': string;
  password: string;
  'exclude-old-transactions': boolean;
}

/**
 * Posts a verification request and resolves with the decoded JSON body.
 * Rejects on network failure, timeout or a non-2xx HTTP status.
 */
export type ReceiptTransport = (
  url: string,
  body: VerifyReceiptRequestBody,
  timeoutMs: number
) => Promise<unknown>;

export const postReceiptWithFetch: ReceiptTransport = async (url, body, timeoutMs) => {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
    timeout: timeoutMs,
  });

  if (!response.ok) {
    throw new Error(`Apple verification failed with HTTP status ${response.status}`);
  }

  return response.json();
};

const verifyReceiptResponseSchema = z.object({
  status: z.number().int(),
  environment: z.string().optional(),
  receipt: z.object({
    in_app: z.array(z.unknown()).optional(),
  }).passthrough().nullable().optional(),
  latest_receipt_info: z.array(z.unknown()).optional(),
}).passthrough();

type VerifyReceiptResponse = z.infer<typeof verifyReceiptResponseSchema>;

const purchaseEntrySchema = z.object({
  transaction_id: z.string().min(1),
  product_id: z.string().min(1),
  expires_date_ms: z.string().regex(/^\d+$/).optional(),
});

export interface ReceiptPurchase {
  transactionId: string;
  productId: string;
  expiresAt: Date;
}

export type ReceiptOutcome =
  | { kind: 'purchase'; purchase: ReceiptPurchase; environment: ReceiptEnvironment }
  | { kind: 'none'; reason: 'empty_receipt' | 'no_purchases' };

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Local shape check run before any network call: receipts are base64, possibly wrapped.
 */
export const isWellFormedReceipt = (receiptData: string): boolean => {
  const compact = receiptData.replace(/\s+/g, '');
  return compact.length > 0 && BASE64_PATTERN.test(compact);
};

/**
 * Picks the purchase with the latest expiration among the entries.
 * Entries without a usable expiration (consumables, malformed rows) are skipped.
 */
export const selectLatestPurchase = (entries: readonly unknown[]): ReceiptPurchase | null => {
  let latest: ReceiptPurchase | null = null;

  for (const entry of entries) {
    const parsed = purchaseEntrySchema.safeParse(entry);
    if (!parsed.success || parsed.data.expires_date_ms === undefined) {
      continue;
    }
    const expiresMs = Number(parsed.data.expires_date_ms);
    // Date only holds +/-8.64e15 ms; anything past that is an Invalid Date
    if (Number.isNaN(new Date(expiresMs).getTime())) continue;

    if (!latest || expiresMs > latest.expiresAt.getTime()) {
      latest = {
        transactionId: parsed.data.transaction_id,
        productId: parsed.data.product_id,
        expiresAt: new Date(expiresMs),
      };
    }
  }

  return latest;
};

export type ReceiptValidatorOptions = AppleReceiptConfig;

/**
 * Verifies opaque App Store receipts against Apple's verifyReceipt endpoint.
 *
 * Resolves with a purchase or with "nothing to record". Throws ValidationError when the
 * receipt itself is at fault and ExternalServiceError when the verification service could
 * not give an answer (network, timeout, unexpected status or payload).
 */
export class ReceiptValidator {
  constructor(
    private readonly options: ReceiptValidatorOptions,
    private readonly transport: ReceiptTransport = postReceiptWithFetch
  ) {}

  async verifyReceipt(receiptData: string): Promise<ReceiptOutcome> {
    if (!receiptData.trim()) {
      log.debug('Empty receipt, nothing to verify');
      return { kind: 'none', reason: 'empty_receipt' };
    }
    if (!isWellFormedReceipt(receiptData)) {
      throw new ValidationError('Receipt data must be base64 encoded');
    }

    let environment = this.options.environment;
    let response = await this.post(environment, receiptData);

    // Retry once against the other environment when Apple says we picked the wrong one
    if (response.status === APPLE_STATUS.SANDBOX_RECEIPT && environment === 'production') {
      log.info('Receipt is from sandbox environment, retrying with sandbox endpoint...');
      environment = 'sandbox';
      response = await this.post(environment, receiptData);
    } else if (response.status === APPLE_STATUS.PRODUCTION_RECEIPT && environment === 'sandbox') {
      log.info('Receipt is from production environment, retrying with production endpoint...');
      environment = 'production';
      response = await this.post(environment, receiptData);
    }

    return this.interpret(response, environment);
  }

  private async post(environment: ReceiptEnvironment, receiptData: string): Promise<VerifyReceiptResponse> {
    const url = APPLE_VERIFICATION_ENDPOINTS[environment];
    let body: unknown;
    try {
      body = await this.transport(url, {
        'receipt-data': receiptData,
        password: this.options.sharedSecret,
        'exclude-old-transactions': true,
      }, this.options.timeoutMs);
    } catch (error) {
      log.warn('Receipt verification request failed', { environment, error: formatError(error) });
      throw new ExternalServiceError(formatError(error), SERVICE_NAME);
    }

    const parsed = verifyReceiptResponseSchema.safeParse(body);
    if (!parsed.success) {
      log.warn('Receipt verification returned an unexpected payload', { environment, error: parsed.error.message });
      throw new ExternalServiceError('Unexpected response payload', SERVICE_NAME);
    }
    return parsed.data;
  }

  private interpret(response: VerifyReceiptResponse, environment: ReceiptEnvironment): ReceiptOutcome {
    const { status } = response;

    if (CALLER_FAULT_STATUSES.has(status)) {
      log.warn('Receipt rejected by App Store', { status, environment });
      throw new ValidationError(`Receipt rejected: ${describeAppleStatus(status)}`);
    }
    if (!VERIFIED_STATUSES.has(status)) {
      log.error('Receipt verification did not succeed', { status, environment, reason: describeAppleStatus(status) });
      throw new ExternalServiceError(describeAppleStatus(status), SERVICE_NAME);
    }

    const entries = [
      ...(response.latest_receipt_info ?? []),
      ...(response.receipt?.in_app ?? []),
    ];
    const purchase = selectLatestPurchase(entries);

    if (!purchase) {
      log.info('Verified receipt contains no subscription purchases', { environment, entryCount: entries.length });
      return { kind: 'none', reason: 'no_purchases' };
    }

    log.info('Receipt verified', {
      environment,
      transactionId: purchase.transactionId,
      productId: purchase.productId,
      expiresAt: purchase.expiresAt.toISOString(),
    });
    return { kind: 'purchase', purchase, environment };
  }
}
