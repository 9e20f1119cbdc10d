import fetch, { type Response } from 'node-fetch';
import type { z } from 'zod';
import {
  SIGN_IN_FAILED_MESSAGE,
  authResponseSchema,
  errorResponseSchema,
  subscriptionStatusResponseSchema,
  type AppleAuthRequest,
  type SubscriptionStatusResponse,
  type UserSummary,
} from '@/types/api';
import { formatError } from '@/utils/error-formatter';
import { log } from '@/utils/logger';

export interface StoredSession {
  token: string;
  user: UserSummary;
}

/**
 * Where the client keeps the session between calls (localStorage on the web, Keychain on iOS).
 */
export interface SessionStore {
  load(): StoredSession | null;
  save(session: StoredSession): void;
  clear(): void;
}

export class MemorySessionStore implements SessionStore {
  private session: StoredSession | null = null;

  load(): StoredSession | null {
    return this.session;
  }

  save(session: StoredSession): void {
    this.session = session;
  }

  clear(): void {
    this.session = null;
  }
}

export class EntitlementClientError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'EntitlementClientError';
  }
}

export interface EntitlementClientOptions {
  baseUrl: string;
  store?: SessionStore;
  timeoutMs?: number;
}

const NOT_ACTIVE: SubscriptionStatusResponse = { isActive: false };

/**
 * Client for the sign-in and subscription status endpoints, shared by the web and mobile front ends.
 */
export class EntitlementClient {
  private readonly baseUrl: string;
  private readonly store: SessionStore;
  private readonly timeoutMs: number;

  constructor({ baseUrl, store = new MemorySessionStore(), timeoutMs = 10_000 }: EntitlementClientOptions) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.store = store;
    this.timeoutMs = timeoutMs;
  }

  isAuthenticated(): boolean {
    return this.store.load() !== null;
  }

  currentUser(): UserSummary | null {
    return this.store.load()?.user ?? null;
  }

  /**
   * Exchanges the platform identity (and the App Store receipt, when there is one) for a session.
   * The session is stored before the promise resolves.
   */
  async signIn(credentials: AppleAuthRequest): Promise<StoredSession> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/auth/apple`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          platformUserId: credentials.platformUserId,
          email: credentials.email ?? '',
          receiptData: credentials.receiptData ?? '',
        }),
        timeout: this.timeoutMs,
      });
    } catch (error) {
      log.error('Sign-in request failed', { error: formatError(error) });
      throw new EntitlementClientError(SIGN_IN_FAILED_MESSAGE);
    }

    const body = await this.readJson(response);
    if (!response.ok) {
      const failure = errorResponseSchema.safeParse(body);
      log.warn('Sign-in rejected', {
        statusCode: response.status,
        error: failure.success ? failure.data.message : 'unreadable error body',
      });
      throw new EntitlementClientError(
        SIGN_IN_FAILED_MESSAGE,
        response.status,
        failure.success ? failure.data.error : undefined
      );
    }

    const auth = this.parse(authResponseSchema, body, 'sign-in');
    const session: StoredSession = { token: auth.token, user: auth.user };
    this.store.save(session);
    return session;
  }

  /**
   * Current entitlement for the stored session. A rejected token signs the client out.
   */
  async checkSubscriptionStatus(): Promise<SubscriptionStatusResponse> {
    const session = this.store.load();
    if (!session) {
      return NOT_ACTIVE;
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/subscription/status`, {
        headers: { Authorization: `Bearer ${session.token}` },
        timeout: this.timeoutMs,
      });
    } catch (error) {
      log.error('Subscription status request failed', { error: formatError(error) });
      throw new EntitlementClientError('Could not check subscription status');
    }

    if (response.status === 401) {
      log.info('Session rejected by server, signing out');
      this.store.clear();
      return NOT_ACTIVE;
    }

    const body = await this.readJson(response);
    if (!response.ok) {
      throw new EntitlementClientError('Could not check subscription status', response.status);
    }
    return this.parse(subscriptionStatusResponseSchema, body, 'subscription status');
  }

  signOut(): void {
    this.store.clear();
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw new EntitlementClientError(`Invalid JSON from server: ${formatError(error)}`, response.status);
    }
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new EntitlementClientError(`Unexpected ${what} response: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
