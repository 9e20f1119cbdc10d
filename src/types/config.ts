export type ReceiptEnvironment = 'production' | 'sandbox';

export interface RateLimitConfig {
  readonly windowMs: number;
  readonly maxRequestsPerWindow: {
    readonly default: number;
    readonly auth: number;
  };
}

export interface JWTConfig {
  readonly secret: string;
  readonly expiresInSeconds: number;
  readonly issuer: string;
}

export interface AppleReceiptConfig {
  readonly sharedSecret: string;
  readonly environment: ReceiptEnvironment;
  readonly timeoutMs: number;
}

export interface AppConfig {
  readonly port: number;
  readonly nodeEnv: string;
  readonly databasePath: string;
  readonly corsOrigin: string;
  readonly appleReceipt: AppleReceiptConfig;
  readonly rateLimit: RateLimitConfig;
  readonly jwt: JWTConfig;
}
