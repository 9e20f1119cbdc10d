import { describe, expect, it } from '@jest/globals';
import { loadConfig, SESSION_TTL_SECONDS } from '@/config';
import { ConfigurationError } from '@/middleware/error';
import { TEST_JWT_SECRET, testEnv } from '@/test/utils/config';

describe('loadConfig', () => {
  it('applies defaults for optional settings', () => {
    const config = loadConfig({
      JWT_SECRET: TEST_JWT_SECRET,
      APPLE_SHARED_SECRET: 'test-shared-secret',
    });

    expect(config.port).toBe(3001);
    expect(config.nodeEnv).toBe('development');
    expect(config.databasePath).toBe('entitlements.db');
    expect(config.corsOrigin).toBe('*');
    expect(config.appleReceipt).toEqual({
      sharedSecret: 'test-shared-secret',
      environment: 'production',
      timeoutMs: 5000,
    });
    expect(config.rateLimit).toEqual({
      windowMs: 900000,
      maxRequestsPerWindow: { default: 100, auth: 20 },
    });
    expect(config.jwt).toEqual({
      secret: TEST_JWT_SECRET,
      expiresInSeconds: 2592000,
      issuer: 'entitlement-bridge',
    });
  });

  it('uses a thirty day session lifetime by default', () => {
    expect(SESSION_TTL_SECONDS).toBe(30 * 24 * 60 * 60);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig(testEnv({
      PORT: '8080',
      DATABASE_PATH: '/tmp/test.db',
      APPLE_RECEIPT_ENVIRONMENT: 'Sandbox',
      APPLE_VERIFY_TIMEOUT_MS: '2500',
      SESSION_TTL_SECONDS: '3600',
      CORS_ORIGIN: 'https://app.example.com',
    }));

    expect(config.port).toBe(8080);
    expect(config.nodeEnv).toBe('test');
    expect(config.databasePath).toBe('/tmp/test.db');
    expect(config.appleReceipt.environment).toBe('sandbox');
    expect(config.appleReceipt.timeoutMs).toBe(2500);
    expect(config.jwt.expiresInSeconds).toBe(3600);
    expect(config.corsOrigin).toBe('https://app.example.com');
  });

  it('refuses to start without a JWT secret', () => {
    expect(() => loadConfig({ APPLE_SHARED_SECRET: 'test-shared-secret' })).toThrow(
      'FATAL ERROR: Missing required environment variables: JWT_SECRET'
    );
  });

  it('lists every missing secret', () => {
    expect(() => loadConfig({ JWT_SECRET: '  ' })).toThrow(
      'FATAL ERROR: Missing required environment variables: JWT_SECRET, APPLE_SHARED_SECRET'
    );
  });

  it('rejects a short JWT secret', () => {
    expect(() => loadConfig(testEnv({ JWT_SECRET: 'too-short' }))).toThrow(
      'FATAL ERROR: JWT_SECRET must be at least 32 characters'
    );
  });

  it('throws ConfigurationError for non-numeric limits', () => {
    expect(() => loadConfig(testEnv({ PORT: 'abc' }))).toThrow(ConfigurationError);
    expect(() => loadConfig(testEnv({ RATE_LIMIT_AUTH_MAX: '0' }))).toThrow(
      'FATAL ERROR: RATE_LIMIT_AUTH_MAX must be a positive integer, got "0"'
    );
  });

  it('rejects an unknown receipt environment', () => {
    expect(() => loadConfig(testEnv({ APPLE_RECEIPT_ENVIRONMENT: 'staging' }))).toThrow(
      'FATAL ERROR: APPLE_RECEIPT_ENVIRONMENT must be "production" or "sandbox", got "staging"'
    );
  });
});
