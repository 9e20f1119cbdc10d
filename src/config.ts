import { ConfigurationError } from './middleware/error';
import type { AppConfig, ReceiptEnvironment } from './types/config';

type Env = Record<string, string | undefined>;

export const MIN_JWT_SECRET_LENGTH = 32;
export const SESSION_TTL_SECONDS = 30 * 24 * 60 * 60;

const validateEnvVars = (env: Env): void => {
  const requiredVars = [
    "JWT_SECRET",
    "APPLE_SHARED_SECRET",
  ] as const;

  const missingVars = requiredVars.filter((key) => !env[key]?.trim());

  if (missingVars.length > 0) {
    throw new ConfigurationError(
      `FATAL ERROR: Missing required environment variables: ${missingVars.join(", ")}`,
    );
  }

  const jwtSecret = env.JWT_SECRET ?? "";
  if (jwtSecret.length < MIN_JWT_SECRET_LENGTH) {
    throw new ConfigurationError(
      `FATAL ERROR: JWT_SECRET must be at least ${MIN_JWT_SECRET_LENGTH} characters`,
    );
  }
};

const positiveInt = (env: Env, key: string, fallback: number): number => {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`FATAL ERROR: ${key} must be a positive integer, got "${raw}"`);
  }
  return value;
};

const receiptEnvironment = (env: Env): ReceiptEnvironment => {
  const raw = env.APPLE_RECEIPT_ENVIRONMENT?.toLowerCase() || "production";
  if (raw !== "production" && raw !== "sandbox") {
    throw new ConfigurationError(
      `FATAL ERROR: APPLE_RECEIPT_ENVIRONMENT must be "production" or "sandbox", got "${raw}"`,
    );
  }
  return raw;
};

/**
 * Builds the application config from environment variables.
 * Throws a ConfigurationError instead of falling back to a default secret.
 */
export const loadConfig = (env: Env = process.env): AppConfig => {
  validateEnvVars(env);

  return {
    port: positiveInt(env, "PORT", 3001),
    nodeEnv: env.NODE_ENV || "development",
    databasePath: env.DATABASE_PATH || "entitlements.db",
    corsOrigin: env.CORS_ORIGIN || "*",

    appleReceipt: {
      sharedSecret: env.APPLE_SHARED_SECRET ?? "",
      environment: receiptEnvironment(env),
      timeoutMs: positiveInt(env, "APPLE_VERIFY_TIMEOUT_MS", 5000),
    },

    rateLimit: {
      windowMs: positiveInt(env, "RATE_LIMIT_WINDOW_MS", 15 * 60 * 1000),
      maxRequestsPerWindow: {
        default: positiveInt(env, "RATE_LIMIT_DEFAULT_MAX", 100),
        auth: positiveInt(env, "RATE_LIMIT_AUTH_MAX", 20),
      },
    },

    jwt: {
      secret: env.JWT_SECRET ?? "",
      expiresInSeconds: positiveInt(env, "SESSION_TTL_SECONDS", SESSION_TTL_SECONDS),
      issuer: "entitlement-bridge",
    },
  };
};
