import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import * as constants from './constants.js';
import { ConfigurationError } from '../errors/faults.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('config');

type Env = Record<string, string | undefined>;

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(env: Env, envVar: string): string | undefined {
  // Check for file-based secret first (Docker secrets pattern)
  const filePath = env[`${envVar}_FILE`];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (error) {
      logger.warn('Could not read secret file', {
        path: filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // Fall back to direct environment variable
  return env[envVar];
}

const reservedClaims: readonly string[] = constants.RESERVED_CLAIMS;

const seconds = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

/**
 * Access token signing options
 */
export const jwtOptionsSchema = z.object({
  signingKey: z
    .string({ required_error: 'signing key is required' })
    .refine((key) => Buffer.byteLength(key, 'utf8') >= constants.MIN_SIGNING_KEY_BYTES, {
      message: `signing key must be at least ${constants.MIN_SIGNING_KEY_BYTES} bytes`,
    }),
  issuer: z.string().trim().min(1, 'issuer is required'),
  audience: z.string().trim().min(1, 'audience is required'),
  accessTokenLifetime: seconds(
    constants.DEFAULT_ACCESS_TOKEN_LIFETIME,
    constants.MIN_ACCESS_TOKEN_LIFETIME,
    constants.MAX_ACCESS_TOKEN_LIFETIME
  ),
  securityStampClaim: z
    .string()
    .trim()
    .min(1)
    .default(constants.DEFAULT_SECURITY_STAMP_CLAIM)
    .refine(
      (claim) => !reservedClaims.includes(claim.toLowerCase()),
      { message: 'security stamp claim collides with a reserved claim' }
    ),
});

export type JwtOptions = z.infer<typeof jwtOptionsSchema>;

export const refreshTokenOptionsSchema = z
  .object({
    persistentLifetime: seconds(
      constants.DEFAULT_PERSISTENT_LIFETIME,
      constants.MIN_PERSISTENT_LIFETIME,
      constants.MAX_PERSISTENT_LIFETIME
    ),
    sessionLifetime: seconds(
      constants.DEFAULT_SESSION_LIFETIME,
      constants.MIN_SESSION_LIFETIME,
      constants.MAX_SESSION_LIFETIME
    ),
    reuseRevocationScope: z.enum(['user', 'family']).default('user'),
  })
  .refine((options) => options.sessionLifetime <= options.persistentLifetime, {
    message: 'session lifetime must not exceed persistent lifetime',
    path: ['sessionLifetime'],
  });

export type RefreshTokenOptions = z.infer<typeof refreshTokenOptionsSchema>;

export const twoFactorOptionsSchema = z.object({
  issuer: z.string().trim().min(1).default(constants.DEFAULT_TWO_FACTOR_ISSUER),
  challengeLifetime: seconds(
    constants.DEFAULT_CHALLENGE_LIFETIME,
    constants.MIN_CHALLENGE_LIFETIME,
    constants.MAX_CHALLENGE_LIFETIME
  ),
  maxFailedAttempts: z.coerce
    .number()
    .int()
    .min(1)
    .max(constants.MAX_MAX_FAILED_ATTEMPTS)
    .default(constants.DEFAULT_MAX_FAILED_ATTEMPTS),
});

export type TwoFactorOptions = z.infer<typeof twoFactorOptionsSchema>;

const providerCredentialsSchema = z.object({
  clientId: z.string().trim().min(1, 'client id is required'),
  clientSecret: z.string().trim().min(1, 'client secret is required'),
});

export type ProviderCredentials = z.infer<typeof providerCredentialsSchema>;

export const externalAuthOptionsSchema = z
  .object({
    allowedRedirectUris: z.array(z.string().url('redirect URIs must be absolute')).default([]),
    stateLifetime: seconds(
      constants.DEFAULT_STATE_LIFETIME,
      constants.MIN_STATE_LIFETIME,
      constants.MAX_STATE_LIFETIME
    ),
    timeoutMs: z.coerce.number().int().min(1000).max(60000).default(constants.DEFAULT_PROVIDER_TIMEOUT_MS),
    providers: z
      .object({
        google: providerCredentialsSchema.optional(),
        github: providerCredentialsSchema.optional(),
      })
      .default({}),
  })
  .refine(
    (options) =>
      options.allowedRedirectUris.length > 0 ||
      (options.providers.google === undefined && options.providers.github === undefined),
    {
      message: 'at least one allowed redirect URI is required when a provider is enabled',
      path: ['allowedRedirectUris'],
    }
  );

export type ExternalAuthOptions = z.infer<typeof externalAuthOptionsSchema>;

export const configSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().min(1).max(65535).default(3000),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.string().default('development'),
  }),
  database: z.object({
    url: z.string().url().optional(),
    statementTimeoutMs: z.coerce.number().int().min(100).default(5000),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  }),
  jwt: jwtOptionsSchema,
  refreshTokens: refreshTokenOptionsSchema,
  twoFactor: twoFactorOptionsSchema,
  externalAuth: externalAuthOptionsSchema,
  cookies: z.object({
    secure: z.boolean(),
  }),
  retention: z.object({
    sweepIntervalMs: z.coerce
      .number()
      .int()
      .min(1000)
      .default(constants.DEFAULT_RETENTION_SWEEP_INTERVAL_MS),
    gracePeriod: z.coerce.number().int().min(0).default(constants.DEFAULT_RETENTION_GRACE_PERIOD),
  }),
  // Seed account for in-memory development runs
  devUser: z
    .object({
      userName: z.string().trim().min(1),
      password: z.string().min(8),
    })
    .optional(),
});

/**
 * Application configuration
 */
export type Config = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

/**
 * Format zod issues as `path: message`
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Validate a section of configuration, throwing ConfigurationError on failure
 */
export function parseOptions<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  section: string
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${section} configuration`, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Validate a complete configuration object
 */
export function parseConfig(input: ConfigInput): Config {
  return parseOptions(configSchema, input, 'server');
}

function providerFromEnv(env: Env, prefix: string): ProviderCredentials | undefined {
  const clientId = env[`${prefix}_CLIENT_ID`];
  const clientSecret = readSecret(env, `${prefix}_CLIENT_SECRET`);

  if (!clientId && !clientSecret) {
    return undefined;
  }
  return { clientId: clientId ?? '', clientSecret: clientSecret ?? '' };
}

function devUserFromEnv(env: Env): { userName: string; password: string | undefined } | undefined {
  const userName = env['DEV_USER_NAME'];
  if (!userName) {
    return undefined;
  }
  return { userName, password: readSecret(env, 'DEV_USER_PASSWORD') };
}

function listFromEnv(value: string | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = env['NODE_ENV'] ?? 'development';
  const cookieSecure = env['COOKIE_SECURE'];

  const raw = {
    server: {
      port: env['PORT'],
      host: env['HOST'],
      nodeEnv,
    },
    database: {
      url: env['DATABASE_URL'],
      statementTimeoutMs: env['DATABASE_STATEMENT_TIMEOUT_MS'],
    },
    logging: {
      level: env['LOG_LEVEL'],
    },
    jwt: {
      signingKey: readSecret(env, 'JWT_SIGNING_KEY'),
      issuer: env['JWT_ISSUER'] ?? '',
      audience: env['JWT_AUDIENCE'] ?? '',
      accessTokenLifetime: env['ACCESS_TOKEN_LIFETIME_SECONDS'],
      securityStampClaim: env['SECURITY_STAMP_CLAIM'],
    },
    refreshTokens: {
      persistentLifetime: env['REFRESH_TOKEN_PERSISTENT_LIFETIME_SECONDS'],
      sessionLifetime: env['REFRESH_TOKEN_SESSION_LIFETIME_SECONDS'],
      reuseRevocationScope: env['REFRESH_TOKEN_REUSE_SCOPE'],
    },
    twoFactor: {
      issuer: env['TWO_FACTOR_ISSUER'],
      challengeLifetime: env['TWO_FACTOR_CHALLENGE_LIFETIME_SECONDS'],
      maxFailedAttempts: env['TWO_FACTOR_MAX_FAILED_ATTEMPTS'],
    },
    externalAuth: {
      allowedRedirectUris: listFromEnv(env['EXTERNAL_AUTH_ALLOWED_REDIRECT_URIS']),
      stateLifetime: env['EXTERNAL_AUTH_STATE_LIFETIME_SECONDS'],
      timeoutMs: env['EXTERNAL_AUTH_TIMEOUT_MS'],
      providers: {
        google: providerFromEnv(env, 'GOOGLE'),
        github: providerFromEnv(env, 'GITHUB'),
      },
    },
    cookies: {
      secure: cookieSecure !== undefined ? cookieSecure === 'true' : nodeEnv === 'production',
    },
    retention: {
      sweepIntervalMs: env['RETENTION_SWEEP_INTERVAL_MS'],
      gracePeriod: env['RETENTION_GRACE_PERIOD_SECONDS'],
    },
    devUser: devUserFromEnv(env),
  };

  return parseOptions(configSchema, raw, 'server');
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
