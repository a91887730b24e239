/**
 * Session core constants
 */

// Opaque token entropy (bytes): refresh tokens, challenges, external state
export const OPAQUE_TOKEN_BYTES = 32;

// Signing
export const JWT_ALGORITHM = 'HS256' as const;
export const MIN_SIGNING_KEY_BYTES = 32;
export const DEFAULT_SECURITY_STAMP_CLAIM = 'security_stamp';
export const RESERVED_CLAIMS = [
  'sub',
  'email',
  'jti',
  'unique_name',
  'iss',
  'aud',
  'exp',
  'nbf',
  'iat',
  'role',
  'permission',
] as const;

// Access token lifetime (seconds)
export const DEFAULT_ACCESS_TOKEN_LIFETIME = 600; // 10 minutes
export const MIN_ACCESS_TOKEN_LIFETIME = 60; // 1 minute
export const MAX_ACCESS_TOKEN_LIFETIME = 7200; // 2 hours

// Refresh token lifetimes (seconds)
export const DEFAULT_PERSISTENT_LIFETIME = 604800; // 7 days
export const MIN_PERSISTENT_LIFETIME = 86400; // 1 day
export const MAX_PERSISTENT_LIFETIME = 31536000; // 365 days
export const DEFAULT_SESSION_LIFETIME = 86400; // 24 hours
export const MIN_SESSION_LIFETIME = 600; // 10 minutes
export const MAX_SESSION_LIFETIME = 2592000; // 30 days

// Two-factor challenge
export const DEFAULT_CHALLENGE_LIFETIME = 300; // 5 minutes
export const MIN_CHALLENGE_LIFETIME = 60;
export const MAX_CHALLENGE_LIFETIME = 900;
export const DEFAULT_MAX_FAILED_ATTEMPTS = 5;
export const MAX_MAX_FAILED_ATTEMPTS = 10;
export const DEFAULT_TWO_FACTOR_ISSUER = 'Authgate';

// Recovery codes
export const RECOVERY_CODE_COUNT = 10;
export const RECOVERY_CODE_LENGTH = 8;
export const RECOVERY_CODE_ALPHABET = '0123456789ABCDEFGHJKLMNPQRSTUVWXYZ';

// TOTP (RFC 6238)
export const TOTP_PERIOD = 30;
export const TOTP_DIGITS = 6;

// External sign-in
export const DEFAULT_STATE_LIFETIME = 600; // 10 minutes
export const MIN_STATE_LIFETIME = 60;
export const MAX_STATE_LIFETIME = 1800;
export const DEFAULT_PROVIDER_TIMEOUT_MS = 10000;

// Identity store lockout (in-memory identity store)
export const DEFAULT_MAX_FAILED_ACCESS_ATTEMPTS = 5;
export const DEFAULT_LOCKOUT_DURATION = 900; // 15 minutes

// Principal cache
export const DEFAULT_PRINCIPAL_CACHE_TTL = 300; // 5 minutes

// Retention sweep
export const DEFAULT_RETENTION_SWEEP_INTERVAL_MS = 3600000; // 1 hour
export const DEFAULT_RETENTION_GRACE_PERIOD = 86400; // 1 day

// Cookies
export const ACCESS_TOKEN_COOKIE = 'access_token';
export const REFRESH_TOKEN_COOKIE = 'refresh_token';

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';

// Cache-Control values
export const NO_STORE_CACHE_CONTROL = 'no-store';
export const NO_CACHE_PRAGMA = 'no-cache';
