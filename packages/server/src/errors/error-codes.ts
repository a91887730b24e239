/**
 * Session error kinds
 *
 * Closed taxonomy returned inside failed results. The kind is internal;
 * the public code and message are what reach the client.
 */

export const ERROR_INVALID_CREDENTIALS = 'InvalidCredentials' as const;
export const ERROR_ACCOUNT_LOCKED = 'AccountLocked' as const;
export const ERROR_UNAUTHORIZED = 'Unauthorized' as const;

// Refresh tokens
export const ERROR_TOKEN_MISSING = 'TokenMissing' as const;
export const ERROR_TOKEN_NOT_FOUND = 'TokenNotFound' as const;
export const ERROR_TOKEN_EXPIRED = 'TokenExpired' as const;
export const ERROR_TOKEN_INVALIDATED = 'TokenInvalidated' as const;
export const ERROR_TOKEN_REUSED = 'TokenReused' as const;

// Two-factor challenge
export const ERROR_CHALLENGE_NOT_FOUND = 'ChallengeNotFound' as const;
export const ERROR_CHALLENGE_EXPIRED = 'ChallengeExpired' as const;
export const ERROR_CHALLENGE_LOCKED = 'ChallengeLocked' as const;
export const ERROR_INVALID_CODE = 'InvalidCode' as const;

// External providers
export const ERROR_PROVIDER_EXCHANGE_FAILED = 'ProviderExchangeFailed' as const;
export const ERROR_NO_USABLE_EMAIL = 'NoUsableEmail' as const;

export const ERROR_VALIDATION = 'Validation' as const;

/**
 * All session error kinds
 */
export type AuthErrorKind =
  | typeof ERROR_INVALID_CREDENTIALS
  | typeof ERROR_ACCOUNT_LOCKED
  | typeof ERROR_UNAUTHORIZED
  | typeof ERROR_TOKEN_MISSING
  | typeof ERROR_TOKEN_NOT_FOUND
  | typeof ERROR_TOKEN_EXPIRED
  | typeof ERROR_TOKEN_INVALIDATED
  | typeof ERROR_TOKEN_REUSED
  | typeof ERROR_CHALLENGE_NOT_FOUND
  | typeof ERROR_CHALLENGE_EXPIRED
  | typeof ERROR_CHALLENGE_LOCKED
  | typeof ERROR_INVALID_CODE
  | typeof ERROR_PROVIDER_EXCHANGE_FAILED
  | typeof ERROR_NO_USABLE_EMAIL
  | typeof ERROR_VALIDATION;

export type ErrorStatusCode = 400 | 401 | 423;

/**
 * HTTP status codes per kind
 */
export const ERROR_STATUS_CODES: Record<AuthErrorKind, ErrorStatusCode> = {
  [ERROR_INVALID_CREDENTIALS]: 401,
  [ERROR_ACCOUNT_LOCKED]: 423,
  [ERROR_UNAUTHORIZED]: 401,
  [ERROR_TOKEN_MISSING]: 401,
  [ERROR_TOKEN_NOT_FOUND]: 401,
  [ERROR_TOKEN_EXPIRED]: 401,
  [ERROR_TOKEN_INVALIDATED]: 401,
  [ERROR_TOKEN_REUSED]: 401,
  [ERROR_CHALLENGE_NOT_FOUND]: 401,
  [ERROR_CHALLENGE_EXPIRED]: 401,
  [ERROR_CHALLENGE_LOCKED]: 401,
  [ERROR_INVALID_CODE]: 401,
  [ERROR_PROVIDER_EXCHANGE_FAILED]: 400,
  [ERROR_NO_USABLE_EMAIL]: 400,
  [ERROR_VALIDATION]: 400,
};

const INVALID_SESSION = 'invalid_session';

/**
 * Public error codes per kind
 *
 * Every refresh-token failure shares one code so the response never
 * reveals whether reuse was detected.
 */
export const ERROR_PUBLIC_CODES: Record<AuthErrorKind, string> = {
  [ERROR_INVALID_CREDENTIALS]: 'invalid_credentials',
  [ERROR_ACCOUNT_LOCKED]: 'account_locked',
  [ERROR_UNAUTHORIZED]: 'unauthorized',
  [ERROR_TOKEN_MISSING]: 'token_missing',
  [ERROR_TOKEN_NOT_FOUND]: INVALID_SESSION,
  [ERROR_TOKEN_EXPIRED]: INVALID_SESSION,
  [ERROR_TOKEN_INVALIDATED]: INVALID_SESSION,
  [ERROR_TOKEN_REUSED]: INVALID_SESSION,
  [ERROR_CHALLENGE_NOT_FOUND]: 'challenge_not_found',
  [ERROR_CHALLENGE_EXPIRED]: 'challenge_expired',
  [ERROR_CHALLENGE_LOCKED]: 'challenge_locked',
  [ERROR_INVALID_CODE]: 'invalid_code',
  [ERROR_PROVIDER_EXCHANGE_FAILED]: 'provider_exchange_failed',
  [ERROR_NO_USABLE_EMAIL]: 'no_usable_email',
  [ERROR_VALIDATION]: 'validation_error',
};

const SESSION_EXPIRED_MESSAGE = 'Your session has expired. Please log in again.';

/**
 * Default human-readable messages per kind
 */
export const ERROR_MESSAGES: Record<AuthErrorKind, string> = {
  [ERROR_INVALID_CREDENTIALS]: 'Invalid username or password.',
  [ERROR_ACCOUNT_LOCKED]:
    'Account is temporarily locked. Please try again later or contact an administrator.',
  [ERROR_UNAUTHORIZED]: 'User is not authenticated.',
  [ERROR_TOKEN_MISSING]: 'Refresh token is missing.',
  [ERROR_TOKEN_NOT_FOUND]: SESSION_EXPIRED_MESSAGE,
  [ERROR_TOKEN_EXPIRED]: SESSION_EXPIRED_MESSAGE,
  [ERROR_TOKEN_INVALIDATED]: SESSION_EXPIRED_MESSAGE,
  [ERROR_TOKEN_REUSED]: SESSION_EXPIRED_MESSAGE,
  [ERROR_CHALLENGE_NOT_FOUND]: 'Two-factor challenge not found or expired.',
  [ERROR_CHALLENGE_EXPIRED]: 'Two-factor challenge not found or expired.',
  [ERROR_CHALLENGE_LOCKED]: 'Too many failed attempts. Please log in again.',
  [ERROR_INVALID_CODE]: 'The verification code is invalid.',
  [ERROR_PROVIDER_EXCHANGE_FAILED]: 'Sign-in with the external provider failed.',
  [ERROR_NO_USABLE_EMAIL]: 'The external account has no verified or primary email address.',
  [ERROR_VALIDATION]: 'The request is invalid.',
};
