import type { ErrorResponse } from '@authgate/shared';
import {
  type AuthErrorKind,
  type ErrorStatusCode,
  ERROR_STATUS_CODES,
  ERROR_PUBLIC_CODES,
  ERROR_MESSAGES,
  ERROR_INVALID_CREDENTIALS,
  ERROR_ACCOUNT_LOCKED,
  ERROR_UNAUTHORIZED,
  ERROR_TOKEN_MISSING,
  ERROR_TOKEN_NOT_FOUND,
  ERROR_TOKEN_EXPIRED,
  ERROR_TOKEN_INVALIDATED,
  ERROR_TOKEN_REUSED,
  ERROR_CHALLENGE_NOT_FOUND,
  ERROR_CHALLENGE_EXPIRED,
  ERROR_CHALLENGE_LOCKED,
  ERROR_INVALID_CODE,
  ERROR_PROVIDER_EXCHANGE_FAILED,
  ERROR_NO_USABLE_EMAIL,
  ERROR_VALIDATION,
} from './error-codes.js';

/**
 * Expected failure of a session operation
 *
 * A value, not an exception: services return it inside a failed Result
 * and the HTTP boundary renders it with toJSON().
 */
export class AuthFailure {
  public readonly kind: AuthErrorKind;
  public readonly message: string;

  constructor(kind: AuthErrorKind, message?: string) {
    this.kind = kind;
    this.message = message ?? ERROR_MESSAGES[kind];
  }

  get statusCode(): ErrorStatusCode {
    return ERROR_STATUS_CODES[this.kind];
  }

  get publicCode(): string {
    return ERROR_PUBLIC_CODES[this.kind];
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): ErrorResponse {
    return {
      error: this.publicCode,
      error_description: this.message,
    };
  }

  static invalidCredentials(): AuthFailure {
    return new AuthFailure(ERROR_INVALID_CREDENTIALS);
  }

  static accountLocked(): AuthFailure {
    return new AuthFailure(ERROR_ACCOUNT_LOCKED);
  }

  static unauthorized(message?: string): AuthFailure {
    return new AuthFailure(ERROR_UNAUTHORIZED, message);
  }

  static tokenMissing(): AuthFailure {
    return new AuthFailure(ERROR_TOKEN_MISSING);
  }

  static tokenNotFound(): AuthFailure {
    return new AuthFailure(ERROR_TOKEN_NOT_FOUND);
  }

  static tokenExpired(): AuthFailure {
    return new AuthFailure(ERROR_TOKEN_EXPIRED);
  }

  static tokenInvalidated(): AuthFailure {
    return new AuthFailure(ERROR_TOKEN_INVALIDATED);
  }

  static tokenReused(): AuthFailure {
    return new AuthFailure(ERROR_TOKEN_REUSED);
  }

  static challengeNotFound(): AuthFailure {
    return new AuthFailure(ERROR_CHALLENGE_NOT_FOUND);
  }

  static challengeExpired(): AuthFailure {
    return new AuthFailure(ERROR_CHALLENGE_EXPIRED);
  }

  static challengeLocked(): AuthFailure {
    return new AuthFailure(ERROR_CHALLENGE_LOCKED);
  }

  static invalidCode(message?: string): AuthFailure {
    return new AuthFailure(ERROR_INVALID_CODE, message);
  }

  static providerExchangeFailed(message?: string): AuthFailure {
    return new AuthFailure(ERROR_PROVIDER_EXCHANGE_FAILED, message);
  }

  static noUsableEmail(): AuthFailure {
    return new AuthFailure(ERROR_NO_USABLE_EMAIL);
  }

  static validation(message?: string): AuthFailure {
    return new AuthFailure(ERROR_VALIDATION, message);
  }
}
