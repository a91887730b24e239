/**
 * Refresh Token (stored)
 *
 * Only the SHA-256 hash of the bearer value is persisted.
 */
export interface RefreshToken {
  id: string;
  userId: string;
  tokenHash: string;
  familyId: string;
  parentTokenId?: string;
  isPersistent: boolean;
  isUsed: boolean;
  isInvalidated: boolean;
  createdAt: Date;
  expiresAt: Date;
}

export interface CreateRefreshTokenInput {
  userId: string;
  tokenHash: string;
  familyId: string;
  parentTokenId?: string;
  isPersistent: boolean;
  createdAt: Date;
  expiresAt: Date;
}

/**
 * Two-factor challenge (stored)
 *
 * Bridges a correct password check to the second-factor step.
 */
export interface TwoFactorChallenge {
  id: string;
  userId: string;
  tokenHash: string;
  isRememberMe: boolean;
  isUsed: boolean;
  failedAttempts: number;
  createdAt: Date;
  expiresAt: Date;
}

export interface CreateTwoFactorChallengeInput {
  userId: string;
  tokenHash: string;
  isRememberMe: boolean;
  createdAt: Date;
  expiresAt: Date;
}

/**
 * External sign-in state (stored, single use)
 */
export interface ExternalAuthState {
  id: string;
  stateHash: string;
  provider: string;
  redirectUri: string;
  /**
   * Set when a signed-in user started the redirect to link the provider
   */
  userId?: string;
  isUsed: boolean;
  createdAt: Date;
  expiresAt: Date;
}

export interface CreateExternalAuthStateInput {
  stateHash: string;
  provider: string;
  redirectUri: string;
  userId?: string;
  createdAt: Date;
  expiresAt: Date;
}

/**
 * Freshly issued access/refresh pair
 */
export interface TokenPair {
  accessToken: string;
  accessTokenExpiresAt: Date;
  refreshToken: string;
  refreshTokenExpiresAt: Date;
  isPersistent: boolean;
}

/**
 * Access token claim set
 */
export interface AccessTokenClaims {
  sub: string;
  iss: string;
  aud: string | string[];
  iat: number;
  nbf: number;
  exp: number;
  jti: string;
  unique_name: string;
  /**
   * Hash of the security stamp, keyed by the configured claim name
   */
  securityStampHash: string;
}
