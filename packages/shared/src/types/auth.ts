/**
 * Response body for a completed sign-in or refresh
 *
 * Token values are omitted when they were delivered as cookies.
 */
export interface AuthenticationResponse {
  requiresTwoFactor: false;
  accessToken?: string;
  refreshToken?: string;
  accessTokenExpiresAt: string;
  refreshTokenExpiresAt: string;
  isNewUser?: boolean;
  provider?: string;
}

export interface TwoFactorRequiredResponse {
  requiresTwoFactor: true;
  challengeToken: string;
}

export type LoginResponse = AuthenticationResponse | TwoFactorRequiredResponse;

/**
 * Error response body
 */
export interface ErrorResponse {
  error: string;
  error_description?: string;
}

export interface TwoFactorSetupResponse {
  sharedKey: string;
  authenticatorUri: string;
}

export interface RecoveryCodesResponse {
  recoveryCodes: string[];
}

export interface ExternalProviderSummary {
  name: string;
  displayName: string;
}

export interface ExternalChallengeResponse {
  authorizationUrl: string;
}

/**
 * Callback answer when the provider was linked to the signed-in user
 */
export interface ExternalLinkResponse {
  provider: string;
  isLinkOnly: true;
}

export interface LinkedProvidersResponse {
  providers: string[];
}

export interface CurrentUserResponse {
  id: string;
  userName: string;
  email?: string;
  twoFactorEnabled: boolean;
}
