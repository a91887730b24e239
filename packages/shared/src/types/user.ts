/**
 * Principal as seen by the session core
 *
 * Owned by the identity store. The password hash never leaves it.
 */
export interface Principal {
  id: string;
  userName: string;
  email?: string;
  emailConfirmed: boolean;
  securityStamp: string;
  twoFactorEnabled: boolean;
  twoFactorSecret?: string;
}

/**
 * Identity returned by an external provider after a code exchange
 */
export interface ExternalUserInfo {
  providerKey: string;
  email: string;
  emailVerified: boolean;
  firstName?: string;
  lastName?: string;
}

/**
 * Result of linking or creating a local account for an external identity
 */
export interface ProvisionedAccount {
  principal: Principal;
  isNewUser: boolean;
}
