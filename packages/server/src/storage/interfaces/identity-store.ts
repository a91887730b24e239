import type { Principal, ExternalUserInfo, ProvisionedAccount } from '@authgate/shared';
import type { Result } from '../../result.js';

/**
 * Identity store consumed by the session core
 *
 * The session core never manages users itself; it delegates credential checks,
 * lockout and security stamp changes to this interface so it can sit in front
 * of any user database.
 */
export interface IIdentityStore {
  findById(userId: string): Promise<Principal | null>;

  /**
   * Find a principal by user name or email
   */
  findByIdentifier(identifier: string): Promise<Principal | null>;

  /**
   * Verify a password in constant time
   */
  checkPassword(principal: Principal, password: string): Promise<boolean>;

  isLockedOut(principal: Principal): Promise<boolean>;

  /**
   * Record a failed password attempt; reports whether it caused a lockout
   */
  recordFailedAccess(principal: Principal): Promise<{ lockedOut: boolean }>;

  resetFailedAccess(principal: Principal): Promise<void>;

  /**
   * Replace the password and rotate the security stamp
   */
  updatePassword(principal: Principal, newPassword: string): Promise<void>;

  /**
   * Set the first password of an account that has none (external sign-up)
   * and rotate the security stamp; false if a password is already set
   */
  addPassword(principal: Principal, password: string): Promise<boolean>;

  /**
   * Issue a new security stamp, invalidating outstanding access tokens
   */
  rotateSecurityStamp(userId: string): Promise<void>;

  /**
   * Store the (pending) authenticator secret
   */
  setTwoFactorSecret(userId: string, secret: string): Promise<void>;

  /**
   * Enable or disable 2FA; disabling clears the secret and recovery codes
   */
  setTwoFactorEnabled(userId: string, enabled: boolean): Promise<void>;

  /**
   * Replace the recovery code pool with new hashes
   */
  replaceRecoveryCodes(userId: string, codeHashes: string[]): Promise<void>;

  /**
   * Remove a recovery code from the pool if present
   */
  redeemRecoveryCode(userId: string, codeHash: string): Promise<boolean>;

  countRecoveryCodes(userId: string): Promise<number>;
}

export type RemoveLoginOutcome = 'removed' | 'not_linked' | 'last_sign_in_method';

/**
 * Links external identities to local accounts
 */
export interface IExternalAccountProvisioner {
  /**
   * Use an existing link, else auto-link a verified email, else create an account
   */
  findOrProvision(provider: string, info: ExternalUserInfo): Promise<Result<ProvisionedAccount>>;

  findByLogin(provider: string, providerKey: string): Promise<Principal | null>;

  /**
   * Link a provider identity to a user; false if it belongs to another user
   */
  addLogin(userId: string, provider: string, providerKey: string): Promise<boolean>;

  /**
   * Names of the providers linked to a user
   */
  listLogins(userId: string): Promise<string[]>;

  /**
   * Unlink a provider (case-insensitive name), refusing to remove the only
   * way left to sign in: an account without a password keeps its last link
   */
  removeLogin(userId: string, provider: string): Promise<RemoveLoginOutcome>;
}
