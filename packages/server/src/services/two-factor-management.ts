import type { Principal, TwoFactorSetupResponse, RecoveryCodesResponse } from '@authgate/shared';
import type { IIdentityStore } from '../storage/interfaces/index.js';
import { type ITotpProvider, generateRecoveryCodes, hashRecoveryCode } from '../crypto/index.js';
import { AuthFailure } from '../errors/auth-failure.js';
import { type Result, ok, err } from '../result.js';
import type { AuditTrail } from './audit.js';
import type { CacheInvalidator } from './principal-cache.js';

export interface TwoFactorManagementDeps {
  identityStore: IIdentityStore;
  totp: ITotpProvider;
  audit: AuditTrail;
  cache: CacheInvalidator;
  issuer: string;
}

/**
 * Authenticator enrolment, recovery codes and disabling 2FA
 */
export class TwoFactorManagementService {
  constructor(private readonly deps: TwoFactorManagementDeps) {}

  /**
   * Start enrolment: store a pending secret and return it with its otpauth:// URI
   */
  async setup(userId: string): Promise<Result<TwoFactorSetupResponse>> {
    const principal = await this.deps.identityStore.findById(userId);
    if (!principal) {
      return err(AuthFailure.unauthorized());
    }
    if (principal.twoFactorEnabled) {
      return err(AuthFailure.validation('Two-factor authentication is already enabled.'));
    }

    const sharedKey = this.deps.totp.generateSecret();
    await this.deps.identityStore.setTwoFactorSecret(userId, sharedKey);

    return ok({
      sharedKey,
      authenticatorUri: this.deps.totp.buildUri(
        sharedKey,
        this.deps.issuer,
        principal.email ?? principal.userName
      ),
    });
  }

  /**
   * Confirm enrolment with a code from the authenticator
   */
  async enable(userId: string, code: string): Promise<Result<RecoveryCodesResponse>> {
    const principal = await this.deps.identityStore.findById(userId);
    if (!principal) {
      return err(AuthFailure.unauthorized());
    }
    if (principal.twoFactorEnabled) {
      return err(AuthFailure.validation('Two-factor authentication is already enabled.'));
    }
    if (!principal.twoFactorSecret) {
      return err(AuthFailure.validation('Two-factor setup has not been started.'));
    }
    if (!this.deps.totp.verify(principal.twoFactorSecret, code)) {
      return err(AuthFailure.invalidCode());
    }

    await this.deps.identityStore.setTwoFactorEnabled(userId, true);
    const recoveryCodes = await this.replaceRecoveryCodes(userId);
    await this.deps.cache.invalidate(userId);

    this.deps.audit.record('TwoFactorEnabled', { userId });

    return ok({ recoveryCodes });
  }

  async disable(userId: string, password: string): Promise<Result<void>> {
    const principal = await this.confirmPassword(userId, password);
    if (!principal.ok) return principal;

    if (!principal.value.twoFactorEnabled) {
      return err(AuthFailure.validation('Two-factor authentication is not enabled.'));
    }

    await this.deps.identityStore.setTwoFactorEnabled(userId, false);
    await this.deps.cache.invalidate(userId);

    this.deps.audit.record('TwoFactorDisabled', { userId });

    return ok(undefined);
  }

  async regenerateRecoveryCodes(userId: string, password: string): Promise<Result<RecoveryCodesResponse>> {
    const principal = await this.confirmPassword(userId, password);
    if (!principal.ok) return principal;

    if (!principal.value.twoFactorEnabled) {
      return err(AuthFailure.validation('Two-factor authentication is not enabled.'));
    }

    const recoveryCodes = await this.replaceRecoveryCodes(userId);
    this.deps.audit.record('RecoveryCodesRegenerated', { userId });

    return ok({ recoveryCodes });
  }

  private async confirmPassword(userId: string, password: string): Promise<Result<Principal>> {
    const principal = await this.deps.identityStore.findById(userId);
    if (!principal) {
      return err(AuthFailure.unauthorized());
    }
    if (!(await this.deps.identityStore.checkPassword(principal, password))) {
      return err(AuthFailure.invalidCredentials());
    }
    return ok(principal);
  }

  private async replaceRecoveryCodes(userId: string): Promise<string[]> {
    const recoveryCodes = generateRecoveryCodes();
    await this.deps.identityStore.replaceRecoveryCodes(userId, recoveryCodes.map(hashRecoveryCode));
    return recoveryCodes;
  }
}
