import type { Principal, ExternalUserInfo, ProvisionedAccount } from '@authgate/shared';
import type {
  IIdentityStore,
  IExternalAccountProvisioner,
  RemoveLoginOutcome,
} from '../interfaces/identity-store.js';
import { type Result, ok, err } from '../../result.js';
import { AuthFailure } from '../../errors/auth-failure.js';
import { type IClock, systemClock, addSeconds } from '../../services/clock.js';
import {
  generateId,
  generateSecurityStamp,
  hashPassword,
  verifyPassword,
} from '../../crypto/index.js';
import {
  DEFAULT_MAX_FAILED_ACCESS_ATTEMPTS,
  DEFAULT_LOCKOUT_DURATION,
} from '../../config/constants.js';

interface StoredUser {
  principal: Principal;
  passwordHash?: string;
  failedAccessCount: number;
  lockoutEnd?: Date;
  recoveryCodeHashes: Set<string>;
}

interface ExternalLogin {
  provider: string;
  providerKey: string;
  userId: string;
}

function loginKey(provider: string, providerKey: string): string {
  return `${provider.toLowerCase()}:${providerKey}`;
}

export interface MemoryIdentityStoreOptions {
  clock?: IClock;
  maxFailedAccessAttempts?: number;
  /**
   * Lockout duration in seconds
   */
  lockoutDuration?: number;
}

export interface CreateUserInput {
  userName: string;
  email?: string;
  emailConfirmed?: boolean;
  password?: string;
}

/**
 * In-memory identity store and external account provisioner
 *
 * Development and test stand-in for a real user database.
 */
export class MemoryIdentityStore implements IIdentityStore, IExternalAccountProvisioner {
  private users = new Map<string, StoredUser>();
  private externalLogins = new Map<string, ExternalLogin>();

  private readonly clock: IClock;
  private readonly maxFailedAccessAttempts: number;
  private readonly lockoutDuration: number;

  constructor(options: MemoryIdentityStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.maxFailedAccessAttempts = options.maxFailedAccessAttempts ?? DEFAULT_MAX_FAILED_ACCESS_ATTEMPTS;
    this.lockoutDuration = options.lockoutDuration ?? DEFAULT_LOCKOUT_DURATION;
  }

  async createUser(input: CreateUserInput): Promise<Principal> {
    const principal: Principal = {
      id: generateId(),
      userName: input.userName,
      email: input.email,
      emailConfirmed: input.emailConfirmed ?? false,
      securityStamp: generateSecurityStamp(),
      twoFactorEnabled: false,
    };

    this.users.set(principal.id, {
      principal,
      passwordHash: input.password !== undefined ? await hashPassword(input.password) : undefined,
      failedAccessCount: 0,
      recoveryCodeHashes: new Set(),
    });

    return principal;
  }

  async findById(userId: string): Promise<Principal | null> {
    return this.users.get(userId)?.principal ?? null;
  }

  async findByIdentifier(identifier: string): Promise<Principal | null> {
    const needle = identifier.trim().toLowerCase();
    for (const { principal } of this.users.values()) {
      if (principal.userName.toLowerCase() === needle || principal.email?.toLowerCase() === needle) {
        return principal;
      }
    }
    return null;
  }

  async checkPassword(principal: Principal, password: string): Promise<boolean> {
    const passwordHash = this.users.get(principal.id)?.passwordHash;
    if (!passwordHash) {
      return false;
    }
    return verifyPassword(password, passwordHash);
  }

  async isLockedOut(principal: Principal): Promise<boolean> {
    const lockoutEnd = this.users.get(principal.id)?.lockoutEnd;
    return lockoutEnd !== undefined && lockoutEnd > this.clock.now();
  }

  async recordFailedAccess(principal: Principal): Promise<{ lockedOut: boolean }> {
    const user = this.users.get(principal.id);
    if (!user) {
      return { lockedOut: false };
    }

    const failedAccessCount = user.failedAccessCount + 1;
    if (failedAccessCount >= this.maxFailedAccessAttempts) {
      this.users.set(principal.id, {
        ...user,
        failedAccessCount: 0,
        lockoutEnd: addSeconds(this.clock.now(), this.lockoutDuration),
      });
      return { lockedOut: true };
    }

    this.users.set(principal.id, { ...user, failedAccessCount });
    return { lockedOut: false };
  }

  async resetFailedAccess(principal: Principal): Promise<void> {
    const user = this.users.get(principal.id);
    if (user) {
      this.users.set(principal.id, { ...user, failedAccessCount: 0, lockoutEnd: undefined });
    }
  }

  async updatePassword(principal: Principal, newPassword: string): Promise<void> {
    const user = this.users.get(principal.id);
    if (!user) {
      return;
    }
    this.users.set(principal.id, {
      ...user,
      passwordHash: await hashPassword(newPassword),
      principal: { ...user.principal, securityStamp: generateSecurityStamp() },
    });
  }

  async addPassword(principal: Principal, password: string): Promise<boolean> {
    if (this.users.get(principal.id)?.passwordHash) {
      return false;
    }
    const passwordHash = await hashPassword(password);

    // Re-read: another request may have set one while hashing
    const user = this.users.get(principal.id);
    if (!user || user.passwordHash) {
      return false;
    }
    this.users.set(principal.id, {
      ...user,
      passwordHash,
      principal: { ...user.principal, securityStamp: generateSecurityStamp() },
    });
    return true;
  }

  async rotateSecurityStamp(userId: string): Promise<void> {
    this.updatePrincipal(userId, (principal) => ({
      ...principal,
      securityStamp: generateSecurityStamp(),
    }));
  }

  async setTwoFactorSecret(userId: string, secret: string): Promise<void> {
    this.updatePrincipal(userId, (principal) => ({ ...principal, twoFactorSecret: secret }));
  }

  async setTwoFactorEnabled(userId: string, enabled: boolean): Promise<void> {
    const user = this.users.get(userId);
    if (!user) {
      return;
    }
    this.users.set(userId, {
      ...user,
      principal: {
        ...user.principal,
        twoFactorEnabled: enabled,
        twoFactorSecret: enabled ? user.principal.twoFactorSecret : undefined,
        securityStamp: generateSecurityStamp(),
      },
      recoveryCodeHashes: enabled ? user.recoveryCodeHashes : new Set(),
    });
  }

  async replaceRecoveryCodes(userId: string, codeHashes: string[]): Promise<void> {
    const user = this.users.get(userId);
    if (user) {
      this.users.set(userId, { ...user, recoveryCodeHashes: new Set(codeHashes) });
    }
  }

  async redeemRecoveryCode(userId: string, codeHash: string): Promise<boolean> {
    const user = this.users.get(userId);
    if (!user || !user.recoveryCodeHashes.has(codeHash)) {
      return false;
    }
    const remaining = new Set(user.recoveryCodeHashes);
    remaining.delete(codeHash);
    this.users.set(userId, { ...user, recoveryCodeHashes: remaining });
    return true;
  }

  async countRecoveryCodes(userId: string): Promise<number> {
    return this.users.get(userId)?.recoveryCodeHashes.size ?? 0;
  }

  async findOrProvision(provider: string, info: ExternalUserInfo): Promise<Result<ProvisionedAccount>> {
    // Already linked
    const linked = await this.findByLogin(provider, info.providerKey);
    if (linked) {
      return ok({ principal: linked, isNewUser: false });
    }

    // Existing account with the same email: link only if the provider verified it
    const existing = await this.findByIdentifier(info.email);
    if (existing) {
      if (!info.emailVerified) {
        return err(AuthFailure.validation('The external account email address is not verified.'));
      }
      this.link(existing.id, provider, info.providerKey);
      return ok({ principal: existing, isNewUser: false });
    }

    const principal = await this.createUser({
      userName: info.email,
      email: info.email,
      emailConfirmed: info.emailVerified,
    });
    this.link(principal.id, provider, info.providerKey);

    return ok({ principal, isNewUser: true });
  }

  async findByLogin(provider: string, providerKey: string): Promise<Principal | null> {
    const login = this.externalLogins.get(loginKey(provider, providerKey));
    return login ? this.findById(login.userId) : null;
  }

  async addLogin(userId: string, provider: string, providerKey: string): Promise<boolean> {
    const existing = this.externalLogins.get(loginKey(provider, providerKey));
    if (existing) {
      return existing.userId === userId;
    }
    if (!this.users.has(userId)) {
      return false;
    }
    this.link(userId, provider, providerKey);
    return true;
  }

  async listLogins(userId: string): Promise<string[]> {
    return this.loginsOf(userId).map((login) => login.provider);
  }

  async removeLogin(userId: string, provider: string): Promise<RemoveLoginOutcome> {
    const logins = this.loginsOf(userId);
    const login = logins.find((entry) => entry.provider.toLowerCase() === provider.toLowerCase());
    if (!login) {
      return 'not_linked';
    }
    if (!this.users.get(userId)?.passwordHash && logins.length <= 1) {
      return 'last_sign_in_method';
    }
    this.externalLogins.delete(loginKey(login.provider, login.providerKey));
    return 'removed';
  }

  private link(userId: string, provider: string, providerKey: string): void {
    this.externalLogins.set(loginKey(provider, providerKey), { provider, providerKey, userId });
  }

  private loginsOf(userId: string): ExternalLogin[] {
    return [...this.externalLogins.values()].filter((login) => login.userId === userId);
  }

  private updatePrincipal(userId: string, update: (principal: Principal) => Principal): void {
    const user = this.users.get(userId);
    if (user) {
      this.users.set(userId, { ...user, principal: update(user.principal) });
    }
  }
}
