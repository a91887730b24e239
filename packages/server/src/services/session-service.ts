import type {
  Principal,
  TokenPair,
  AuthenticationResponse,
  TwoFactorRequiredResponse,
} from '@authgate/shared';
import type { IIdentityStore, IExternalAccountProvisioner } from '../storage/interfaces/index.js';
import type { ExternalProviderRegistry } from '../providers/registry.js';
import type { SessionTransport, DeliveryPlan, AuthenticationExtras } from '../transport/session-transport.js';
import { AuthFailure } from '../errors/auth-failure.js';
import { type Result, ok, err } from '../result.js';
import type { RefreshTokenService } from './refresh-token-service.js';
import type { TwoFactorChallengeService, VerifiedChallenge } from './two-factor-service.js';
import type { AuditTrail } from './audit.js';
import type { CacheInvalidator } from './principal-cache.js';

export interface SessionServiceDeps {
  identityStore: IIdentityStore;
  provisioner: IExternalAccountProvisioner;
  refreshTokens: RefreshTokenService;
  twoFactor: TwoFactorChallengeService;
  providers: ExternalProviderRegistry;
  transport: SessionTransport;
  audit: AuditTrail;
  cache: CacheInvalidator;
}

export type LoginOutcome =
  | { kind: 'authenticated'; tokens: TokenPair; delivery: DeliveryPlan<AuthenticationResponse> }
  | { kind: 'twoFactorRequired'; challengeToken: string; delivery: DeliveryPlan<TwoFactorRequiredResponse> };

export type ExternalLoginOutcome = LoginOutcome & { isNewUser: boolean; provider: string };

export interface TokenOutcome {
  tokens: TokenPair;
  delivery: DeliveryPlan<AuthenticationResponse>;
}

export interface LoginInput {
  identifier: string;
  password: string;
  rememberMe: boolean;
  useCookies: boolean;
}

export interface ChallengeInput {
  challengeToken: string;
  useCookies: boolean;
}

export interface ExternalLoginInput {
  provider: string;
  code: string;
  redirectUri: string;
  useCookies: boolean;
  signal?: AbortSignal;
}

/**
 * Session orchestrator: sign-in, refresh, sign-out and credential changes
 *
 * Expected failures come back as results. Provider outages and storage
 * faults are thrown and left to the HTTP error handler.
 */
export class SessionService {
  constructor(private readonly deps: SessionServiceDeps) {}

  async login(input: LoginInput): Promise<Result<LoginOutcome>> {
    const principal = await this.deps.identityStore.findByIdentifier(input.identifier);
    if (!principal) {
      this.deps.audit.record('LoginFailure', { metadata: { reason: 'unknown_user' } });
      return err(AuthFailure.invalidCredentials());
    }

    if (await this.deps.identityStore.isLockedOut(principal)) {
      this.deps.audit.record('LoginFailure', { userId: principal.id, metadata: { reason: 'locked_out' } });
      return err(AuthFailure.accountLocked());
    }

    if (!(await this.deps.identityStore.checkPassword(principal, input.password))) {
      const { lockedOut } = await this.deps.identityStore.recordFailedAccess(principal);
      this.deps.audit.record('LoginFailure', {
        userId: principal.id,
        metadata: { reason: lockedOut ? 'locked_out' : 'invalid_password' },
      });
      return err(lockedOut ? AuthFailure.accountLocked() : AuthFailure.invalidCredentials());
    }

    await this.deps.identityStore.resetFailedAccess(principal);

    return ok(await this.signIn(principal, input.rememberMe, input.useCookies));
  }

  async refresh(refreshToken: string | undefined, useCookies: boolean): Promise<Result<TokenOutcome>> {
    const rotated = await this.deps.refreshTokens.rotate(refreshToken);
    if (!rotated.ok) return rotated;

    return ok({
      tokens: rotated.value,
      delivery: this.deps.transport.deliverTokens(rotated.value, useCookies),
    });
  }

  async verifyTwoFactor(input: ChallengeInput & { code: string }): Promise<Result<TokenOutcome>> {
    const verified = await this.deps.twoFactor.verify(input.challengeToken, input.code);
    return this.completeChallenge(verified, input.useCookies, 'totp');
  }

  async verifyRecoveryCode(input: ChallengeInput & { recoveryCode: string }): Promise<Result<TokenOutcome>> {
    const verified = await this.deps.twoFactor.verifyRecoveryCode(input.challengeToken, input.recoveryCode);
    return this.completeChallenge(verified, input.useCookies, 'recovery_code');
  }

  /**
   * Revoke the caller's sessions (if known) and clear the cookies either way
   */
  async logout(userId?: string): Promise<Result<DeliveryPlan<null>>> {
    if (userId) {
      const revoked = await this.deps.refreshTokens.revokeAllForUser(userId);
      await this.deps.identityStore.rotateSecurityStamp(userId);
      await this.deps.cache.invalidate(userId);
      this.deps.audit.record('Logout', { userId, metadata: { revoked } });
    }

    return ok(this.deps.transport.clear());
  }

  async changePassword(
    userId: string,
    currentPassword: string,
    newPassword: string
  ): Promise<Result<DeliveryPlan<null>>> {
    const principal = await this.deps.identityStore.findById(userId);
    if (!principal) {
      return err(AuthFailure.unauthorized());
    }
    if (!(await this.deps.identityStore.checkPassword(principal, currentPassword))) {
      return err(AuthFailure.invalidCredentials());
    }
    if (newPassword === currentPassword) {
      return err(AuthFailure.validation('The new password must differ from the current password.'));
    }

    await this.deps.identityStore.updatePassword(principal, newPassword);
    const revoked = await this.deps.refreshTokens.revokeAllForUser(userId);
    await this.deps.cache.invalidate(userId);

    this.deps.audit.record('PasswordChanged', { userId, metadata: { revoked } });

    return ok(this.deps.transport.clear());
  }

  async loginWithExternalProvider(input: ExternalLoginInput): Promise<Result<ExternalLoginOutcome>> {
    const provider = this.deps.providers.get(input.provider);
    if (!provider) {
      return err(AuthFailure.validation(`Unknown external provider '${input.provider}'.`));
    }

    const info = await provider.exchangeCode(input.code, input.redirectUri, input.signal);
    if (!info.ok) {
      this.deps.audit.record('ExternalLoginFailure', {
        metadata: { provider: provider.name, reason: info.error.kind },
      });
      return info;
    }

    const account = await this.deps.provisioner.findOrProvision(provider.name, info.value);
    if (!account.ok) {
      this.deps.audit.record('ExternalLoginFailure', {
        metadata: { provider: provider.name, reason: account.error.kind },
      });
      return account;
    }

    const { principal, isNewUser } = account.value;

    if (isNewUser) {
      this.deps.audit.record('ExternalAccountCreated', {
        userId: principal.id,
        metadata: { provider: provider.name },
      });
    }

    if (await this.deps.identityStore.isLockedOut(principal)) {
      this.deps.audit.record('ExternalLoginFailure', {
        userId: principal.id,
        metadata: { provider: provider.name, reason: 'locked_out' },
      });
      return err(AuthFailure.accountLocked());
    }

    const outcome = await this.signIn(principal, false, input.useCookies, {
      isNewUser,
      provider: provider.name,
    });

    return ok({ ...outcome, isNewUser, provider: provider.name });
  }

  /**
   * Roles or claims changed: rotate the stamp so access tokens are
   * re-issued through refresh, leaving refresh tokens valid
   */
  async onAuthorizationChanged(userId: string): Promise<Result<void>> {
    if (!(await this.deps.identityStore.findById(userId))) {
      return err(AuthFailure.unauthorized());
    }

    await this.deps.identityStore.rotateSecurityStamp(userId);
    await this.deps.cache.invalidate(userId);
    this.deps.audit.record('AuthorizationChanged', { userId });

    return ok(undefined);
  }

  /**
   * Force sign-out everywhere
   */
  async revokeSessions(userId: string): Promise<Result<{ revoked: number }>> {
    if (!(await this.deps.identityStore.findById(userId))) {
      return err(AuthFailure.unauthorized());
    }

    const revoked = await this.deps.refreshTokens.revokeAllForUser(userId);
    await this.deps.identityStore.rotateSecurityStamp(userId);
    await this.deps.cache.invalidate(userId);
    this.deps.audit.record('SessionsRevoked', { userId, metadata: { revoked } });

    return ok({ revoked });
  }

  private async signIn(
    principal: Principal,
    rememberMe: boolean,
    useCookies: boolean,
    external?: AuthenticationExtras
  ): Promise<LoginOutcome> {
    if (principal.twoFactorEnabled) {
      const challengeToken = await this.deps.twoFactor.issue(principal.id, rememberMe);
      return {
        kind: 'twoFactorRequired',
        challengeToken,
        delivery: this.deps.transport.challenge(challengeToken),
      };
    }

    const tokens = await this.deps.refreshTokens.issueTokenPair(principal, rememberMe);
    this.deps.audit.record(external ? 'ExternalLoginSuccess' : 'LoginSuccess', {
      userId: principal.id,
      metadata: { rememberMe, provider: external?.provider },
    });

    return {
      kind: 'authenticated',
      tokens,
      delivery: this.deps.transport.deliverTokens(tokens, useCookies, external),
    };
  }

  private async completeChallenge(
    verified: Result<VerifiedChallenge>,
    useCookies: boolean,
    method: 'totp' | 'recovery_code'
  ): Promise<Result<TokenOutcome>> {
    if (!verified.ok) return verified;

    const { principal, rememberMe } = verified.value;
    const tokens = await this.deps.refreshTokens.issueTokenPair(principal, rememberMe);

    this.deps.audit.record('TwoFactorLoginSuccess', {
      userId: principal.id,
      metadata: { method, rememberMe },
    });

    return ok({ tokens, delivery: this.deps.transport.deliverTokens(tokens, useCookies) });
  }
}
