import type { z } from 'zod';
import type {
  ExternalAuthState,
  ExternalChallengeResponse,
  ExternalLinkResponse,
  ExternalProviderSummary,
  LinkedProvidersResponse,
} from '@authgate/shared';
import type {
  IExternalAuthStateStorage,
  IExternalAccountProvisioner,
  IIdentityStore,
} from '../storage/interfaces/index.js';
import type { ExternalProviderRegistry } from '../providers/registry.js';
import {
  type ExternalAuthOptions,
  externalAuthOptionsSchema,
  parseOptions,
} from '../config/index.js';
import { hashToken, generateStateToken } from '../crypto/index.js';
import { AuthFailure } from '../errors/auth-failure.js';
import { type Result, ok, err } from '../result.js';
import type { SessionService, ExternalLoginOutcome } from './session-service.js';
import type { AuditTrail } from './audit.js';
import type { CacheInvalidator } from './principal-cache.js';
import { type IClock, systemClock, addSeconds } from './clock.js';

export interface ExternalSignInDeps {
  states: IExternalAuthStateStorage;
  providers: ExternalProviderRegistry;
  sessions: SessionService;
  identityStore: IIdentityStore;
  provisioner: IExternalAccountProvisioner;
  audit: AuditTrail;
  cache: CacheInvalidator;
  clock?: IClock;
}

export interface CompleteExternalSignInInput {
  code: string;
  state: string;
  useCookies: boolean;
  signal?: AbortSignal;
}

/**
 * Callback that linked the provider to the signed-in user; no tokens issued
 */
export interface ExternalLinkOutcome {
  kind: 'linked';
  provider: string;
  body: ExternalLinkResponse;
}

export type ExternalCallbackOutcome = ExternalLoginOutcome | ExternalLinkOutcome;

const INVALID_STATE = 'Sign-in state is invalid or has already been used.';
const LINKED_ELSEWHERE = 'This external account is already linked to another user.';

/**
 * Browser redirect leg of external sign-in, plus management of the
 * providers linked to an account
 *
 * Owns the CSRF `state`: stored hashed, bound to one provider, one
 * redirect URI and (when linking) one user, redeemable once.
 */
export class ExternalSignInService {
  private readonly options: ExternalAuthOptions;
  private readonly clock: IClock;

  constructor(
    options: z.input<typeof externalAuthOptionsSchema>,
    private readonly deps: ExternalSignInDeps
  ) {
    this.options = parseOptions(externalAuthOptionsSchema, options, 'externalAuth');
    this.clock = deps.clock ?? systemClock;
  }

  listProviders(): ExternalProviderSummary[] {
    return this.deps.providers.list();
  }

  /**
   * Start the redirect. With `userId` the callback links instead of signing in.
   */
  async begin(
    providerName: string,
    redirectUri: string,
    userId?: string
  ): Promise<Result<ExternalChallengeResponse>> {
    const provider = this.deps.providers.get(providerName);
    if (!provider) {
      return err(AuthFailure.validation(`Unknown external provider '${providerName}'.`));
    }
    if (!this.options.allowedRedirectUris.includes(redirectUri)) {
      return err(AuthFailure.validation('Redirect URI is not allowed.'));
    }

    const state = generateStateToken();
    const now = this.clock.now();

    await this.deps.states.create({
      stateHash: hashToken(state),
      provider: provider.name,
      redirectUri,
      userId,
      createdAt: now,
      expiresAt: addSeconds(now, this.options.stateLifetime),
    });

    return ok({ authorizationUrl: provider.buildAuthorizationUrl(state, redirectUri) });
  }

  async complete(input: CompleteExternalSignInInput): Promise<Result<ExternalCallbackOutcome>> {
    const stored = await this.deps.states.findByHash(hashToken(input.state));

    if (!stored || stored.isUsed) {
      return err(AuthFailure.validation(INVALID_STATE));
    }
    if (stored.expiresAt <= this.clock.now()) {
      return err(AuthFailure.validation('Sign-in state has expired.'));
    }
    if (!(await this.deps.states.consume(stored.id))) {
      return err(AuthFailure.validation(INVALID_STATE));
    }

    if (stored.userId) {
      return this.linkToUser(stored.userId, stored, input);
    }

    return this.deps.sessions.loginWithExternalProvider({
      provider: stored.provider,
      code: input.code,
      redirectUri: stored.redirectUri,
      useCookies: input.useCookies,
      signal: input.signal,
    });
  }

  async listLinkedProviders(userId: string): Promise<Result<LinkedProvidersResponse>> {
    if (!(await this.deps.identityStore.findById(userId))) {
      return err(AuthFailure.unauthorized());
    }
    return ok({ providers: await this.deps.provisioner.listLogins(userId) });
  }

  async unlinkProvider(userId: string, providerName: string): Promise<Result<void>> {
    if (!(await this.deps.identityStore.findById(userId))) {
      return err(AuthFailure.unauthorized());
    }

    const outcome = await this.deps.provisioner.removeLogin(userId, providerName);
    switch (outcome) {
      case 'not_linked':
        return err(AuthFailure.validation('This provider is not linked to your account.'));
      case 'last_sign_in_method':
        return err(
          AuthFailure.validation('Cannot remove the last way to sign in. Set a password first.')
        );
      case 'removed':
        this.deps.audit.record('ExternalAccountUnlinked', {
          userId,
          metadata: { provider: providerName.toLowerCase() },
        });
        return ok(undefined);
    }
  }

  /**
   * Give an account created through a provider its first password
   */
  async setPassword(userId: string, newPassword: string): Promise<Result<void>> {
    const principal = await this.deps.identityStore.findById(userId);
    if (!principal) {
      return err(AuthFailure.unauthorized());
    }

    if (!(await this.deps.identityStore.addPassword(principal, newPassword))) {
      return err(AuthFailure.validation('A password is already set for this account.'));
    }

    await this.deps.cache.invalidate(userId);
    this.deps.audit.record('PasswordSet', { userId });

    return ok(undefined);
  }

  private async linkToUser(
    userId: string,
    stored: ExternalAuthState,
    input: CompleteExternalSignInInput
  ): Promise<Result<ExternalLinkOutcome>> {
    const provider = this.deps.providers.get(stored.provider);
    if (!provider) {
      return err(AuthFailure.validation(`Unknown external provider '${stored.provider}'.`));
    }
    if (!(await this.deps.identityStore.findById(userId))) {
      return err(AuthFailure.unauthorized());
    }

    const info = await provider.exchangeCode(input.code, stored.redirectUri, input.signal);
    if (!info.ok) {
      this.deps.audit.record('ExternalLoginFailure', {
        userId,
        metadata: { provider: provider.name, reason: info.error.kind },
      });
      return info;
    }

    const linked = await this.deps.provisioner.findByLogin(provider.name, info.value.providerKey);
    if (linked && linked.id !== userId) {
      return err(AuthFailure.validation(LINKED_ELSEWHERE));
    }

    if (!linked) {
      if (!(await this.deps.provisioner.addLogin(userId, provider.name, info.value.providerKey))) {
        return err(AuthFailure.validation(LINKED_ELSEWHERE));
      }
      this.deps.audit.record('ExternalAccountLinked', {
        userId,
        metadata: { provider: provider.name },
      });
    }

    return ok({
      kind: 'linked',
      provider: provider.name,
      body: { provider: provider.name, isLinkOnly: true },
    });
  }
}
