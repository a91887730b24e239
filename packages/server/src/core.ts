import type { z } from 'zod';
import type { IStorage, IIdentityStore, IExternalAccountProvisioner } from './storage/interfaces/index.js';
import {
  type jwtOptionsSchema,
  type refreshTokenOptionsSchema,
  type twoFactorOptionsSchema,
  externalAuthOptionsSchema,
  parseOptions,
} from './config/index.js';
import { type ITotpProvider, OtplibTotpProvider } from './crypto/totp.js';
import { type ExternalProviderRegistry, createProviderRegistry } from './providers/registry.js';
import { SessionTransport } from './transport/session-transport.js';
import { TokenCodec } from './services/token-codec.js';
import { RefreshTokenService } from './services/refresh-token-service.js';
import { TwoFactorChallengeService } from './services/two-factor-service.js';
import { TwoFactorManagementService } from './services/two-factor-management.js';
import { SessionService } from './services/session-service.js';
import { ExternalSignInService } from './services/external-sign-in.js';
import { AuditTrail, LoggerAuditSink, type IAuditSink } from './services/audit.js';
import { CacheInvalidator, MemoryPrincipalCache, type IPrincipalCache } from './services/principal-cache.js';
import { type IClock, systemClock } from './services/clock.js';

export interface SessionCoreOptions {
  storage: IStorage;
  identityStore: IIdentityStore;
  provisioner: IExternalAccountProvisioner;
  jwt: z.input<typeof jwtOptionsSchema>;
  refreshTokens?: z.input<typeof refreshTokenOptionsSchema>;
  twoFactor?: z.input<typeof twoFactorOptionsSchema>;
  externalAuth?: z.input<typeof externalAuthOptionsSchema>;
  cookies: { secure: boolean };
  /**
   * Overrides the registry built from externalAuth.providers
   */
  providers?: ExternalProviderRegistry;
  totp?: ITotpProvider;
  auditSink?: IAuditSink;
  principalCache?: IPrincipalCache;
  clock?: IClock;
}

/**
 * Wired services behind the HTTP routes
 */
export interface SessionCore {
  storage: IStorage;
  identityStore: IIdentityStore;
  codec: TokenCodec;
  transport: SessionTransport;
  principalCache: IPrincipalCache;
  sessions: SessionService;
  twoFactor: TwoFactorManagementService;
  externalSignIn: ExternalSignInService;
}

/**
 * Build the session core; throws ConfigurationError on invalid options
 */
export function createSessionCore(options: SessionCoreOptions): SessionCore {
  const { storage, identityStore, provisioner } = options;
  const clock = options.clock ?? systemClock;
  const totp = options.totp ?? new OtplibTotpProvider(clock);
  const principalCache = options.principalCache ?? new MemoryPrincipalCache(undefined, clock);
  const externalAuth = parseOptions(externalAuthOptionsSchema, options.externalAuth ?? {}, 'externalAuth');

  const audit = new AuditTrail(options.auditSink ?? new LoggerAuditSink(), clock);
  const cache = new CacheInvalidator(principalCache);
  const codec = new TokenCodec(options.jwt, clock);
  const transport = new SessionTransport(options.cookies);
  const providers = options.providers ?? createProviderRegistry(externalAuth);

  const refreshTokens = new RefreshTokenService(options.refreshTokens ?? {}, {
    unitOfWork: storage.unitOfWork,
    identityStore,
    codec,
    audit,
    cache,
    clock,
  });

  const challenges = new TwoFactorChallengeService(options.twoFactor ?? {}, {
    challenges: storage.twoFactorChallenges,
    identityStore,
    totp,
    audit,
    clock,
  });

  const sessions = new SessionService({
    identityStore,
    provisioner,
    refreshTokens,
    twoFactor: challenges,
    providers,
    transport,
    audit,
    cache,
  });

  return {
    storage,
    identityStore,
    codec,
    transport,
    principalCache,
    sessions,
    twoFactor: new TwoFactorManagementService({
      identityStore,
      totp,
      audit,
      cache,
      issuer: challenges.issuer,
    }),
    externalSignIn: new ExternalSignInService(externalAuth, {
      states: storage.externalAuthStates,
      providers,
      sessions,
      identityStore,
      provisioner,
      audit,
      cache,
      clock,
    }),
  };
}
