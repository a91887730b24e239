// Programmatic API (index.ts is the runnable server)
export { createAuthServer, type AuthServerOptions } from './app.js';
export { createSessionCore, type SessionCore, type SessionCoreOptions } from './core.js';
export { createMemoryStorage, MemoryIdentityStore } from './storage/memory/index.js';
export { createDrizzleStorage, closeDatabase } from './storage/drizzle/index.js';
export { startRetentionSweep, sweepExpired } from './jobs/retention-sweep.js';
export * from './storage/interfaces/index.js';
export * from './providers/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './result.js';
export { SessionService, type LoginOutcome, type ExternalLoginOutcome } from './services/session-service.js';
export {
  ExternalSignInService,
  type ExternalCallbackOutcome,
  type ExternalLinkOutcome,
} from './services/external-sign-in.js';
export { AuditTrail, LoggerAuditSink, MemoryAuditSink, type IAuditSink } from './services/audit.js';
export { MemoryPrincipalCache, type IPrincipalCache } from './services/principal-cache.js';
export { TokenCodec } from './services/token-codec.js';
export type { IClock } from './services/clock.js';
export { SessionTransport, type CookieInstruction, type DeliveryPlan } from './transport/session-transport.js';
