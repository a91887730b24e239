import type { Principal } from '@authgate/shared';
import { createLogger, describeError, type Logger } from '../logging/logger.js';
import { type IClock, systemClock, addSeconds } from './clock.js';
import { DEFAULT_PRINCIPAL_CACHE_TTL } from '../config/constants.js';

/**
 * Read-through cache of principal data
 *
 * Never authoritative for refresh token validity; only used to avoid an
 * identity store round trip when checking access tokens.
 */
export interface IPrincipalCache {
  get(userId: string): Promise<Principal | null>;
  set(principal: Principal): Promise<void>;
  invalidate(userId: string): Promise<void>;
}

interface CacheEntry {
  principal: Principal;
  expiresAt: Date;
}

/**
 * In-process principal cache with a fixed TTL
 */
export class MemoryPrincipalCache implements IPrincipalCache {
  private entries = new Map<string, CacheEntry>();

  constructor(
    private readonly ttlSeconds: number = DEFAULT_PRINCIPAL_CACHE_TTL,
    private readonly clock: IClock = systemClock
  ) {}

  async get(userId: string): Promise<Principal | null> {
    const entry = this.entries.get(userId);
    if (!entry) return null;

    if (entry.expiresAt <= this.clock.now()) {
      this.entries.delete(userId);
      return null;
    }
    return entry.principal;
  }

  async set(principal: Principal): Promise<void> {
    this.entries.set(principal.id, {
      principal,
      expiresAt: addSeconds(this.clock.now(), this.ttlSeconds),
    });
  }

  async invalidate(userId: string): Promise<void> {
    this.entries.delete(userId);
  }
}

/**
 * Cache that never stores anything
 */
export const noopPrincipalCache: IPrincipalCache = {
  get: async () => null,
  set: async () => undefined,
  invalidate: async () => undefined,
};

/**
 * Best-effort eviction: failures are logged, never propagated
 */
export class CacheInvalidator {
  private readonly logger: Logger = createLogger('cache');

  constructor(private readonly cache: IPrincipalCache) {}

  async invalidate(userId: string): Promise<void> {
    try {
      await this.cache.invalidate(userId);
    } catch (error) {
      this.logger.warn('Principal cache invalidation failed', { userId, ...describeError(error) });
    }
  }
}
