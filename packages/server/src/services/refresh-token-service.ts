import type { z } from 'zod';
import type { Principal, RefreshToken, TokenPair } from '@authgate/shared';
import type { IIdentityStore, IUnitOfWork, ISessionRepositories } from '../storage/interfaces/index.js';
import {
  type RefreshTokenOptions,
  refreshTokenOptionsSchema,
  parseOptions,
} from '../config/index.js';
import { hashToken, generateFamilyId } from '../crypto/index.js';
import { AuthFailure } from '../errors/auth-failure.js';
import { type Result, ok, err } from '../result.js';
import { createLogger } from '../logging/logger.js';
import type { TokenCodec } from './token-codec.js';
import type { AuditTrail } from './audit.js';
import type { CacheInvalidator } from './principal-cache.js';
import { type IClock, systemClock, addSeconds } from './clock.js';

const logger = createLogger('refresh-tokens');

export interface RefreshTokenServiceDeps {
  unitOfWork: IUnitOfWork;
  identityStore: IIdentityStore;
  codec: TokenCodec;
  audit: AuditTrail;
  cache: CacheInvalidator;
  clock?: IClock;
}

type RotationOutcome =
  | { status: 'rejected'; failure: AuthFailure }
  | { status: 'reused'; token: RefreshToken; revoked: number }
  | {
      status: 'rotated';
      principal: Principal;
      parent: RefreshToken;
      refreshToken: string;
      expiresAt: Date;
    };

/**
 * Refresh token issuance and rotation with reuse detection
 *
 * A redeemed token is kept as a tripwire: presenting it again revokes the
 * user's sessions and rotates the security stamp.
 */
export class RefreshTokenService {
  private readonly options: RefreshTokenOptions;
  private readonly clock: IClock;

  constructor(
    options: z.input<typeof refreshTokenOptionsSchema>,
    private readonly deps: RefreshTokenServiceDeps
  ) {
    this.options = parseOptions(refreshTokenOptionsSchema, options, 'refreshTokens');
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Lifetime in seconds for a persistent or session refresh token
   */
  lifetimeFor(isPersistent: boolean): number {
    return isPersistent ? this.options.persistentLifetime : this.options.sessionLifetime;
  }

  /**
   * Issue a pair for a fresh sign-in; starts a new rotation family
   */
  async issueTokenPair(principal: Principal, isPersistent: boolean): Promise<TokenPair> {
    const now = this.clock.now();
    const refreshToken = this.deps.codec.issueRefreshTokenValue();
    const refreshTokenExpiresAt = addSeconds(now, this.lifetimeFor(isPersistent));

    await this.deps.unitOfWork.transaction((repositories) =>
      repositories.refreshTokens.create({
        userId: principal.id,
        tokenHash: hashToken(refreshToken),
        familyId: generateFamilyId(),
        isPersistent,
        createdAt: now,
        expiresAt: refreshTokenExpiresAt,
      })
    );

    const access = await this.deps.codec.issueAccessToken(principal);

    return {
      accessToken: access.token,
      accessTokenExpiresAt: access.expiresAt,
      refreshToken,
      refreshTokenExpiresAt,
      isPersistent,
    };
  }

  /**
   * Redeem a refresh token for a new pair
   */
  async rotate(presented: string | undefined): Promise<Result<TokenPair>> {
    if (!presented) {
      return err(AuthFailure.tokenMissing());
    }

    const tokenHash = hashToken(presented);
    const now = this.clock.now();

    const outcome = await this.deps.unitOfWork.transaction((repositories) =>
      this.redeem(repositories, tokenHash, now)
    );

    switch (outcome.status) {
      case 'rejected':
        return err(outcome.failure);

      case 'reused':
        await this.afterReuse(outcome.token, outcome.revoked);
        return err(AuthFailure.tokenReused());

      case 'rotated': {
        const access = await this.deps.codec.issueAccessToken(outcome.principal);
        this.deps.audit.record('TokenRefreshed', {
          userId: outcome.principal.id,
          targetType: 'RefreshToken',
          targetId: outcome.parent.id,
          metadata: { familyId: outcome.parent.familyId },
        });

        return ok({
          accessToken: access.token,
          accessTokenExpiresAt: access.expiresAt,
          refreshToken: outcome.refreshToken,
          refreshTokenExpiresAt: outcome.expiresAt,
          isPersistent: outcome.parent.isPersistent,
        });
      }
    }
  }

  /**
   * Invalidate every active refresh token of a user
   */
  async revokeAllForUser(userId: string): Promise<number> {
    const now = this.clock.now();
    return this.deps.unitOfWork.transaction((repositories) =>
      repositories.refreshTokens.invalidateByUser(userId, now)
    );
  }

  private async redeem(
    repositories: ISessionRepositories,
    tokenHash: string,
    now: Date
  ): Promise<RotationOutcome> {
    const stored = await repositories.refreshTokens.findByHash(tokenHash);

    if (!stored) {
      return { status: 'rejected', failure: AuthFailure.tokenNotFound() };
    }
    if (stored.expiresAt <= now) {
      return { status: 'rejected', failure: AuthFailure.tokenExpired() };
    }
    if (stored.isInvalidated) {
      return { status: 'rejected', failure: AuthFailure.tokenInvalidated() };
    }
    if (stored.isUsed) {
      return this.revokeAfterReuse(repositories, stored, now);
    }

    const principal = await this.deps.identityStore.findById(stored.userId);
    if (!principal) {
      return { status: 'rejected', failure: AuthFailure.tokenNotFound() };
    }

    // Lost the race to a concurrent redeemer of the same value
    if (!(await repositories.refreshTokens.markUsed(stored.id))) {
      return this.revokeAfterReuse(repositories, stored, now);
    }

    const refreshToken = this.deps.codec.issueRefreshTokenValue();
    const expiresAt = addSeconds(now, this.lifetimeFor(stored.isPersistent));

    await repositories.refreshTokens.create({
      userId: stored.userId,
      tokenHash: hashToken(refreshToken),
      familyId: stored.familyId,
      parentTokenId: stored.id,
      isPersistent: stored.isPersistent,
      createdAt: now,
      expiresAt,
    });

    return { status: 'rotated', principal, parent: stored, refreshToken, expiresAt };
  }

  private async revokeAfterReuse(
    repositories: ISessionRepositories,
    token: RefreshToken,
    now: Date
  ): Promise<RotationOutcome> {
    const revoked =
      this.options.reuseRevocationScope === 'family'
        ? await repositories.refreshTokens.invalidateFamily(token.familyId, now)
        : await repositories.refreshTokens.invalidateByUser(token.userId, now);

    return { status: 'reused', token, revoked };
  }

  private async afterReuse(token: RefreshToken, revoked: number): Promise<void> {
    logger.warn('Refresh token reuse detected', {
      userId: token.userId,
      familyId: token.familyId,
      scope: this.options.reuseRevocationScope,
      revoked,
    });

    await this.deps.identityStore.rotateSecurityStamp(token.userId);
    await this.deps.cache.invalidate(token.userId);

    this.deps.audit.record('TokenReuseDetected', {
      userId: token.userId,
      targetType: 'RefreshToken',
      targetId: token.id,
      metadata: {
        familyId: token.familyId,
        scope: this.options.reuseRevocationScope,
        revoked,
      },
    });
  }
}
