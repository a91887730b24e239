import type { z } from 'zod';
import type { Principal, TwoFactorChallenge } from '@authgate/shared';
import type { IIdentityStore, ITwoFactorChallengeStorage } from '../storage/interfaces/index.js';
import {
  type TwoFactorOptions,
  twoFactorOptionsSchema,
  parseOptions,
} from '../config/index.js';
import {
  type ITotpProvider,
  hashToken,
  generateChallengeToken,
  normalizeRecoveryCode,
  hashRecoveryCode,
} from '../crypto/index.js';
import { AuthFailure } from '../errors/auth-failure.js';
import { type Result, ok, err } from '../result.js';
import type { AuditTrail } from './audit.js';
import { type IClock, systemClock, addSeconds } from './clock.js';

export interface TwoFactorChallengeServiceDeps {
  challenges: ITwoFactorChallengeStorage;
  identityStore: IIdentityStore;
  totp: ITotpProvider;
  audit: AuditTrail;
  clock?: IClock;
}

/**
 * A challenge that passed its second factor
 */
export interface VerifiedChallenge {
  principal: Principal;
  rememberMe: boolean;
}

interface OpenChallenge {
  challenge: TwoFactorChallenge;
  principal: Principal;
  secret: string;
}

/**
 * Issues and verifies the short-lived challenge between a correct
 * password and the second factor
 *
 * Lockout is permanent per challenge; the client restarts from the
 * password step.
 */
export class TwoFactorChallengeService {
  private readonly options: TwoFactorOptions;
  private readonly clock: IClock;

  constructor(
    options: z.input<typeof twoFactorOptionsSchema>,
    private readonly deps: TwoFactorChallengeServiceDeps
  ) {
    this.options = parseOptions(twoFactorOptionsSchema, options, 'twoFactor');
    this.clock = deps.clock ?? systemClock;
  }

  get issuer(): string {
    return this.options.issuer;
  }

  /**
   * Create a challenge and return its plaintext token (shown once)
   */
  async issue(userId: string, rememberMe: boolean): Promise<string> {
    const token = generateChallengeToken();
    const now = this.clock.now();

    await this.deps.challenges.create({
      userId,
      tokenHash: hashToken(token),
      isRememberMe: rememberMe,
      createdAt: now,
      expiresAt: addSeconds(now, this.options.challengeLifetime),
    });

    this.deps.audit.record('TwoFactorChallengeIssued', { userId, metadata: { rememberMe } });

    return token;
  }

  async verify(token: string, code: string): Promise<Result<VerifiedChallenge>> {
    const open = await this.open(token);
    if (!open.ok) return open;

    const { challenge, principal, secret } = open.value;

    if (!this.deps.totp.verify(secret, code)) {
      return this.recordFailure(challenge, 'totp');
    }

    return this.complete(challenge, principal);
  }

  async verifyRecoveryCode(token: string, recoveryCode: string): Promise<Result<VerifiedChallenge>> {
    const open = await this.open(token);
    if (!open.ok) return open;

    const { challenge, principal } = open.value;

    if (normalizeRecoveryCode(recoveryCode).length === 0) {
      return this.recordFailure(challenge, 'recovery_code');
    }

    // Claim the challenge before spending a code, so a request that loses
    // the race keeps its code
    const consumed = await this.deps.challenges.consume(challenge.id, this.options.maxFailedAttempts);
    if (!consumed) {
      return err(AuthFailure.challengeNotFound());
    }

    const redeemed = await this.deps.identityStore.redeemRecoveryCode(
      principal.id,
      hashRecoveryCode(recoveryCode)
    );
    if (!redeemed) {
      await this.deps.challenges.release(challenge.id);
      return this.recordFailure(challenge, 'recovery_code');
    }

    const remaining = await this.deps.identityStore.countRecoveryCodes(principal.id);
    this.deps.audit.record('TwoFactorRecoveryCodeUsed', {
      userId: principal.id,
      metadata: { remaining },
    });

    return ok({ principal, rememberMe: challenge.isRememberMe });
  }

  /**
   * Look up a challenge and check it can still be answered
   */
  private async open(token: string): Promise<Result<OpenChallenge>> {
    const challenge = await this.deps.challenges.findByHash(hashToken(token));

    if (!challenge) {
      return err(AuthFailure.challengeNotFound());
    }
    if (challenge.expiresAt <= this.clock.now()) {
      return err(AuthFailure.challengeExpired());
    }
    if (challenge.isUsed) {
      return err(AuthFailure.challengeNotFound());
    }
    if (challenge.failedAttempts >= this.options.maxFailedAttempts) {
      return err(AuthFailure.challengeLocked());
    }

    const principal = await this.deps.identityStore.findById(challenge.userId);
    if (!principal || !principal.twoFactorEnabled || !principal.twoFactorSecret) {
      return err(AuthFailure.challengeNotFound());
    }

    return ok({ challenge, principal, secret: principal.twoFactorSecret });
  }

  private async recordFailure(
    challenge: TwoFactorChallenge,
    method: 'totp' | 'recovery_code'
  ): Promise<Result<VerifiedChallenge>> {
    const failedAttempts = await this.deps.challenges.incrementFailedAttempts(challenge.id);

    this.deps.audit.record('TwoFactorLoginFailure', {
      userId: challenge.userId,
      targetType: 'TwoFactorChallenge',
      targetId: challenge.id,
      metadata: { method, failedAttempts },
    });

    return err(AuthFailure.invalidCode());
  }

  private async complete(
    challenge: TwoFactorChallenge,
    principal: Principal
  ): Promise<Result<VerifiedChallenge>> {
    const consumed = await this.deps.challenges.consume(challenge.id, this.options.maxFailedAttempts);
    if (!consumed) {
      return err(AuthFailure.challengeNotFound());
    }
    return ok({ principal, rememberMe: challenge.isRememberMe });
  }
}
