import type { TwoFactorChallenge, CreateTwoFactorChallengeInput } from '@authgate/shared';

/**
 * Storage interface for two-factor challenges
 */
export interface ITwoFactorChallengeStorage {
  create(input: CreateTwoFactorChallengeInput): Promise<TwoFactorChallenge>;

  findByHash(tokenHash: string): Promise<TwoFactorChallenge | null>;

  /**
   * Atomically increment the failed attempt counter
   * Returns the counter value after the increment
   */
  incrementFailedAttempts(id: string): Promise<number>;

  /**
   * Mark the challenge used if it is unused and below the attempt limit
   * Returns false if it was consumed or locked concurrently
   */
  consume(id: string, maxFailedAttempts: number): Promise<boolean>;

  /**
   * Reopen a challenge claimed by a request whose factor then failed
   */
  release(id: string): Promise<void>;

  /**
   * Delete challenges that expired before the cutoff (cleanup)
   */
  deleteExpired(before: Date): Promise<number>;
}
