import type { TwoFactorChallenge, CreateTwoFactorChallengeInput } from '@authgate/shared';
import type { ITwoFactorChallengeStorage } from '../interfaces/two-factor-storage.js';
import { generateId } from '../../crypto/index.js';
import { directWriter, type MemoryTables, type TableWriter } from './state.js';

/**
 * In-memory two-factor challenge storage implementation
 */
export class MemoryTwoFactorChallengeStorage implements ITwoFactorChallengeStorage {
  constructor(
    private readonly tables: MemoryTables,
    private readonly writer: TableWriter = directWriter
  ) {}

  async create(input: CreateTwoFactorChallengeInput): Promise<TwoFactorChallenge> {
    const challenge: TwoFactorChallenge = {
      id: generateId(),
      userId: input.userId,
      tokenHash: input.tokenHash,
      isRememberMe: input.isRememberMe,
      isUsed: false,
      failedAttempts: 0,
      createdAt: input.createdAt,
      expiresAt: input.expiresAt,
    };

    this.writer.set(this.tables.twoFactorChallenges, challenge.id, challenge);
    this.writer.set(this.tables.twoFactorChallengeHashIndex, challenge.tokenHash, challenge.id);

    return challenge;
  }

  async findByHash(tokenHash: string): Promise<TwoFactorChallenge | null> {
    const id = this.tables.twoFactorChallengeHashIndex.get(tokenHash);
    if (!id) return null;
    return this.tables.twoFactorChallenges.get(id) ?? null;
  }

  async incrementFailedAttempts(id: string): Promise<number> {
    const challenge = this.tables.twoFactorChallenges.get(id);
    if (!challenge) {
      return 0;
    }
    const failedAttempts = challenge.failedAttempts + 1;
    this.writer.set(this.tables.twoFactorChallenges, id, { ...challenge, failedAttempts });
    return failedAttempts;
  }

  async consume(id: string, maxFailedAttempts: number): Promise<boolean> {
    const challenge = this.tables.twoFactorChallenges.get(id);
    if (!challenge || challenge.isUsed || challenge.failedAttempts >= maxFailedAttempts) {
      return false;
    }
    this.writer.set(this.tables.twoFactorChallenges, id, { ...challenge, isUsed: true });
    return true;
  }

  async release(id: string): Promise<void> {
    const challenge = this.tables.twoFactorChallenges.get(id);
    if (challenge?.isUsed) {
      this.writer.set(this.tables.twoFactorChallenges, id, { ...challenge, isUsed: false });
    }
  }

  async deleteExpired(before: Date): Promise<number> {
    let count = 0;
    for (const [id, challenge] of this.tables.twoFactorChallenges) {
      if (challenge.expiresAt < before) {
        this.writer.delete(this.tables.twoFactorChallenges, id);
        this.writer.delete(this.tables.twoFactorChallengeHashIndex, challenge.tokenHash);
        count++;
      }
    }
    return count;
  }
}
