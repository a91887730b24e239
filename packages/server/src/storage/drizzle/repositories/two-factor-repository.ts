import { and, eq, lt, sql } from 'drizzle-orm';
import type { TwoFactorChallenge, CreateTwoFactorChallengeInput } from '@authgate/shared';
import type { ITwoFactorChallengeStorage } from '../../interfaces/two-factor-storage.js';
import type { DatabaseExecutor } from '../client.js';
import { twoFactorChallenges, type TwoFactorChallengeRow } from '../schema.js';
import { generateId } from '../../../crypto/index.js';

function toChallenge(row: TwoFactorChallengeRow): TwoFactorChallenge {
  return {
    id: row.id,
    userId: row.userId,
    tokenHash: row.tokenHash,
    isRememberMe: row.isRememberMe,
    isUsed: row.isUsed,
    failedAttempts: row.failedAttempts,
    createdAt: row.createdAt,
    expiresAt: row.expiresAt,
  };
}

/**
 * PostgreSQL two-factor challenge storage implementation
 */
export class DrizzleTwoFactorChallengeStorage implements ITwoFactorChallengeStorage {
  constructor(private readonly db: DatabaseExecutor) {}

  async create(input: CreateTwoFactorChallengeInput): Promise<TwoFactorChallenge> {
    const [row] = await this.db
      .insert(twoFactorChallenges)
      .values({
        id: generateId(),
        userId: input.userId,
        tokenHash: input.tokenHash,
        isRememberMe: input.isRememberMe,
        createdAt: input.createdAt,
        expiresAt: input.expiresAt,
      })
      .returning();

    if (!row) {
      throw new Error('Two-factor challenge insert returned no row');
    }
    return toChallenge(row);
  }

  async findByHash(tokenHash: string): Promise<TwoFactorChallenge | null> {
    const [row] = await this.db
      .select()
      .from(twoFactorChallenges)
      .where(eq(twoFactorChallenges.tokenHash, tokenHash))
      .limit(1);

    return row ? toChallenge(row) : null;
  }

  async incrementFailedAttempts(id: string): Promise<number> {
    // Single UPDATE so parallel guesses cannot lose an increment
    const [row] = await this.db
      .update(twoFactorChallenges)
      .set({ failedAttempts: sql`${twoFactorChallenges.failedAttempts} + 1` })
      .where(eq(twoFactorChallenges.id, id))
      .returning({ failedAttempts: twoFactorChallenges.failedAttempts });

    return row?.failedAttempts ?? 0;
  }

  async consume(id: string, maxFailedAttempts: number): Promise<boolean> {
    const rows = await this.db
      .update(twoFactorChallenges)
      .set({ isUsed: true })
      .where(
        and(
          eq(twoFactorChallenges.id, id),
          eq(twoFactorChallenges.isUsed, false),
          lt(twoFactorChallenges.failedAttempts, maxFailedAttempts)
        )
      )
      .returning({ id: twoFactorChallenges.id });

    return rows.length === 1;
  }

  async release(id: string): Promise<void> {
    await this.db
      .update(twoFactorChallenges)
      .set({ isUsed: false })
      .where(and(eq(twoFactorChallenges.id, id), eq(twoFactorChallenges.isUsed, true)));
  }

  async deleteExpired(before: Date): Promise<number> {
    const rows = await this.db
      .delete(twoFactorChallenges)
      .where(lt(twoFactorChallenges.expiresAt, before))
      .returning({ id: twoFactorChallenges.id });

    return rows.length;
  }
}
