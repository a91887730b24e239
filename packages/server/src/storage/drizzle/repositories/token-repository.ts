import { and, eq, gt, lt } from 'drizzle-orm';
import type { RefreshToken, CreateRefreshTokenInput } from '@authgate/shared';
import type { IRefreshTokenStorage } from '../../interfaces/token-storage.js';
import type { DatabaseExecutor } from '../client.js';
import { refreshTokens, type RefreshTokenRow } from '../schema.js';
import { generateId } from '../../../crypto/index.js';

function toRefreshToken(row: RefreshTokenRow): RefreshToken {
  return {
    id: row.id,
    userId: row.userId,
    tokenHash: row.tokenHash,
    familyId: row.familyId,
    parentTokenId: row.parentTokenId ?? undefined,
    isPersistent: row.isPersistent,
    isUsed: row.isUsed,
    isInvalidated: row.isInvalidated,
    createdAt: row.createdAt,
    expiresAt: row.expiresAt,
  };
}

/**
 * PostgreSQL refresh token storage implementation
 *
 * Inside a transaction lookups take a row lock, so a second redeemer of the
 * same value waits and then sees the committed isUsed flag.
 */
export class DrizzleRefreshTokenStorage implements IRefreshTokenStorage {
  constructor(
    private readonly db: DatabaseExecutor,
    private readonly lockRows: boolean = false
  ) {}

  async create(input: CreateRefreshTokenInput): Promise<RefreshToken> {
    const [row] = await this.db
      .insert(refreshTokens)
      .values({
        id: generateId(),
        userId: input.userId,
        tokenHash: input.tokenHash,
        familyId: input.familyId,
        parentTokenId: input.parentTokenId ?? null,
        isPersistent: input.isPersistent,
        createdAt: input.createdAt,
        expiresAt: input.expiresAt,
      })
      .returning();

    if (!row) {
      throw new Error('Refresh token insert returned no row');
    }
    return toRefreshToken(row);
  }

  async findByHash(tokenHash: string): Promise<RefreshToken | null> {
    const query = this.db
      .select()
      .from(refreshTokens)
      .where(eq(refreshTokens.tokenHash, tokenHash))
      .limit(1);

    const [row] = this.lockRows ? await query.for('update') : await query;
    return row ? toRefreshToken(row) : null;
  }

  async markUsed(id: string): Promise<boolean> {
    const rows = await this.db
      .update(refreshTokens)
      .set({ isUsed: true })
      .where(
        and(
          eq(refreshTokens.id, id),
          eq(refreshTokens.isUsed, false),
          eq(refreshTokens.isInvalidated, false)
        )
      )
      .returning({ id: refreshTokens.id });

    return rows.length === 1;
  }

  async invalidateByUser(userId: string, now: Date): Promise<number> {
    const rows = await this.db
      .update(refreshTokens)
      .set({ isInvalidated: true })
      .where(
        and(
          eq(refreshTokens.userId, userId),
          eq(refreshTokens.isInvalidated, false),
          gt(refreshTokens.expiresAt, now)
        )
      )
      .returning({ id: refreshTokens.id });

    return rows.length;
  }

  async invalidateFamily(familyId: string, now: Date): Promise<number> {
    const rows = await this.db
      .update(refreshTokens)
      .set({ isInvalidated: true })
      .where(
        and(
          eq(refreshTokens.familyId, familyId),
          eq(refreshTokens.isInvalidated, false),
          gt(refreshTokens.expiresAt, now)
        )
      )
      .returning({ id: refreshTokens.id });

    return rows.length;
  }

  async deleteExpired(before: Date): Promise<number> {
    const rows = await this.db
      .delete(refreshTokens)
      .where(lt(refreshTokens.expiresAt, before))
      .returning({ id: refreshTokens.id });

    return rows.length;
  }
}
