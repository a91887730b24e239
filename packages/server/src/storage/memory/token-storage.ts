import type { RefreshToken, CreateRefreshTokenInput } from '@authgate/shared';
import type { IRefreshTokenStorage } from '../interfaces/token-storage.js';
import { generateId } from '../../crypto/index.js';
import { directWriter, type MemoryTables, type TableWriter } from './state.js';

/**
 * In-memory refresh token storage implementation
 *
 * Each method mutates synchronously, so a check-and-set inside one call
 * cannot interleave with another request.
 */
export class MemoryRefreshTokenStorage implements IRefreshTokenStorage {
  constructor(
    private readonly tables: MemoryTables,
    private readonly writer: TableWriter = directWriter
  ) {}

  async create(input: CreateRefreshTokenInput): Promise<RefreshToken> {
    const token: RefreshToken = {
      id: generateId(),
      userId: input.userId,
      tokenHash: input.tokenHash,
      familyId: input.familyId,
      parentTokenId: input.parentTokenId,
      isPersistent: input.isPersistent,
      isUsed: false,
      isInvalidated: false,
      createdAt: input.createdAt,
      expiresAt: input.expiresAt,
    };

    this.writer.set(this.tables.refreshTokens, token.id, token);
    this.writer.set(this.tables.refreshTokenHashIndex, token.tokenHash, token.id);

    return token;
  }

  async findByHash(tokenHash: string): Promise<RefreshToken | null> {
    const id = this.tables.refreshTokenHashIndex.get(tokenHash);
    if (!id) return null;
    return this.tables.refreshTokens.get(id) ?? null;
  }

  async markUsed(id: string): Promise<boolean> {
    const token = this.tables.refreshTokens.get(id);
    if (!token || token.isUsed || token.isInvalidated) {
      return false;
    }
    this.writer.set(this.tables.refreshTokens, id, { ...token, isUsed: true });
    return true;
  }

  async invalidateByUser(userId: string, now: Date): Promise<number> {
    return this.invalidateWhere((token) => token.userId === userId, now);
  }

  async invalidateFamily(familyId: string, now: Date): Promise<number> {
    return this.invalidateWhere((token) => token.familyId === familyId, now);
  }

  async deleteExpired(before: Date): Promise<number> {
    let count = 0;
    for (const [id, token] of this.tables.refreshTokens) {
      if (token.expiresAt < before) {
        this.writer.delete(this.tables.refreshTokens, id);
        this.writer.delete(this.tables.refreshTokenHashIndex, token.tokenHash);
        count++;
      }
    }
    return count;
  }

  private invalidateWhere(predicate: (token: RefreshToken) => boolean, now: Date): number {
    let count = 0;
    for (const [id, token] of this.tables.refreshTokens) {
      if (predicate(token) && !token.isInvalidated && token.expiresAt > now) {
        this.writer.set(this.tables.refreshTokens, id, { ...token, isInvalidated: true });
        count++;
      }
    }
    return count;
  }
}
