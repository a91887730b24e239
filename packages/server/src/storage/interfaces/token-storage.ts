import type { RefreshToken, CreateRefreshTokenInput } from '@authgate/shared';

/**
 * Storage interface for refresh token management
 *
 * Rows are append-only apart from the isUsed / isInvalidated flags.
 */
export interface IRefreshTokenStorage {
  /**
   * Insert a refresh token record (the caller supplies the hash, never the value)
   */
  create(input: CreateRefreshTokenInput): Promise<RefreshToken>;

  /**
   * Find a refresh token by its hash
   */
  findByHash(tokenHash: string): Promise<RefreshToken | null>;

  /**
   * Mark a token as used if it is still unused and not invalidated
   * Returns false when another redeemer got there first
   */
  markUsed(id: string): Promise<boolean>;

  /**
   * Invalidate every active (non-invalidated, unexpired) token of a user
   */
  invalidateByUser(userId: string, now: Date): Promise<number>;

  /**
   * Invalidate every active token in a rotation family
   */
  invalidateFamily(familyId: string, now: Date): Promise<number>;

  /**
   * Delete tokens that expired before the cutoff and can no longer be redeemed (cleanup)
   */
  deleteExpired(before: Date): Promise<number>;
}
