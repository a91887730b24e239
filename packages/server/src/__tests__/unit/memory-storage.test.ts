import { describe, it, expect, beforeEach } from 'vitest';
import type { CreateRefreshTokenInput } from '@authgate/shared';
import { createMemoryStorage } from '../../storage/memory/index.js';
import type { IStorage } from '../../storage/interfaces/index.js';

const now = new Date('2030-01-01T00:00:00.000Z');

function tokenInput(tokenHash: string, expiresAt = new Date(now.getTime() + 3600_000)): CreateRefreshTokenInput {
  return {
    userId: 'user-1',
    tokenHash,
    familyId: 'family-1',
    isPersistent: false,
    createdAt: now,
    expiresAt,
  };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('MemoryUnitOfWork', () => {
  let storage: IStorage;

  beforeEach(() => {
    storage = createMemoryStorage();
  });

  it('keeps writes from a committed transaction', async () => {
    await storage.unitOfWork.transaction((repositories) => repositories.refreshTokens.create(tokenInput('kept')));

    expect(await storage.refreshTokens.findByHash('kept')).not.toBeNull();
  });

  it('keeps a failed-attempt increment made while a transaction rolls back', async () => {
    const challenge = await storage.twoFactorChallenges.create({
      userId: 'user-1',
      tokenHash: 'challenge-hash',
      isRememberMe: false,
      createdAt: now,
      expiresAt: new Date(now.getTime() + 300_000),
    });
    const entered = deferred();
    const gate = deferred();

    const transaction = storage.unitOfWork.transaction(async (repositories) => {
      await repositories.refreshTokens.create(tokenInput('successor'));
      entered.resolve();
      await gate.promise;
      throw new Error('rotation failed');
    });

    await entered.promise;
    expect(await storage.twoFactorChallenges.incrementFailedAttempts(challenge.id)).toBe(1);
    gate.resolve();
    await expect(transaction).rejects.toThrow('rotation failed');

    expect((await storage.twoFactorChallenges.findByHash('challenge-hash'))?.failedAttempts).toBe(1);
    expect(await storage.refreshTokens.findByHash('successor')).toBeNull();
  });

  it('reverts its own writes without restoring rows deleted outside it', async () => {
    const active = await storage.refreshTokens.create(tokenInput('active'));
    await storage.refreshTokens.create(tokenInput('stale', new Date(now.getTime() - 1000)));
    const entered = deferred();
    const gate = deferred();

    const transaction = storage.unitOfWork.transaction(async (repositories) => {
      await repositories.refreshTokens.markUsed(active.id);
      entered.resolve();
      await gate.promise;
      throw new Error('rotation failed');
    });

    await entered.promise;
    expect(await storage.refreshTokens.deleteExpired(now)).toBe(1);
    gate.resolve();
    await expect(transaction).rejects.toThrow('rotation failed');

    expect((await storage.refreshTokens.findByHash('active'))?.isUsed).toBe(false);
    expect(await storage.refreshTokens.findByHash('stale')).toBeNull();
  });

  it('leaves a row alone when it was changed again after the transaction wrote it', async () => {
    const active = await storage.refreshTokens.create(tokenInput('active'));
    const entered = deferred();
    const gate = deferred();

    const transaction = storage.unitOfWork.transaction(async (repositories) => {
      await repositories.refreshTokens.markUsed(active.id);
      entered.resolve();
      await gate.promise;
      throw new Error('rotation failed');
    });

    await entered.promise;
    expect(await storage.refreshTokens.invalidateByUser('user-1', now)).toBe(1);
    gate.resolve();
    await expect(transaction).rejects.toThrow('rotation failed');

    const stored = await storage.refreshTokens.findByHash('active');
    expect(stored?.isInvalidated).toBe(true);
    expect(stored?.isUsed).toBe(true);
  });
});
