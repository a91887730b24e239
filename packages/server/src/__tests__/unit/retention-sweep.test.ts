import { describe, it, expect, vi, afterEach } from 'vitest';
import { createMemoryStorage } from '../../storage/memory/index.js';
import { sweepExpired, startRetentionSweep } from '../../jobs/retention-sweep.js';
import { addSeconds } from '../../services/clock.js';
import { ManualClock } from '../test-setup.js';

describe('Retention sweep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('deletes rows past the grace period only', async () => {
    const clock = new ManualClock();
    const storage = createMemoryStorage();
    const now = clock.now();

    await storage.refreshTokens.create({
      userId: 'user-1',
      tokenHash: 'old-hash',
      familyId: 'family-1',
      isPersistent: false,
      createdAt: addSeconds(now, -200000),
      expiresAt: addSeconds(now, -100000),
    });
    await storage.refreshTokens.create({
      userId: 'user-1',
      tokenHash: 'recent-hash',
      familyId: 'family-1',
      isPersistent: false,
      createdAt: addSeconds(now, -7200),
      expiresAt: addSeconds(now, -3600),
    });
    await storage.twoFactorChallenges.create({
      userId: 'user-1',
      tokenHash: 'challenge-hash',
      isRememberMe: false,
      createdAt: addSeconds(now, -90000),
      expiresAt: addSeconds(now, -89700),
    });
    await storage.externalAuthStates.create({
      stateHash: 'state-hash',
      provider: 'fake',
      redirectUri: 'https://app.test/callback',
      createdAt: now,
      expiresAt: addSeconds(now, 600),
    });

    const counts = await sweepExpired(storage, 86400, clock);

    expect(counts).toEqual({ refreshTokens: 1, twoFactorChallenges: 1, externalAuthStates: 0 });
    expect(await storage.refreshTokens.findByHash('old-hash')).toBeNull();
    expect(await storage.refreshTokens.findByHash('recent-hash')).not.toBeNull();
    expect(await storage.externalAuthStates.findByHash('state-hash')).not.toBeNull();
  });

  it('runs on an interval until stopped', async () => {
    vi.useFakeTimers();
    const storage = createMemoryStorage();
    const spy = vi.spyOn(storage.refreshTokens, 'deleteExpired');

    const stop = startRetentionSweep({ repositories: storage, intervalMs: 1000, gracePeriod: 0 });
    await vi.advanceTimersByTimeAsync(3000);
    stop();
    await vi.advanceTimersByTimeAsync(3000);

    expect(spy).toHaveBeenCalledTimes(3);
  });
});
