import type { ISessionRepositories } from '../storage/interfaces/index.js';
import { type IClock, systemClock, addSeconds } from '../services/clock.js';
import { createLogger, describeError } from '../logging/logger.js';

const logger = createLogger('retention');

export interface SweepCounts {
  refreshTokens: number;
  twoFactorChallenges: number;
  externalAuthStates: number;
}

/**
 * Delete rows that expired more than `gracePeriod` seconds ago
 *
 * Used tokens stay until then so replays are still detected as reuse.
 */
export async function sweepExpired(
  repositories: ISessionRepositories,
  gracePeriod: number,
  clock: IClock = systemClock
): Promise<SweepCounts> {
  const cutoff = addSeconds(clock.now(), -gracePeriod);

  const [refreshTokens, twoFactorChallenges, externalAuthStates] = await Promise.all([
    repositories.refreshTokens.deleteExpired(cutoff),
    repositories.twoFactorChallenges.deleteExpired(cutoff),
    repositories.externalAuthStates.deleteExpired(cutoff),
  ]);

  return { refreshTokens, twoFactorChallenges, externalAuthStates };
}

export interface RetentionSweepOptions {
  repositories: ISessionRepositories;
  intervalMs: number;
  gracePeriod: number;
  clock?: IClock;
}

/**
 * Run sweepExpired on an interval; returns a stop function
 */
export function startRetentionSweep(options: RetentionSweepOptions): () => void {
  const run = async () => {
    try {
      const counts = await sweepExpired(options.repositories, options.gracePeriod, options.clock);
      logger.debug('Retention sweep finished', { ...counts });
    } catch (error) {
      logger.error('Retention sweep failed', describeError(error));
    }
  };

  const timer = setInterval(() => {
    void run();
  }, options.intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
