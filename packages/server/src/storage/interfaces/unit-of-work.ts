import type { IRefreshTokenStorage } from './token-storage.js';
import type { ITwoFactorChallengeStorage } from './two-factor-storage.js';
import type { IExternalAuthStateStorage } from './external-auth-state-storage.js';

/**
 * Repositories over the session core's shared mutable state
 */
export interface ISessionRepositories {
  refreshTokens: IRefreshTokenStorage;
  twoFactorChallenges: ITwoFactorChallengeStorage;
  externalAuthStates: IExternalAuthStateStorage;
}

/**
 * Transactional boundary
 *
 * The work either commits as a whole or, if it throws, leaves no trace.
 */
export interface IUnitOfWork {
  transaction<T>(work: (repositories: ISessionRepositories) => Promise<T>): Promise<T>;
}
