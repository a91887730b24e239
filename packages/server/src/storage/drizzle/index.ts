import type { IStorage } from '../interfaces/index.js';
import type { ISessionRepositories, IUnitOfWork } from '../interfaces/unit-of-work.js';
import {
  initializeDatabase,
  closeDatabase,
  type Database,
  type DatabaseExecutor,
  type DatabaseOptions,
} from './client.js';
import { DrizzleRefreshTokenStorage } from './repositories/token-repository.js';
import { DrizzleTwoFactorChallengeStorage } from './repositories/two-factor-repository.js';
import { DrizzleExternalAuthStateStorage } from './repositories/external-auth-state-repository.js';

export { initializeDatabase, closeDatabase } from './client.js';
export type { Database, DatabaseExecutor, DatabaseOptions } from './client.js';
export * as schema from './schema.js';
export { DrizzleRefreshTokenStorage } from './repositories/token-repository.js';
export { DrizzleTwoFactorChallengeStorage } from './repositories/two-factor-repository.js';
export { DrizzleExternalAuthStateStorage } from './repositories/external-auth-state-repository.js';

function createRepositories(db: DatabaseExecutor, lockRows: boolean): ISessionRepositories {
  return {
    refreshTokens: new DrizzleRefreshTokenStorage(db, lockRows),
    twoFactorChallenges: new DrizzleTwoFactorChallengeStorage(db),
    externalAuthStates: new DrizzleExternalAuthStateStorage(db),
  };
}

/**
 * PostgreSQL unit of work
 *
 * READ COMMITTED plus SELECT ... FOR UPDATE on the presented token: a
 * concurrent redeemer blocks on the row lock and then reads the committed
 * isUsed flag instead of failing with a serialization error.
 */
export class DrizzleUnitOfWork implements IUnitOfWork {
  constructor(private readonly db: Database) {}

  transaction<T>(work: (repositories: ISessionRepositories) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(createRepositories(tx, true)), {
      isolationLevel: 'read committed',
    });
  }
}

/**
 * Create a complete PostgreSQL storage implementation
 */
export function createDrizzleStorage(options: DatabaseOptions): IStorage {
  const db = initializeDatabase(options);

  return {
    ...createRepositories(db, false),
    unitOfWork: new DrizzleUnitOfWork(db),
    close: closeDatabase,
  };
}
