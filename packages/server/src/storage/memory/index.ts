import type { IStorage } from '../interfaces/index.js';
import { MemoryTables, directWriter, type TableWriter } from './state.js';
import { MemoryRefreshTokenStorage } from './token-storage.js';
import { MemoryTwoFactorChallengeStorage } from './two-factor-storage.js';
import { MemoryExternalAuthStateStorage } from './external-auth-state-storage.js';
import { MemoryUnitOfWork } from './unit-of-work.js';

export { MemoryTables, UndoLog, directWriter, type TableWriter } from './state.js';
export { MemoryRefreshTokenStorage } from './token-storage.js';
export { MemoryTwoFactorChallengeStorage } from './two-factor-storage.js';
export { MemoryExternalAuthStateStorage } from './external-auth-state-storage.js';
export { MemoryUnitOfWork } from './unit-of-work.js';
export { MemoryIdentityStore, type MemoryIdentityStoreOptions, type CreateUserInput } from './identity-store.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(): IStorage {
  const tables = new MemoryTables();
  const createRepositories = (writer: TableWriter) => ({
    refreshTokens: new MemoryRefreshTokenStorage(tables, writer),
    twoFactorChallenges: new MemoryTwoFactorChallengeStorage(tables, writer),
    externalAuthStates: new MemoryExternalAuthStateStorage(tables, writer),
  });

  return {
    ...createRepositories(directWriter),
    unitOfWork: new MemoryUnitOfWork(createRepositories),
    close: async () => undefined,
  };
}
