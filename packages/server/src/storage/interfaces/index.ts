export * from './token-storage.js';
export * from './two-factor-storage.js';
export * from './external-auth-state-storage.js';
export * from './identity-store.js';
export * from './unit-of-work.js';

import type { ISessionRepositories, IUnitOfWork } from './unit-of-work.js';

/**
 * Complete storage interface for the session core
 *
 * The repositories on this object run outside any transaction; multi-step
 * state changes go through unitOfWork.
 */
export interface IStorage extends ISessionRepositories {
  unitOfWork: IUnitOfWork;

  /**
   * Release connections (no-op for memory storage)
   */
  close(): Promise<void>;
}
