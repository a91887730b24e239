import type { ExternalAuthState, CreateExternalAuthStateInput } from '@authgate/shared';

/**
 * Storage interface for external sign-in state values
 */
export interface IExternalAuthStateStorage {
  create(input: CreateExternalAuthStateInput): Promise<ExternalAuthState>;

  findByHash(stateHash: string): Promise<ExternalAuthState | null>;

  /**
   * Mark the state used; false if it was already used
   */
  consume(id: string): Promise<boolean>;

  deleteExpired(before: Date): Promise<number>;
}
