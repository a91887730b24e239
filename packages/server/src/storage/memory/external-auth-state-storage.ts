import type { ExternalAuthState, CreateExternalAuthStateInput } from '@authgate/shared';
import type { IExternalAuthStateStorage } from '../interfaces/external-auth-state-storage.js';
import { generateId } from '../../crypto/index.js';
import { directWriter, type MemoryTables, type TableWriter } from './state.js';

/**
 * In-memory external sign-in state storage implementation
 */
export class MemoryExternalAuthStateStorage implements IExternalAuthStateStorage {
  constructor(
    private readonly tables: MemoryTables,
    private readonly writer: TableWriter = directWriter
  ) {}

  async create(input: CreateExternalAuthStateInput): Promise<ExternalAuthState> {
    const state: ExternalAuthState = {
      id: generateId(),
      stateHash: input.stateHash,
      provider: input.provider,
      redirectUri: input.redirectUri,
      userId: input.userId,
      isUsed: false,
      createdAt: input.createdAt,
      expiresAt: input.expiresAt,
    };

    this.writer.set(this.tables.externalAuthStates, state.id, state);
    this.writer.set(this.tables.externalAuthStateHashIndex, state.stateHash, state.id);

    return state;
  }

  async findByHash(stateHash: string): Promise<ExternalAuthState | null> {
    const id = this.tables.externalAuthStateHashIndex.get(stateHash);
    if (!id) return null;
    return this.tables.externalAuthStates.get(id) ?? null;
  }

  async consume(id: string): Promise<boolean> {
    const state = this.tables.externalAuthStates.get(id);
    if (!state || state.isUsed) {
      return false;
    }
    this.writer.set(this.tables.externalAuthStates, id, { ...state, isUsed: true });
    return true;
  }

  async deleteExpired(before: Date): Promise<number> {
    let count = 0;
    for (const [id, state] of this.tables.externalAuthStates) {
      if (state.expiresAt < before) {
        this.writer.delete(this.tables.externalAuthStates, id);
        this.writer.delete(this.tables.externalAuthStateHashIndex, state.stateHash);
        count++;
      }
    }
    return count;
  }
}
