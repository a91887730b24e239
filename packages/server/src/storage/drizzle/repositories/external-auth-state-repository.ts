import { and, eq, lt } from 'drizzle-orm';
import type { ExternalAuthState, CreateExternalAuthStateInput } from '@authgate/shared';
import type { IExternalAuthStateStorage } from '../../interfaces/external-auth-state-storage.js';
import type { DatabaseExecutor } from '../client.js';
import { externalAuthStates, type ExternalAuthStateRow } from '../schema.js';
import { generateId } from '../../../crypto/index.js';

function toState(row: ExternalAuthStateRow): ExternalAuthState {
  return {
    id: row.id,
    stateHash: row.stateHash,
    provider: row.provider,
    redirectUri: row.redirectUri,
    userId: row.userId ?? undefined,
    isUsed: row.isUsed,
    createdAt: row.createdAt,
    expiresAt: row.expiresAt,
  };
}

/**
 * PostgreSQL external sign-in state storage implementation
 */
export class DrizzleExternalAuthStateStorage implements IExternalAuthStateStorage {
  constructor(private readonly db: DatabaseExecutor) {}

  async create(input: CreateExternalAuthStateInput): Promise<ExternalAuthState> {
    const [row] = await this.db
      .insert(externalAuthStates)
      .values({
        id: generateId(),
        stateHash: input.stateHash,
        provider: input.provider,
        redirectUri: input.redirectUri,
        userId: input.userId ?? null,
        createdAt: input.createdAt,
        expiresAt: input.expiresAt,
      })
      .returning();

    if (!row) {
      throw new Error('External auth state insert returned no row');
    }
    return toState(row);
  }

  async findByHash(stateHash: string): Promise<ExternalAuthState | null> {
    const [row] = await this.db
      .select()
      .from(externalAuthStates)
      .where(eq(externalAuthStates.stateHash, stateHash))
      .limit(1);

    return row ? toState(row) : null;
  }

  async consume(id: string): Promise<boolean> {
    const rows = await this.db
      .update(externalAuthStates)
      .set({ isUsed: true })
      .where(and(eq(externalAuthStates.id, id), eq(externalAuthStates.isUsed, false)))
      .returning({ id: externalAuthStates.id });

    return rows.length === 1;
  }

  async deleteExpired(before: Date): Promise<number> {
    const rows = await this.db
      .delete(externalAuthStates)
      .where(lt(externalAuthStates.expiresAt, before))
      .returning({ id: externalAuthStates.id });

    return rows.length;
  }
}
