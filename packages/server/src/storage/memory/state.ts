import type { RefreshToken, TwoFactorChallenge, ExternalAuthState } from '@authgate/shared';

/**
 * Tables backing the in-memory repositories
 *
 * Records are immutable: updates replace the entry.
 */
export class MemoryTables {
  readonly refreshTokens = new Map<string, RefreshToken>();
  readonly refreshTokenHashIndex = new Map<string, string>(); // tokenHash -> id
  readonly twoFactorChallenges = new Map<string, TwoFactorChallenge>();
  readonly twoFactorChallengeHashIndex = new Map<string, string>(); // tokenHash -> id
  readonly externalAuthStates = new Map<string, ExternalAuthState>();
  readonly externalAuthStateHashIndex = new Map<string, string>(); // stateHash -> id
}

/**
 * Applies writes to the tables
 */
export interface TableWriter {
  set<K, V>(table: Map<K, V>, key: K, value: V): void;
  delete<K, V>(table: Map<K, V>, key: K): void;
}

export const directWriter: TableWriter = {
  set(table, key, value) {
    table.set(key, value);
  },
  delete(table, key) {
    table.delete(key);
  },
};

/**
 * Writer that remembers how to revert each write it makes
 *
 * Only writes made through this log are reverted. An entry that was changed
 * again by someone else after the logged write is left alone.
 */
export class UndoLog implements TableWriter {
  private readonly entries: Array<() => void> = [];

  set<K, V>(table: Map<K, V>, key: K, value: V): void {
    const previous = table.get(key);
    table.set(key, value);
    this.entries.push(() => {
      if (table.get(key) !== value) return;
      if (previous === undefined) {
        table.delete(key);
      } else {
        table.set(key, previous);
      }
    });
  }

  delete<K, V>(table: Map<K, V>, key: K): void {
    const previous = table.get(key);
    if (previous === undefined) return;
    table.delete(key);
    this.entries.push(() => {
      if (!table.has(key)) {
        table.set(key, previous);
      }
    });
  }

  rollback(): void {
    for (const undo of this.entries.reverse()) {
      undo();
    }
    this.entries.length = 0;
  }
}
