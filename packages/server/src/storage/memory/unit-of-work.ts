import type { ISessionRepositories, IUnitOfWork } from '../interfaces/unit-of-work.js';
import { UndoLog, type TableWriter } from './state.js';

/**
 * In-memory unit of work
 *
 * Transactions run one at a time on repositories bound to their own undo
 * log. If the work throws, only the writes it made are reverted; writes made
 * meanwhile outside the transaction survive.
 */
export class MemoryUnitOfWork implements IUnitOfWork {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly createRepositories: (writer: TableWriter) => ISessionRepositories) {}

  transaction<T>(work: (repositories: ISessionRepositories) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runIsolated(work));
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runIsolated<T>(work: (repositories: ISessionRepositories) => Promise<T>): Promise<T> {
    const log = new UndoLog();
    try {
      return await work(this.createRepositories(log));
    } catch (error) {
      log.rollback();
      throw error;
    }
  }
}
