import type { AuditAction, AuditEntry } from '@authgate/shared';
import { createLogger, describeError, type Logger } from '../logging/logger.js';
import { type IClock, systemClock } from './clock.js';

/**
 * Audit sink consumed by the session core
 */
export interface IAuditSink {
  log(entry: AuditEntry): void | Promise<void>;
}

export interface AuditDetails {
  userId?: string;
  targetType?: string;
  targetId?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Fire-and-forget audit front end
 *
 * Sink failures, sync or async, are logged and never reach the caller.
 */
export class AuditTrail {
  private readonly logger: Logger = createLogger('audit');

  constructor(
    private readonly sink: IAuditSink,
    private readonly clock: IClock = systemClock
  ) {}

  record(action: AuditAction, details: AuditDetails = {}): void {
    const entry: AuditEntry = { action, ...details, occurredAt: this.clock.now() };

    try {
      const pending = this.sink.log(entry);
      if (pending instanceof Promise) {
        void pending.catch((error: unknown) => this.reportFailure(action, error));
      }
    } catch (error) {
      this.reportFailure(action, error);
    }
  }

  private reportFailure(action: AuditAction, error: unknown): void {
    this.logger.error('Audit sink failed', { action, ...describeError(error) });
  }
}

/**
 * Writes audit entries as structured log lines
 */
export class LoggerAuditSink implements IAuditSink {
  private readonly logger: Logger = createLogger('audit');

  log(entry: AuditEntry): void {
    this.logger.info(entry.action, {
      userId: entry.userId,
      targetType: entry.targetType,
      targetId: entry.targetId,
      metadata: entry.metadata,
      occurredAt: entry.occurredAt.toISOString(),
    });
  }
}

/**
 * Keeps audit entries in memory (tests, local development)
 */
export class MemoryAuditSink implements IAuditSink {
  readonly entries: AuditEntry[] = [];

  log(entry: AuditEntry): void {
    this.entries.push(entry);
  }

  actions(): AuditAction[] {
    return this.entries.map((entry) => entry.action);
  }
}
