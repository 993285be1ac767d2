/**
 * Error Intelligence
 * Bounded, queryable history of classified errors plus per-worker success tracking
 */

import type { Logger } from './logger.js';
import {
  ErrorRecordBuilder,
  ErrorSeverity,
  ErrorType,
  classifyError,
  isCritical,
  summarizeRecord,
  type ErrorRecord,
} from './ErrorRecord.js';

export interface ErrorQuery {
  type?: ErrorType;
  severity?: ErrorSeverity;
  workerName?: string;
  since?: Date;
  limit?: number;
}

export interface RecordErrorOptions {
  workerName: string;
  context?: Record<string, unknown>;
  severity?: ErrorSeverity;
}

export interface WorkerHealth {
  successes: number;
  failures: number;
  successRate: number;
}

export interface ErrorSummary {
  totalErrors: number;
  retained: number;
  criticalCount: number;
  byType: Record<string, number>;
  bySeverity: Record<string, number>;
  byWorker: Record<string, number>;
  recent: string[];
}

export class ErrorIntelligence {
  private history: ErrorRecord[] = [];
  private total = 0;
  private workers: Map<string, { successes: number; failures: number }> = new Map();
  private logFailures = 0;

  constructor(
    private readonly logger: Logger,
    private readonly historyLimit: number = 1000
  ) {}

  /**
   * Store a record. Never throws: a broken record is logged and dropped,
   * and a failing log sink is counted in droppedLogs.
   */
  record(record: ErrorRecord): void {
    try {
      this.history.push(record);
      if (this.history.length > this.historyLimit) {
        this.history.splice(0, this.history.length - this.historyLimit);
      }
      this.total++;
      this.workerStats(record.workerName).failures++;

      this.log(
        'warn',
        { type: record.type, severity: record.severity, worker: record.workerName, context: record.context },
        summarizeRecord(record)
      );
    } catch (err) {
      this.log('warn', { err }, 'Failed to record error');
    }
  }

  /**
   * Classify a thrown value, build its record and store it. Never throws;
   * returns undefined when no record could be built.
   */
  recordError(error: unknown, options: RecordErrorOptions): ErrorRecord | undefined {
    try {
      const { type, severity } = classifyError(error);
      const message = error instanceof Error ? error.message : String(error);
      const builder = new ErrorRecordBuilder()
        .withType(type)
        .withSeverity(options.severity ?? severity)
        .withWorker(options.workerName)
        .withMessage(message || 'Unknown error')
        .withContext(options.context ?? {})
        .withStack(error instanceof Error ? error.stack : undefined);

      if (error instanceof Error) {
        builder.addContext('errorName', error.name);
      }

      const record = builder.build();
      this.record(record);
      return record;
    } catch (err) {
      this.log('warn', { err }, 'Failed to build error record');
      return undefined;
    }
  }

  trackSuccess(workerName: string, operation: string, context: Record<string, unknown> = {}): void {
    this.workerStats(workerName).successes++;
    this.log('debug', { worker: workerName, operation, ...context }, 'Operation succeeded');
  }

  /** Log lines lost because the logger itself threw */
  get droppedLogs(): number {
    return this.logFailures;
  }

  /** All errors ever recorded, including those evicted from history */
  get totalErrors(): number {
    return this.total;
  }

  get retained(): number {
    return this.history.length;
  }

  /**
   * Most recent first
   */
  query(filter: ErrorQuery = {}): ErrorRecord[] {
    const matches = this.history.filter(
      (record) =>
        (filter.type === undefined || record.type === filter.type) &&
        (filter.severity === undefined || record.severity === filter.severity) &&
        (filter.workerName === undefined || record.workerName === filter.workerName) &&
        (filter.since === undefined || record.timestamp >= filter.since)
    );
    matches.reverse();
    return filter.limit !== undefined ? matches.slice(0, filter.limit) : matches;
  }

  getWorkerHealth(): Record<string, WorkerHealth> {
    const health: Record<string, WorkerHealth> = {};
    for (const [name, stats] of this.workers) {
      const attempts = stats.successes + stats.failures;
      health[name] = {
        successes: stats.successes,
        failures: stats.failures,
        successRate: attempts === 0 ? 1 : Math.round((stats.successes / attempts) * 1000) / 1000,
      };
    }
    return health;
  }

  getSummary(recentCount = 5): ErrorSummary {
    const byType: Record<string, number> = {};
    const bySeverity: Record<string, number> = {};
    const byWorker: Record<string, number> = {};

    for (const record of this.history) {
      byType[record.type] = (byType[record.type] ?? 0) + 1;
      bySeverity[record.severity] = (bySeverity[record.severity] ?? 0) + 1;
      byWorker[record.workerName] = (byWorker[record.workerName] ?? 0) + 1;
    }

    return {
      totalErrors: this.total,
      retained: this.history.length,
      criticalCount: this.history.filter(isCritical).length,
      byType,
      bySeverity,
      byWorker,
      recent: this.history.slice(-recentCount).map(summarizeRecord),
    };
  }

  clear(): void {
    this.history = [];
    this.total = 0;
    this.workers.clear();
  }

  private log(level: 'warn' | 'debug', bindings: Record<string, unknown>, message: string): void {
    try {
      this.logger[level](bindings, message);
    } catch {
      this.logFailures++;
    }
  }

  private workerStats(workerName: string): { successes: number; failures: number } {
    let stats = this.workers.get(workerName);
    if (!stats) {
      stats = { successes: 0, failures: 0 };
      this.workers.set(workerName, stats);
    }
    return stats;
  }
}
