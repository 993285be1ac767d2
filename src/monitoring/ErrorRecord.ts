/**
 * Error Record
 * Immutable, classified error entries and the builder that produces them
 */

import { OrchestratorError, type ErrorKind } from '../errors.js';

export enum ErrorType {
  VALIDATION = 'validation',
  AGENT_LIFECYCLE = 'agent_lifecycle',
  TASK_EXECUTION = 'task_execution',
  WORKFLOW_EXECUTION = 'workflow_execution',
  NARRATIVE_GENERATION = 'narrative_generation',
  UNKNOWN = 'unknown',
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorRecord {
  readonly type: ErrorType;
  readonly severity: ErrorSeverity;
  readonly workerName: string;
  readonly message: string;
  readonly context: Readonly<Record<string, unknown>>;
  readonly timestamp: Date;
  readonly stack?: string;
}

const KIND_TYPES: Record<ErrorKind, ErrorType> = {
  validation: ErrorType.VALIDATION,
  lifecycle: ErrorType.AGENT_LIFECYCLE,
  execution: ErrorType.TASK_EXECUTION,
  workflow: ErrorType.WORKFLOW_EXECUTION,
  narrative: ErrorType.NARRATIVE_GENERATION,
};

const KIND_SEVERITIES: Record<ErrorKind, ErrorSeverity> = {
  validation: ErrorSeverity.MEDIUM,
  lifecycle: ErrorSeverity.HIGH,
  execution: ErrorSeverity.HIGH,
  workflow: ErrorSeverity.CRITICAL,
  narrative: ErrorSeverity.MEDIUM,
};

/**
 * Map a thrown value onto the error taxonomy
 */
export function classifyError(error: unknown): { type: ErrorType; severity: ErrorSeverity } {
  if (error instanceof OrchestratorError) {
    return { type: KIND_TYPES[error.kind], severity: KIND_SEVERITIES[error.kind] };
  }
  return { type: ErrorType.UNKNOWN, severity: ErrorSeverity.MEDIUM };
}

export function isCritical(record: ErrorRecord): boolean {
  return record.severity === ErrorSeverity.CRITICAL;
}

/** One-line form: "[HIGH] loader: message" */
export function summarizeRecord(record: ErrorRecord): string {
  return `[${record.severity.toUpperCase()}] ${record.workerName}: ${record.message}`;
}

export function recordToJSON(record: ErrorRecord): Record<string, unknown> {
  return {
    type: record.type,
    severity: record.severity,
    workerName: record.workerName,
    message: record.message,
    context: { ...record.context },
    timestamp: record.timestamp.toISOString(),
    ...(record.stack ? { stack: record.stack } : {}),
  };
}

/**
 * Fluent builder; build() refuses to produce a record without
 * type, severity, worker and message.
 */
export class ErrorRecordBuilder {
  private type?: ErrorType;
  private severity?: ErrorSeverity;
  private workerName?: string;
  private message?: string;
  private context: Record<string, unknown> = {};
  private stack?: string;
  private timestamp?: Date;

  withType(type: ErrorType): this {
    this.type = type;
    return this;
  }

  withSeverity(severity: ErrorSeverity): this {
    this.severity = severity;
    return this;
  }

  withWorker(workerName: string): this {
    this.workerName = workerName;
    return this;
  }

  withMessage(message: string): this {
    this.message = message;
    return this;
  }

  withContext(context: Record<string, unknown>): this {
    this.context = { ...context };
    return this;
  }

  addContext(key: string, value: unknown): this {
    this.context[key] = value;
    return this;
  }

  withStack(stack: string | undefined): this {
    this.stack = stack;
    return this;
  }

  withTimestamp(timestamp: Date): this {
    this.timestamp = timestamp;
    return this;
  }

  build(): ErrorRecord {
    const missing: string[] = [];
    if (this.type === undefined) missing.push('type');
    if (this.severity === undefined) missing.push('severity');
    if (!this.workerName) missing.push('workerName');
    if (!this.message) missing.push('message');

    if (
      this.type === undefined ||
      this.severity === undefined ||
      !this.workerName ||
      !this.message
    ) {
      throw new Error(`Cannot build error record, missing: ${missing.join(', ')}`);
    }

    return Object.freeze({
      type: this.type,
      severity: this.severity,
      workerName: this.workerName,
      message: this.message,
      context: Object.freeze({ ...this.context }),
      timestamp: this.timestamp ?? new Date(),
      ...(this.stack ? { stack: this.stack } : {}),
    });
  }
}
