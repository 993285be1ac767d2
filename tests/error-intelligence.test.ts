/**
 * Error records and error intelligence
 */

import { describe, it, expect, vi } from 'vitest';
import { AgentNotFoundError, DataUnavailableError, WorkflowError } from '../src/errors.js';
import { ErrorIntelligence } from '../src/monitoring/ErrorIntelligence.js';
import { createLogger } from '../src/monitoring/logger.js';
import {
  ErrorRecordBuilder,
  ErrorSeverity,
  ErrorType,
  classifyError,
  isCritical,
  recordToJSON,
  summarizeRecord,
  type ErrorRecord,
} from '../src/monitoring/ErrorRecord.js';
import { WorkflowStatus, type Workflow } from '../src/state/models.js';
import { silentLogger } from './helpers.js';

function record(worker: string, type = ErrorType.TASK_EXECUTION, severity = ErrorSeverity.HIGH) {
  return new ErrorRecordBuilder()
    .withType(type)
    .withSeverity(severity)
    .withWorker(worker)
    .withMessage(`${worker} failed`)
    .build();
}

describe('ErrorRecordBuilder', () => {
  it('should build a frozen record', () => {
    const timestamp = new Date('2026-01-02T03:04:05.000Z');
    const built = new ErrorRecordBuilder()
      .withType(ErrorType.VALIDATION)
      .withSeverity(ErrorSeverity.MEDIUM)
      .withWorker('TaskRouter')
      .withMessage('Unknown task type: x')
      .withContext({ taskId: 't1' })
      .addContext('attempt', 1)
      .withTimestamp(timestamp)
      .build();

    expect(Object.isFrozen(built)).toBe(true);
    expect(recordToJSON(built)).toEqual({
      type: 'validation',
      severity: 'medium',
      workerName: 'TaskRouter',
      message: 'Unknown task type: x',
      context: { taskId: 't1', attempt: 1 },
      timestamp: '2026-01-02T03:04:05.000Z',
    });
  });

  it('should refuse to build without required fields', () => {
    expect(() => new ErrorRecordBuilder().withType(ErrorType.UNKNOWN).withWorker('w').build()).toThrow(
      'Cannot build error record, missing: severity, message'
    );
  });

  it('should summarise and flag critical records', () => {
    const critical = record('loader', ErrorType.WORKFLOW_EXECUTION, ErrorSeverity.CRITICAL);
    expect(summarizeRecord(critical)).toBe('[CRITICAL] loader: loader failed');
    expect(isCritical(critical)).toBe(true);
    expect(isCritical(record('explorer'))).toBe(false);
  });
});

describe('classifyError', () => {
  it('should classify by error kind', () => {
    expect(classifyError(new DataUnavailableError())).toEqual({ type: ErrorType.VALIDATION, severity: ErrorSeverity.MEDIUM });
    expect(classifyError(new AgentNotFoundError('loader'))).toEqual({
      type: ErrorType.AGENT_LIFECYCLE,
      severity: ErrorSeverity.HIGH,
    });
    const workflow: Workflow = {
      id: 'wf',
      status: WorkflowStatus.FAILED,
      totalTasks: 0,
      completedTasks: 0,
      failedTasks: 0,
      skippedTasks: 0,
      results: {},
      errors: [],
      qualityScore: 0,
      createdAt: new Date(),
      durationMs: 0,
    };
    expect(classifyError(new WorkflowError('aborted', workflow, [])).severity).toBe(ErrorSeverity.CRITICAL);
    expect(classifyError(new Error('foreign'))).toEqual({ type: ErrorType.UNKNOWN, severity: ErrorSeverity.MEDIUM });
  });
});

describe('ErrorIntelligence', () => {
  it('should keep a bounded history but count every error', () => {
    const errors = new ErrorIntelligence(silentLogger, 3);
    for (const worker of ['a', 'b', 'c', 'd', 'e']) {
      errors.record(record(worker));
    }
    expect(errors.totalErrors).toBe(5);
    expect(errors.retained).toBe(3);
    expect(errors.query().map((entry) => entry.workerName)).toEqual(['e', 'd', 'c']);
  });

  it('should record thrown values without throwing', () => {
    const errors = new ErrorIntelligence(silentLogger);
    const recorded = errors.recordError(new AgentNotFoundError('loader'), {
      workerName: 'TaskRouter',
      context: { taskId: 't1' },
    });
    expect(recorded?.type).toBe(ErrorType.AGENT_LIFECYCLE);
    expect(recorded?.context).toEqual({ taskId: 't1', errorName: 'AgentNotFoundError' });

    expect(errors.recordError('not an error', { workerName: '' })).toBeUndefined();
    expect(errors.totalErrors).toBe(1);
  });

  it('should keep recording when the logger throws', () => {
    const logger = createLogger('test', { level: 'silent', pretty: false });
    vi.spyOn(logger, 'warn').mockImplementation(() => {
      throw new Error('log sink down');
    });
    const errors = new ErrorIntelligence(logger);

    let recorded: ErrorRecord | undefined;
    expect(() => {
      recorded = errors.recordError(new AgentNotFoundError('loader'), { workerName: 'TaskRouter' });
    }).not.toThrow();
    expect(recorded?.type).toBe(ErrorType.AGENT_LIFECYCLE);
    expect(errors.totalErrors).toBe(1);
    expect(errors.droppedLogs).toBe(1);

    expect(() => errors.recordError('not an error', { workerName: '' })).not.toThrow();
    expect(errors.recordError('not an error', { workerName: '' })).toBeUndefined();
    expect(errors.totalErrors).toBe(1);
    expect(errors.droppedLogs).toBe(3);
  });

  it('should return undefined for values whose message cannot be read', () => {
    const errors = new ErrorIntelligence(silentLogger);
    const unreadable = new Error('hidden');
    Object.defineProperty(unreadable, 'message', {
      get() {
        throw new Error('getter failed');
      },
    });

    expect(errors.recordError(unreadable, { workerName: 'TaskRouter' })).toBeUndefined();
    expect(errors.totalErrors).toBe(0);
  });

  it('should filter queries', () => {
    const errors = new ErrorIntelligence(silentLogger);
    errors.record(record('loader', ErrorType.TASK_EXECUTION, ErrorSeverity.HIGH));
    errors.record(record('explorer', ErrorType.VALIDATION, ErrorSeverity.MEDIUM));
    errors.record(record('loader', ErrorType.VALIDATION, ErrorSeverity.LOW));

    expect(errors.query({ workerName: 'loader' })).toHaveLength(2);
    expect(errors.query({ type: ErrorType.VALIDATION, severity: ErrorSeverity.LOW })).toHaveLength(1);
    expect(errors.query({ limit: 1 })[0].workerName).toBe('loader');
    expect(errors.query({ since: new Date(Date.now() + 60_000) })).toEqual([]);
  });

  it('should summarise by type, severity and worker', () => {
    const errors = new ErrorIntelligence(silentLogger);
    errors.record(record('loader'));
    errors.record(record('loader', ErrorType.WORKFLOW_EXECUTION, ErrorSeverity.CRITICAL));
    errors.trackSuccess('loader', 'load_data');
    errors.trackSuccess('explorer', 'explore_data');

    const summary = errors.getSummary();
    expect(summary.totalErrors).toBe(2);
    expect(summary.criticalCount).toBe(1);
    expect(summary.byType).toEqual({ task_execution: 1, workflow_execution: 1 });
    expect(summary.bySeverity).toEqual({ high: 1, critical: 1 });
    expect(summary.byWorker).toEqual({ loader: 2 });
    expect(summary.recent).toEqual(['[HIGH] loader: loader failed', '[CRITICAL] loader: loader failed']);

    expect(errors.getWorkerHealth()).toEqual({
      loader: { successes: 1, failures: 2, successRate: 0.333 },
      explorer: { successes: 1, failures: 0, successRate: 1 },
    });
  });

  it('should clear everything', () => {
    const errors = new ErrorIntelligence(silentLogger);
    errors.record(record('loader'));
    errors.clear();
    expect(errors.totalErrors).toBe(0);
    expect(errors.getSummary().recent).toEqual([]);
  });
});
