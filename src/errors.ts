/**
 * Error definitions
 * Structured error hierarchy shared by every orchestrator component
 */

import type { Task, Workflow } from './state/models.js';

export type ErrorKind =
  | 'validation'
  | 'lifecycle'
  | 'execution'
  | 'workflow'
  | 'narrative';

export interface OrchestratorErrorOptions {
  context?: Record<string, unknown>;
  cause?: unknown;
}

/** Base error class for all orchestrator errors */
export class OrchestratorError extends Error {
  public readonly code: string;
  public readonly kind: ErrorKind;
  public readonly context: Record<string, unknown>;

  constructor(message: string, code: string, kind: ErrorKind, options: OrchestratorErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'OrchestratorError';
    this.code = code;
    this.kind = kind;
    this.context = options.context ?? {};
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      kind: this.kind,
      context: this.context,
    };
  }
}

/** Bad input: unknown stage, malformed parameters, missing data */
export class ValidationError extends OrchestratorError {
  constructor(message: string, options: OrchestratorErrorOptions = {}, code = 'VALIDATION_ERROR') {
    super(message, code, 'validation', options);
    this.name = 'ValidationError';
  }
}

export class UnknownStageError extends ValidationError {
  constructor(type: string) {
    super(`Unknown task type: ${type}`, { context: { type } }, 'UNKNOWN_STAGE');
    this.name = 'UnknownStageError';
  }
}

/** Thrown when a workflow lists stages against canonical pipeline order */
export class PipelineOrderError extends ValidationError {
  constructor(previous: string, next: string, index: number) {
    super(
      `Invalid pipeline order: '${next}' (task ${index}) cannot run after '${previous}'`,
      { context: { previous, next, index } },
      'PIPELINE_ORDER'
    );
    this.name = 'PipelineOrderError';
  }
}

export class DataUnavailableError extends ValidationError {
  constructor(context: Record<string, unknown> = {}, cause?: unknown) {
    super('No data available for task execution', { context, cause }, 'DATA_UNAVAILABLE');
    this.name = 'DataUnavailableError';
  }
}

/** Agent registration and lookup failures */
export class AgentLifecycleError extends OrchestratorError {
  constructor(message: string, options: OrchestratorErrorOptions = {}, code = 'AGENT_LIFECYCLE') {
    super(message, code, 'lifecycle', options);
    this.name = 'AgentLifecycleError';
  }
}

export class DuplicateAgentError extends AgentLifecycleError {
  constructor(agentName: string) {
    super(`Agent already registered: ${agentName}`, { context: { agentName } }, 'DUPLICATE_AGENT');
    this.name = 'DuplicateAgentError';
  }
}

export class AgentNotFoundError extends AgentLifecycleError {
  constructor(agentName: string) {
    super(`Agent not registered: ${agentName}`, { context: { agentName } }, 'AGENT_NOT_FOUND');
    this.name = 'AgentNotFoundError';
  }
}

export class InvalidAgentError extends AgentLifecycleError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, { context }, 'INVALID_AGENT');
    this.name = 'InvalidAgentError';
  }
}

export class ShutdownError extends AgentLifecycleError {
  constructor() {
    super('Orchestrator has been shut down', {}, 'ORCHESTRATOR_SHUTDOWN');
    this.name = 'ShutdownError';
  }
}

/** An agent raised or reported failure while running a stage */
export class AgentExecutionError extends OrchestratorError {
  constructor(message: string, options: OrchestratorErrorOptions = {}) {
    super(message, 'AGENT_EXECUTION', 'execution', options);
    this.name = 'AgentExecutionError';
  }
}

/** Orchestrator-level wrapper around a failed task; keeps the kind of its cause */
export class TaskExecutionError extends OrchestratorError {
  public readonly task: Task;

  constructor(cause: OrchestratorError, task: Task) {
    super(`Task execution failed: ${cause.message}`, 'TASK_EXECUTION_FAILED', cause.kind, {
      context: cause.context,
      cause,
    });
    this.name = 'TaskExecutionError';
    this.task = task;
  }
}

export class WorkflowError extends OrchestratorError {
  public readonly workflow: Workflow;
  public readonly tasks: Task[];

  constructor(message: string, workflow: Workflow, tasks: Task[], options: OrchestratorErrorOptions = {}) {
    super(message, 'WORKFLOW_FAILED', 'workflow', options);
    this.name = 'WorkflowError';
    this.workflow = workflow;
    this.tasks = tasks;
  }
}

export class NarrativeError extends OrchestratorError {
  constructor(message: string, options: OrchestratorErrorOptions = {}) {
    super(message, 'NARRATIVE_FAILED', 'narrative', options);
    this.name = 'NarrativeError';
  }
}

/**
 * Normalise anything thrown by foreign code into the hierarchy
 */
export function toOrchestratorError(error: unknown): OrchestratorError {
  if (error instanceof OrchestratorError) {
    return error;
  }
  if (error instanceof Error) {
    return new AgentExecutionError(error.message, { cause: error });
  }
  return new AgentExecutionError(String(error));
}

export function isRetryable(error: unknown): boolean {
  if (!(error instanceof OrchestratorError)) {
    return true;
  }
  return error.kind === 'execution' || error.kind === 'narrative';
}
