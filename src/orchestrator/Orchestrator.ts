/**
 * Orchestrator
 * Façade over registry, data cache, router, workflow executor and narrative
 * integration. Owns execution history and the quality counters.
 */

import {
  InvalidAgentError,
  NarrativeError,
  ShutdownError,
  TaskExecutionError,
  ValidationError,
  WorkflowError,
  isRetryable,
} from '../errors.js';
import { isNarrativeAgent, type AnalysisAgent, type NarrativeAgent, type NarrativeInput } from '../agents/types.js';
import type { ErrorQuery } from '../monitoring/ErrorIntelligence.js';
import { ErrorSeverity, classifyError, recordToJSON } from '../monitoring/ErrorRecord.js';
import { healthStatus, type HealthStatus } from '../monitoring/QualityTracker.js';
import { childLogger, type Logger } from '../monitoring/logger.js';
import {
  WorkflowStatus,
  taskSubmissionSchema,
  type ExecutionRecord,
  type Task,
  type TaskSpec,
  type Workflow,
} from '../state/models.js';
import { generateId, retry } from '../utils/retry.js';
import { AgentRegistry } from './AgentRegistry.js';
import { createContext, type ContextOptions, type OrchestratorContext } from './context.js';
import { DataManager } from './DataManager.js';
import {
  NarrativeIntegrator,
  type EnrichedNarrative,
  type NarrativeSummary,
  type NarrativeValidation,
} from './NarrativeIntegrator.js';
import { agentForStage } from './pipeline.js';
import { TaskRouter } from './TaskRouter.js';
import { WorkflowExecutor, type WorkflowRun } from './WorkflowExecutor.js';

export const ORCHESTRATOR_NAME = 'analysis-orchestrator';
export const ORCHESTRATOR_VERSION = '0.1.0';

export type OrchestratorState = 'active' | 'shutdown';

export interface OrchestratorOptions extends ContextOptions {
  context?: OrchestratorContext;
}

export interface OrchestratorStatus {
  name: string;
  version: string;
  status: OrchestratorState;
  healthScore: number;
  agentsRegistered: number;
  cacheItems: number;
  qualityScore: number;
  timestamp: string;
}

export interface HealthReport {
  overallHealth: number;
  status: HealthStatus;
  timestamp: string;
  agents: ReturnType<AgentRegistry['getSummary']>;
  cache: ReturnType<DataManager['getSummary']>;
  execution: {
    currentTask: string | null;
    currentWorkflow: string | null;
    totalExecuted: number;
  };
  workflows: ReturnType<WorkflowExecutor['getSummary']>;
  errors: ReturnType<OrchestratorContext['errors']['getSummary']>;
  workers: ReturnType<OrchestratorContext['errors']['getWorkerHealth']>;
  quality: ReturnType<OrchestratorContext['quality']['getSummary']>;
}

export interface PipelineResult {
  pipelineId: string;
  workflowId: string;
  workflow: Workflow;
  narrative: EnrichedNarrative;
  validation: NarrativeValidation;
  summary: NarrativeSummary;
  overallQualityScore: number;
  durationMs: number;
  executedAt: string;
}

export interface ResetOptions {
  /** Also clear quality counters and error history */
  includeMetrics?: boolean;
}

export interface ResetResult {
  success: true;
  clearedCache: number;
  clearedHistory: number;
  resetAt: string;
}

export interface ShutdownResult {
  success: true;
  finalHealth: HealthReport;
  shutdownAt: string;
}

export class Orchestrator {
  readonly context: OrchestratorContext;
  readonly registry: AgentRegistry;
  readonly data: DataManager;
  readonly router: TaskRouter;
  readonly workflows: WorkflowExecutor;
  readonly narrative: NarrativeIntegrator;

  private history: ExecutionRecord[] = [];
  private currentTask: Task | null = null;
  private currentWorkflow: Workflow | null = null;
  private state: OrchestratorState = 'active';
  private logger: Logger;

  constructor(options: OrchestratorOptions = {}) {
    this.context = options.context ?? createContext(options);
    this.logger = childLogger(this.context.logger, { component: 'Orchestrator' });

    this.registry = new AgentRegistry(this.context);
    this.data = new DataManager(this.context);
    this.router = new TaskRouter(this.context, this.registry, this.data);
    this.workflows = new WorkflowExecutor(this.context, this.router);
    this.narrative = new NarrativeIntegrator(this.context);

    this.logger.info({ version: ORCHESTRATOR_VERSION }, 'Orchestrator initialized');
  }

  // ========== Agents ==========

  registerAgent(name: string, agent: unknown): void {
    this.assertActive();
    try {
      this.registry.register(name, agent);
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }
    this.context.quality.recordSuccess();
  }

  getAgent(name: string): AnalysisAgent | undefined {
    return this.registry.get(name);
  }

  listAgents(): string[] {
    return this.registry.list();
  }

  // ========== Data cache ==========

  cacheData(key: string, value: unknown): void {
    this.data.set(key, value);
  }

  getCachedData(key: string): unknown {
    return this.data.get(key);
  }

  listCachedData(): string[] {
    return this.data.listKeys();
  }

  clearCache(): number {
    const count = this.data.count();
    this.data.clear();
    return count;
  }

  // ========== Execution ==========

  /**
   * Run a single task with the task retry budget. Throws TaskExecutionError
   * once retries are exhausted.
   */
  async executeTask(submission: unknown): Promise<Task> {
    this.assertActive();

    let spec: TaskSpec;
    try {
      spec = this.parseTask(submission);
    } catch (error) {
      this.context.errors.recordError(error, { workerName: 'Orchestrator', context: { operation: 'executeTask' } });
      this.recordFailure(error);
      throw error;
    }

    const { task, error } = await this.router.execute(spec, {
      maxAttempts: this.context.settings.retry.taskAttempts,
    });
    this.currentTask = task;
    this.history.push({ kind: 'task', task });

    if (error) {
      this.recordFailure(error);
      throw new TaskExecutionError(error, task);
    }

    this.context.quality.recordSuccess();
    return task;
  }

  /**
   * Run a workflow. Out-of-order or malformed submissions are rejected
   * before any task runs and leave history untouched.
   */
  async executeWorkflow(submissions: unknown): Promise<Workflow> {
    this.assertActive();

    try {
      const { workflow } = await this.runWorkflow(submissions);
      switch (workflow.status) {
        case WorkflowStatus.COMPLETED:
          this.context.quality.recordSuccess();
          break;
        case WorkflowStatus.PARTIALLY_COMPLETED:
          this.context.quality.recordPartial();
          break;
        default:
          this.context.quality.recordFailure();
      }
      return workflow;
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }
  }

  /**
   * Generate a narrative from role-keyed results with the narrative retry budget
   */
  async generateNarrative(input: NarrativeInput): Promise<EnrichedNarrative> {
    this.assertActive();

    try {
      const capability = this.narrativeCapability();
      const narrative = await retry(
        () => this.narrative.generateFromResults(capability, input),
        this.retryOptions(this.context.settings.retry.narrativeAttempts)
      );
      this.context.quality.recordSuccess();
      return narrative;
    } catch (error) {
      if (!(error instanceof NarrativeError)) {
        this.context.errors.recordError(error, { workerName: 'Orchestrator', context: { operation: 'generateNarrative' } });
      }
      this.recordFailure(error);
      throw error;
    }
  }

  /**
   * Workflow followed by a narrative over its results, in one call
   */
  async executeWorkflowWithNarrative(submissions: unknown): Promise<PipelineResult> {
    this.assertActive();
    const startTime = Date.now();
    const pipelineId = generateId('pipeline');
    this.logger.info({ pipelineId }, 'Full pipeline started');

    try {
      const { workflow } = await this.runWorkflow(submissions);
      const capability = this.narrativeCapability();
      const { narrative } = await retry(
        () => this.narrative.generateFromWorkflow(capability, workflow),
        this.retryOptions(this.context.settings.retry.narrativeAttempts)
      );

      const result: PipelineResult = {
        pipelineId,
        workflowId: workflow.id,
        workflow,
        narrative,
        validation: this.narrative.validate(narrative),
        summary: this.narrative.summarize(narrative),
        overallQualityScore: workflow.qualityScore,
        durationMs: Date.now() - startTime,
        executedAt: new Date().toISOString(),
      };

      this.context.quality.recordSuccess();
      this.logger.info({ pipelineId, workflowId: workflow.id, durationMs: result.durationMs }, 'Full pipeline completed');
      return result;
    } catch (error) {
      this.context.errors.recordError(error, {
        workerName: 'Orchestrator',
        severity: ErrorSeverity.CRITICAL,
        context: { operation: 'executeWorkflowWithNarrative', pipelineId },
      });
      this.recordFailure(error);
      this.logger.error({ pipelineId, err: error }, 'Full pipeline failed');
      throw error;
    }
  }

  // ========== Status & health ==========

  getStatus(): OrchestratorStatus {
    return {
      name: ORCHESTRATOR_NAME,
      version: ORCHESTRATOR_VERSION,
      status: this.state,
      healthScore: this.healthScore(),
      agentsRegistered: this.registry.count(),
      cacheItems: this.data.count(),
      qualityScore: this.context.quality.score(),
      timestamp: new Date().toISOString(),
    };
  }

  getHealthReport(): HealthReport {
    const overallHealth = this.healthScore();
    return {
      overallHealth,
      status: healthStatus(overallHealth),
      timestamp: new Date().toISOString(),
      agents: this.registry.getSummary(),
      cache: this.data.getSummary(),
      execution: {
        currentTask: this.currentTask?.type ?? null,
        currentWorkflow: this.currentWorkflow?.id ?? null,
        totalExecuted: this.history.length,
      },
      workflows: this.workflows.getSummary(),
      errors: this.context.errors.getSummary(),
      workers: this.context.errors.getWorkerHealth(),
      quality: this.context.quality.getSummary(),
    };
  }

  /**
   * Most recent `limit` records, oldest first
   */
  getExecutionHistory(limit?: number): ExecutionRecord[] {
    if (limit !== undefined && limit > 0) {
      return this.history.slice(-limit);
    }
    return [...this.history];
  }

  clearHistory(): number {
    const count = this.history.length;
    this.history = [];
    this.logger.info({ count }, 'Execution history cleared');
    return count;
  }

  getErrors(filter: ErrorQuery = {}): Record<string, unknown>[] {
    return this.context.errors.query(filter).map(recordToJSON);
  }

  /**
   * Clear cached data, history and current task/workflow. Agents stay
   * registered; metrics stay unless includeMetrics is set.
   */
  reset(options: ResetOptions = {}): ResetResult {
    const clearedCache = this.clearCache();
    const clearedHistory = this.clearHistory();
    this.workflows.clear();
    this.currentTask = null;
    this.currentWorkflow = null;

    if (options.includeMetrics) {
      this.context.quality.reset();
      this.context.errors.clear();
    }

    this.logger.info({ clearedCache, clearedHistory, includeMetrics: options.includeMetrics ?? false }, 'Orchestrator reset');
    return {
      success: true,
      clearedCache,
      clearedHistory,
      resetAt: new Date().toISOString(),
    };
  }

  /**
   * Final health snapshot, then reset. Later task and workflow calls are rejected.
   */
  shutdown(): ShutdownResult {
    const finalHealth = this.getHealthReport();
    this.reset();
    this.state = 'shutdown';
    this.context.events.clear();
    this.logger.info({ finalHealth: finalHealth.overallHealth }, 'Orchestrator shut down');
    return {
      success: true,
      finalHealth,
      shutdownAt: new Date().toISOString(),
    };
  }

  get isActive(): boolean {
    return this.state === 'active';
  }

  // ========== Internals ==========

  /**
   * Workflow run with history bookkeeping but no quality update
   */
  private async runWorkflow(submissions: unknown): Promise<WorkflowRun> {
    try {
      const run = await this.workflows.execute(submissions);
      this.remember(run);
      return run;
    } catch (error) {
      if (error instanceof WorkflowError) {
        this.remember({ workflow: error.workflow, tasks: error.tasks });
      }
      throw error;
    }
  }

  private remember(run: WorkflowRun): void {
    for (const task of run.tasks) {
      this.history.push({ kind: 'task', task });
    }
    this.history.push({ kind: 'workflow', workflow: run.workflow });
    this.currentWorkflow = run.workflow;
    this.currentTask = run.tasks[run.tasks.length - 1] ?? this.currentTask;
  }

  private parseTask(submission: unknown): TaskSpec {
    const parsed = taskSubmissionSchema.safeParse(submission);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'task'}: ${issue.message}`);
      throw new ValidationError(`Invalid task submission: ${issues.join('; ')}`, { context: { issues } });
    }
    return parsed.data;
  }

  private narrativeCapability(): NarrativeAgent {
    const name = agentForStage('generate_narrative');
    const agent = this.registry.getOrFail(name);
    if (!isNarrativeAgent(agent)) {
      throw new InvalidAgentError(`Agent '${name}' does not implement generateNarrative`, { agentName: name });
    }
    return agent;
  }

  private retryOptions(maxAttempts: number) {
    const { backoffFactor, initialDelayMs } = this.context.settings.retry;
    return {
      maxAttempts,
      backoffFactor,
      initialDelayMs,
      shouldRetry: (error: unknown) => isRetryable(error),
    };
  }

  private healthScore(): number {
    return this.context.quality.healthScore(this.context.errors.totalErrors);
  }

  /** One quality failure per public call */
  private recordFailure(error: unknown): void {
    this.context.quality.recordFailure();
    this.context.quality.recordErrorType(classifyError(error).type);
  }

  private assertActive(): void {
    if (this.state === 'shutdown') {
      throw new ShutdownError();
    }
  }
}

export function createOrchestrator(options: OrchestratorOptions = {}): Orchestrator {
  return new Orchestrator(options);
}
