/**
 * Task Router
 * Drives a task through validating → routing → executing and dispatches it to
 * the stage's agent
 */

import {
  AgentExecutionError,
  AgentNotFoundError,
  InvalidAgentError,
  isRetryable,
  toOrchestratorError,
  type OrchestratorError,
} from '../errors.js';
import { toStageOutcome, type StageOutcome } from '../agents/envelope.js';
import {
  STAGE_OPERATIONS,
  canSetData,
  isAggregatorAgent,
  isAnomalyDetectorAgent,
  isExplorerAgent,
  isLoaderAgent,
  isNarrativeAgent,
  isPredictorAgent,
  isRecommenderAgent,
  isReporterAgent,
  isVisualizerAgent,
  missingMethods,
  type AggregatorAgent,
  type AnalysisAgent,
  type AnomalyDetectorAgent,
  type ExplorerAgent,
  type LoaderAgent,
  type NarrativeAgent,
  type PredictorAgent,
  type RecommenderAgent,
  type ReporterAgent,
  type VisualizerAgent,
} from '../agents/types.js';
import { childLogger, type Logger } from '../monitoring/logger.js';
import { EventType } from '../state/EventBus.js';
import { TaskStatus, isDataset, type Dataset, type Task, type TaskSpec } from '../state/models.js';
import { generateId, retry } from '../utils/retry.js';
import type { AgentRegistry } from './AgentRegistry.js';
import type { OrchestratorContext } from './context.js';
import type { DataManager, DatasetLoader } from './DataManager.js';
import { buildNarrativeInput, shapeOf } from './NarrativeIntegrator.js';
import {
  aggregateParamsSchema,
  anomalyParamsSchema,
  loadParamsSchema,
  parseParams,
  predictParamsSchema,
  reportParamsSchema,
  visualizeParamsSchema,
} from './parameters.js';
import { DEFAULT_DATA_KEY, STAGES, agentForStage, assertNever, parseStage, type Stage } from './pipeline.js';

export interface TaskExecution {
  task: Task;
  error?: OrchestratorError;
}

export interface ExecuteTaskOptions {
  taskId?: string;
  maxAttempts: number;
}

type Params = Record<string, unknown>;

export class TaskRouter {
  private logger: Logger;

  constructor(
    private readonly context: OrchestratorContext,
    private readonly registry: AgentRegistry,
    private readonly data: DataManager
  ) {
    this.logger = childLogger(context.logger, { component: 'TaskRouter' });
  }

  createTask(spec: TaskSpec, id: string = generateId('task'), attempt: number = 1): Task {
    return {
      id,
      type: spec.type,
      parameters: spec.parameters,
      critical: spec.critical,
      status: TaskStatus.CREATED,
      attempt,
      createdAt: new Date(),
      durationMs: 0,
    };
  }

  /**
   * Run one task through the state machine. Mutates the task record and
   * returns the agent's raw result; failures are recorded and rethrown.
   */
  async route(task: Task): Promise<unknown> {
    const startTime = Date.now();
    let workerName = 'TaskRouter';

    try {
      task.status = TaskStatus.VALIDATING;
      const stage = parseStage(task.type);
      task.stage = stage;

      task.status = TaskStatus.ROUTING;
      workerName = agentForStage(stage);
      const agent = this.registry.getOrFail(workerName);

      task.status = TaskStatus.EXECUTING;
      this.logger.info({ taskId: task.id, stage, agent: workerName, attempt: task.attempt }, 'Executing task');
      const outcome = await this.dispatch(stage, agent, task.parameters);
      if (!outcome.ok) {
        throw new AgentExecutionError(outcome.message, {
          context: { stage, agent: workerName, errors: outcome.errors },
        });
      }

      this.data.set(stage, outcome.raw);

      task.status = TaskStatus.COMPLETED;
      task.result = outcome.raw;
      task.qualityScore = outcome.qualityScore;
      task.completedAt = new Date();
      task.durationMs = Date.now() - startTime;

      this.context.errors.trackSuccess(workerName, stage, { taskId: task.id });
      this.context.events.publish(EventType.TASK_COMPLETED, { task });
      this.logger.info({ taskId: task.id, stage, durationMs: task.durationMs }, 'Task completed');
      return outcome.raw;
    } catch (error) {
      const failure = toOrchestratorError(error);
      task.status = TaskStatus.FAILED;
      task.error = failure.message;
      task.errorKind = failure.kind;
      task.completedAt = new Date();
      task.durationMs = Date.now() - startTime;

      this.context.errors.recordError(failure, {
        workerName,
        context: { taskId: task.id, type: task.type, stage: task.stage, attempt: task.attempt },
      });
      this.context.events.publish(EventType.TASK_FAILED, { task, error: failure.message });
      throw failure;
    }
  }

  /**
   * Route with retry. Each attempt gets a fresh task record under the same id;
   * the last one is returned along with the error, if any.
   */
  async execute(spec: TaskSpec, options: ExecuteTaskOptions): Promise<TaskExecution> {
    const taskId = options.taskId ?? generateId('task');
    const { backoffFactor, initialDelayMs } = this.context.settings.retry;
    let task = this.createTask(spec, taskId);

    try {
      await retry(
        (attempt) => {
          task = this.createTask(spec, taskId, attempt);
          return this.route(task);
        },
        {
          maxAttempts: options.maxAttempts,
          backoffFactor,
          initialDelayMs,
          shouldRetry: (error) => isRetryable(error),
          onRetry: (error, attempt, delayMs) => {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.warn({ taskId, type: spec.type, attempt, delayMs, error: message }, 'Retrying task');
            this.context.events.publish(EventType.TASK_RETRYING, {
              taskId,
              type: spec.type,
              attempt,
              delayMs,
              error: message,
            });
          },
        }
      );
      return { task };
    } catch (error) {
      return { task, error: toOrchestratorError(error) };
    }
  }

  private async dispatch(stage: Stage, agent: AnalysisAgent, params: Params): Promise<StageOutcome> {
    switch (stage) {
      case 'load_data':
        return this.load(this.expect(agent, stage, isLoaderAgent), params);
      case 'explore_data':
        return this.explore(this.expect(agent, stage, isExplorerAgent), params);
      case 'aggregate_data':
        return this.aggregate(this.expect(agent, stage, isAggregatorAgent), params);
      case 'detect_anomalies':
        return this.detectAnomalies(this.expect(agent, stage, isAnomalyDetectorAgent), params);
      case 'predict':
        return this.predict(this.expect(agent, stage, isPredictorAgent), params);
      case 'get_recommendations':
        return this.recommend(this.expect(agent, stage, isRecommenderAgent), params);
      case 'generate_narrative':
        return this.narrate(this.expect(agent, stage, isNarrativeAgent), params);
      case 'visualize_data':
        return this.visualize(this.expect(agent, stage, isVisualizerAgent), params);
      case 'generate_report':
        return this.report(this.expect(agent, stage, isReporterAgent), params);
      default:
        return assertNever(stage);
    }
  }

  private expect<T extends AnalysisAgent>(
    agent: AnalysisAgent,
    stage: Stage,
    guard: (candidate: AnalysisAgent) => candidate is T
  ): T {
    if (!guard(agent)) {
      const missing = missingMethods(agent, STAGE_OPERATIONS[stage]);
      throw new InvalidAgentError(
        `Agent '${agent.name}' cannot handle ${stage}: missing ${missing.join(', ')}`,
        { stage, missing }
      );
    }
    return agent;
  }

  /**
   * Dataset for a stage, handed to stateful agents through setData first
   */
  private async workingData(agent: AnalysisAgent, params: Params): Promise<Dataset> {
    const resolved = await this.data.resolveForTask(params, this.loader);
    this.logger.debug({ source: resolved.source, rows: resolved.data.length }, 'Resolved task data');
    if (canSetData(agent)) {
      await agent.setData(resolved.data);
    }
    return resolved.data;
  }

  /** Loads through the registered loader when resolution falls back to file_path */
  private loader: DatasetLoader = async (filePath) => {
    const agent = this.registry.get(agentForStage('load_data'));
    if (!agent) {
      throw new AgentNotFoundError(agentForStage('load_data'));
    }
    const outcome = await this.load(this.expect(agent, 'load_data', isLoaderAgent), { file_path: filePath });
    if (!outcome.ok) {
      throw new AgentExecutionError(outcome.message, { context: { filePath, errors: outcome.errors } });
    }
    return outcome.data;
  };

  private async load(agent: LoaderAgent, params: Params): Promise<StageOutcome> {
    const { file_path } = parseParams(loadParamsSchema, 'load_data', params);
    const outcome = toStageOutcome(await agent.load(file_path));
    if (!outcome.ok) {
      return outcome;
    }
    if (!isDataset(outcome.data)) {
      throw new AgentExecutionError(`Loader returned no tabular data for ${file_path}`, {
        context: { filePath: file_path },
      });
    }
    this.data.set(DEFAULT_DATA_KEY, outcome.data);
    return outcome;
  }

  private async explore(agent: ExplorerAgent, params: Params): Promise<StageOutcome> {
    const data = await this.workingData(agent, params);
    return toStageOutcome(await agent.explore(data));
  }

  private async aggregate(agent: AggregatorAgent, params: Params): Promise<StageOutcome> {
    const options = parseParams(aggregateParamsSchema, 'aggregate_data', params);
    const data = await this.workingData(agent, params);
    return toStageOutcome(
      await agent.aggregate(data, {
        groupBy: options.group_by,
        aggColumn: options.agg_col,
        aggFunc: options.agg_func,
      })
    );
  }

  private async detectAnomalies(agent: AnomalyDetectorAgent, params: Params): Promise<StageOutcome> {
    const options = parseParams(anomalyParamsSchema, 'detect_anomalies', params);
    const data = await this.workingData(agent, params);
    const column = options.column ?? '';

    switch (options.method) {
      case 'iqr':
        return toStageOutcome(await agent.detectIqr(data, column, options.multiplier));
      case 'zscore':
        return toStageOutcome(await agent.detectZScore(data, column, options.threshold));
      case 'isolation_forest':
        return toStageOutcome(await agent.detectIsolationForest(data, options.columns));
      default:
        return assertNever(options.method);
    }
  }

  private async predict(agent: PredictorAgent, params: Params): Promise<StageOutcome> {
    const options = parseParams(predictParamsSchema, 'predict', params);
    const data = await this.workingData(agent, params);

    switch (options.prediction_type) {
      case 'trend':
        return toStageOutcome(await agent.analyzeTrend(data, options.column ?? ''));
      case 'forecast':
        return toStageOutcome(
          await agent.forecast(data, options.x_col ?? '', options.y_col ?? '', options.periods)
        );
      default:
        return assertNever(options.prediction_type);
    }
  }

  private async recommend(agent: RecommenderAgent, params: Params): Promise<StageOutcome> {
    const data = await this.workingData(agent, params);
    return toStageOutcome(await agent.recommend(data));
  }

  /**
   * Narrative input is assembled from whatever earlier stages have cached
   */
  private async narrate(agent: NarrativeAgent, params: Params): Promise<StageOutcome> {
    const stageResults: Partial<Record<Stage, unknown>> = {};
    for (const stage of STAGES) {
      if (this.data.has(stage)) {
        stageResults[stage] = this.data.get(stage);
      }
    }

    const resolved = await this.data.findForTask(params);
    const input = buildNarrativeInput(stageResults, resolved ? shapeOf(resolved.data) : undefined);
    return toStageOutcome(await agent.generateNarrative(input));
  }

  private async visualize(agent: VisualizerAgent, params: Params): Promise<StageOutcome> {
    const options = parseParams(visualizeParamsSchema, 'visualize_data', params);
    const data = await this.workingData(agent, params);
    const chart = { title: options.title };
    const x = options.x_col ?? '';
    const y = options.y_col ?? '';

    switch (options.chart_type) {
      case 'histogram':
        return toStageOutcome(await agent.histogram(data, options.column ?? '', options.bins, chart));
      case 'bar':
        return toStageOutcome(await agent.barChart(data, x, y, chart));
      case 'line':
        return toStageOutcome(await agent.lineChart(data, x, y, chart));
      case 'scatter':
        return toStageOutcome(await agent.scatterPlot(data, x, y, chart));
      case 'heatmap':
        return toStageOutcome(await agent.heatmap(data, chart));
      default:
        return assertNever(options.chart_type);
    }
  }

  private async report(agent: ReporterAgent, params: Params): Promise<StageOutcome> {
    const options = parseParams(reportParamsSchema, 'generate_report', params);
    const data = await this.workingData(agent, params);

    switch (options.report_type) {
      case 'executive_summary':
        return toStageOutcome(await agent.executiveSummary(data));
      case 'data_profile':
        return toStageOutcome(await agent.dataProfile(data));
      case 'comprehensive':
        return toStageOutcome(await agent.comprehensiveReport(data));
      default:
        return assertNever(options.report_type);
    }
  }
}
