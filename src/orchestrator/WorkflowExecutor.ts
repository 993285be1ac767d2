/**
 * Workflow Executor
 * Runs a validated, pipeline-ordered list of tasks one after another
 */

import { ValidationError, WorkflowError } from '../errors.js';
import { childLogger, type Logger } from '../monitoring/logger.js';
import { EventType } from '../state/EventBus.js';
import {
  TaskStatus,
  WorkflowStatus,
  workflowSubmissionSchema,
  type Task,
  type TaskSpec,
  type Workflow,
} from '../state/models.js';
import { generateId } from '../utils/retry.js';
import type { OrchestratorContext } from './context.js';
import { assertPipelineOrder } from './pipeline.js';
import type { TaskRouter } from './TaskRouter.js';

export interface WorkflowSummary {
  totalWorkflows: number;
  completed: number;
  partiallyCompleted: number;
  failed: number;
  successRate: number;
}

export interface WorkflowRun {
  workflow: Workflow;
  tasks: Task[];
}

/**
 * Parse a raw workflow submission and check pipeline order. Nothing runs if
 * this throws.
 */
export function validateWorkflow(submissions: unknown): TaskSpec[] {
  const parsed = workflowSubmissionSchema.safeParse(submissions);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid workflow submission: ${issues.join('; ')}`, { context: { issues } });
  }
  assertPipelineOrder(parsed.data.map((spec) => spec.type));
  return parsed.data;
}

/**
 * Mean of completed tasks' own scores (1.0 when a task reports none).
 * An empty workflow scores 1, one where nothing completed scores 0.
 */
export function workflowQuality(tasks: readonly Task[], totalTasks: number): number {
  if (totalTasks === 0) {
    return 1;
  }
  const completed = tasks.filter((task) => task.status === TaskStatus.COMPLETED);
  if (completed.length === 0) {
    return 0;
  }
  const sum = completed.reduce((acc, task) => acc + (task.qualityScore ?? 1), 0);
  return Math.round((sum / completed.length) * 1000) / 1000;
}

export function finalStatus(completedTasks: number, failedTasks: number): WorkflowStatus {
  if (failedTasks === 0) {
    return WorkflowStatus.COMPLETED;
  }
  return completedTasks > 0 ? WorkflowStatus.PARTIALLY_COMPLETED : WorkflowStatus.FAILED;
}

export class WorkflowExecutor {
  private workflows: Map<string, Workflow> = new Map();
  private logger: Logger;

  constructor(
    private readonly context: OrchestratorContext,
    private readonly router: TaskRouter
  ) {
    this.logger = childLogger(context.logger, { component: 'WorkflowExecutor' });
  }

  /**
   * Validate, then run every task in order. A failed critical task aborts the
   * run with a WorkflowError carrying the workflow and the tasks run so far.
   */
  async execute(submissions: unknown): Promise<WorkflowRun> {
    let specs: TaskSpec[];
    try {
      specs = validateWorkflow(submissions);
    } catch (error) {
      this.context.errors.recordError(error, { workerName: 'WorkflowExecutor', context: { phase: 'validation' } });
      throw error;
    }

    const startTime = Date.now();
    const workflow: Workflow = {
      id: generateId('workflow'),
      status: WorkflowStatus.CREATED,
      totalTasks: specs.length,
      completedTasks: 0,
      failedTasks: 0,
      skippedTasks: 0,
      results: {},
      errors: [],
      qualityScore: 0,
      createdAt: new Date(),
      durationMs: 0,
    };
    const tasks: Task[] = [];
    this.workflows.set(workflow.id, workflow);

    workflow.status = WorkflowStatus.RUNNING;
    this.context.events.publish(EventType.WORKFLOW_STARTED, { workflowId: workflow.id, totalTasks: specs.length });
    this.logger.info({ workflowId: workflow.id, totalTasks: specs.length }, 'Workflow started');

    for (const [index, spec] of specs.entries()) {
      const { task, error } = await this.router.execute(spec, {
        taskId: `${workflow.id}_task_${index}`,
        maxAttempts: this.context.settings.retry.workflowTaskAttempts,
      });
      tasks.push(task);
      workflow.results[task.id] = task;

      if (!error) {
        workflow.completedTasks++;
        continue;
      }

      workflow.failedTasks++;
      workflow.errors.push({ taskIndex: index, taskType: spec.type, error: error.message });

      if (spec.critical) {
        workflow.skippedTasks = specs.length - index - 1;
        workflow.status = WorkflowStatus.FAILED;
        workflow.fatalError = error.message;
        this.finish(workflow, tasks, startTime);

        const failure = new WorkflowError(
          `Critical task ${index} (${spec.type}) failed: ${error.message}`,
          workflow,
          tasks,
          { context: { workflowId: workflow.id, taskIndex: index, taskType: spec.type }, cause: error }
        );
        this.context.errors.recordError(failure, { workerName: 'WorkflowExecutor', context: { workflowId: workflow.id } });
        this.context.events.publish(EventType.WORKFLOW_FAILED, { workflow, error: failure.message });
        this.logger.error({ workflowId: workflow.id, taskIndex: index, err: error }, 'Workflow aborted by critical task');
        throw failure;
      }

      this.logger.warn({ workflowId: workflow.id, taskIndex: index, error: error.message }, 'Non-critical task failed');
    }

    workflow.status = finalStatus(workflow.completedTasks, workflow.failedTasks);
    this.finish(workflow, tasks, startTime);

    if (workflow.status === WorkflowStatus.FAILED) {
      this.context.events.publish(EventType.WORKFLOW_FAILED, { workflow, error: 'No task completed' });
    } else {
      this.context.events.publish(EventType.WORKFLOW_COMPLETED, { workflow });
    }
    this.logger.info(
      {
        workflowId: workflow.id,
        status: workflow.status,
        completed: workflow.completedTasks,
        failed: workflow.failedTasks,
        durationMs: workflow.durationMs,
      },
      'Workflow finished'
    );

    return { workflow, tasks };
  }

  getWorkflow(id: string): Workflow | undefined {
    return this.workflows.get(id);
  }

  listWorkflows(): Workflow[] {
    return Array.from(this.workflows.values());
  }

  getSummary(): WorkflowSummary {
    const workflows = this.listWorkflows();
    const count = (status: WorkflowStatus) => workflows.filter((workflow) => workflow.status === status).length;
    const completed = count(WorkflowStatus.COMPLETED);

    return {
      totalWorkflows: workflows.length,
      completed,
      partiallyCompleted: count(WorkflowStatus.PARTIALLY_COMPLETED),
      failed: count(WorkflowStatus.FAILED),
      successRate: workflows.length === 0 ? 0 : Math.round((completed / workflows.length) * 1000) / 1000,
    };
  }

  clear(): void {
    this.workflows.clear();
  }

  private finish(workflow: Workflow, tasks: Task[], startTime: number): void {
    workflow.qualityScore = workflowQuality(tasks, workflow.totalTasks);
    workflow.completedAt = new Date();
    workflow.durationMs = Date.now() - startTime;
  }
}
