/**
 * State Models
 * Type definitions for tasks, workflows and datasets
 */

import { z } from 'zod';
import type { ErrorKind } from '../errors.js';
import type { Stage } from '../orchestrator/pipeline.js';

export type Row = Record<string, unknown>;
export type Dataset = Row[];

export function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isDataset(value: unknown): value is Dataset {
  return Array.isArray(value) && value.every(isRow);
}

export function isNonEmptyDataset(value: unknown): value is Dataset {
  return isDataset(value) && value.length > 0;
}

export enum TaskStatus {
  CREATED = 'created',
  VALIDATING = 'validating',
  ROUTING = 'routing',
  EXECUTING = 'executing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export enum WorkflowStatus {
  CREATED = 'created',
  RUNNING = 'running',
  COMPLETED = 'completed',
  PARTIALLY_COMPLETED = 'partially_completed',
  FAILED = 'failed',
}

export const taskSubmissionSchema = z.object({
  type: z.string().min(1, 'Task type is required'),
  parameters: z.record(z.unknown()).default({}),
  critical: z.boolean().default(false),
});

export const workflowSubmissionSchema = z.array(taskSubmissionSchema);

/** What callers hand in */
export type TaskSubmission = z.input<typeof taskSubmissionSchema>;
/** What the engine works with after defaults are applied */
export type TaskSpec = z.output<typeof taskSubmissionSchema>;

export interface Task {
  id: string;
  type: string;
  stage?: Stage;
  parameters: Record<string, unknown>;
  critical: boolean;
  status: TaskStatus;
  attempt: number;
  createdAt: Date;
  completedAt?: Date;
  result?: unknown;
  error?: string;
  errorKind?: ErrorKind;
  qualityScore?: number;
  durationMs: number;
}

export interface WorkflowTaskError {
  taskIndex: number;
  taskType: string;
  error: string;
}

export interface Workflow {
  id: string;
  status: WorkflowStatus;
  totalTasks: number;
  completedTasks: number;
  failedTasks: number;
  skippedTasks: number;
  results: Record<string, Task>;
  errors: WorkflowTaskError[];
  qualityScore: number;
  createdAt: Date;
  completedAt?: Date;
  durationMs: number;
  fatalError?: string;
}

export type ExecutionRecord =
  | { kind: 'task'; task: Task }
  | { kind: 'workflow'; workflow: Workflow };

export enum AgentStatus {
  IDLE = 'idle',
  BUSY = 'busy',
  ERROR = 'error',
}
