/**
 * Base Agent
 * Optional base class for analysis agents: dataset holder, envelope helpers, stats
 */

import { AgentStatus, type Dataset } from '../state/models.js';
import { createLogger, childLogger, type Logger } from '../monitoring/logger.js';
import type { AgentEnvelope } from './envelope.js';
import type { AnalysisAgent } from './types.js';

export interface EnvelopeOptions {
  message?: string;
  metadata?: Record<string, unknown>;
  qualityScore?: number;
}

/**
 * Abstract base agent class
 */
export abstract class BaseAgent implements AnalysisAgent {
  protected logger: Logger;
  protected status: AgentStatus = AgentStatus.IDLE;
  protected data: Dataset | null = null;
  protected tasksCompleted: number = 0;
  protected tasksFailed: number = 0;
  protected totalExecutionTime: number = 0;

  /**
   * Agents built without a logger get their own, named after the agent
   */
  constructor(
    public readonly name: string,
    logger?: Logger
  ) {
    this.logger = logger ? childLogger(logger, { agent: name }) : createLogger(`agent:${name}`);
  }

  /**
   * Hold a dataset for the next operation
   */
  setData(data: Dataset): void {
    this.data = data;
    this.logger.debug({ rows: data.length }, 'Dataset set');
  }

  getData(): Dataset | null {
    return this.data;
  }

  protected success(data: unknown, options: EnvelopeOptions = {}): AgentEnvelope {
    return {
      status: 'success',
      data,
      ...(options.message ? { message: options.message } : {}),
      ...(options.metadata ? { metadata: options.metadata } : {}),
      ...(options.qualityScore !== undefined ? { qualityScore: options.qualityScore } : {}),
    };
  }

  protected failure(message: string, errors: string[] = [message]): AgentEnvelope {
    return { status: 'error', message, errors };
  }

  /**
   * Run an operation with status and timing bookkeeping
   */
  protected async track<T>(operation: string, fn: () => T | Promise<T>): Promise<T> {
    this.setStatus(AgentStatus.BUSY);
    const startTime = Date.now();
    try {
      const result = await fn();
      this.tasksCompleted++;
      this.setStatus(AgentStatus.IDLE);
      return result;
    } catch (error) {
      this.tasksFailed++;
      this.setStatus(AgentStatus.ERROR);
      this.logger.warn({ operation, err: error }, 'Agent operation failed');
      throw error;
    } finally {
      this.totalExecutionTime += Date.now() - startTime;
    }
  }

  getStatus(): AgentStatus {
    return this.status;
  }

  getStats() {
    return {
      name: this.name,
      status: this.status,
      tasksCompleted: this.tasksCompleted,
      tasksFailed: this.tasksFailed,
      totalExecutionTime: this.totalExecutionTime,
      averageExecutionTime: this.tasksCompleted > 0
        ? this.totalExecutionTime / this.tasksCompleted
        : 0,
    };
  }

  protected setStatus(status: AgentStatus): void {
    this.status = status;
    this.logger.debug({ status }, 'Agent status changed');
  }
}
