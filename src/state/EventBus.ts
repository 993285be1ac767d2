/**
 * Event Bus
 * In-process, typed lifecycle events
 */

import { EventEmitter } from 'events';
import type { Logger } from '../monitoring/logger.js';
import type { Task, Workflow } from './models.js';

export enum EventType {
  AGENT_REGISTERED = 'agent.registered',
  TASK_COMPLETED = 'task.completed',
  TASK_FAILED = 'task.failed',
  TASK_RETRYING = 'task.retrying',
  WORKFLOW_STARTED = 'workflow.started',
  WORKFLOW_COMPLETED = 'workflow.completed',
  WORKFLOW_FAILED = 'workflow.failed',
  NARRATIVE_GENERATED = 'narrative.generated',
}

export interface EventPayloads {
  [EventType.AGENT_REGISTERED]: { name: string };
  [EventType.TASK_COMPLETED]: { task: Task };
  [EventType.TASK_FAILED]: { task: Task; error: string };
  [EventType.TASK_RETRYING]: { taskId: string; type: string; attempt: number; delayMs: number; error: string };
  [EventType.WORKFLOW_STARTED]: { workflowId: string; totalTasks: number };
  [EventType.WORKFLOW_COMPLETED]: { workflow: Workflow };
  [EventType.WORKFLOW_FAILED]: { workflow: Workflow; error: string };
  [EventType.NARRATIVE_GENERATED]: { confidence: number; workflowId?: string };
}

export type EventListener<E extends EventType> = (payload: EventPayloads[E]) => void;

/**
 * Event Bus - local event handling
 */
export class EventBus {
  private emitter = new EventEmitter();

  constructor(private readonly logger?: Logger) {
    this.emitter.setMaxListeners(100);
  }

  /**
   * Publish event. A throwing listener is logged and does not reach the publisher.
   */
  publish<E extends EventType>(eventType: E, payload: EventPayloads[E]): void {
    for (const listener of this.emitter.listeners(eventType)) {
      try {
        listener(payload);
      } catch (err) {
        this.logger?.warn({ err, event: eventType }, 'Event listener failed');
      }
    }
    this.logger?.debug({ event: eventType }, 'Event published');
  }

  /**
   * Subscribe to specific event type; returns the unsubscribe function
   */
  subscribe<E extends EventType>(eventType: E, listener: EventListener<E>): () => void {
    this.emitter.on(eventType, listener);
    return () => {
      this.emitter.off(eventType, listener);
    };
  }

  /**
   * Subscribe to event once
   */
  once<E extends EventType>(eventType: E, listener: EventListener<E>): void {
    const unsubscribe = this.subscribe(eventType, (payload) => {
      unsubscribe();
      listener(payload);
    });
  }

  listenerCount(eventType: EventType): number {
    return this.emitter.listenerCount(eventType);
  }

  /**
   * Remove all listeners
   */
  clear(eventType?: EventType): void {
    if (eventType) {
      this.emitter.removeAllListeners(eventType);
    } else {
      this.emitter.removeAllListeners();
    }
  }
}
