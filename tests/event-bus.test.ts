/**
 * Event bus
 */

import { describe, it, expect } from 'vitest';
import { EventBus, EventType } from '../src/state/EventBus.js';
import { silentLogger } from './helpers.js';

describe('EventBus', () => {
  it('should deliver payloads until unsubscribed', () => {
    const bus = new EventBus(silentLogger);
    const names: string[] = [];
    const unsubscribe = bus.subscribe(EventType.AGENT_REGISTERED, ({ name }) => names.push(name));

    bus.publish(EventType.AGENT_REGISTERED, { name: 'loader' });
    unsubscribe();
    bus.publish(EventType.AGENT_REGISTERED, { name: 'explorer' });

    expect(names).toEqual(['loader']);
    expect(bus.listenerCount(EventType.AGENT_REGISTERED)).toBe(0);
  });

  it('should call once-listeners a single time', () => {
    const bus = new EventBus();
    const seen: number[] = [];
    bus.once(EventType.WORKFLOW_STARTED, ({ totalTasks }) => seen.push(totalTasks));

    bus.publish(EventType.WORKFLOW_STARTED, { workflowId: 'a', totalTasks: 2 });
    bus.publish(EventType.WORKFLOW_STARTED, { workflowId: 'b', totalTasks: 5 });

    expect(seen).toEqual([2]);
  });

  it('should keep going when a listener throws', () => {
    const bus = new EventBus(silentLogger);
    const seen: string[] = [];
    bus.subscribe(EventType.AGENT_REGISTERED, () => {
      throw new Error('listener broke');
    });
    bus.subscribe(EventType.AGENT_REGISTERED, ({ name }) => seen.push(name));

    expect(() => bus.publish(EventType.AGENT_REGISTERED, { name: 'loader' })).not.toThrow();
    expect(seen).toEqual(['loader']);
  });

  it('should clear listeners', () => {
    const bus = new EventBus();
    bus.subscribe(EventType.TASK_FAILED, () => undefined);
    bus.subscribe(EventType.TASK_COMPLETED, () => undefined);
    bus.clear(EventType.TASK_FAILED);
    expect(bus.listenerCount(EventType.TASK_FAILED)).toBe(0);
    expect(bus.listenerCount(EventType.TASK_COMPLETED)).toBe(1);
    bus.clear();
    expect(bus.listenerCount(EventType.TASK_COMPLETED)).toBe(0);
  });
});
