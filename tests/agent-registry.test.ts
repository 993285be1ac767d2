/**
 * Agent registry
 */

import { describe, it, expect } from 'vitest';
import { AgentNotFoundError, DuplicateAgentError, InvalidAgentError } from '../src/errors.js';
import { ErrorType } from '../src/monitoring/ErrorRecord.js';
import { AgentRegistry } from '../src/orchestrator/AgentRegistry.js';
import { EventType } from '../src/state/EventBus.js';
import { FakeExplorer, FakeLoader, testContext } from './helpers.js';

describe('AgentRegistry', () => {
  it('should register agents and list them in registration order', () => {
    const registry = new AgentRegistry(testContext());
    registry.register('loader', new FakeLoader());
    registry.register('explorer', new FakeExplorer());

    expect(registry.list()).toEqual(['loader', 'explorer']);
    expect(registry.count()).toBe(2);
    expect(registry.has('loader')).toBe(true);
    expect(registry.getSummary()).toEqual({ totalAgents: 2, agentNames: ['loader', 'explorer'] });
  });

  it('should accept plain objects with a name', () => {
    const registry = new AgentRegistry(testContext());
    const agent = { name: 'recommender', recommend: () => ({ status: 'success', data: [] }) };
    registry.register('recommender', agent);
    expect(registry.get('recommender')).toBe(agent);
  });

  it('should reject duplicates without replacing the first agent', () => {
    const context = testContext();
    const registry = new AgentRegistry(context);
    const first = new FakeLoader();
    registry.register('loader', first);

    expect(() => registry.register('loader', new FakeLoader())).toThrow(DuplicateAgentError);
    expect(registry.count()).toBe(1);
    expect(registry.get('loader')).toBe(first);

    const [recorded] = context.errors.query();
    expect(recorded.type).toBe(ErrorType.AGENT_LIFECYCLE);
    expect(recorded.workerName).toBe('AgentRegistry');
    expect(recorded.message).toBe('Agent already registered: loader');
  });

  it('should reject handles without a name', () => {
    const registry = new AgentRegistry(testContext());
    expect(() => registry.register('loader', {})).toThrow(InvalidAgentError);
    expect(() => registry.register('loader', null)).toThrow(InvalidAgentError);
    expect(() => registry.register('', new FakeLoader())).toThrow('Agent name must be a non-empty string');
    expect(registry.count()).toBe(0);
  });

  it('should publish registrations', () => {
    const context = testContext();
    const names: string[] = [];
    context.events.subscribe(EventType.AGENT_REGISTERED, ({ name }) => names.push(name));

    new AgentRegistry(context).register('explorer', new FakeExplorer());
    expect(names).toEqual(['explorer']);
  });

  it('should distinguish absent agents from failed lookups', () => {
    const registry = new AgentRegistry(testContext());
    expect(registry.get('predictor')).toBeUndefined();
    expect(() => registry.getOrFail('predictor')).toThrow(AgentNotFoundError);
    expect(() => registry.getOrFail('predictor')).toThrow('Agent not registered: predictor');
  });
});
