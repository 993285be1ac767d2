/**
 * Result envelopes and BaseAgent helpers
 */

import { describe, it, expect } from 'vitest';
import { BaseAgent } from '../src/agents/BaseAgent.js';
import { toStageOutcome, unwrapData } from '../src/agents/envelope.js';
import { AgentStatus } from '../src/state/models.js';
import { silentLogger } from './helpers.js';

class CountingAgent extends BaseAgent {
  constructor() {
    super('counter', silentLogger);
  }

  count(values: number[]) {
    return this.track('count', () => {
      if (values.length === 0) {
        throw new Error('nothing to count');
      }
      return this.success(values.length, { metadata: { unit: 'rows' }, qualityScore: 0.9 });
    });
  }

  refuse() {
    return this.failure('refused');
  }
}

describe('toStageOutcome', () => {
  it('should read the status envelope', () => {
    const raw = { status: 'success', data: { rows: 3 }, metadata: { source: 'x.csv' }, qualityScore: 0.7 };
    expect(toStageOutcome(raw)).toEqual({
      ok: true,
      data: { rows: 3 },
      metadata: { source: 'x.csv' },
      qualityScore: 0.7,
      warnings: [],
      raw,
    });
  });

  it('should report status errors with their message', () => {
    expect(toStageOutcome({ status: 'error', message: 'File not found: y.csv', errors: ['missing'] })).toEqual({
      ok: false,
      kind: 'execution',
      message: 'File not found: y.csv',
      errors: ['missing'],
    });
    expect(toStageOutcome({ status: 'error' })).toEqual({
      ok: false,
      kind: 'execution',
      message: 'Agent reported an error',
      errors: [],
    });
  });

  it('should read the worker envelope', () => {
    const raw = { worker: 'predictor', success: true, data: [1, 2], warnings: ['short series'], qualityScore: 0.6 };
    const outcome = toStageOutcome(raw);
    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.data).toEqual([1, 2]);
      expect(outcome.warnings).toEqual(['short series']);
      expect(outcome.qualityScore).toBe(0.6);
    }

    expect(toStageOutcome({ success: false, errors: ['column not numeric'] })).toEqual({
      ok: false,
      kind: 'execution',
      message: 'column not numeric',
      errors: ['column not numeric'],
    });
  });

  it('should decide from status alone when other fields are malformed', () => {
    expect(toStageOutcome({ status: 'error', message: 'boom', errors: [{ code: 'E1' }] })).toEqual({
      ok: false,
      kind: 'execution',
      message: 'boom',
      errors: ['E1'],
    });
    expect(toStageOutcome({ status: 'error', message: 42, errors: [{ message: 'disk full' }, 7] })).toEqual({
      ok: false,
      kind: 'execution',
      message: 'disk full',
      errors: ['disk full', '7'],
    });

    const raw = { status: 'success', data: 1, metadata: 'none', qualityScore: 'high', errors: 'none' };
    expect(toStageOutcome(raw)).toEqual({ ok: true, data: 1, metadata: {}, warnings: [], raw });
  });

  it('should decide from success alone when other fields are malformed', () => {
    expect(toStageOutcome({ success: false, errors: ['bad'], qualityScore: 1.5 })).toEqual({
      ok: false,
      kind: 'execution',
      message: 'bad',
      errors: ['bad'],
    });

    const outcome = toStageOutcome({ success: true, data: [], warnings: ['short', 3], qualityScore: 1.5 });
    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.warnings).toEqual(['short']);
      expect(outcome.qualityScore).toBe(1);
    }
  });

  it('should accept quality_score and clamp it', () => {
    const worker = toStageOutcome({ worker: 'predictor', success: true, data: [], quality_score: 0.4 });
    expect(worker.ok && worker.qualityScore).toBe(0.4);

    const agent = toStageOutcome({ status: 'success', data: [], quality_score: -2 });
    expect(agent.ok && agent.qualityScore).toBe(0);
  });

  it('should treat anything else as a bare payload', () => {
    const raw = [{ a: 1 }];
    expect(toStageOutcome(raw)).toEqual({ ok: true, data: raw, metadata: {}, warnings: [], raw });
    expect(unwrapData('text')).toBe('text');
    expect(unwrapData({ status: 'success', data: 42 })).toBe(42);
    expect(unwrapData({ status: 'error', message: 'no' })).toBeUndefined();
  });
});

class UnloggedAgent extends BaseAgent {
  get agentLogger() {
    return this.logger;
  }
}

describe('BaseAgent', () => {
  it('should build envelopes and track stats', async () => {
    const agent = new CountingAgent();
    await expect(agent.count([1, 2, 3])).resolves.toEqual({
      status: 'success',
      data: 3,
      metadata: { unit: 'rows' },
      qualityScore: 0.9,
    });
    await expect(agent.count([])).rejects.toThrow('nothing to count');

    const stats = agent.getStats();
    expect(stats.tasksCompleted).toBe(1);
    expect(stats.tasksFailed).toBe(1);
    expect(agent.getStatus()).toBe(AgentStatus.ERROR);
    expect(agent.refuse()).toEqual({ status: 'error', message: 'refused', errors: ['refused'] });
  });

  it('should give each agent built without a logger its own', () => {
    const first = new UnloggedAgent('first');
    const second = new UnloggedAgent('second');
    expect(first.agentLogger).not.toBe(second.agentLogger);
    expect(first.agentLogger.bindings()).toEqual({ name: 'agent:first' });
    expect(second.agentLogger.bindings()).toEqual({ name: 'agent:second' });
  });

  it('should hold a dataset', () => {
    const agent = new CountingAgent();
    expect(agent.getData()).toBeNull();
    agent.setData([{ a: 1 }]);
    expect(agent.getData()).toEqual([{ a: 1 }]);
  });
});
