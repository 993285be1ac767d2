/**
 * Pipeline
 * Stage vocabulary, canonical order and the stage → agent table
 */

import { PipelineOrderError, UnknownStageError } from '../errors.js';

export const STAGES = [
  'load_data',
  'explore_data',
  'aggregate_data',
  'detect_anomalies',
  'predict',
  'get_recommendations',
  'generate_narrative',
  'visualize_data',
  'generate_report',
] as const;

export type Stage = (typeof STAGES)[number];

export const STAGE_AGENTS = {
  load_data: 'loader',
  explore_data: 'explorer',
  aggregate_data: 'aggregator',
  detect_anomalies: 'anomaly-detector',
  predict: 'predictor',
  get_recommendations: 'recommender',
  generate_narrative: 'narrative-generator',
  visualize_data: 'visualizer',
  generate_report: 'reporter',
} as const satisfies Record<Stage, string>;

export type AgentName = (typeof STAGE_AGENTS)[Stage];

const STAGE_ALIASES: Record<string, Stage> = {
  load: 'load_data',
  explore: 'explore_data',
  aggregate: 'aggregate_data',
  'detect-anomalies': 'detect_anomalies',
  anomalies: 'detect_anomalies',
  recommend: 'get_recommendations',
  narrate: 'generate_narrative',
  visualize: 'visualize_data',
  report: 'generate_report',
};

/** Cache key the load stage writes its dataset to */
export const DEFAULT_DATA_KEY = 'loaded_data';

function isStage(value: string): value is Stage {
  return STAGES.some((stage) => stage === value);
}

/**
 * Normalise a task type (canonical name or alias) to its Stage
 */
export function parseStage(type: string): Stage {
  const normalized = type.trim();
  if (isStage(normalized)) {
    return normalized;
  }
  const alias = STAGE_ALIASES[normalized.toLowerCase()];
  if (alias) {
    return alias;
  }
  throw new UnknownStageError(type);
}

export function stageIndex(stage: Stage): number {
  return STAGES.indexOf(stage);
}

export function agentForStage(stage: Stage): AgentName {
  return STAGE_AGENTS[stage];
}

/**
 * Reject any sequence whose canonical indices decrease.
 * Repeating a stage is allowed.
 */
export function assertPipelineOrder(types: readonly string[]): Stage[] {
  const stages = types.map(parseStage);

  for (let i = 1; i < stages.length; i++) {
    if (stageIndex(stages[i]) < stageIndex(stages[i - 1])) {
      throw new PipelineOrderError(stages[i - 1], stages[i], i);
    }
  }

  return stages;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`);
}
