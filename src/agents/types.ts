/**
 * Agent Contracts
 * Operations each pipeline stage expects from its agent, with runtime guards
 */

import type { Dataset } from '../state/models.js';
import type { Stage } from '../orchestrator/pipeline.js';

export type MaybePromise<T> = T | Promise<T>;

/** Anything registered with the orchestrator */
export interface AnalysisAgent {
  name: string;
  setData?(data: Dataset): MaybePromise<void>;
}

export interface LoaderAgent extends AnalysisAgent {
  load(filePath: string): MaybePromise<unknown>;
}

export interface ExplorerAgent extends AnalysisAgent {
  explore(data: Dataset): MaybePromise<unknown>;
}

export interface AggregateOptions {
  groupBy: string | string[];
  aggColumn?: string;
  aggFunc: string;
}

export interface AggregatorAgent extends AnalysisAgent {
  aggregate(data: Dataset, options: AggregateOptions): MaybePromise<unknown>;
}

export interface AnomalyDetectorAgent extends AnalysisAgent {
  detectIqr(data: Dataset, column: string, multiplier: number): MaybePromise<unknown>;
  detectZScore(data: Dataset, column: string, threshold: number): MaybePromise<unknown>;
  detectIsolationForest(data: Dataset, columns?: string[]): MaybePromise<unknown>;
}

export interface PredictorAgent extends AnalysisAgent {
  analyzeTrend(data: Dataset, column: string): MaybePromise<unknown>;
  forecast(data: Dataset, xColumn: string, yColumn: string, periods: number): MaybePromise<unknown>;
}

export interface RecommenderAgent extends AnalysisAgent {
  recommend(data: Dataset): MaybePromise<unknown>;
}

export interface DataShape {
  rows: number;
  columns: number;
}

/** Role-keyed results handed to the narrative generator */
export interface NarrativeInput {
  explorer?: unknown;
  aggregations?: unknown;
  anomalies?: unknown;
  predictions?: unknown;
  recommendations?: unknown;
  dataShape?: DataShape;
}

export interface NarrativeAgent extends AnalysisAgent {
  generateNarrative(input: NarrativeInput): MaybePromise<unknown>;
}

export interface ChartOptions {
  title?: string;
}

export interface VisualizerAgent extends AnalysisAgent {
  histogram(data: Dataset, column: string, bins: number, options: ChartOptions): MaybePromise<unknown>;
  barChart(data: Dataset, xColumn: string, yColumn: string, options: ChartOptions): MaybePromise<unknown>;
  lineChart(data: Dataset, xColumn: string, yColumn: string, options: ChartOptions): MaybePromise<unknown>;
  scatterPlot(data: Dataset, xColumn: string, yColumn: string, options: ChartOptions): MaybePromise<unknown>;
  heatmap(data: Dataset, options: ChartOptions): MaybePromise<unknown>;
}

export interface ReporterAgent extends AnalysisAgent {
  executiveSummary(data: Dataset): MaybePromise<unknown>;
  dataProfile(data: Dataset): MaybePromise<unknown>;
  comprehensiveReport(data: Dataset): MaybePromise<unknown>;
}

/** Method names a stage's agent must expose */
export const STAGE_OPERATIONS = {
  load_data: ['load'],
  explore_data: ['explore'],
  aggregate_data: ['aggregate'],
  detect_anomalies: ['detectIqr', 'detectZScore', 'detectIsolationForest'],
  predict: ['analyzeTrend', 'forecast'],
  get_recommendations: ['recommend'],
  generate_narrative: ['generateNarrative'],
  visualize_data: ['histogram', 'barChart', 'lineChart', 'scatterPlot', 'heatmap'],
  generate_report: ['executiveSummary', 'dataProfile', 'comprehensiveReport'],
} as const satisfies Record<Stage, readonly string[]>;

export function hasMethods(agent: object, methods: readonly string[]): boolean {
  return methods.every((method) => typeof Reflect.get(agent, method) === 'function');
}

export function missingMethods(agent: object, methods: readonly string[]): string[] {
  return methods.filter((method) => typeof Reflect.get(agent, method) !== 'function');
}

export function isAnalysisAgent(value: unknown): value is AnalysisAgent {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const name = Reflect.get(value, 'name');
  return typeof name === 'string' && name.length > 0;
}

export function canSetData(agent: AnalysisAgent): agent is AnalysisAgent & Required<Pick<AnalysisAgent, 'setData'>> {
  return typeof agent.setData === 'function';
}

export function isLoaderAgent(agent: AnalysisAgent): agent is LoaderAgent {
  return hasMethods(agent, STAGE_OPERATIONS.load_data);
}

export function isExplorerAgent(agent: AnalysisAgent): agent is ExplorerAgent {
  return hasMethods(agent, STAGE_OPERATIONS.explore_data);
}

export function isAggregatorAgent(agent: AnalysisAgent): agent is AggregatorAgent {
  return hasMethods(agent, STAGE_OPERATIONS.aggregate_data);
}

export function isAnomalyDetectorAgent(agent: AnalysisAgent): agent is AnomalyDetectorAgent {
  return hasMethods(agent, STAGE_OPERATIONS.detect_anomalies);
}

export function isPredictorAgent(agent: AnalysisAgent): agent is PredictorAgent {
  return hasMethods(agent, STAGE_OPERATIONS.predict);
}

export function isRecommenderAgent(agent: AnalysisAgent): agent is RecommenderAgent {
  return hasMethods(agent, STAGE_OPERATIONS.get_recommendations);
}

export function isNarrativeAgent(agent: AnalysisAgent): agent is NarrativeAgent {
  return hasMethods(agent, STAGE_OPERATIONS.generate_narrative);
}

export function isVisualizerAgent(agent: AnalysisAgent): agent is VisualizerAgent {
  return hasMethods(agent, STAGE_OPERATIONS.visualize_data);
}

export function isReporterAgent(agent: AnalysisAgent): agent is ReporterAgent {
  return hasMethods(agent, STAGE_OPERATIONS.generate_report);
}
