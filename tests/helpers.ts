/**
 * Test helpers: settings, a silent logger and fake agents
 */

import type { Config } from '../src/config/index.js';
import { BaseAgent } from '../src/agents/BaseAgent.js';
import type { AggregateOptions, ChartOptions, NarrativeInput } from '../src/agents/types.js';
import { createLogger } from '../src/monitoring/logger.js';
import { createContext, type OrchestratorContext } from '../src/orchestrator/context.js';
import { Orchestrator } from '../src/orchestrator/Orchestrator.js';
import type { Dataset } from '../src/state/models.js';

export const silentLogger = createLogger('test', { level: 'silent', pretty: false });

export function testSettings(retry: Partial<Config['retry']> = {}): Config {
  return {
    retry: {
      taskAttempts: 3,
      workflowTaskAttempts: 2,
      narrativeAttempts: 2,
      backoffFactor: 2,
      initialDelayMs: 0,
      ...retry,
    },
    api: { host: '127.0.0.1', port: 0 },
    monitoring: { logLevel: 'silent', logPretty: false, errorHistoryLimit: 100 },
    agents: { modules: [] },
  };
}

export function testContext(retry: Partial<Config['retry']> = {}): OrchestratorContext {
  return createContext({ settings: testSettings(retry), logger: silentLogger });
}

export function testOrchestrator(retry: Partial<Config['retry']> = {}): Orchestrator {
  return new Orchestrator({ settings: testSettings(retry), logger: silentLogger });
}

export const SALES: Dataset = [
  { region: 'north', amount: 120 },
  { region: 'south', amount: 80 },
  { region: 'north', amount: 95 },
];

export const INLINE: Dataset = [{ region: 'east', amount: 10 }];

export class FakeLoader extends BaseAgent {
  readonly calls: string[] = [];

  constructor(private readonly files: Record<string, Dataset> = { 'x.csv': SALES }) {
    super('loader', silentLogger);
  }

  load(filePath: string) {
    this.calls.push(filePath);
    const data = this.files[filePath];
    if (!data) {
      return this.failure(`File not found: ${filePath}`);
    }
    return this.success(data, { metadata: { rows: data.length } });
  }
}

export class FakeExplorer extends BaseAgent {
  readonly seen: Dataset[] = [];

  constructor(private readonly qualityScore?: number) {
    super('explorer', silentLogger);
  }

  explore(data: Dataset) {
    this.seen.push(data);
    return this.success(
      { rows: data.length, columns: Object.keys(data[0]).length },
      { qualityScore: this.qualityScore }
    );
  }
}

/** Throws on the first `failures` calls, then succeeds */
export class FlakyExplorer extends BaseAgent {
  calls = 0;

  constructor(private readonly failures: number) {
    super('explorer', silentLogger);
  }

  explore(data: Dataset) {
    this.calls++;
    if (this.calls <= this.failures) {
      throw new Error(`explore crashed (call ${this.calls})`);
    }
    return this.success({ rows: data.length });
  }
}

export class FakeAggregator extends BaseAgent {
  readonly options: AggregateOptions[] = [];

  constructor() {
    super('aggregator', silentLogger);
  }

  aggregate(data: Dataset, options: AggregateOptions) {
    this.options.push(options);
    return this.success({ groups: data.length });
  }
}

export class FakeAnomalyDetector extends BaseAgent {
  readonly methods: string[] = [];

  constructor() {
    super('anomaly-detector', silentLogger);
  }

  detectIqr(_data: Dataset, column: string, multiplier: number) {
    this.methods.push(`iqr:${column}:${multiplier}`);
    return this.success({ anomalies: 1, method: 'iqr' });
  }

  detectZScore(_data: Dataset, column: string, threshold: number) {
    this.methods.push(`zscore:${column}:${threshold}`);
    return this.success({ anomalies: 0, method: 'zscore' });
  }

  detectIsolationForest(_data: Dataset, columns?: string[]) {
    this.methods.push(`isolation_forest:${(columns ?? []).join(',')}`);
    return this.success({ anomalies: 2, method: 'isolation_forest' });
  }
}

export class FakePredictor extends BaseAgent {
  readonly calls: string[] = [];

  constructor() {
    super('predictor', silentLogger);
  }

  analyzeTrend(_data: Dataset, column: string) {
    this.calls.push(`trend:${column}`);
    return { worker: 'predictor', taskType: 'trend', success: true, data: { direction: 'up' }, errors: [], warnings: [], qualityScore: 0.8 };
  }

  forecast(_data: Dataset, xColumn: string, yColumn: string, periods: number) {
    this.calls.push(`forecast:${xColumn}:${yColumn}:${periods}`);
    return { worker: 'predictor', taskType: 'forecast', success: true, data: { values: [1, 2] }, errors: [], warnings: [], qualityScore: 0.6 };
  }
}

export class FakeRecommender extends BaseAgent {
  constructor() {
    super('recommender', silentLogger);
  }

  recommend() {
    return this.success({ recommendations: ['expand north'] });
  }
}

export const NARRATIVE = {
  executiveSummary: 'Sales are concentrated in the north region.',
  problemStatement: 'The south region underperforms.',
  actionPlan: '**Actions**\n1. Review south pricing\n\n2. Expand north inventory',
  fullNarrative:
    'Sales are concentrated in the north region, which accounts for most revenue. ' +
    'The south region underperforms and needs a pricing review before next quarter.',
  totalRecommendations: 2,
  criticalCount: 1,
  highCount: 1,
};

export class FakeNarrator extends BaseAgent {
  readonly inputs: NarrativeInput[] = [];

  constructor(private readonly output: unknown = NARRATIVE) {
    super('narrative-generator', silentLogger);
  }

  generateNarrative(input: NarrativeInput) {
    this.inputs.push(input);
    return this.output;
  }
}

export class FakeVisualizer extends BaseAgent {
  readonly charts: string[] = [];

  constructor() {
    super('visualizer', silentLogger);
  }

  histogram(_data: Dataset, column: string, bins: number, _options: ChartOptions) {
    this.charts.push(`histogram:${column}:${bins}`);
    return this.success({ chart: 'histogram' });
  }

  barChart(_data: Dataset, x: string, y: string) {
    this.charts.push(`bar:${x}:${y}`);
    return this.success({ chart: 'bar' });
  }

  lineChart(_data: Dataset, x: string, y: string) {
    this.charts.push(`line:${x}:${y}`);
    return this.success({ chart: 'line' });
  }

  scatterPlot(_data: Dataset, x: string, y: string) {
    this.charts.push(`scatter:${x}:${y}`);
    return this.success({ chart: 'scatter' });
  }

  heatmap() {
    this.charts.push('heatmap');
    return this.success({ chart: 'heatmap' });
  }
}

export class FakeReporter extends BaseAgent {
  readonly reports: string[] = [];

  constructor() {
    super('reporter', silentLogger);
  }

  executiveSummary() {
    this.reports.push('executive_summary');
    return this.success({ report: 'summary' });
  }

  dataProfile() {
    this.reports.push('data_profile');
    return this.success({ report: 'profile' });
  }

  comprehensiveReport() {
    this.reports.push('comprehensive');
    return this.success({ report: 'full' });
  }
}
