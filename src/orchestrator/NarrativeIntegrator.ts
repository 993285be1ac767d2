/**
 * Narrative Integrator
 * Reshapes stage results for the narrative generator, then validates and
 * summarises what it produced
 */

import { z } from 'zod';
import { NarrativeError, toOrchestratorError } from '../errors.js';
import { agentStatusSchema, toStageOutcome, unwrapData } from '../agents/envelope.js';
import type { DataShape, NarrativeAgent, NarrativeInput } from '../agents/types.js';
import { childLogger, type Logger } from '../monitoring/logger.js';
import { EventType } from '../state/EventBus.js';
import { TaskStatus, isDataset, type Dataset, type Workflow } from '../state/models.js';
import type { OrchestratorContext } from './context.js';
import type { Stage } from './pipeline.js';

export const narrativeSchema = z
  .object({
    executiveSummary: z.string(),
    problemStatement: z.string(),
    actionPlan: z.string(),
    fullNarrative: z.string(),
    totalRecommendations: z.number().int().nonnegative(),
    criticalCount: z.number().int().nonnegative().default(0),
    highCount: z.number().int().nonnegative().default(0),
  })
  .passthrough();

export type Narrative = z.output<typeof narrativeSchema>;

export type EnrichedNarrative = Narrative & {
  agentResults: NarrativeInput;
  generatedAt: string;
};

export interface WorkflowNarrative {
  workflow: Workflow;
  narrative: EnrichedNarrative;
  combinedAt: string;
}

export interface NarrativeValidation {
  hasExecutiveSummary: boolean;
  hasProblemStatement: boolean;
  hasActionPlan: boolean;
  hasFullNarrative: boolean;
  hasRecommendations: boolean;
  narrativeLengthOk: boolean;
  allSectionsPresent: boolean;
}

export interface NarrativeSummary {
  headline: string;
  problemCount: number;
  criticalIssues: number;
  highPriority: number;
  actionItems: string[];
  confidence: number;
}

type NarrativeRole = Exclude<keyof NarrativeInput, 'dataShape'>;

const STAGE_ROLES: Partial<Record<Stage, NarrativeRole>> = {
  explore_data: 'explorer',
  aggregate_data: 'aggregations',
  detect_anomalies: 'anomalies',
  predict: 'predictions',
  get_recommendations: 'recommendations',
};

const MIN_NARRATIVE_LENGTH = 100;
const MAX_ACTION_ITEMS = 5;

export function shapeOf(data: Dataset): DataShape {
  return {
    rows: data.length,
    columns: data.length > 0 ? Object.keys(data[0]).length : 0,
  };
}

/**
 * Role-keyed narrative input from raw stage results (envelopes are unwrapped)
 */
export function buildNarrativeInput(
  stageResults: Partial<Record<Stage, unknown>>,
  dataShape?: DataShape
): NarrativeInput {
  const input: NarrativeInput = {};
  for (const [stage, role] of Object.entries(STAGE_ROLES)) {
    const raw = Reflect.get(stageResults, stage);
    if (role && raw !== undefined) {
      input[role] = unwrapData(raw);
    }
  }
  if (dataShape) {
    input.dataShape = dataShape;
  }
  return input;
}

/**
 * Accepts a bare narrative or one wrapped in a success envelope
 */
export function parseNarrative(raw: unknown): Narrative {
  if (agentStatusSchema.safeParse(raw).success) {
    const outcome = toStageOutcome(raw);
    if (!outcome.ok) {
      throw new NarrativeError(outcome.message, { context: { errors: outcome.errors } });
    }
    return parseNarrative(outcome.data);
  }

  const result = narrativeSchema.safeParse(raw);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.') || issue.message);
    throw new NarrativeError(`Narrative output is missing required fields: ${fields.join(', ')}`, {
      context: { fields },
    });
  }
  return result.data;
}

export function validateNarrative(narrative: Narrative): NarrativeValidation {
  const hasExecutiveSummary = narrative.executiveSummary.trim().length > 0;
  const hasProblemStatement = narrative.problemStatement.trim().length > 0;
  const hasFullNarrative = narrative.fullNarrative.trim().length > 0;

  return {
    hasExecutiveSummary,
    hasProblemStatement,
    hasActionPlan: narrative.actionPlan.trim().length > 0,
    hasFullNarrative,
    hasRecommendations: narrative.totalRecommendations > 0,
    narrativeLengthOk: narrative.fullNarrative.length > MIN_NARRATIVE_LENGTH,
    allSectionsPresent: hasExecutiveSummary && hasProblemStatement && hasFullNarrative,
  };
}

/**
 * 0.5 base, +0.1 per present section, plus up to 0.1 scaled by
 * recommendation count (full bonus at 5). Capped at 1.
 */
export function calculateConfidence(narrative: Narrative): number {
  const validation = validateNarrative(narrative);
  let score = 0.5;
  if (validation.hasExecutiveSummary) score += 0.1;
  if (validation.hasProblemStatement) score += 0.1;
  if (validation.hasActionPlan) score += 0.1;
  if (validation.hasFullNarrative) score += 0.1;

  if (narrative.totalRecommendations > 0) {
    score = Math.min(1, score + 0.1 * Math.min(narrative.totalRecommendations / 5, 1));
  }
  return Math.round(score * 100) / 100;
}

export function extractActionItems(narrative: Narrative): string[] {
  return narrative.actionPlan
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('**'))
    .slice(0, MAX_ACTION_ITEMS);
}

export function summarizeNarrative(narrative: Narrative): NarrativeSummary {
  return {
    headline: narrative.executiveSummary || 'N/A',
    problemCount: narrative.totalRecommendations,
    criticalIssues: narrative.criticalCount,
    highPriority: narrative.highCount,
    actionItems: extractActionItems(narrative),
    confidence: calculateConfidence(narrative),
  };
}

export class NarrativeIntegrator {
  private logger: Logger;

  constructor(private readonly context: OrchestratorContext) {
    this.logger = childLogger(context.logger, { component: 'NarrativeIntegrator' });
  }

  /**
   * Role-keyed results from a workflow's completed tasks
   */
  extractAgentResults(workflow: Workflow): NarrativeInput {
    const stageResults: Partial<Record<Stage, unknown>> = {};
    let dataShape: DataShape | undefined;

    for (const task of Object.values(workflow.results)) {
      if (task.status !== TaskStatus.COMPLETED || !task.stage) {
        continue;
      }
      Reflect.set(stageResults, task.stage, task.result);

      if (task.stage === 'load_data') {
        const loaded = unwrapData(task.result);
        if (isDataset(loaded)) {
          dataShape = shapeOf(loaded);
        }
      }
    }

    const input = buildNarrativeInput(stageResults, dataShape);
    this.logger.debug({ workflowId: workflow.id, roles: Object.keys(input) }, 'Extracted workflow results');
    return input;
  }

  async generateFromResults(capability: NarrativeAgent, input: NarrativeInput): Promise<EnrichedNarrative> {
    try {
      const narrative = parseNarrative(await capability.generateNarrative(input));
      const enriched: EnrichedNarrative = {
        ...narrative,
        agentResults: input,
        generatedAt: new Date().toISOString(),
      };

      this.context.errors.trackSuccess('NarrativeIntegrator', 'generate', {
        totalRecommendations: narrative.totalRecommendations,
      });
      this.context.events.publish(EventType.NARRATIVE_GENERATED, {
        confidence: calculateConfidence(narrative),
      });
      this.logger.info({ roles: Object.keys(input).length }, 'Narrative generated');
      return enriched;
    } catch (error) {
      const failure =
        error instanceof NarrativeError
          ? error
          : new NarrativeError(`Narrative generation failed: ${toOrchestratorError(error).message}`, { cause: error });
      this.context.errors.recordError(failure, {
        workerName: 'NarrativeIntegrator',
        context: { operation: 'generate', roles: Object.keys(input) },
      });
      throw failure;
    }
  }

  async generateFromWorkflow(capability: NarrativeAgent, workflow: Workflow): Promise<WorkflowNarrative> {
    const input = this.extractAgentResults(workflow);
    const narrative = await this.generateFromResults(capability, input);
    return {
      workflow,
      narrative,
      combinedAt: new Date().toISOString(),
    };
  }

  validate(narrative: Narrative): NarrativeValidation {
    return validateNarrative(narrative);
  }

  summarize(narrative: Narrative): NarrativeSummary {
    return summarizeNarrative(narrative);
  }
}
