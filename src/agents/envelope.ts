/**
 * Result Envelopes
 * Agents answer either with { status, data } or with the richer worker form
 * { success, errors, warnings, qualityScore }. Both collapse into a StageOutcome.
 * Only status/success decide the outcome; the other fields are read leniently.
 */

import { z } from 'zod';
import type { ErrorKind } from '../errors.js';

export const agentStatusSchema = z.object({ status: z.enum(['success', 'error']) }).passthrough();
export const workerStatusSchema = z.object({ success: z.boolean() }).passthrough();

const envelopeFieldsSchema = z.object({
  message: z.string().optional().catch(undefined),
  data: z.unknown(),
  metadata: z.record(z.unknown()).optional().catch(undefined),
  errors: z.array(z.unknown()).optional().catch(undefined),
  warnings: z.array(z.unknown()).optional().catch(undefined),
  qualityScore: z.number().finite().optional().catch(undefined),
  quality_score: z.number().finite().optional().catch(undefined),
});

type EnvelopeFields = z.infer<typeof envelopeFieldsSchema>;

export interface AgentEnvelope {
  status: 'success' | 'error';
  message?: string;
  data?: unknown;
  metadata?: Record<string, unknown>;
  errors?: string[];
  qualityScore?: number;
}

export type StageOutcome =
  | {
      ok: true;
      data: unknown;
      metadata: Record<string, unknown>;
      qualityScore?: number;
      warnings: string[];
      raw: unknown;
    }
  | {
      ok: false;
      kind: ErrorKind;
      message: string;
      errors: string[];
    };

function describeEntry(entry: unknown): string {
  if (typeof entry === 'string') {
    return entry;
  }
  if (typeof entry === 'object' && entry !== null) {
    if ('message' in entry && typeof entry.message === 'string') {
      return entry.message;
    }
    if ('code' in entry && typeof entry.code === 'string') {
      return entry.code;
    }
  }
  try {
    return JSON.stringify(entry) ?? String(entry);
  } catch {
    return String(entry);
  }
}

function readFields(raw: unknown): EnvelopeFields {
  const fields = envelopeFieldsSchema.safeParse(raw);
  return fields.success ? fields.data : { data: undefined };
}

function readQuality(fields: EnvelopeFields): number | undefined {
  const score = fields.qualityScore ?? fields.quality_score;
  return score === undefined ? undefined : Math.min(1, Math.max(0, score));
}

function failure(fields: EnvelopeFields, fallback: string): StageOutcome {
  const errors = (fields.errors ?? []).map(describeEntry);
  return {
    ok: false,
    kind: 'execution',
    message: fields.message ?? errors[0] ?? fallback,
    errors,
  };
}

function success(fields: EnvelopeFields, raw: unknown): StageOutcome {
  return {
    ok: true,
    data: fields.data,
    metadata: fields.metadata ?? {},
    qualityScore: readQuality(fields),
    warnings: (fields.warnings ?? []).filter((warning): warning is string => typeof warning === 'string'),
    raw,
  };
}

/**
 * Interpret whatever an agent returned. Values that carry neither a status nor
 * a success flag are treated as a successful bare payload.
 */
export function toStageOutcome(raw: unknown): StageOutcome {
  const agent = agentStatusSchema.safeParse(raw);
  if (agent.success) {
    const fields = readFields(raw);
    return agent.data.status === 'error' ? failure(fields, 'Agent reported an error') : success(fields, raw);
  }

  const worker = workerStatusSchema.safeParse(raw);
  if (worker.success) {
    const fields = readFields(raw);
    return worker.data.success ? success(fields, raw) : failure(fields, 'Worker reported failure');
  }

  return { ok: true, data: raw, metadata: {}, warnings: [], raw };
}

/**
 * Payload carried by a cached stage result, or the value itself when it is not
 * an envelope
 */
export function unwrapData(raw: unknown): unknown {
  const outcome = toStageOutcome(raw);
  return outcome.ok ? outcome.data : undefined;
}
