/**
 * Stage Parameters
 * zod schemas for the parameters each stage reads
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';

export const loadParamsSchema = z
  .object({
    file_path: z.string().min(1, 'file_path is required'),
  })
  .passthrough();

export const aggregateParamsSchema = z
  .object({
    group_by: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
    agg_col: z.string().optional(),
    agg_func: z.enum(['sum', 'mean', 'count', 'min', 'max', 'median']).default('sum'),
  })
  .passthrough();

export const anomalyParamsSchema = z
  .object({
    method: z.enum(['iqr', 'zscore', 'isolation_forest']).default('iqr'),
    column: z.string().optional(),
    columns: z.array(z.string()).optional(),
    multiplier: z.number().positive().default(1.5),
    threshold: z.number().positive().default(3.0),
  })
  .passthrough()
  .superRefine((params, ctx) => {
    if (params.method !== 'isolation_forest' && !params.column) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['column'],
        message: `column is required for method '${params.method}'`,
      });
    }
  });

export const predictParamsSchema = z
  .object({
    prediction_type: z.enum(['trend', 'forecast']).default('trend'),
    column: z.string().optional(),
    x_col: z.string().optional(),
    y_col: z.string().optional(),
    periods: z.number().int().positive().default(10),
  })
  .passthrough()
  .superRefine((params, ctx) => {
    if (params.prediction_type === 'trend' && !params.column) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['column'], message: 'column is required for trend' });
    }
    if (params.prediction_type === 'forecast' && (!params.x_col || !params.y_col)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['x_col'],
        message: 'x_col and y_col are required for forecast',
      });
    }
  });

export const visualizeParamsSchema = z
  .object({
    chart_type: z.enum(['histogram', 'bar', 'line', 'scatter', 'heatmap']).default('line'),
    column: z.string().optional(),
    bins: z.number().int().positive().default(30),
    x_col: z.string().optional(),
    y_col: z.string().optional(),
    title: z.string().optional(),
  })
  .passthrough()
  .superRefine((params, ctx) => {
    if (params.chart_type === 'histogram' && !params.column) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['column'], message: 'column is required for histogram' });
    }
    if (['bar', 'line', 'scatter'].includes(params.chart_type) && (!params.x_col || !params.y_col)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['x_col'],
        message: `x_col and y_col are required for ${params.chart_type} charts`,
      });
    }
  });

export const reportParamsSchema = z
  .object({
    report_type: z.enum(['executive_summary', 'data_profile', 'comprehensive']).default('executive_summary'),
  })
  .passthrough();

/**
 * Parse stage parameters, turning zod issues into a ValidationError
 */
export function parseParams<S extends z.ZodTypeAny>(schema: S, stage: string, params: unknown): z.output<S> {
  const result = schema.safeParse(params);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new ValidationError(`Invalid parameters for ${stage}: ${issues.join('; ')}`, {
      context: { stage, issues },
    });
  }
  return result.data;
}
