/**
 * Pipeline Routes
 * Tasks, workflows, history and error records
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../../errors.js';
import { ErrorSeverity, ErrorType } from '../../monitoring/ErrorRecord.js';
import type { RouteOptions } from './health.js';

const workflowBodySchema = z.object({
  tasks: z.array(z.unknown()),
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
});

const errorsQuerySchema = z.object({
  type: z.nativeEnum(ErrorType).optional(),
  severity: z.nativeEnum(ErrorSeverity).optional(),
  worker: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().optional(),
});

const resetBodySchema = z
  .object({
    includeMetrics: z.boolean().optional(),
  })
  .default({});

function parse<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || what}: ${issue.message}`);
    throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, { context: { issues } });
  }
  return result.data;
}

export const pipelineRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { orchestrator }) => {
  fastify.post('/tasks', async (request) => {
    const task = await orchestrator.executeTask(request.body);
    return { success: true, data: task };
  });

  fastify.post('/workflows', async (request) => {
    const { tasks } = parse(workflowBodySchema, request.body, 'request body');
    const workflow = await orchestrator.executeWorkflow(tasks);
    return { success: true, data: workflow };
  });

  fastify.post('/workflows/narrative', async (request) => {
    const { tasks } = parse(workflowBodySchema, request.body, 'request body');
    const result = await orchestrator.executeWorkflowWithNarrative(tasks);
    return { success: true, data: result };
  });

  fastify.get('/history', async (request) => {
    const { limit } = parse(historyQuerySchema, request.query, 'query');
    const history = orchestrator.getExecutionHistory(limit);
    return { success: true, data: history, total: history.length };
  });

  fastify.get('/errors', async (request) => {
    const query = parse(errorsQuerySchema, request.query, 'query');
    const errors = orchestrator.getErrors({
      type: query.type,
      severity: query.severity,
      workerName: query.worker,
      limit: query.limit,
    });
    return { success: true, data: errors, total: errors.length };
  });

  fastify.post('/reset', async (request) => {
    const options = parse(resetBodySchema, request.body, 'request body');
    return orchestrator.reset(options);
  });
};
