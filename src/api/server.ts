/**
 * API Server
 * Fastify REST service over the orchestrator
 */

import fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import { loadConfig } from '../config/index.js';
import {
  AgentNotFoundError,
  OrchestratorError,
  ShutdownError,
  TaskExecutionError,
  WorkflowError,
} from '../errors.js';
import { childLogger } from '../monitoring/logger.js';
import type { Orchestrator } from '../orchestrator/Orchestrator.js';
import { healthRoutes } from './routes/health.js';
import { pipelineRoutes } from './routes/pipeline.js';

export interface APIServerConfig {
  host?: string;
  port?: number;
  logger?: boolean;
}

/**
 * HTTP status for an orchestrator error
 */
export function statusFor(error: OrchestratorError): number {
  if (error instanceof TaskExecutionError && error.cause instanceof OrchestratorError) {
    return statusFor(error.cause);
  }
  if (error instanceof AgentNotFoundError) return 404;
  if (error instanceof ShutdownError) return 503;
  switch (error.kind) {
    case 'validation':
      return 400;
    case 'lifecycle':
      return 409;
    default:
      return 500;
  }
}

export function buildServer(orchestrator: Orchestrator, config: APIServerConfig = {}): FastifyInstance {
  const server = fastify({ logger: config.logger ?? false });
  const logger = childLogger(orchestrator.context.logger, { component: 'APIServer' });

  server.setErrorHandler((error: FastifyError | OrchestratorError, request, reply) => {
    if (error instanceof OrchestratorError) {
      const statusCode = statusFor(error);
      logger.warn({ url: request.url, code: error.code, statusCode }, error.message);
      reply.code(statusCode).send({
        success: false,
        error: error.message,
        kind: error.kind,
        code: error.code,
        ...(error instanceof WorkflowError ? { workflow: error.workflow } : {}),
      });
      return;
    }

    logger.error({ err: error, url: request.url }, 'Request error');
    reply.code(error.statusCode ?? 500).send({
      success: false,
      error: error.message,
    });
  });

  server.get('/status', async () => orchestrator.getStatus());

  server.get('/agents', async () => {
    const agents = orchestrator.listAgents();
    return { agents, total: agents.length };
  });

  void server.register(healthRoutes, { prefix: '/health', orchestrator });
  void server.register(pipelineRoutes, { prefix: '/api/v1', orchestrator });

  return server;
}

/**
 * Build and listen on the configured host and port
 */
export async function startServer(orchestrator: Orchestrator, config: APIServerConfig = {}): Promise<FastifyInstance> {
  const settings = loadConfig();
  const host = config.host ?? settings.api.host;
  const port = config.port ?? settings.api.port;
  const server = buildServer(orchestrator, config);
  const logger = childLogger(orchestrator.context.logger, { component: 'APIServer' });

  await server.listen({ host, port });
  logger.info(`API server listening on ${host}:${port}`);
  return server;
}
