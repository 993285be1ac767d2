/**
 * Health Check Routes
 */

import type { FastifyPluginAsync } from 'fastify';
import { healthStatus } from '../../monitoring/QualityTracker.js';
import type { Orchestrator } from '../../orchestrator/Orchestrator.js';

export interface RouteOptions {
  orchestrator: Orchestrator;
}

export const healthRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { orchestrator }) => {
  // Basic health check
  fastify.get('/', async () => {
    const status = orchestrator.getStatus();
    return {
      status: healthStatus(status.healthScore),
      healthScore: status.healthScore,
      timestamp: status.timestamp,
      agentsRegistered: status.agentsRegistered,
    };
  });

  // Full report: agents, cache, workflows, errors, quality
  fastify.get('/detailed', async () => orchestrator.getHealthReport());

  fastify.get('/ready', async (_request, reply) => {
    if (!orchestrator.isActive) {
      reply.status(503);
      return { status: 'not_ready', reason: 'shutdown', timestamp: new Date().toISOString() };
    }
    return { status: 'ready', timestamp: new Date().toISOString() };
  });

  fastify.get('/live', async () => ({
    status: 'alive',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  }));
};
