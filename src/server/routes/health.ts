import type { FastifyInstance } from 'fastify';
import type { ApprovalGate } from '../../approval/approval-gate.js';
import { createSuccessResponse, type HealthStatus } from '../types.js';

/**
 * Package version - should match package.json
 */
export const VERSION = '0.1.0';

/**
 * Register health check routes
 */
export function registerHealthRoutes(app: FastifyInstance, gate: ApprovalGate): void {
  /**
   * GET /health - Basic health check
   */
  app.get('/health', async (request, reply) => {
    const response: HealthStatus = {
      status: 'ok',
      version: VERSION,
      timestamp: new Date().toISOString(),
      pendingApprovals: gate.pending().length,
    };
    return reply.send(createSuccessResponse(response, request.id));
  });
}
