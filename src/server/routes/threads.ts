import type { FastifyInstance } from 'fastify';
import type { OrchestrationEngine } from '../../orchestrator/engine.js';
import { summarizeThread } from '../../orchestrator/summary.js';
import {
  createErrorResponse,
  createSuccessResponse,
  ErrorCode,
  threadIdParamsSchema,
  type ThreadIdParams,
} from '../types.js';

/**
 * Register thread API routes
 */
export function registerThreadRoutes(app: FastifyInstance, engine: OrchestrationEngine): void {
  /**
   * GET /api/v1/threads/:threadId - Latest checkpoint summary
   */
  app.get<{
    Params: ThreadIdParams;
  }>('/api/v1/threads/:threadId', async (request, reply) => {
    const paramsResult = threadIdParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Invalid thread ID',
          { errors: paramsResult.error.errors },
          request.id
        )
      );
    }

    const { threadId } = paramsResult.data;
    const checkpoint = await engine.latestCheckpoint(threadId);
    if (!checkpoint) {
      return reply.status(404).send(
        createErrorResponse(ErrorCode.NOT_FOUND, `Thread not found: ${threadId}`, undefined, request.id)
      );
    }

    return reply.send(createSuccessResponse(summarizeThread(checkpoint), request.id));
  });
}
