import type { FastifyInstance } from 'fastify';
import type { ApprovalGate, PendingApproval } from '../../approval/approval-gate.js';
import type { OrchestrationEngine } from '../../orchestrator/engine.js';
import { approvalDecisionSchema, type ApprovalDecision } from '../../types/index.js';
import { createLogger } from '../../utils/logger.js';
import {
  createErrorResponse,
  createSuccessResponse,
  ErrorCode,
  handleParamsSchema,
  type HandleParams,
} from '../types.js';

const logger = createLogger('routes:approvals');

export interface ApprovalView {
  handle: string;
  threadId: string;
  question: string;
  details: Record<string, unknown>;
  createdAt: string;
}

function toApprovalView(approval: PendingApproval): ApprovalView {
  return {
    handle: approval.handle,
    threadId: approval.threadId,
    question: approval.question,
    details: approval.details,
    createdAt: approval.createdAt.toISOString(),
  };
}

/**
 * Register approval API routes
 */
export function registerApprovalRoutes(
  app: FastifyInstance,
  engine: OrchestrationEngine,
  gate: ApprovalGate
): void {
  /**
   * GET /api/v1/approvals - Pending approvals
   */
  app.get('/api/v1/approvals', async (request, reply) => {
    return reply.send(createSuccessResponse(gate.pending().map(toApprovalView), request.id));
  });

  /**
   * POST /api/v1/approvals/:handle - Answer an approval and resume its thread
   */
  app.post<{
    Params: HandleParams;
    Body: ApprovalDecision;
  }>('/api/v1/approvals/:handle', async (request, reply) => {
    const paramsResult = handleParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Invalid approval handle',
          { errors: paramsResult.error.errors },
          request.id
        )
      );
    }

    const bodyResult = approvalDecisionSchema.safeParse(request.body);
    if (!bodyResult.success) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Invalid decision',
          { errors: bodyResult.error.errors },
          request.id
        )
      );
    }

    const { handle } = paramsResult.data;
    const result = await engine.resume(handle, bodyResult.data);
    if (!result.ok) {
      return reply.status(404).send(
        createErrorResponse(ErrorCode.NOT_FOUND, result.error.message, { handle }, request.id)
      );
    }

    const { outcome } = result;
    logger.info(
      { requestId: request.id, handle, threadId: outcome.threadId, status: outcome.status },
      'Approval answered'
    );
    return reply.send(
      createSuccessResponse(
        {
          threadId: outcome.threadId,
          status: outcome.status,
          node: outcome.state.node,
          pendingApprovals: outcome.pendingApprovals,
          artifact: outcome.report?.artifact ?? null,
        },
        request.id
      )
    );
  });
}
