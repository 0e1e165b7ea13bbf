import Fastify, { type FastifyError, type FastifyInstance, type FastifyRequest } from 'fastify';
import { nanoid } from 'nanoid';
import type { ApprovalGate } from '../approval/approval-gate.js';
import type { OrchestrationEngine } from '../orchestrator/engine.js';
import { TaskloomError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { registerApprovalRoutes } from './routes/approvals.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerThreadRoutes } from './routes/threads.js';
import {
  createErrorResponse,
  ErrorCode,
  serverConfigSchema,
  type ServerConfig,
} from './types.js';

const logger = createLogger('server');

/**
 * Server configuration plus the orchestration objects the routes act on
 */
export interface AppConfig extends Partial<ServerConfig> {
  engine: OrchestrationEngine;
  gate: ApprovalGate;
}

/**
 * Create and configure a Fastify application instance
 */
export async function createApp(config: AppConfig): Promise<FastifyInstance> {
  const { engine, gate, ...serverConfig } = config;
  const validatedConfig = serverConfigSchema.parse(serverConfig);

  const app = Fastify({
    logger: validatedConfig.enableLogging
      ? {
          level: 'info',
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
            },
          },
        }
      : false,
    requestTimeout: validatedConfig.requestTimeout,
    genReqId: () => nanoid(12),
  });

  // Add request ID to response headers
  app.addHook('onRequest', (request: FastifyRequest, reply, done) => {
    void reply.header('X-Request-ID', request.id);
    done();
  });

  app.setErrorHandler(async (error: FastifyError, request, reply) => {
    logger.error({ err: error, requestId: request.id }, 'Request error');

    if (error.validation) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Validation error',
          { errors: error.validation },
          request.id
        )
      );
    }

    if (error instanceof TaskloomError) {
      const status = mapDomainErrorToStatus(error);
      return reply.status(status).send(
        createErrorResponse(
          mapStatusToErrorCode(status),
          error.message,
          { type: error.code },
          request.id
        )
      );
    }

    if (error.statusCode) {
      const code = mapStatusToErrorCode(error.statusCode);
      return reply.status(error.statusCode).send(
        createErrorResponse(code, error.message, undefined, request.id)
      );
    }

    return reply.status(500).send(
      createErrorResponse(
        ErrorCode.INTERNAL_ERROR,
        'An unexpected error occurred',
        undefined,
        request.id
      )
    );
  });

  app.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send(
      createErrorResponse(
        ErrorCode.NOT_FOUND,
        `Route ${request.method} ${request.url} not found`,
        undefined,
        request.id
      )
    );
  });

  registerHealthRoutes(app, gate);
  registerApprovalRoutes(app, engine, gate);
  registerThreadRoutes(app, engine);

  return app;
}

/**
 * HTTP status for an orchestration error that escaped a route
 */
function mapDomainErrorToStatus(error: TaskloomError): number {
  switch (error.code) {
    case 'CHECKPOINT_IO_ERROR':
      return 503;
    case 'HANDLE_NOT_FOUND':
      return 404;
    case 'CONFIG_ERROR':
      return 500;
    case 'THREAD_EXISTS':
      return 409;
    default:
      return 409;
  }
}

/**
 * Map HTTP status code to error code
 */
function mapStatusToErrorCode(status: number): ErrorCode {
  switch (status) {
    case 400:
      return ErrorCode.BAD_REQUEST;
    case 404:
      return ErrorCode.NOT_FOUND;
    case 409:
      return ErrorCode.CONFLICT;
    case 503:
      return ErrorCode.SERVICE_UNAVAILABLE;
    default:
      return ErrorCode.INTERNAL_ERROR;
  }
}
