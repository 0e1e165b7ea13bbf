import { z } from 'zod';

/**
 * Server configuration schema
 */
export const serverConfigSchema = z.object({
  /** Port to listen on */
  port: z.number().int().min(1).max(65535).default(3100),
  /** Host to bind to */
  host: z.string().default('127.0.0.1'),
  /** Request timeout in milliseconds */
  requestTimeout: z.number().int().positive().default(30000),
  /** Enable request logging */
  enableLogging: z.boolean().default(true),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

export type ApiResponse<T> = {
  success: true;
  data: T;
  requestId?: string;
};

/**
 * API error response schema
 */
export const apiErrorSchema = z.object({
  success: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.record(z.unknown()).optional(),
  }),
  requestId: z.string().optional(),
});

export type ApiError = z.infer<typeof apiErrorSchema>;

/**
 * Health check status
 */
export const healthStatusSchema = z.object({
  status: z.enum(['ok', 'degraded', 'unhealthy']),
  version: z.string(),
  timestamp: z.string().datetime(),
  pendingApprovals: z.number().int().min(0),
});

export type HealthStatus = z.infer<typeof healthStatusSchema>;

/**
 * Route params carrying an approval handle
 */
export const handleParamsSchema = z.object({
  handle: z.string().min(1),
});

export type HandleParams = z.infer<typeof handleParamsSchema>;

export const threadIdParamsSchema = z.object({
  threadId: z.string().min(1),
});

export type ThreadIdParams = z.infer<typeof threadIdParamsSchema>;

/**
 * Error codes for API errors
 */
export const ErrorCode = {
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Create a success response
 */
export function createSuccessResponse<T>(
  data: T,
  requestId?: string
): ApiResponse<T> {
  return {
    success: true,
    data,
    ...(requestId && { requestId }),
  };
}

/**
 * Create an error response
 */
export function createErrorResponse(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ApiError {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
    ...(requestId && { requestId }),
  };
}
