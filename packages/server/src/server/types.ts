import { z } from 'zod';

/**
 * Server configuration schema
 */
export const serverConfigSchema = z.object({
  /** Port to listen on; 0 binds a free port */
  port: z.number().int().min(0).max(65535).default(3001),
  /** Host to bind to */
  host: z.string().default('0.0.0.0'),
  /** CORS origins to allow */
  corsOrigins: z.array(z.string()).default(['*']),
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

export interface HealthStatus {
  status: 'ok' | 'degraded' | 'unhealthy';
  version: string;
  timestamp: string;
}

export interface ComponentCheck {
  name: string;
  healthy: boolean;
  message?: string;
  latencyMs?: number;
}

export interface ReadinessResponse {
  ready: boolean;
  checks: ComponentCheck[];
  timestamp: string;
}

export interface LivenessResponse {
  alive: true;
  timestamp: string;
}

/**
 * Error codes for API errors
 */
export const ErrorCode = {
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Create a success response
 */
export function createSuccessResponse<T>(data: T, requestId?: string): ApiResponse<T> {
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
