import { z } from 'zod';
import {
  imageryRefsSchema,
  locationSchema,
  PipelineStage,
  RequestStatus,
  damageReportSchema,
  logisticsPlanSchema,
  rescueRequestSchema,
  type DamageReport,
  type LogisticsPlan,
  type RescueRequest,
} from './records.js';

/**
 * Pagination query parameters
 */
export const paginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export type PaginationQuery = z.infer<typeof paginationQuerySchema>;

/**
 * List requests query parameters
 */
export const listRequestsQuerySchema = paginationQuerySchema.extend({
  status: z.nativeEnum(RequestStatus).optional(),
});

export type ListRequestsQuery = z.infer<typeof listRequestsQuerySchema>;

/**
 * Request ID route parameter
 */
export const requestIdParamsSchema = z.object({
  id: z.string().min(1),
});

export type RequestIdParams = z.infer<typeof requestIdParamsSchema>;

/**
 * Intake body: a new rescue request
 */
export const intakeRequestSchema = z.object({
  location: locationSchema,
  eventName: z.string().trim().min(1).max(100).optional(),
  imagery: imageryRefsSchema,
});

export type IntakeRequest = z.infer<typeof intakeRequestSchema>;

/**
 * Operator reprocess body
 */
export const reprocessBodySchema = z.object({
  stage: z.nativeEnum(PipelineStage),
});

export type ReprocessBody = z.infer<typeof reprocessBodySchema>;

/**
 * Reconcile body
 */
export const reconcileBodySchema = z.object({
  dryRun: z.boolean().default(false),
});

export type ReconcileBody = z.infer<typeof reconcileBodySchema>;

/**
 * Intake acknowledgment. Returned before any downstream stage has run.
 */
export interface IntakeAck {
  requestId: string;
  status: RescueRequest['status'];
  /** False when every trigger publish attempt failed; the reconciler repairs it */
  triggered: boolean;
}

/**
 * Coarse position of a request in the pipeline
 */
export type PipelineProgress =
  | 'intake'
  | 'damage_analysis'
  | 'logistics_planning'
  | 'done'
  | 'failed';

/**
 * Combined view of the three records for one request
 */
export interface PipelineStatusView {
  requestId: string;
  progress: PipelineProgress;
  request: RescueRequest;
  damageReport: DamageReport | null;
  logisticsPlan: LogisticsPlan | null;
}

export type StuckReason = 'untriggered' | 'handoff_lost' | 'stalled';

export interface StuckRequest {
  requestId: string;
  reason: StuckReason;
  stage: PipelineStage;
  /** Action the reconciler takes (or would take on a dry run) */
  action: 'republish_damage_trigger' | 'republish_logistics_trigger' | 'mark_failed';
  since: string;
}

export interface ReconcileReport {
  dryRun: boolean;
  scannedAt: string;
  stuck: StuckRequest[];
  applied: number;
}

export interface ReprocessAck {
  requestId: string;
  stage: PipelineStage;
  attempt: number;
  messageId: string;
}

export interface DeadLetterSummary {
  messageId: string;
  topic: string;
  requestId: string | null;
  deliveryCount: number;
  reason: string;
  publishedAt: string;
  deadLetteredAt: string;
}

export interface AuditEventView {
  id: string;
  requestId: string;
  eventType: string;
  timestamp: string;
  details: Record<string, unknown>;
}

/**
 * Paginated response wrapper
 */
export interface PaginatedResponse<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

/**
 * Generic API success response wrapper
 */
export interface ApiResponse<T> {
  success: true;
  data: T;
  requestId?: string;
}

export interface ApiErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  requestId?: string;
}

// =============================================================================
// Response schemas
// =============================================================================

export const intakeAckSchema: z.ZodType<IntakeAck, z.ZodTypeDef, unknown> = z.object({
  requestId: z.string(),
  status: z.nativeEnum(RequestStatus),
  triggered: z.boolean(),
});

export const pipelineStatusViewSchema: z.ZodType<PipelineStatusView, z.ZodTypeDef, unknown> =
  z.object({
    requestId: z.string(),
    progress: z.enum(['intake', 'damage_analysis', 'logistics_planning', 'done', 'failed']),
    request: rescueRequestSchema,
    damageReport: damageReportSchema.nullable(),
    logisticsPlan: logisticsPlanSchema.nullable(),
  });

export const reconcileReportSchema: z.ZodType<ReconcileReport, z.ZodTypeDef, unknown> = z.object({
  dryRun: z.boolean(),
  scannedAt: z.string(),
  stuck: z.array(
    z.object({
      requestId: z.string(),
      reason: z.enum(['untriggered', 'handoff_lost', 'stalled']),
      stage: z.nativeEnum(PipelineStage),
      action: z.enum(['republish_damage_trigger', 'republish_logistics_trigger', 'mark_failed']),
      since: z.string(),
    })
  ),
  applied: z.number().int(),
});

export const reprocessAckSchema: z.ZodType<ReprocessAck, z.ZodTypeDef, unknown> = z.object({
  requestId: z.string(),
  stage: z.nativeEnum(PipelineStage),
  attempt: z.number().int(),
  messageId: z.string(),
});

export const deadLetterSummarySchema: z.ZodType<DeadLetterSummary, z.ZodTypeDef, unknown> =
  z.object({
    messageId: z.string(),
    topic: z.string(),
    requestId: z.string().nullable(),
    deliveryCount: z.number().int(),
    reason: z.string(),
    publishedAt: z.string(),
    deadLetteredAt: z.string(),
  });

export const auditEventViewSchema: z.ZodType<AuditEventView, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  requestId: z.string(),
  eventType: z.string(),
  timestamp: z.string(),
  details: z.record(z.unknown()),
});

export function paginatedResponseSchema<T>(
  item: z.ZodType<T, z.ZodTypeDef, unknown>
): z.ZodType<PaginatedResponse<T>, z.ZodTypeDef, unknown> {
  return z.object({
    items: z.array(item),
    total: z.number().int(),
    limit: z.number().int(),
    offset: z.number().int(),
    hasMore: z.boolean(),
  });
}

/**
 * Envelope of every HTTP API reply
 */
export const apiEnvelopeSchema = z.discriminatedUnion('success', [
  z.object({
    success: z.literal(true),
    data: z.unknown(),
    requestId: z.string().optional(),
  }),
  z.object({
    success: z.literal(false),
    error: z.object({
      code: z.string(),
      message: z.string(),
      details: z.record(z.unknown()).optional(),
    }),
    requestId: z.string().optional(),
  }),
]);
