import { z } from 'zod';

// =============================================================================
// Status values
// =============================================================================

export const RequestStatus = {
  SUBMITTED: 'submitted',
  ANALYZING: 'analyzing',
  ANALYZED: 'analyzed',
  PLANNING: 'planning',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type RequestStatus = (typeof RequestStatus)[keyof typeof RequestStatus];

export const AnalysisStatus = {
  PENDING: 'pending',
  ANALYZING: 'analyzing',
  COMPLETE: 'complete',
  FAILED: 'failed',
} as const;

export type AnalysisStatus = (typeof AnalysisStatus)[keyof typeof AnalysisStatus];

export const PlanStatus = {
  PENDING: 'pending',
  PLANNING: 'planning',
  COMPLETE: 'complete',
  FAILED: 'failed',
} as const;

export type PlanStatus = (typeof PlanStatus)[keyof typeof PlanStatus];

export const PipelineStage = {
  DAMAGE: 'damage',
  LOGISTICS: 'logistics',
} as const;

export type PipelineStage = (typeof PipelineStage)[keyof typeof PipelineStage];

export const DamageCategory = {
  FLOODING: 'flooding',
  STRUCTURAL: 'structural',
  ROAD_BLOCKAGE: 'road_blockage',
  LANDSLIDE: 'landslide',
  FIRE: 'fire',
  OTHER: 'other',
} as const;

export type DamageCategory = (typeof DamageCategory)[keyof typeof DamageCategory];

const isoTimestamp = z.string().datetime({ offset: true });

// =============================================================================
// Request
// =============================================================================

export const locationSchema = z.object({
  name: z.string().trim().min(1).max(100),
  latitude: z.number().min(-90).max(90).optional(),
  longitude: z.number().min(-180).max(180).optional(),
  /** Area-of-interest boundary, usually a GeoJSON geometry */
  boundary: z.record(z.unknown()).optional(),
});

export type Location = z.infer<typeof locationSchema>;

const imageryRefSchema = z.string().trim().min(1).max(2048);

export const imageryRefsSchema = z.object({
  preEvent: z.array(imageryRefSchema).min(1, 'At least one pre-event imagery reference is required'),
  postEvent: z.array(imageryRefSchema).min(1, 'At least one post-event imagery reference is required'),
});

export type ImageryRefs = z.infer<typeof imageryRefsSchema>;

export const rescueRequestSchema = z.object({
  requestId: z.string().min(1),
  location: locationSchema,
  eventName: z.string().max(100).optional(),
  imagery: imageryRefsSchema,
  status: z.nativeEnum(RequestStatus),
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp,
  triggerPublishedAt: isoTimestamp.optional(),
  /** Set when the reconciler republishes a lost logistics hand-off */
  handoffRepublishedAt: isoTimestamp.optional(),
});

export type RescueRequest = z.infer<typeof rescueRequestSchema>;

// =============================================================================
// DamageReport
// =============================================================================

export const damageFindingSchema = z.object({
  location: z.string().min(1),
  category: z.nativeEnum(DamageCategory),
  confidence: z.number().min(0).max(1),
  description: z.string().optional(),
});

export type DamageFinding = z.infer<typeof damageFindingSchema>;

export const damageReportSchema = z.object({
  requestId: z.string().min(1),
  findings: z.array(damageFindingSchema),
  summary: z.string().optional(),
  analysisModel: z.string().optional(),
  status: z.nativeEnum(AnalysisStatus),
  attempt: z.number().int().min(0),
  error: z.string().optional(),
  claimedBy: z.string().optional(),
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp,
  completedAt: isoTimestamp.optional(),
});

export type DamageReport = z.infer<typeof damageReportSchema>;

// =============================================================================
// LogisticsPlan
// =============================================================================

export const deploymentActionSchema = z.object({
  resourceType: z.string().min(1),
  quantity: z.number().int().positive(),
  destination: z.string().min(1),
  /** 1 is the highest priority */
  priority: z.number().int().min(1),
});

export type DeploymentAction = z.infer<typeof deploymentActionSchema>;

export const logisticsPlanSchema = z.object({
  requestId: z.string().min(1),
  actions: z.array(deploymentActionSchema),
  summary: z.string().optional(),
  planningModel: z.string().optional(),
  status: z.nativeEnum(PlanStatus),
  attempt: z.number().int().min(0),
  error: z.string().optional(),
  claimedBy: z.string().optional(),
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp,
  completedAt: isoTimestamp.optional(),
});

export type LogisticsPlan = z.infer<typeof logisticsPlanSchema>;

// =============================================================================
// Claim
// =============================================================================

export const claimRecordSchema = z.object({
  key: z.string().min(1),
  stage: z.nativeEnum(PipelineStage),
  requestId: z.string().min(1),
  attempt: z.number().int().min(0),
  owner: z.string().min(1),
  claimedAt: isoTimestamp,
});

export type ClaimRecord = z.infer<typeof claimRecordSchema>;

/**
 * Claim keys take the form `{stage}:{requestId}:{attempt}`.
 */
export function claimKey(stage: PipelineStage, requestId: string, attempt: number): string {
  return `${stage}:${requestId}:${attempt}`;
}

// =============================================================================
// Trigger payload
// =============================================================================

export const triggerPayloadSchema = z.object({
  requestId: z.string().min(1),
});

export type TriggerPayload = z.infer<typeof triggerPayloadSchema>;

// =============================================================================
// Collections
// =============================================================================

export const Collection = {
  REQUESTS: 'requests',
  DAMAGE_REPORTS: 'damage_reports',
  LOGISTICS_PLANS: 'logistics_plans',
  CLAIMS: 'claims',
} as const;

export type CollectionName = (typeof Collection)[keyof typeof Collection];

export interface CollectionRecords {
  requests: RescueRequest;
  damage_reports: DamageReport;
  logistics_plans: LogisticsPlan;
  claims: ClaimRecord;
}

export const collectionSchemas: {
  [C in CollectionName]: z.ZodType<CollectionRecords[C], z.ZodTypeDef, unknown>;
} = {
  requests: rescueRequestSchema,
  damage_reports: damageReportSchema,
  logistics_plans: logisticsPlanSchema,
  claims: claimRecordSchema,
};

export const COLLECTION_NAMES: readonly CollectionName[] = [
  Collection.REQUESTS,
  Collection.DAMAGE_REPORTS,
  Collection.LOGISTICS_PLANS,
  Collection.CLAIMS,
];
