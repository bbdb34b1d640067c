/**
 * Relief Client Types
 */

import type { z } from 'zod';

export type {
  AuditEventView,
  DamageReport,
  DeadLetterSummary,
  IntakeAck,
  IntakeRequest,
  LogisticsPlan,
  PaginatedResponse,
  PipelineProgress,
  PipelineStage,
  PipelineStatusView,
  ReconcileReport,
  ReprocessAck,
  RequestStatus,
  RescueRequest,
  StuckRequest,
} from '@relief-pipeline/shared';

export interface ReliefClientConfig {
  /** Base URL of the relief API server */
  baseUrl: string;
  /** Sent as X-API-Key on every request */
  apiKey?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Custom fetch implementation */
  fetch?: typeof fetch;
}

export interface RequestOptions {
  body?: unknown;
  params?: Record<string, string>;
}

/**
 * Performs one API call and validates the `data` of the reply with `schema`.
 */
export type RequestFn = <T>(
  method: string,
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options?: RequestOptions
) => Promise<T>;
