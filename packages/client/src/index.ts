/**
 * @relief-pipeline/client - Typed client for the relief pipeline HTTP API
 *
 * @packageDocumentation
 */

export { ReliefClient } from './client.js';

export type {
  ReliefClientConfig,
  RequestFn,
  RequestOptions,
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
} from './types.js';

export {
  ReliefClientError,
  NetworkError,
  NotFoundError,
  ValidationError,
  AuthenticationError,
  ConflictError,
  ServerError,
  InvalidResponseError,
} from './errors.js';

export type { RequestsListOptions } from './resources/requests.js';
export type { ReconcileOptions } from './resources/operator.js';
