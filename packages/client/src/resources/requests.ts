/**
 * Rescue Requests Resource API
 */

import {
  intakeAckSchema,
  paginatedResponseSchema,
  pipelineStatusViewSchema,
  reprocessAckSchema,
  rescueRequestSchema,
} from '@relief-pipeline/shared';
import type {
  IntakeAck,
  IntakeRequest,
  PaginatedResponse,
  PipelineStage,
  PipelineStatusView,
  ReprocessAck,
  RequestFn,
  RequestStatus,
  RescueRequest,
} from '../types.js';

export interface RequestsListOptions {
  status?: RequestStatus;
  limit?: number;
  offset?: number;
}

const requestPageSchema = paginatedResponseSchema(rescueRequestSchema);

/**
 * Rescue request methods
 */
export class RequestsResource {
  constructor(private request: RequestFn) {}

  /**
   * Submit a new rescue request. Resolves once the request is stored and
   * the damage trigger is published, before any analysis has run.
   */
  async submit(body: IntakeRequest): Promise<IntakeAck> {
    return this.request('POST', '/api/v1/requests', intakeAckSchema, { body });
  }

  /**
   * Request with its damage report and logistics plan
   */
  async get(requestId: string): Promise<PipelineStatusView> {
    return this.request(
      'GET',
      `/api/v1/requests/${encodeURIComponent(requestId)}`,
      pipelineStatusViewSchema
    );
  }

  /**
   * List requests, newest first
   */
  async list(options: RequestsListOptions = {}): Promise<PaginatedResponse<RescueRequest>> {
    const params: Record<string, string> = {};
    if (options.limit) params.limit = String(options.limit);
    if (options.offset) params.offset = String(options.offset);
    if (options.status) params.status = options.status;

    return this.request('GET', '/api/v1/requests', requestPageSchema, { params });
  }

  /**
   * Reset a failed stage and publish a fresh trigger for it
   */
  async reprocess(requestId: string, stage: PipelineStage): Promise<ReprocessAck> {
    return this.request(
      'POST',
      `/api/v1/requests/${encodeURIComponent(requestId)}/reprocess`,
      reprocessAckSchema,
      { body: { stage } }
    );
  }
}
