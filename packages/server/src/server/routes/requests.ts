import type { FastifyInstance } from 'fastify';
import {
  listRequestsQuerySchema,
  reprocessBodySchema,
  requestIdParamsSchema,
  type ListRequestsQuery,
  type ReprocessBody,
  type RequestIdParams,
} from '@relief-pipeline/shared';
import type { ReliefPipeline } from '../../pipeline/pipeline.js';
import { createLogger } from '../../utils/logger.js';
import type { ApiKeyAuth } from '../middleware/auth.js';
import { createSuccessResponse } from '../types.js';
import { sendBadRequest, sendRouteError } from './errors.js';

const logger = createLogger('routes:requests');

/**
 * Register intake and status routes
 */
export function registerRequestRoutes(
  app: FastifyInstance,
  pipeline: ReliefPipeline,
  apiKeyAuth: ApiKeyAuth
): void {
  /**
   * POST /api/v1/requests - Submit a rescue request
   * Answers 202 once the request is stored and its trigger enqueued
   */
  app.post('/api/v1/requests', { preHandler: [apiKeyAuth] }, async (request, reply) => {
    try {
      const ack = await pipeline.submit(request.body);
      return reply.status(202).send(createSuccessResponse(ack, request.id));
    } catch (error) {
      return sendRouteError(request, reply, error, logger, 'Failed to submit request');
    }
  });

  /**
   * GET /api/v1/requests - List requests, newest first
   */
  app.get<{ Querystring: ListRequestsQuery }>('/api/v1/requests', async (request, reply) => {
    const queryResult = listRequestsQuerySchema.safeParse(request.query);
    if (!queryResult.success) {
      return sendBadRequest(request, reply, 'Invalid query parameters', queryResult.error.errors);
    }

    try {
      const page = await pipeline.listRequests(queryResult.data);
      return reply.send(createSuccessResponse(page, request.id));
    } catch (error) {
      return sendRouteError(request, reply, error, logger, 'Failed to list requests');
    }
  });

  /**
   * GET /api/v1/requests/:id - Request with its damage report and logistics plan
   */
  app.get<{ Params: RequestIdParams }>('/api/v1/requests/:id', async (request, reply) => {
    const paramsResult = requestIdParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return sendBadRequest(request, reply, 'Invalid request ID', paramsResult.error.errors);
    }

    try {
      const status = await pipeline.getStatus(paramsResult.data.id);
      return reply.send(createSuccessResponse(status, request.id));
    } catch (error) {
      return sendRouteError(request, reply, error, logger, 'Failed to get request');
    }
  });

  /**
   * POST /api/v1/requests/:id/reprocess - Reset a failed stage and trigger it again
   * Returns 409 unless the stage record is failed
   */
  app.post<{ Params: RequestIdParams; Body: ReprocessBody }>(
    '/api/v1/requests/:id/reprocess',
    { preHandler: [apiKeyAuth] },
    async (request, reply) => {
      const paramsResult = requestIdParamsSchema.safeParse(request.params);
      if (!paramsResult.success) {
        return sendBadRequest(request, reply, 'Invalid request ID', paramsResult.error.errors);
      }
      const bodyResult = reprocessBodySchema.safeParse(request.body);
      if (!bodyResult.success) {
        return sendBadRequest(request, reply, 'Invalid request body', bodyResult.error.errors);
      }

      try {
        const ack = await pipeline.reprocess(paramsResult.data.id, bodyResult.data.stage);
        return reply.status(202).send(createSuccessResponse(ack, request.id));
      } catch (error) {
        return sendRouteError(request, reply, error, logger, 'Failed to reprocess request');
      }
    }
  );
}
