import type { FastifyInstance } from 'fastify';
import {
  reconcileBodySchema,
  requestIdParamsSchema,
  type ReconcileBody,
  type RequestIdParams,
} from '@relief-pipeline/shared';
import type { ReliefPipeline } from '../../pipeline/pipeline.js';
import { createLogger } from '../../utils/logger.js';
import type { ApiKeyAuth } from '../middleware/auth.js';
import { createSuccessResponse } from '../types.js';
import { sendBadRequest, sendRouteError } from './errors.js';

const logger = createLogger('routes:operator');

/**
 * Register reconciliation, dead-letter and audit routes
 */
export function registerOperatorRoutes(
  app: FastifyInstance,
  pipeline: ReliefPipeline,
  apiKeyAuth: ApiKeyAuth
): void {
  /**
   * POST /api/v1/reconcile - Repair stuck requests (or list them on a dry run)
   */
  app.post<{ Body: ReconcileBody | undefined }>(
    '/api/v1/reconcile',
    { preHandler: [apiKeyAuth] },
    async (request, reply) => {
      const bodyResult = reconcileBodySchema.safeParse(request.body ?? {});
      if (!bodyResult.success) {
        return sendBadRequest(request, reply, 'Invalid request body', bodyResult.error.errors);
      }

      try {
        const report = await pipeline.reconcile(bodyResult.data.dryRun);
        return reply.send(createSuccessResponse(report, request.id));
      } catch (error) {
        return sendRouteError(request, reply, error, logger, 'Failed to reconcile');
      }
    }
  );

  /**
   * GET /api/v1/dead-letters - Triggers that exhausted their deliveries
   */
  app.get('/api/v1/dead-letters', async (request, reply) => {
    return reply.send(createSuccessResponse(pipeline.deadLetters(), request.id));
  });

  /**
   * GET /api/v1/audit/:id - Audit trail of one request, oldest first
   */
  app.get<{ Params: RequestIdParams }>('/api/v1/audit/:id', async (request, reply) => {
    const paramsResult = requestIdParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return sendBadRequest(request, reply, 'Invalid request ID', paramsResult.error.errors);
    }
    return reply.send(createSuccessResponse(pipeline.auditTrail(paramsResult.data.id), request.id));
  });
}
