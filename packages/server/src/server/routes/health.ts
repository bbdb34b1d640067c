import type { FastifyInstance } from 'fastify';
import { getPublicSettings } from '../../config/index.js';
import type { ReliefPipeline } from '../../pipeline/pipeline.js';
import { errorMessage } from '../../pipeline/errors.js';
import {
  createSuccessResponse,
  type ComponentCheck,
  type HealthStatus,
  type LivenessResponse,
  type ReadinessResponse,
} from '../types.js';

/**
 * Package version - should match package.json
 */
const VERSION = '0.1.0';

/**
 * Register health check routes
 */
export function registerHealthRoutes(app: FastifyInstance, pipeline: ReliefPipeline): void {
  /**
   * GET /health - Basic health check
   * Returns service status, version, and the non-secret settings
   */
  app.get('/health', async (request, reply) => {
    const response: HealthStatus & {
      settings: ReturnType<typeof getPublicSettings>;
      bus: { pending: number; deadLetters: number };
    } = {
      status: pipeline.isStarted ? 'ok' : 'degraded',
      version: VERSION,
      timestamp: new Date().toISOString(),
      settings: getPublicSettings(pipeline.config),
      bus: {
        pending: pipeline.bus.pendingCount(),
        deadLetters: pipeline.bus.deadLetters().length,
      },
    };
    return reply.send(createSuccessResponse(response, request.id));
  });

  /**
   * GET /health/ready - Readiness check
   * 503 until the store answers and the workers are subscribed
   */
  app.get('/health/ready', async (request, reply) => {
    const checks: ComponentCheck[] = [await checkStore(pipeline), checkWorkers(pipeline)];
    const allHealthy = checks.every((c) => c.healthy);

    const response: ReadinessResponse = {
      ready: allHealthy,
      checks,
      timestamp: new Date().toISOString(),
    };

    if (!allHealthy) {
      return reply.status(503).send(createSuccessResponse(response, request.id));
    }
    return reply.send(createSuccessResponse(response, request.id));
  });

  /**
   * GET /health/live - Liveness check
   */
  app.get('/health/live', async (request, reply) => {
    const response: LivenessResponse = {
      alive: true,
      timestamp: new Date().toISOString(),
    };
    return reply.send(createSuccessResponse(response, request.id));
  });
}

async function checkStore(pipeline: ReliefPipeline): Promise<ComponentCheck> {
  const start = Date.now();
  try {
    await pipeline.store.read('requests', 'health-check');
    return { name: 'store', healthy: true, latencyMs: Date.now() - start };
  } catch (error) {
    return {
      name: 'store',
      healthy: false,
      message: errorMessage(error),
      latencyMs: Date.now() - start,
    };
  }
}

function checkWorkers(pipeline: ReliefPipeline): ComponentCheck {
  if (!pipeline.isStarted) {
    return { name: 'workers', healthy: false, message: 'Pipeline not started' };
  }
  return { name: 'workers', healthy: true };
}
