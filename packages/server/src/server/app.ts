import Fastify, { type FastifyError, type FastifyInstance, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import websocket from '@fastify/websocket';
import { nanoid } from 'nanoid';
import type { ReliefPipeline } from '../pipeline/pipeline.js';
import { createLogger } from '../utils/logger.js';
import { createApiKeyAuth } from './middleware/auth.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerOperatorRoutes } from './routes/operator.js';
import { registerRequestRoutes } from './routes/requests.js';
import { createErrorResponse, ErrorCode, serverConfigSchema, type ServerConfig } from './types.js';
import { EventBroadcaster } from './websocket/broadcaster.js';
import { registerWebSocketRoutes } from './websocket/handler.js';

const logger = createLogger('server');

/**
 * Extended server configuration with the pipeline, API key and broadcaster
 */
export interface AppConfig extends Partial<ServerConfig> {
  pipeline: ReliefPipeline;
  apiKey?: string;
  broadcaster?: EventBroadcaster;
}

/**
 * Create and configure a Fastify application instance
 */
export async function createApp(config: AppConfig): Promise<FastifyInstance> {
  const { pipeline, apiKey, broadcaster: providedBroadcaster, ...serverConfig } = config;

  const broadcaster = providedBroadcaster ?? new EventBroadcaster();
  const validatedConfig = serverConfigSchema.parse(serverConfig);

  const app = Fastify({
    logger: validatedConfig.enableLogging
      ? {
          level: 'info',
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
            },
          },
        }
      : false,
    requestTimeout: validatedConfig.requestTimeout,
    genReqId: () => nanoid(12),
  });

  await app.register(cors, {
    origin: validatedConfig.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-API-Key', 'X-Request-ID'],
  });

  await app.register(websocket);

  app.addHook('onRequest', (request: FastifyRequest, reply, done) => {
    void reply.header('X-Request-ID', request.id);
    done();
  });

  app.setErrorHandler(async (error: FastifyError, request, reply) => {
    logger.error({ err: error, requestId: request.id }, 'Request error');

    if (error.validation) {
      return reply
        .status(400)
        .send(createErrorResponse(ErrorCode.BAD_REQUEST, 'Validation error', { errors: error.validation }, request.id));
    }

    // Malformed JSON bodies and the like
    if (error.statusCode && error.statusCode < 500) {
      return reply
        .status(error.statusCode)
        .send(createErrorResponse(mapStatusToErrorCode(error.statusCode), error.message, undefined, request.id));
    }

    return reply
      .status(500)
      .send(createErrorResponse(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred', undefined, request.id));
  });

  app.setNotFoundHandler(async (request, reply) => {
    return reply
      .status(404)
      .send(
        createErrorResponse(ErrorCode.NOT_FOUND, `Route ${request.method} ${request.url} not found`, undefined, request.id)
      );
  });

  const apiKeyAuth = createApiKeyAuth(apiKey);

  registerHealthRoutes(app, pipeline);
  registerRequestRoutes(app, pipeline, apiKeyAuth);
  registerOperatorRoutes(app, pipeline, apiKeyAuth);
  registerWebSocketRoutes(app, broadcaster);

  // Push store changes to WebSocket subscribers
  const unsubscribe = pipeline.store.subscribe('*', (change) => {
    broadcaster.emitRecordChanged(change);
  });
  app.addHook('onClose', async () => {
    unsubscribe();
  });

  return app;
}

function mapStatusToErrorCode(status: number): ErrorCode {
  switch (status) {
    case 400:
    case 413:
    case 415:
      return ErrorCode.BAD_REQUEST;
    case 401:
      return ErrorCode.UNAUTHORIZED;
    case 404:
      return ErrorCode.NOT_FOUND;
    case 409:
      return ErrorCode.CONFLICT;
    default:
      return ErrorCode.INTERNAL_ERROR;
  }
}
