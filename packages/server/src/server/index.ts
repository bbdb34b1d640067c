import type { FastifyInstance } from 'fastify';
import { createApp, type AppConfig } from './app.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('server');

/**
 * Build the API for a running pipeline and bind it.
 * The app is closed again when the port cannot be bound.
 */
export async function startServer(config: AppConfig): Promise<FastifyInstance> {
  const app = await createApp(config);

  const port = config.port ?? 3001;
  const host = config.host ?? '0.0.0.0';

  try {
    const address = await app.listen({ port, host });
    logger.info({ address, auth: config.apiKey !== undefined }, 'Relief API listening');
    return app;
  } catch (error) {
    logger.error({ err: error, port, host }, 'Failed to bind relief API');
    await app.close();
    throw error;
  }
}

export { createApp, type AppConfig } from './app.js';
export { EventBroadcaster } from './websocket/broadcaster.js';
