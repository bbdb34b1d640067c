import type { FastifyInstance } from 'fastify';
import type { WebSocket } from 'ws';
import {
  clientMessageSchema,
  WebSocketErrorCode,
  type ClientMessage,
  type ErrorMessage,
  type ServerMessage,
} from '@relief-pipeline/shared';
import { createLogger } from '../../utils/logger.js';
import type { EventBroadcaster } from './broadcaster.js';

const logger = createLogger('websocket:handler');

interface HandlerContext {
  connectionId: string;
  broadcaster: EventBroadcaster;
  socket: WebSocket;
}

/**
 * Parse and validate an incoming client message
 */
export function parseClientMessage(data: string): ClientMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (error) {
    logger.debug({ err: error }, 'Failed to parse JSON message');
    return null;
  }
  const result = clientMessageSchema.safeParse(json);
  if (result.success) {
    return result.data;
  }
  logger.debug({ errors: result.error.errors }, 'Invalid message format');
  return null;
}

function createErrorMessage(
  code: WebSocketErrorCode,
  message: string,
  details?: Record<string, unknown>
): ErrorMessage {
  return {
    type: 'error',
    code,
    message,
    ...(details !== undefined && { details }),
    timestamp: new Date().toISOString(),
  };
}

function sendMessage(socket: WebSocket, message: ServerMessage): void {
  socket.send(JSON.stringify(message));
}

/**
 * Handle an incoming WebSocket message
 */
function handleMessage(ctx: HandlerContext, data: string): void {
  const message = parseClientMessage(data);

  if (!message) {
    sendMessage(
      ctx.socket,
      createErrorMessage(
        WebSocketErrorCode.INVALID_MESSAGE,
        'Invalid message format. Expected JSON with "type" field.'
      )
    );
    return;
  }

  const timestamp = new Date().toISOString();
  switch (message.type) {
    case 'subscribe':
      if (ctx.broadcaster.subscribe(ctx.connectionId, message.requestId)) {
        sendMessage(ctx.socket, { type: 'subscription_confirmed', requestId: message.requestId, timestamp });
      } else {
        sendMessage(
          ctx.socket,
          createErrorMessage(WebSocketErrorCode.INTERNAL_ERROR, 'Failed to subscribe', {
            requestId: message.requestId,
          })
        );
      }
      break;
    case 'unsubscribe':
      ctx.broadcaster.unsubscribe(ctx.connectionId, message.requestId);
      sendMessage(ctx.socket, { type: 'unsubscription_confirmed', requestId: message.requestId, timestamp });
      break;
    case 'ping':
      ctx.broadcaster.updateLastPing(ctx.connectionId);
      sendMessage(ctx.socket, { type: 'pong', timestamp });
      break;
  }
}

/**
 * Register the `/ws` status stream
 */
export function registerWebSocketRoutes(app: FastifyInstance, broadcaster: EventBroadcaster): void {
  app.get('/ws', { websocket: true }, (socket) => {
    const connectionId = broadcaster.addConnection(socket);

    logger.info(
      { connectionId, totalConnections: broadcaster.getConnectionCount() },
      'WebSocket client connected'
    );

    const ctx: HandlerContext = { connectionId, broadcaster, socket };

    socket.on('message', (rawData) => {
      try {
        handleMessage(ctx, rawData.toString());
      } catch (error) {
        logger.error({ err: error, connectionId }, 'Error handling message');
        sendMessage(socket, createErrorMessage(WebSocketErrorCode.INTERNAL_ERROR, 'Internal server error'));
      }
    });

    socket.on('close', () => {
      broadcaster.removeConnection(connectionId);
      logger.info(
        { connectionId, totalConnections: broadcaster.getConnectionCount() },
        'WebSocket client disconnected'
      );
    });

    socket.on('error', (error: Error) => {
      logger.error({ err: error, connectionId }, 'WebSocket error');
      broadcaster.removeConnection(connectionId);
    });
  });
}
