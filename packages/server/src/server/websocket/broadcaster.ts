import { nanoid } from 'nanoid';
import type { RecordChangedEvent, ServerMessage } from '@relief-pipeline/shared';
import type { StoreChange } from '../../store/types.js';
import { statusOf } from '../../store/records.js';
import { createLogger } from '../../utils/logger.js';
import { SOCKET_OPEN, type BroadcastSocket, type WebSocketConnection } from './types.js';

const logger = createLogger('websocket:broadcaster');

/**
 * EventBroadcaster manages WebSocket connections and pushes record changes
 * to the clients subscribed to that request.
 */
export class EventBroadcaster {
  private connections: Map<string, WebSocketConnection> = new Map();

  /**
   * Add a new WebSocket connection
   */
  addConnection(socket: BroadcastSocket): string {
    const id = nanoid(12);
    this.connections.set(id, {
      id,
      socket,
      subscriptions: new Set(),
      connectedAt: new Date(),
    });
    logger.debug({ connectionId: id }, 'Connection added');
    return id;
  }

  removeConnection(connectionId: string): void {
    const connection = this.connections.get(connectionId);
    if (connection) {
      this.connections.delete(connectionId);
      logger.debug(
        { connectionId, subscriptions: Array.from(connection.subscriptions) },
        'Connection removed'
      );
    }
  }

  /**
   * Subscribe a connection to a request's updates
   */
  subscribe(connectionId: string, requestId: string): boolean {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      logger.warn({ connectionId }, 'Subscribe failed: connection not found');
      return false;
    }
    connection.subscriptions.add(requestId);
    logger.debug({ connectionId, requestId }, 'Subscribed to request');
    return true;
  }

  unsubscribe(connectionId: string, requestId: string): boolean {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      logger.warn({ connectionId }, 'Unsubscribe failed: connection not found');
      return false;
    }
    return connection.subscriptions.delete(requestId);
  }

  updateLastPing(connectionId: string): void {
    const connection = this.connections.get(connectionId);
    if (connection) {
      connection.lastPingAt = new Date();
    }
  }

  getConnection(connectionId: string): WebSocketConnection | undefined {
    return this.connections.get(connectionId);
  }

  getConnectionCount(): number {
    return this.connections.size;
  }

  /**
   * Broadcast an event to all connections subscribed to the request.
   * Returns the number of connections it was sent to.
   */
  broadcast(event: ServerMessage, requestId: string): number {
    const message = JSON.stringify(event);
    let sentCount = 0;

    for (const connection of [...this.connections.values()]) {
      if (connection.subscriptions.has(requestId) && this.sendToConnection(connection, message)) {
        sentCount++;
      }
    }

    logger.debug({ requestId, eventType: event.type, sentCount }, 'Broadcast to subscribers');
    return sentCount;
  }

  /**
   * Turn a store change into a `record_changed` event. Claims are internal
   * and never broadcast.
   */
  emitRecordChanged(change: StoreChange): number {
    if (change.collection === 'claims') {
      return 0;
    }

    const previousStatus = change.previous ? statusOf(change.previous) : undefined;
    const event: RecordChangedEvent = {
      type: 'record_changed',
      requestId: change.id,
      collection: change.collection,
      change: change.change,
      status: statusOf(change.record) ?? 'unknown',
      ...(previousStatus !== undefined && { previousStatus }),
      timestamp: new Date().toISOString(),
    };
    return this.broadcast(event, change.id);
  }

  /**
   * Send a message to a specific connection by ID
   */
  sendToConnection(connectionOrId: WebSocketConnection | string, message: string): boolean {
    const connection =
      typeof connectionOrId === 'string' ? this.connections.get(connectionOrId) : connectionOrId;

    if (!connection) {
      return false;
    }

    try {
      if (connection.socket.readyState === SOCKET_OPEN) {
        connection.socket.send(message);
        return true;
      }
      logger.warn(
        { connectionId: connection.id, readyState: connection.socket.readyState },
        'Socket not open, removing connection'
      );
      this.removeConnection(connection.id);
      return false;
    } catch (error) {
      logger.error({ err: error, connectionId: connection.id }, 'Failed to send message');
      this.removeConnection(connection.id);
      return false;
    }
  }
}
