/**
 * The part of a WebSocket the broadcaster uses
 */
export interface BroadcastSocket {
  readonly readyState: number;
  send(data: string): void;
}

/**
 * WebSocket connection with its request subscriptions
 */
export interface WebSocketConnection {
  id: string;
  socket: BroadcastSocket;
  /** Request ids this connection follows */
  subscriptions: Set<string>;
  connectedAt: Date;
  lastPingAt?: Date;
}

/** WebSocket.OPEN */
export const SOCKET_OPEN = 1;
