import { z } from 'zod';
import type { CollectionName } from './records.js';

// =============================================================================
// Client Messages (sent from client to server)
// =============================================================================

export const subscribeMessageSchema = z.object({
  type: z.literal('subscribe'),
  requestId: z.string().min(1),
});

export type SubscribeMessage = z.infer<typeof subscribeMessageSchema>;

export const unsubscribeMessageSchema = z.object({
  type: z.literal('unsubscribe'),
  requestId: z.string().min(1),
});

export type UnsubscribeMessage = z.infer<typeof unsubscribeMessageSchema>;

export const pingMessageSchema = z.object({
  type: z.literal('ping'),
});

export type PingMessage = z.infer<typeof pingMessageSchema>;

export const clientMessageSchema = z.discriminatedUnion('type', [
  subscribeMessageSchema,
  unsubscribeMessageSchema,
  pingMessageSchema,
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

// =============================================================================
// Server Messages (sent from server to client)
// =============================================================================

export interface BaseEvent {
  timestamp: string;
}

/**
 * A pipeline record was created or updated
 */
export interface RecordChangedEvent extends BaseEvent {
  type: 'record_changed';
  requestId: string;
  collection: Exclude<CollectionName, 'claims'>;
  change: 'created' | 'updated';
  status: string;
  previousStatus?: string;
}

export interface SubscriptionConfirmedEvent extends BaseEvent {
  type: 'subscription_confirmed';
  requestId: string;
}

export interface UnsubscriptionConfirmedEvent extends BaseEvent {
  type: 'unsubscription_confirmed';
  requestId: string;
}

export interface PongMessage extends BaseEvent {
  type: 'pong';
}

export const WebSocketErrorCode = {
  INVALID_MESSAGE: 'INVALID_MESSAGE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type WebSocketErrorCode = (typeof WebSocketErrorCode)[keyof typeof WebSocketErrorCode];

export interface ErrorMessage extends BaseEvent {
  type: 'error';
  code: WebSocketErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type ServerMessage =
  | RecordChangedEvent
  | SubscriptionConfirmedEvent
  | UnsubscriptionConfirmedEvent
  | PongMessage
  | ErrorMessage;
