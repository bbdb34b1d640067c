/**
 * A message as seen by a subscriber.
 */
export interface BusMessage {
  readonly messageId: string;
  readonly topic: string;
  readonly payload: unknown;
  readonly publishedAt: string;
  /** 1 on first delivery, incremented on each redelivery */
  readonly deliveryCount: number;
}

/**
 * What the bus should do with a message once the handler returns.
 */
export type DeliveryOutcome =
  | { type: 'ack' }
  | { type: 'retry'; reason: string; delayMs?: number }
  | { type: 'dead_letter'; reason: string };

export const Outcome = {
  ack(): DeliveryOutcome {
    return { type: 'ack' };
  },
  /** Redeliver later; without `delayMs` the bus applies its backoff schedule */
  retry(reason: string, delayMs?: number): DeliveryOutcome {
    return delayMs === undefined ? { type: 'retry', reason } : { type: 'retry', reason, delayMs };
  },
  deadLetter(reason: string): DeliveryOutcome {
    return { type: 'dead_letter', reason };
  },
} as const;

/**
 * A thrown handler is treated as `retry`.
 */
export type MessageHandler = (message: BusMessage) => Promise<DeliveryOutcome>;

export interface PublishOptions {
  /** Publishing an id that is still pending is a no-op returning the original receipt */
  messageId?: string;
}

export interface PublishReceipt {
  messageId: string;
  topic: string;
  enqueuedAt: string;
}

export interface SubscribeOptions {
  /** Maximum deliveries in flight for this subscription */
  concurrency?: number;
  /** Label used in logs */
  name?: string;
}

export interface Subscription {
  readonly topic: string;
  readonly name: string;
  close(): void;
}

export interface DeadLetter {
  message: BusMessage;
  reason: string;
  deadLetteredAt: string;
}

/**
 * At-least-once trigger delivery. Messages may arrive more than once, out of
 * order, and after the records they refer to.
 *
 * Several subscriptions on one topic compete for its messages.
 */
export interface TriggerBus {
  start(): Promise<void>;
  /** Resolves once the message is durably enqueued, not once it is consumed */
  publish(topic: string, payload: unknown, options?: PublishOptions): Promise<PublishReceipt>;
  subscribe(topic: string, handler: MessageHandler, options?: SubscribeOptions): Subscription;
  deadLetters(): DeadLetter[];
  pendingCount(): number;
  /** Resolves when nothing is in flight or scheduled for redelivery */
  whenIdle(): Promise<void>;
  close(): Promise<void>;
}
