import { appendFile, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import type { Logger } from 'pino';
import { errorMessage, hasErrorCode } from '../pipeline/errors.js';
import { ensureDir } from '../store/paths.js';
import { createLogger } from '../utils/logger.js';
import { calculateDelay, DEFAULT_BACKOFF_POLICY, type BackoffPolicy } from './backoff.js';
import type {
  BusMessage,
  DeadLetter,
  DeliveryOutcome,
  MessageHandler,
  PublishOptions,
  PublishReceipt,
  SubscribeOptions,
  Subscription,
  TriggerBus,
} from './types.js';

const storedMessageSchema = z.object({
  messageId: z.string().min(1),
  topic: z.string().min(1),
  payload: z.unknown(),
  publishedAt: z.string(),
});

interface StoredMessage {
  messageId: string;
  topic: string;
  payload: unknown;
  publishedAt: string;
}

const logEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('publish'), message: storedMessageSchema }),
  z.object({ type: z.literal('deliver'), messageId: z.string(), deliveryCount: z.number().int() }),
  z.object({ type: z.literal('retry'), messageId: z.string(), deliveryCount: z.number().int() }),
  z.object({ type: z.literal('ack'), messageId: z.string() }),
  z.object({
    type: z.literal('dead_letter'),
    messageId: z.string(),
    reason: z.string(),
    deadLetteredAt: z.string(),
    deliveryCount: z.number().int().optional(),
  }),
]);

type LogEvent = z.infer<typeof logEventSchema>;

export interface LocalTriggerBusOptions {
  /** Append-only JSONL log; null keeps everything in memory */
  logPath: string | null;
  /** Deliveries after which a retried message is dead-lettered */
  maxDeliveries?: number;
  redelivery?: BackoffPolicy;
  onDeadLetter?: (deadLetter: DeadLetter) => void;
}

interface PendingMessage {
  stored: StoredMessage;
  deliveryCount: number;
  state: 'queued' | 'inflight' | 'scheduled';
  timer: NodeJS.Timeout | null;
}

interface SubscriptionState {
  topic: string;
  name: string;
  handler: MessageHandler;
  concurrency: number;
  active: number;
  closed: boolean;
}

/**
 * In-process trigger bus backed by a write-ahead log.
 *
 * Publish, deliver, retry, ack and dead-letter events are appended to a JSONL
 * file. On start the log is replayed: messages without an ack or dead-letter
 * entry are queued again (at-least-once) with their delivery count, then the
 * log is compacted. A message that was in flight on its last allowed delivery
 * is dead-lettered instead of being delivered again.
 */
export class LocalTriggerBus implements TriggerBus {
  private readonly logger: Logger;
  private readonly maxDeliveries: number;
  private readonly redelivery: BackoffPolicy;
  private readonly pending: Map<string, PendingMessage> = new Map();
  private readonly queues: Map<string, string[]> = new Map();
  private readonly subscriptions: Map<string, SubscriptionState[]> = new Map();
  private readonly roundRobin: Map<string, number> = new Map();
  private readonly inflight: Set<Promise<void>> = new Set();
  private readonly deadLetterList: DeadLetter[] = [];
  private logChain: Promise<void> = Promise.resolve();
  private started = false;
  private closed = false;

  constructor(private readonly options: LocalTriggerBusOptions) {
    this.logger = createLogger('trigger-bus');
    this.maxDeliveries = options.maxDeliveries ?? 8;
    this.redelivery = options.redelivery ?? DEFAULT_BACKOFF_POLICY;
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    if (this.options.logPath) {
      await this.replay(this.options.logPath);
      await this.compact(this.options.logPath);
    }
    this.started = true;
    this.logger.info(
      { pending: this.pending.size, deadLetters: this.deadLetterList.length },
      'Trigger bus started'
    );
    for (const topic of this.queues.keys()) {
      this.dispatch(topic);
    }
  }

  async publish(
    topic: string,
    payload: unknown,
    options: PublishOptions = {}
  ): Promise<PublishReceipt> {
    if (!this.started || this.closed) {
      throw new Error(`Trigger bus is ${this.closed ? 'closed' : 'not started'}`);
    }

    const existing = options.messageId !== undefined ? this.pending.get(options.messageId) : undefined;
    if (existing) {
      this.logger.debug({ messageId: existing.stored.messageId, topic }, 'Message already pending');
      return {
        messageId: existing.stored.messageId,
        topic: existing.stored.topic,
        enqueuedAt: existing.stored.publishedAt,
      };
    }

    const stored: StoredMessage = {
      messageId: options.messageId ?? nanoid(),
      topic,
      payload,
      publishedAt: new Date().toISOString(),
    };

    await this.appendLog({ type: 'publish', message: stored });

    this.pending.set(stored.messageId, {
      stored,
      deliveryCount: 0,
      state: 'queued',
      timer: null,
    });
    this.enqueue(topic, stored.messageId);
    this.logger.debug({ messageId: stored.messageId, topic }, 'Message published');
    this.dispatch(topic);

    return { messageId: stored.messageId, topic, enqueuedAt: stored.publishedAt };
  }

  subscribe(topic: string, handler: MessageHandler, options: SubscribeOptions = {}): Subscription {
    const state: SubscriptionState = {
      topic,
      name: options.name ?? `${topic}#${(this.subscriptions.get(topic)?.length ?? 0) + 1}`,
      handler,
      concurrency: Math.max(1, options.concurrency ?? 1),
      active: 0,
      closed: false,
    };

    const subs = this.subscriptions.get(topic) ?? [];
    subs.push(state);
    this.subscriptions.set(topic, subs);
    this.logger.info(
      { topic, subscription: state.name, concurrency: state.concurrency },
      'Subscription added'
    );

    this.dispatch(topic);

    return {
      topic,
      name: state.name,
      close: () => {
        state.closed = true;
        const remaining = (this.subscriptions.get(topic) ?? []).filter((s) => s !== state);
        this.subscriptions.set(topic, remaining);
      },
    };
  }

  deadLetters(): DeadLetter[] {
    return [...this.deadLetterList];
  }

  pendingCount(): number {
    return this.pending.size;
  }

  async whenIdle(): Promise<void> {
    for (;;) {
      if (this.inflight.size > 0) {
        await Promise.all([...this.inflight]);
        continue;
      }
      if ([...this.pending.values()].some((p) => p.state === 'scheduled')) {
        await delay(5);
        continue;
      }
      if (this.hasDeliverable()) {
        await delay(1);
        continue;
      }
      await this.logChain;
      return;
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    // Scheduled redeliveries stay unacknowledged in the log and are replayed on the next start
    for (const entry of this.pending.values()) {
      if (entry.timer) {
        clearTimeout(entry.timer);
        entry.timer = null;
      }
    }
    for (const subs of this.subscriptions.values()) {
      for (const sub of subs) {
        sub.closed = true;
      }
    }
    this.subscriptions.clear();

    await Promise.all([...this.inflight]);
    await this.logChain;
    this.logger.info({ pending: this.pending.size }, 'Trigger bus closed');
  }

  // ---------------------------------------------------------------------------
  // Delivery
  // ---------------------------------------------------------------------------

  private enqueue(topic: string, messageId: string): void {
    const queue = this.queues.get(topic) ?? [];
    queue.push(messageId);
    this.queues.set(topic, queue);
  }

  private hasDeliverable(): boolean {
    for (const [topic, queue] of this.queues) {
      if (queue.length > 0 && this.nextSubscription(topic, false)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Pick the next subscription with spare capacity, rotating between competitors.
   */
  private nextSubscription(topic: string, advance: boolean): SubscriptionState | null {
    const subs = this.subscriptions.get(topic) ?? [];
    if (subs.length === 0) {
      return null;
    }
    const start = this.roundRobin.get(topic) ?? 0;
    for (let i = 0; i < subs.length; i++) {
      const index = (start + i) % subs.length;
      const sub = subs[index];
      if (sub && !sub.closed && sub.active < sub.concurrency) {
        if (advance) {
          this.roundRobin.set(topic, index + 1);
        }
        return sub;
      }
    }
    return null;
  }

  private dispatch(topic: string): void {
    if (!this.started || this.closed) {
      return;
    }
    const queue = this.queues.get(topic);
    while (queue && queue.length > 0) {
      const sub = this.nextSubscription(topic, true);
      if (!sub) {
        return;
      }
      const messageId = queue.shift();
      const entry = messageId !== undefined ? this.pending.get(messageId) : undefined;
      if (!entry || entry.state !== 'queued') {
        continue;
      }

      const task: Promise<void> = this.deliver(sub, entry).then(() => {
        this.inflight.delete(task);
        this.dispatch(topic);
      });
      this.inflight.add(task);
    }
  }

  private async deliver(sub: SubscriptionState, entry: PendingMessage): Promise<void> {
    entry.state = 'inflight';
    entry.deliveryCount++;
    sub.active++;

    const message: BusMessage = { ...entry.stored, deliveryCount: entry.deliveryCount };
    const context = {
      messageId: message.messageId,
      topic: message.topic,
      subscription: sub.name,
      deliveryCount: message.deliveryCount,
    };

    let outcome: DeliveryOutcome;
    try {
      await this.appendLog({
        type: 'deliver',
        messageId: message.messageId,
        deliveryCount: message.deliveryCount,
      });
    } catch (err) {
      // Delivered anyway; after a crash the count restarts from the last logged event
      this.logger.error({ ...context, err }, 'Failed to record delivery');
    }
    try {
      outcome = await sub.handler(message);
    } catch (err) {
      this.logger.warn({ ...context, err }, 'Handler threw, scheduling redelivery');
      outcome = { type: 'retry', reason: errorMessage(err) };
    } finally {
      sub.active--;
    }

    try {
      await this.settle(entry, outcome);
    } catch (err) {
      // The log write failed; the message stays pending and is replayed on restart
      this.logger.error({ ...context, err, outcome: outcome.type }, 'Failed to record delivery outcome');
    }
  }

  private async settle(entry: PendingMessage, outcome: DeliveryOutcome): Promise<void> {
    const { messageId, topic } = entry.stored;

    switch (outcome.type) {
      case 'ack':
        this.pending.delete(messageId);
        this.logger.debug({ messageId, topic }, 'Message acknowledged');
        await this.appendLog({ type: 'ack', messageId });
        return;

      case 'dead_letter':
        await this.deadLetter(entry, outcome.reason);
        return;

      case 'retry': {
        if (entry.deliveryCount >= this.maxDeliveries) {
          await this.deadLetter(
            entry,
            `max deliveries (${this.maxDeliveries}) exceeded: ${outcome.reason}`
          );
          return;
        }
        const delayMs =
          outcome.delayMs ?? calculateDelay(this.redelivery, entry.deliveryCount - 1);
        this.scheduleRedelivery(entry, delayMs);
        this.logger.info(
          { messageId, topic, deliveryCount: entry.deliveryCount, delayMs, reason: outcome.reason },
          'Redelivery scheduled'
        );
        await this.appendLog({ type: 'retry', messageId, deliveryCount: entry.deliveryCount });
        return;
      }
    }
  }

  private scheduleRedelivery(entry: PendingMessage, delayMs: number): void {
    if (this.closed) {
      // Left pending; replayed on the next start
      return;
    }
    entry.state = 'scheduled';
    entry.timer = setTimeout(() => {
      entry.timer = null;
      if (this.closed || !this.pending.has(entry.stored.messageId)) {
        return;
      }
      entry.state = 'queued';
      this.enqueue(entry.stored.topic, entry.stored.messageId);
      this.dispatch(entry.stored.topic);
    }, delayMs);
  }

  private async deadLetter(entry: PendingMessage, reason: string): Promise<void> {
    const { messageId, topic } = entry.stored;
    this.pending.delete(messageId);

    const deadLetter: DeadLetter = {
      message: { ...entry.stored, deliveryCount: entry.deliveryCount },
      reason,
      deadLetteredAt: new Date().toISOString(),
    };
    this.deadLetterList.push(deadLetter);

    this.logger.error(
      { messageId, topic, deliveryCount: entry.deliveryCount, reason },
      'Message dead-lettered'
    );
    await this.appendLog({
      type: 'dead_letter',
      messageId,
      reason,
      deadLetteredAt: deadLetter.deadLetteredAt,
      deliveryCount: entry.deliveryCount,
    });
    this.options.onDeadLetter?.(deadLetter);
  }

  // ---------------------------------------------------------------------------
  // Write-ahead log
  // ---------------------------------------------------------------------------

  /**
   * Append one event. Writes are serialized so the file order matches the call order.
   */
  private appendLog(event: LogEvent): Promise<void> {
    const logPath = this.options.logPath;
    if (!logPath) {
      return Promise.resolve();
    }
    const write = this.logChain.then(() => appendFile(logPath, `${JSON.stringify(event)}\n`, 'utf-8'));
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.logChain = write.catch((err: unknown) => {
      this.logger.error({ err, logPath }, 'Bus log append failed');
    });
    return write;
  }

  private async replay(logPath: string): Promise<void> {
    await ensureDir(dirname(logPath));

    let content: string;
    try {
      content = await readFile(logPath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return;
      }
      throw error;
    }

    const lines = content.split('\n').filter(Boolean);
    let skipped = 0;
    for (const [index, line] of lines.entries()) {
      const event = this.parseLogLine(line);
      if (!event) {
        skipped++;
        this.logger.warn({ logPath, line: index + 1 }, 'Skipping unreadable bus log entry');
        continue;
      }
      this.applyLogEvent(event);
    }

    for (const entry of [...this.pending.values()]) {
      if (entry.deliveryCount >= this.maxDeliveries) {
        await this.deadLetter(
          entry,
          `max deliveries (${this.maxDeliveries}) exceeded: in flight when the bus stopped`
        );
        continue;
      }
      this.enqueue(entry.stored.topic, entry.stored.messageId);
    }

    this.logger.info(
      { logPath, events: lines.length, skipped, redelivering: this.pending.size },
      'Bus log replayed'
    );
  }

  private parseLogLine(line: string): LogEvent | null {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      return null;
    }
    const result = logEventSchema.safeParse(json);
    return result.success ? result.data : null;
  }

  private applyLogEvent(event: LogEvent): void {
    switch (event.type) {
      case 'publish': {
        const { messageId, topic, payload, publishedAt } = event.message;
        this.pending.set(messageId, {
          stored: { messageId, topic, payload, publishedAt },
          deliveryCount: 0,
          state: 'queued',
          timer: null,
        });
        return;
      }
      case 'deliver':
      case 'retry': {
        const entry = this.pending.get(event.messageId);
        if (entry) {
          entry.deliveryCount = event.deliveryCount;
        }
        return;
      }
      case 'ack':
        this.pending.delete(event.messageId);
        return;
      case 'dead_letter': {
        const entry = this.pending.get(event.messageId);
        if (entry) {
          this.pending.delete(event.messageId);
          this.deadLetterList.push({
            message: { ...entry.stored, deliveryCount: event.deliveryCount ?? entry.deliveryCount },
            reason: event.reason,
            deadLetteredAt: event.deadLetteredAt,
          });
        }
        return;
      }
    }
  }

  /**
   * Rewrite the log with only pending messages and dead letters.
   */
  private async compact(logPath: string): Promise<void> {
    const events: LogEvent[] = [];
    for (const entry of this.pending.values()) {
      events.push({ type: 'publish', message: entry.stored });
      if (entry.deliveryCount > 0) {
        events.push({
          type: 'retry',
          messageId: entry.stored.messageId,
          deliveryCount: entry.deliveryCount,
        });
      }
    }
    for (const deadLetter of this.deadLetterList) {
      const { deliveryCount, ...stored } = deadLetter.message;
      events.push({ type: 'publish', message: stored });
      events.push({
        type: 'dead_letter',
        messageId: stored.messageId,
        reason: deadLetter.reason,
        deadLetteredAt: deadLetter.deadLetteredAt,
        deliveryCount,
      });
    }

    const tmpPath = `${logPath}.${nanoid(8)}.tmp`;
    await writeFile(tmpPath, events.map((e) => `${JSON.stringify(e)}\n`).join(''), 'utf-8');
    await rename(tmpPath, logPath);
  }
}
