/**
 * Local Trigger Bus Tests
 * Delivery, redelivery, dead-lettering and write-ahead log replay
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { appendFile, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { LocalTriggerBus } from '../src/bus/local-trigger-bus.js';
import { Outcome, type BusMessage, type DeadLetter } from '../src/bus/types.js';
import { makeTempDir } from './helpers/pipeline.js';

const FAST_REDELIVERY = { baseDelayMs: 1, maxDelayMs: 5, backoffMultiplier: 2, jitterFactor: 0 };

function createBus(options: { logPath?: string | null; maxDeliveries?: number } = {}): LocalTriggerBus {
  return new LocalTriggerBus({
    logPath: options.logPath ?? null,
    maxDeliveries: options.maxDeliveries ?? 3,
    redelivery: FAST_REDELIVERY,
  });
}

describe('LocalTriggerBus', () => {
  let bus: LocalTriggerBus;

  beforeEach(async () => {
    bus = createBus();
    await bus.start();
  });

  afterEach(async () => {
    await bus.close();
  });

  describe('publish', () => {
    it('should refuse to publish before start', async () => {
      const idle = createBus();

      await expect(idle.publish('damage', { requestId: 'req_1' })).rejects.toThrow(
        'Trigger bus is not started'
      );
    });

    it('should refuse to publish after close', async () => {
      await bus.close();

      await expect(bus.publish('damage', { requestId: 'req_1' })).rejects.toThrow('Trigger bus is closed');
    });

    it('should hold messages until a subscriber arrives', async () => {
      const receipt = await bus.publish('damage', { requestId: 'req_1' });

      expect(receipt.topic).toBe('damage');
      expect(bus.pendingCount()).toBe(1);

      const received: BusMessage[] = [];
      bus.subscribe('damage', async (message) => {
        received.push(message);
        return Outcome.ack();
      });
      await bus.whenIdle();

      expect(received).toHaveLength(1);
      expect(received[0]).toMatchObject({
        messageId: receipt.messageId,
        topic: 'damage',
        payload: { requestId: 'req_1' },
        deliveryCount: 1,
      });
      expect(bus.pendingCount()).toBe(0);
    });

    it('should return the original receipt for a message id that is still pending', async () => {
      const first = await bus.publish('damage', { requestId: 'req_1' }, { messageId: 'fixed' });
      const second = await bus.publish('damage', { requestId: 'req_2' }, { messageId: 'fixed' });

      expect(second).toEqual(first);
      expect(bus.pendingCount()).toBe(1);
    });
  });

  describe('delivery outcomes', () => {
    it('should redeliver a retried message with an incremented delivery count', async () => {
      const counts: number[] = [];
      bus.subscribe('damage', async (message) => {
        counts.push(message.deliveryCount);
        return message.deliveryCount === 1 ? Outcome.retry('not ready') : Outcome.ack();
      });

      await bus.publish('damage', { requestId: 'req_1' });
      await bus.whenIdle();

      expect(counts).toEqual([1, 2]);
      expect(bus.pendingCount()).toBe(0);
      expect(bus.deadLetters()).toEqual([]);
    });

    it('should treat a thrown handler as a retry and dead-letter after max deliveries', async () => {
      const onDeadLetter = vi.fn<(deadLetter: DeadLetter) => void>();
      const limited = new LocalTriggerBus({
        logPath: null,
        maxDeliveries: 3,
        redelivery: FAST_REDELIVERY,
        onDeadLetter,
      });
      await limited.start();
      const handler = vi.fn(async (): Promise<never> => {
        throw new Error('boom');
      });
      limited.subscribe('damage', handler);

      await limited.publish('damage', { requestId: 'req_1' });
      await limited.whenIdle();

      expect(handler).toHaveBeenCalledTimes(3);
      const [deadLetter] = limited.deadLetters();
      expect(deadLetter?.reason).toBe('max deliveries (3) exceeded: boom');
      expect(deadLetter?.message.deliveryCount).toBe(3);
      expect(onDeadLetter).toHaveBeenCalledTimes(1);
      expect(limited.pendingCount()).toBe(0);
      await limited.close();
    });

    it('should dead-letter immediately on a dead_letter outcome', async () => {
      const handler = vi.fn(async () => Outcome.deadLetter('bad payload'));
      bus.subscribe('damage', handler);

      await bus.publish('damage', { nope: true });
      await bus.whenIdle();

      expect(handler).toHaveBeenCalledTimes(1);
      expect(bus.deadLetters().map((d) => [d.reason, d.message.deliveryCount])).toEqual([['bad payload', 1]]);
    });

    it('should honour an explicit retry delay', async () => {
      const counts: number[] = [];
      bus.subscribe('damage', async (message) => {
        counts.push(message.deliveryCount);
        return message.deliveryCount < 3 ? Outcome.retry('later', 2) : Outcome.ack();
      });

      await bus.publish('damage', { requestId: 'req_1' });
      await bus.whenIdle();

      expect(counts).toEqual([1, 2, 3]);
    });
  });

  describe('subscriptions', () => {
    it('should deliver each message to exactly one competing subscription', async () => {
      const handledBy = new Map<string, string[]>();
      const record = (name: string) => async (message: BusMessage) => {
        await delay(2);
        handledBy.set(message.messageId, [...(handledBy.get(message.messageId) ?? []), name]);
        return Outcome.ack();
      };
      bus.subscribe('damage', record('a'), { name: 'a' });
      bus.subscribe('damage', record('b'), { name: 'b' });

      for (let i = 0; i < 6; i++) {
        await bus.publish('damage', { requestId: `req_${i}` });
      }
      await bus.whenIdle();

      expect(handledBy.size).toBe(6);
      const handlers = [...handledBy.values()];
      expect(handlers.every((names) => names.length === 1)).toBe(true);
      expect(new Set(handlers.flat())).toEqual(new Set(['a', 'b']));
    });

    it('should not exceed the subscription concurrency', async () => {
      let active = 0;
      let maxActive = 0;
      bus.subscribe(
        'damage',
        async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await delay(5);
          active--;
          return Outcome.ack();
        },
        { concurrency: 2 }
      );

      await Promise.all(Array.from({ length: 5 }, (_, i) => bus.publish('damage', { requestId: `req_${i}` })));
      await bus.whenIdle();

      expect(maxActive).toBe(2);
      expect(bus.pendingCount()).toBe(0);
    });

    it('should stop delivering to a closed subscription', async () => {
      const handler = vi.fn(async () => Outcome.ack());
      const subscription = bus.subscribe('damage', handler);

      subscription.close();
      await bus.publish('damage', { requestId: 'req_1' });
      await bus.whenIdle();

      expect(handler).not.toHaveBeenCalled();
      expect(bus.pendingCount()).toBe(1);
    });
  });
});

describe('LocalTriggerBus write-ahead log', () => {
  let dir: string;
  let logPath: string;

  beforeEach(async () => {
    dir = await makeTempDir('relief-bus');
    logPath = join(dir, 'bus', 'wal.jsonl');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should redeliver unacknowledged messages after a restart', async () => {
    const first = createBus({ logPath });
    await first.start();
    const pending = await first.publish('damage', { requestId: 'req_1' });
    await first.publish('logistics', { requestId: 'req_2' });
    first.subscribe('logistics', async () => Outcome.ack());
    await first.whenIdle();
    await first.close();

    const second = createBus({ logPath });
    await second.start();
    expect(second.pendingCount()).toBe(1);

    const received: BusMessage[] = [];
    second.subscribe('damage', async (message) => {
      received.push(message);
      return Outcome.ack();
    });
    await second.whenIdle();
    await second.close();

    expect(received.map((m) => [m.messageId, m.payload, m.deliveryCount])).toEqual([
      [pending.messageId, { requestId: 'req_1' }, 1],
    ]);
  });

  it('should resume the delivery count of a message awaiting redelivery', async () => {
    const first = createBus({ logPath, maxDeliveries: 5 });
    await first.start();
    const delivered = new Promise<void>((resolve) => {
      first.subscribe('damage', async () => {
        resolve();
        return Outcome.retry('not yet', 60_000);
      });
    });
    await first.publish('damage', { requestId: 'req_1' });
    await delivered;
    await first.close();

    const second = createBus({ logPath, maxDeliveries: 5 });
    await second.start();
    const counts: number[] = [];
    second.subscribe('damage', async (message) => {
      counts.push(message.deliveryCount);
      return Outcome.ack();
    });
    await second.whenIdle();
    await second.close();

    expect(counts).toEqual([2]);
  });

  it('should record each delivery before the handler runs', async () => {
    const bus = createBus({ logPath });
    await bus.start();
    const logged: unknown[] = [];
    bus.subscribe('damage', async () => {
      const lines = (await readFile(logPath, 'utf-8')).split('\n').filter(Boolean);
      logged.push(JSON.parse(lines.at(-1) ?? ''));
      return Outcome.ack();
    });
    const receipt = await bus.publish('damage', { requestId: 'req_1' });
    await bus.whenIdle();
    await bus.close();

    expect(logged).toEqual([{ type: 'deliver', messageId: receipt.messageId, deliveryCount: 1 }]);
  });

  it('should carry the delivery count of a message in flight when the process stopped', async () => {
    const publishedAt = '2026-03-01T10:00:00.000Z';
    await mkdir(dirname(logPath), { recursive: true });
    await writeFile(
      logPath,
      [
        {
          type: 'publish',
          message: { messageId: 'msg-1', topic: 'damage', payload: { requestId: 'req_1' }, publishedAt },
        },
        { type: 'deliver', messageId: 'msg-1', deliveryCount: 1 },
      ]
        .map((event) => `${JSON.stringify(event)}\n`)
        .join(''),
      'utf-8'
    );

    const bus = createBus({ logPath });
    await bus.start();
    const counts: number[] = [];
    bus.subscribe('damage', async (message) => {
      counts.push(message.deliveryCount);
      return Outcome.ack();
    });
    await bus.whenIdle();
    await bus.close();

    expect(counts).toEqual([2]);
  });

  it('should dead-letter a message that was in flight on its last delivery', async () => {
    const publishedAt = '2026-03-01T10:00:00.000Z';
    await mkdir(dirname(logPath), { recursive: true });
    await writeFile(
      logPath,
      [
        {
          type: 'publish',
          message: { messageId: 'msg-1', topic: 'damage', payload: { requestId: 'req_1' }, publishedAt },
        },
        { type: 'deliver', messageId: 'msg-1', deliveryCount: 1 },
        { type: 'retry', messageId: 'msg-1', deliveryCount: 1 },
        { type: 'deliver', messageId: 'msg-1', deliveryCount: 2 },
        { type: 'retry', messageId: 'msg-1', deliveryCount: 2 },
        { type: 'deliver', messageId: 'msg-1', deliveryCount: 3 },
      ]
        .map((event) => `${JSON.stringify(event)}\n`)
        .join(''),
      'utf-8'
    );

    const bus = createBus({ logPath });
    await bus.start();
    const handler = vi.fn(async () => Outcome.ack());
    bus.subscribe('damage', handler);
    await bus.whenIdle();
    await bus.close();

    expect(handler).not.toHaveBeenCalled();
    expect(bus.pendingCount()).toBe(0);
    expect(bus.deadLetters().map((d) => [d.message.messageId, d.message.deliveryCount, d.reason])).toEqual([
      ['msg-1', 3, 'max deliveries (3) exceeded: in flight when the bus stopped'],
    ]);
  });

  it('should restore dead letters after a restart', async () => {
    const first = createBus({ logPath });
    await first.start();
    first.subscribe('damage', async () => Outcome.deadLetter('poison'));
    await first.publish('damage', { requestId: 'req_1' });
    await first.whenIdle();
    await first.close();

    const second = createBus({ logPath });
    await second.start();

    expect(second.deadLetters().map((d) => [d.reason, d.message.payload, d.message.deliveryCount])).toEqual([
      ['poison', { requestId: 'req_1' }, 1],
    ]);
    expect(second.pendingCount()).toBe(0);
    await second.close();
  });

  it('should skip unreadable entries and compact the log on start', async () => {
    const first = createBus({ logPath });
    await first.start();
    await first.publish('damage', { requestId: 'req_1' });
    await first.publish('logistics', { requestId: 'req_2' });
    first.subscribe('logistics', async () => Outcome.ack());
    await first.whenIdle();
    await first.close();
    await appendFile(logPath, 'not json\n', 'utf-8');

    const second = createBus({ logPath });
    await second.start();
    await second.close();

    const lines = (await readFile(logPath, 'utf-8')).split('\n').filter(Boolean);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      type: 'publish',
      message: { topic: 'damage', payload: { requestId: 'req_1' } },
    });
  });
});
