/**
 * Intake Router Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { LocalTriggerBus } from '../src/bus/local-trigger-bus.js';
import { AuditEventType, AuditLog } from '../src/pipeline/audit-log.js';
import { ValidationError } from '../src/pipeline/errors.js';
import { generateRequestId, IntakeRouter } from '../src/pipeline/intake-router.js';
import { TriggerPublisher } from '../src/pipeline/trigger-publisher.js';
import { InMemoryStateStore } from '../src/store/memory-state-store.js';
import { DAMAGE_TOPIC, sampleIntake } from './helpers/pipeline.js';

describe('generateRequestId', () => {
  it('should encode the timestamp in a fixed-width prefix', () => {
    expect(generateRequestId(0)).toMatch(/^req_0000000000_[A-Za-z0-9_-]{12}$/);
    expect(generateRequestId(1000)).toMatch(/^req_00000000rs_/);
  });

  it('should sort later ids after earlier ones', () => {
    expect(generateRequestId(1000) < generateRequestId(2000)).toBe(true);
    expect(generateRequestId(Date.UTC(2026, 0, 1)) < generateRequestId(Date.UTC(2026, 0, 2))).toBe(true);
  });
});

describe('IntakeRouter', () => {
  let store: InMemoryStateStore;
  let audit: AuditLog;
  let bus: LocalTriggerBus;
  let router: IntakeRouter;

  beforeEach(async () => {
    store = new InMemoryStateStore();
    audit = new AuditLog({ logToConsole: false });
    bus = new LocalTriggerBus({ logPath: null });
    await bus.start();
    const publisher = new TriggerPublisher(bus, audit, { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 });
    router = new IntakeRouter({ store, publisher, audit, damageTopic: DAMAGE_TOPIC });
  });

  afterEach(async () => {
    await bus.close();
  });

  it('should store the request and publish its damage trigger', async () => {
    const ack = await router.submit(sampleIntake());

    expect(ack.requestId).toMatch(/^req_/);
    expect(ack).toMatchObject({ status: 'submitted', triggered: true });

    const stored = await store.read('requests', ack.requestId);
    expect(stored).toMatchObject({
      requestId: ack.requestId,
      location: sampleIntake().location,
      eventName: 'Spring flood',
      imagery: sampleIntake().imagery,
      status: 'submitted',
    });
    expect(stored?.triggerPublishedAt).toBeDefined();
    expect(bus.pendingCount()).toBe(1);
    expect(audit.getRequestTimeline(ack.requestId).map((e) => e.eventType)).toEqual([
      AuditEventType.REQUEST_SUBMITTED,
      AuditEventType.TRIGGER_PUBLISHED,
    ]);
  });

  it('should not write anything downstream', async () => {
    const ack = await router.submit(sampleIntake());

    expect(await store.read('damage_reports', ack.requestId)).toBeNull();
    expect(await store.read('logistics_plans', ack.requestId)).toBeNull();
  });

  it('should give every submission its own id', async () => {
    const [a, b] = await Promise.all([router.submit(sampleIntake()), router.submit(sampleIntake())]);

    expect(a.requestId).not.toBe(b.requestId);
    expect(await store.list('requests')).toHaveLength(2);
  });

  it('should reject an invalid payload with field issues and store nothing', async () => {
    const error: unknown = await router
      .submit({ location: { name: '', latitude: 95 }, imagery: { preEvent: [], postEvent: ['post-1'] } })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    const issues = error instanceof ValidationError ? error.issues : [];
    expect(issues.map((i) => i.path)).toEqual(['location.name', 'location.latitude', 'imagery.preEvent']);
    expect(issues).toContainEqual({
      path: 'imagery.preEvent',
      message: 'At least one pre-event imagery reference is required',
    });
    expect(await store.list('requests')).toEqual([]);
    expect(bus.pendingCount()).toBe(0);
  });

  it('should reject a payload without imagery', async () => {
    await expect(router.submit({ location: { name: 'Riverside' } })).rejects.toMatchObject({
      issues: [{ path: 'imagery', message: 'Required' }],
    });
  });

  it('should keep the request and report it untriggered when publishing fails', async () => {
    await bus.close();

    const ack = await router.submit(sampleIntake());

    expect(ack.triggered).toBe(false);
    const stored = await store.read('requests', ack.requestId);
    expect(stored?.status).toBe('submitted');
    expect(stored?.triggerPublishedAt).toBeUndefined();
    const failure = audit.query({
      requestId: ack.requestId,
      eventType: AuditEventType.TRIGGER_PUBLISH_FAILED,
    });
    expect(failure[0]?.details).toEqual({
      topic: DAMAGE_TOPIC,
      attempts: 2,
      error: 'Trigger bus is closed',
    });
  });
});
