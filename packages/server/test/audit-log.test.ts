/**
 * Audit Log Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AuditEventType, AuditLog } from '../src/pipeline/audit-log.js';

describe('AuditLog', () => {
  let audit: AuditLog;

  beforeEach(() => {
    audit = new AuditLog({ logToConsole: false });
  });

  it('should keep a timeline per request in order', () => {
    audit.record('req_1', AuditEventType.REQUEST_SUBMITTED, { location: 'Riverside' });
    audit.record('req_2', AuditEventType.REQUEST_SUBMITTED);
    audit.record('req_1', AuditEventType.TRIGGER_PUBLISHED, { topic: 'damage-analysis' });

    const timeline = audit.getRequestTimeline('req_1');

    expect(timeline.map((e) => e.eventType)).toEqual(['request_submitted', 'trigger_published']);
    expect(timeline[0]?.details).toEqual({ location: 'Riverside' });
    expect(audit.getRequestTimeline('unknown')).toEqual([]);
  });

  it('should filter by event type and request', () => {
    audit.record('req_1', AuditEventType.STAGE_FAILED);
    audit.record('req_2', AuditEventType.STAGE_FAILED);
    audit.record('req_2', AuditEventType.STAGE_COMPLETED);

    expect(audit.query({ eventType: AuditEventType.STAGE_FAILED }).map((e) => e.requestId)).toEqual([
      'req_1',
      'req_2',
    ]);
    expect(audit.query({ requestId: 'req_2', eventType: AuditEventType.STAGE_COMPLETED })).toHaveLength(1);
  });

  it('should return the most recent events up to the limit', () => {
    audit.record('req_1', AuditEventType.STAGE_STARTED);
    audit.record('req_1', AuditEventType.STAGE_FAILED);
    audit.record('req_1', AuditEventType.REPROCESS_REQUESTED);

    expect(audit.query({ limit: 2 }).map((e) => e.eventType)).toEqual(['stage_failed', 'reprocess_requested']);
  });

  it('should evict the oldest events past maxEvents', () => {
    const small = new AuditLog({ maxEvents: 2, logToConsole: false });
    small.record('req_1', AuditEventType.REQUEST_SUBMITTED);
    small.record('req_2', AuditEventType.REQUEST_SUBMITTED);
    small.record('req_2', AuditEventType.TRIGGER_PUBLISHED);

    expect(small.getEventCount()).toBe(2);
    expect(small.getRequestTimeline('req_1')).toEqual([]);
    expect(small.getRequestTimeline('req_2')).toHaveLength(2);
  });

  it('should forget everything on clear', () => {
    audit.record('req_1', AuditEventType.REQUEST_SUBMITTED);

    audit.clear();

    expect(audit.getEventCount()).toBe(0);
    expect(audit.getRequestTimeline('req_1')).toEqual([]);
  });
});
