import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';

/**
 * Pipeline events kept in the audit trail.
 */
export const AuditEventType = {
  REQUEST_SUBMITTED: 'request_submitted',
  TRIGGER_PUBLISHED: 'trigger_published',
  TRIGGER_PUBLISH_FAILED: 'trigger_publish_failed',
  STAGE_STARTED: 'stage_started',
  STAGE_COMPLETED: 'stage_completed',
  STAGE_FAILED: 'stage_failed',
  DUPLICATE_DISCARDED: 'duplicate_discarded',
  CLAIM_LOST: 'claim_lost',
  PRECONDITION_UNMET: 'precondition_unmet',
  PIPELINE_HALTED: 'pipeline_halted',
  DEAD_LETTERED: 'dead_lettered',
  REPROCESS_REQUESTED: 'reprocess_requested',
  STALLED_MARKED_FAILED: 'stalled_marked_failed',
  TRIGGER_REPUBLISHED: 'trigger_republished',
} as const;

export type AuditEventType = (typeof AuditEventType)[keyof typeof AuditEventType];

export interface AuditEvent {
  id: string;
  requestId: string;
  eventType: AuditEventType;
  timestamp: Date;
  details: Record<string, unknown>;
}

export interface AuditQueryOptions {
  requestId?: string;
  eventType?: AuditEventType;
  since?: Date;
  until?: Date;
  limit?: number;
}

/**
 * Configuration for audit log.
 */
export interface AuditLogConfig {
  /** Maximum events to keep in memory */
  maxEvents: number;

  /** Whether to also log to pino logger */
  logToConsole: boolean;
}

const DEFAULT_CONFIG: AuditLogConfig = {
  maxEvents: 10000,
  logToConsole: true,
};

/**
 * In-memory audit trail of pipeline events, indexed per request.
 */
export class AuditLog {
  private readonly logger: Logger;
  private readonly config: AuditLogConfig;
  private readonly events: AuditEvent[] = [];
  private readonly eventsByRequest: Map<string, AuditEvent[]> = new Map();

  constructor(config: Partial<AuditLogConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = createLogger('audit-log');
  }

  record(
    requestId: string,
    eventType: AuditEventType,
    details: Record<string, unknown> = {}
  ): AuditEvent {
    const event: AuditEvent = {
      id: nanoid(),
      requestId,
      eventType,
      timestamp: new Date(),
      details,
    };

    this.events.push(event);

    let requestEvents = this.eventsByRequest.get(requestId);
    if (!requestEvents) {
      requestEvents = [];
      this.eventsByRequest.set(requestId, requestEvents);
    }
    requestEvents.push(event);

    // Enforce max events
    if (this.events.length > this.config.maxEvents) {
      const removed = this.events.shift();
      if (removed) {
        const indexed = this.eventsByRequest.get(removed.requestId);
        if (indexed) {
          const idx = indexed.findIndex((e) => e.id === removed.id);
          if (idx !== -1) indexed.splice(idx, 1);
          if (indexed.length === 0) this.eventsByRequest.delete(removed.requestId);
        }
      }
    }

    if (this.config.logToConsole) {
      this.logger.info({ requestId, eventType, details }, `Audit: ${eventType}`);
    }

    return event;
  }

  query(options: AuditQueryOptions = {}): AuditEvent[] {
    let results: AuditEvent[] = options.requestId
      ? [...(this.eventsByRequest.get(options.requestId) ?? [])]
      : [...this.events];

    if (options.eventType) {
      results = results.filter((e) => e.eventType === options.eventType);
    }

    if (options.since) {
      const since = options.since;
      results = results.filter((e) => e.timestamp >= since);
    }
    if (options.until) {
      const until = options.until;
      results = results.filter((e) => e.timestamp <= until);
    }

    if (options.limit && options.limit > 0) {
      results = results.slice(-options.limit);
    }

    return results;
  }

  getRequestTimeline(requestId: string): AuditEvent[] {
    return [...(this.eventsByRequest.get(requestId) ?? [])];
  }

  getEventCount(): number {
    return this.events.length;
  }

  /**
   * Clear all events (for testing).
   */
  clear(): void {
    this.events.length = 0;
    this.eventsByRequest.clear();
  }
}
