import { nanoid } from 'nanoid';
import {
  intakeRequestSchema,
  RequestStatus,
  type IntakeAck,
  type RescueRequest,
} from '@relief-pipeline/shared';
import type { StateStore } from '../store/types.js';
import { createLogger } from '../utils/logger.js';
import { AuditEventType, type AuditLog } from './audit-log.js';
import { ValidationError } from './errors.js';
import type { TriggerPublisher } from './trigger-publisher.js';

const log = createLogger('intake-router');

/**
 * Time-ordered request id: `req_` + base36 milliseconds (10 chars) + `_` + 12 random chars.
 */
export function generateRequestId(now: number = Date.now()): string {
  return `req_${now.toString(36).padStart(10, '0')}_${nanoid(12)}`;
}

export interface IntakeRouterDeps {
  store: StateStore;
  publisher: TriggerPublisher;
  audit: AuditLog;
  damageTopic: string;
}

/**
 * Accepts rescue requests, persists them and triggers damage analysis.
 */
export class IntakeRouter {
  constructor(private readonly deps: IntakeRouterDeps) {}

  /**
   * Returns once the Request is stored and the trigger enqueued (or given up
   * on); never waits for downstream stages.
   */
  async submit(input: unknown): Promise<IntakeAck> {
    const parsed = intakeRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid rescue request',
        parsed.error.errors.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
      );
    }

    const { location, eventName, imagery } = parsed.data;
    const now = new Date();
    const requestId = generateRequestId(now.getTime());
    const request: RescueRequest = {
      requestId,
      location,
      ...(eventName !== undefined && { eventName }),
      imagery,
      status: RequestStatus.SUBMITTED,
      createdAt: now.toISOString(),
      updatedAt: now.toISOString(),
    };

    await this.deps.store.create('requests', requestId, request);
    this.deps.audit.record(requestId, AuditEventType.REQUEST_SUBMITTED, {
      location: location.name,
      ...(eventName !== undefined && { eventName }),
    });
    log.info({ requestId, location: location.name }, 'Rescue request accepted');

    const receipt = await this.deps.publisher.publish(this.deps.damageTopic, requestId);
    if (!receipt) {
      return { requestId, status: RequestStatus.SUBMITTED, triggered: false };
    }

    await this.deps.store.update('requests', requestId, { triggerPublishedAt: receipt.enqueuedAt });
    return { requestId, status: RequestStatus.SUBMITTED, triggered: true };
  }
}
