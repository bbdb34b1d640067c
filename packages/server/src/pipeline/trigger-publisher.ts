import type { PublishRetryConfig } from '../config/index.js';
import { retryWithBackoff } from '../bus/backoff.js';
import type { PublishReceipt, TriggerBus } from '../bus/types.js';
import { createLogger } from '../utils/logger.js';
import { AuditEventType, type AuditLog } from './audit-log.js';
import { errorMessage, TriggerPublishError } from './errors.js';

const log = createLogger('trigger-publisher');

/**
 * Publishes `{ requestId }` triggers with bounded retries. A trigger that
 * cannot be published is logged and audited; the caller decides what that
 * means (the reconciler republishes from the persisted state later).
 */
export class TriggerPublisher {
  constructor(
    private readonly bus: TriggerBus,
    private readonly audit: AuditLog,
    private readonly retry: PublishRetryConfig
  ) {}

  /**
   * Resolves to the receipt, or null when every attempt failed.
   */
  async publish(topic: string, requestId: string): Promise<PublishReceipt | null> {
    try {
      return await this.publishOrThrow(topic, requestId);
    } catch (error) {
      if (!(error instanceof TriggerPublishError)) {
        throw error;
      }
      log.error({ err: error, requestId, topic }, 'Trigger could not be published');
      this.audit.record(requestId, AuditEventType.TRIGGER_PUBLISH_FAILED, {
        topic,
        attempts: error.attempts,
        error: errorMessage(error.cause),
      });
      return null;
    }
  }

  /**
   * Like `publish`, but throws TriggerPublishError when every attempt failed.
   */
  async publishOrThrow(topic: string, requestId: string): Promise<PublishReceipt> {
    let receipt: PublishReceipt;
    try {
      receipt = await retryWithBackoff(() => this.bus.publish(topic, { requestId }), {
        maxAttempts: this.retry.maxAttempts,
        policy: {
          baseDelayMs: this.retry.baseDelayMs,
          maxDelayMs: this.retry.maxDelayMs,
          backoffMultiplier: 2,
          jitterFactor: 0.1,
        },
        onRetry: (err, attempt, delayMs) => {
          log.warn({ err, requestId, topic, attempt, delayMs }, 'Trigger publish failed, retrying');
        },
      });
    } catch (error) {
      throw new TriggerPublishError(topic, this.retry.maxAttempts, error);
    }

    this.audit.record(requestId, AuditEventType.TRIGGER_PUBLISHED, {
      topic,
      messageId: receipt.messageId,
    });
    return receipt;
  }
}
