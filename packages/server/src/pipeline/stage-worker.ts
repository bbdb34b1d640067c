import type { Logger } from 'pino';
import {
  claimKey,
  triggerPayloadSchema,
  type PipelineStage,
  type RequestStatus,
} from '@relief-pipeline/shared';
import { Outcome, type BusMessage, type DeliveryOutcome, type Subscription, type TriggerBus } from '../bus/types.js';
import type { StateStore } from '../store/types.js';
import { createLogger } from '../utils/logger.js';
import { AuditEventType, type AuditLog } from './audit-log.js';
import {
  BusRedeliveryDuplicate,
  PreconditionError,
  StoreConflictError,
} from './errors.js';
import type { IdempotencyGuard } from './idempotency-guard.js';
import { advanceRequestStatus } from './request-status.js';
import { StageStateMachine, type StageState } from './stage-machine.js';

export interface StageWorkerConfig {
  /** Topic this worker consumes */
  topic: string;
  /** Deliveries handled at once by this instance */
  concurrency: number;
  /** Deadline for the engine call */
  stageTimeoutMs: number;
  /** Deliveries allowed while a precondition is unmet before dead-lettering */
  maxPreconditionAttempts: number;
  /** Recorded as the claim owner */
  workerId: string;
}

export interface StageWorkerDeps {
  store: StateStore;
  bus: TriggerBus;
  guard: IdempotencyGuard;
  audit: AuditLog;
}

/**
 * Consumes one stage's trigger topic. Subclasses implement `process`; this
 * class turns the benign race outcomes into acknowledgements and unmet
 * preconditions into bounded redelivery.
 */
export abstract class StageWorker {
  protected readonly logger: Logger;
  private subscription: Subscription | null = null;

  constructor(
    readonly stage: PipelineStage,
    protected readonly deps: StageWorkerDeps,
    protected readonly config: StageWorkerConfig
  ) {
    this.logger = createLogger(`${stage}-worker`);
  }

  start(): void {
    if (this.subscription) {
      this.logger.warn('Worker already started');
      return;
    }
    this.subscription = this.deps.bus.subscribe(this.config.topic, (message) => this.handle(message), {
      concurrency: this.config.concurrency,
      name: `${this.stage}:${this.config.workerId}`,
    });
    this.logger.info(
      { topic: this.config.topic, concurrency: this.config.concurrency, workerId: this.config.workerId },
      'Worker started'
    );
  }

  stop(): void {
    this.subscription?.close();
    this.subscription = null;
  }

  isRunning(): boolean {
    return this.subscription !== null;
  }

  /**
   * Handle one trigger delivery. Store failures and other unexpected errors
   * propagate so the bus redelivers.
   */
  async handle(message: BusMessage): Promise<DeliveryOutcome> {
    const parsed = triggerPayloadSchema.safeParse(message.payload);
    if (!parsed.success) {
      this.logger.warn({ messageId: message.messageId, errors: parsed.error.errors }, 'Malformed trigger');
      return Outcome.deadLetter(`malformed trigger payload: ${parsed.error.message}`);
    }

    const { requestId } = parsed.data;
    const context = { requestId, stage: this.stage, messageId: message.messageId };

    try {
      return await this.process(requestId, message);
    } catch (error) {
      if (error instanceof BusRedeliveryDuplicate) {
        this.logger.info({ ...context, existingStatus: error.existingStatus }, 'Duplicate trigger discarded');
        this.deps.audit.record(requestId, AuditEventType.DUPLICATE_DISCARDED, {
          stage: this.stage,
          messageId: message.messageId,
          existingStatus: error.existingStatus,
        });
        return Outcome.ack();
      }

      if (error instanceof StoreConflictError) {
        this.logger.info({ ...context, key: error.key }, 'Lost race for stage record');
        this.deps.audit.record(requestId, AuditEventType.CLAIM_LOST, {
          stage: this.stage,
          messageId: message.messageId,
          key: error.key,
        });
        return Outcome.ack();
      }

      if (error instanceof PreconditionError) {
        const exhausted = message.deliveryCount >= this.config.maxPreconditionAttempts;
        this.logger.warn(
          { ...context, deliveryCount: message.deliveryCount, exhausted },
          error.message
        );
        this.deps.audit.record(requestId, AuditEventType.PRECONDITION_UNMET, {
          stage: this.stage,
          messageId: message.messageId,
          deliveryCount: message.deliveryCount,
          reason: error.message,
        });
        return exhausted
          ? Outcome.deadLetter(
              `precondition unmet after ${message.deliveryCount} deliveries: ${error.message}`
            )
          : Outcome.retry(error.message);
      }

      this.logger.error({ ...context, err: error }, 'Stage handler failed');
      throw error;
    }
  }

  protected abstract process(requestId: string, message: BusMessage): Promise<DeliveryOutcome>;

  /**
   * Claim this stage's attempt or throw StoreConflictError for the loser.
   */
  protected async claimAttempt(requestId: string, attempt: number): Promise<void> {
    const result = await this.deps.guard.claim(this.stage, requestId, attempt);
    if (!result.acquired) {
      throw new StoreConflictError(
        'claims',
        claimKey(this.stage, requestId, attempt),
        `Claim held by ${result.existing?.owner ?? 'another worker'}`
      );
    }
  }

  protected createMachine(requestId: string, initialState: StageState): StageStateMachine {
    return new StageStateMachine({ stage: this.stage, requestId, initialState });
  }

  protected async setRequestStatus(requestId: string, status: RequestStatus): Promise<void> {
    await advanceRequestStatus(this.deps.store, requestId, status);
  }
}
