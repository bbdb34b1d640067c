import { hostname } from 'node:os';
import { nanoid } from 'nanoid';
import {
  triggerPayloadSchema,
  type AuditEventView,
  type DeadLetterSummary,
  type IntakeAck,
  type ListRequestsQuery,
  type PaginatedResponse,
  type PipelineStage,
  type PipelineStatusView,
  type ReconcileReport,
  type ReprocessAck,
  type RescueRequest,
} from '@relief-pipeline/shared';
import { getConfig, type ReliefConfig } from '../config/index.js';
import { LocalTriggerBus } from '../bus/local-trigger-bus.js';
import type { DeadLetter } from '../bus/types.js';
import {
  FileInventorySource,
  HttpImageryAnalyzer,
  HttpPlanGenerator,
  UnconfiguredImageryAnalyzer,
  UnconfiguredPlanGenerator,
  type ImageryAnalyzer,
  type InventorySource,
  type PlanGenerator,
} from '../engines/index.js';
import { FileStateStore } from '../store/file-state-store.js';
import { getBusLogPath } from '../store/paths.js';
import type { StateStore } from '../store/types.js';
import { createLogger } from '../utils/logger.js';
import { AuditEventType, AuditLog } from './audit-log.js';
import { DamageWorker } from './damage-worker.js';
import { IdempotencyGuard } from './idempotency-guard.js';
import { IntakeRouter } from './intake-router.js';
import { LogisticsWorker } from './logistics-worker.js';
import { Reconciler } from './reconciler.js';
import { getPipelineStatus } from './status.js';
import { TriggerPublisher } from './trigger-publisher.js';

const log = createLogger('pipeline');

export interface PipelineOptions {
  /** Defaults to getConfig() */
  config?: ReliefConfig;
  /** Defaults to a FileStateStore under the data root */
  store?: StateStore;
  /** Write-ahead log of the trigger bus; null keeps it in memory. Defaults to the data root. */
  busLogPath?: string | null;
  analyzer?: ImageryAnalyzer;
  planner?: PlanGenerator;
  inventory?: InventorySource;
  /** Worker instances per stage, each with `config.workerConcurrency` slots */
  workersPerStage?: number;
  /** Prefix of the claim owner recorded by this process */
  instanceId?: string;
}

/**
 * Wires the store, bus and stage workers of one process together.
 */
export class ReliefPipeline {
  readonly config: ReliefConfig;
  readonly store: StateStore;
  readonly bus: LocalTriggerBus;
  readonly audit: AuditLog;
  readonly publisher: TriggerPublisher;
  readonly router: IntakeRouter;
  readonly damageWorkers: DamageWorker[];
  readonly logisticsWorkers: LogisticsWorker[];
  readonly reconciler: Reconciler;
  private started = false;

  constructor(options: PipelineOptions = {}) {
    const config = options.config ?? getConfig();
    this.config = config;
    this.store = options.store ?? new FileStateStore({ lockStaleMs: config.lockStaleMs });
    this.audit = new AuditLog();

    this.bus = new LocalTriggerBus({
      logPath: options.busLogPath === undefined ? getBusLogPath() : options.busLogPath,
      maxDeliveries: config.maxDeliveries,
      redelivery: config.redelivery,
      onDeadLetter: (deadLetter) => this.recordDeadLetter(deadLetter),
    });

    this.publisher = new TriggerPublisher(this.bus, this.audit, config.publishRetry);
    this.router = new IntakeRouter({
      store: this.store,
      publisher: this.publisher,
      audit: this.audit,
      damageTopic: config.damageTopic,
    });

    const analyzer = options.analyzer ?? createAnalyzer(config);
    const planner = options.planner ?? createPlanner(config);
    const inventory = options.inventory ?? new FileInventorySource(config.inventoryFile);
    const instanceId = options.instanceId ?? `${hostname()}-${process.pid}-${nanoid(6)}`;
    const workersPerStage = Math.max(1, options.workersPerStage ?? 1);

    this.damageWorkers = [];
    this.logisticsWorkers = [];
    for (let i = 1; i <= workersPerStage; i++) {
      const workerId = `${instanceId}#${i}`;
      const guard = new IdempotencyGuard(this.store, workerId);
      const base = {
        concurrency: config.workerConcurrency,
        stageTimeoutMs: config.stageTimeoutMs,
        maxPreconditionAttempts: config.maxPreconditionAttempts,
        workerId,
      };
      this.damageWorkers.push(
        new DamageWorker(
          { store: this.store, bus: this.bus, guard, audit: this.audit, analyzer, publisher: this.publisher },
          { ...base, topic: config.damageTopic, logisticsTopic: config.logisticsTopic }
        )
      );
      this.logisticsWorkers.push(
        new LogisticsWorker(
          { store: this.store, bus: this.bus, guard, audit: this.audit, planner, inventory },
          { ...base, topic: config.logisticsTopic }
        )
      );
    }

    this.reconciler = new Reconciler(
      { store: this.store, publisher: this.publisher, audit: this.audit },
      {
        damageTopic: config.damageTopic,
        logisticsTopic: config.logisticsTopic,
        stuckAfterMs: config.stuckAfterMs,
        stageTimeoutMs: config.stageTimeoutMs,
        intervalMs: config.reconcileIntervalMs,
      }
    );
  }

  get isStarted(): boolean {
    return this.started;
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    await this.bus.start();
    for (const worker of [...this.damageWorkers, ...this.logisticsWorkers]) {
      worker.start();
    }
    this.reconciler.start();
    this.started = true;
    log.info(
      { workersPerStage: this.damageWorkers.length, concurrency: this.config.workerConcurrency },
      'Pipeline started'
    );
  }

  async stop(): Promise<void> {
    await this.reconciler.stop();
    for (const worker of [...this.damageWorkers, ...this.logisticsWorkers]) {
      worker.stop();
    }
    await this.bus.close();
    await this.store.close();
    this.started = false;
    log.info('Pipeline stopped');
  }

  submit(input: unknown): Promise<IntakeAck> {
    return this.router.submit(input);
  }

  getStatus(requestId: string): Promise<PipelineStatusView> {
    return getPipelineStatus(this.store, requestId);
  }

  /**
   * Newest first. Request ids sort by creation time.
   */
  async listRequests(query: ListRequestsQuery): Promise<PaginatedResponse<RescueRequest>> {
    const { status } = query;
    const all = await this.store.list(
      'requests',
      status === undefined ? {} : { filter: (request) => request.status === status }
    );
    all.sort((a, b) => (a.requestId < b.requestId ? 1 : a.requestId > b.requestId ? -1 : 0));

    const items = all.slice(query.offset, query.offset + query.limit);
    return {
      items,
      total: all.length,
      limit: query.limit,
      offset: query.offset,
      hasMore: query.offset + items.length < all.length,
    };
  }

  reprocess(requestId: string, stage: PipelineStage): Promise<ReprocessAck> {
    return this.reconciler.reprocess(requestId, stage);
  }

  reconcile(dryRun: boolean): Promise<ReconcileReport> {
    return this.reconciler.reconcile({ dryRun });
  }

  deadLetters(): DeadLetterSummary[] {
    return this.bus.deadLetters().map((entry) => ({
      messageId: entry.message.messageId,
      topic: entry.message.topic,
      requestId: requestIdOf(entry),
      deliveryCount: entry.message.deliveryCount,
      reason: entry.reason,
      publishedAt: entry.message.publishedAt,
      deadLetteredAt: entry.deadLetteredAt,
    }));
  }

  auditTrail(requestId: string): AuditEventView[] {
    return this.audit.getRequestTimeline(requestId).map((event) => ({
      id: event.id,
      requestId: event.requestId,
      eventType: event.eventType,
      timestamp: event.timestamp.toISOString(),
      details: event.details,
    }));
  }

  /**
   * Resolves when no trigger is in flight or waiting for redelivery.
   */
  whenIdle(): Promise<void> {
    return this.bus.whenIdle();
  }

  private recordDeadLetter(deadLetter: DeadLetter): void {
    const requestId = requestIdOf(deadLetter);
    if (requestId === null) {
      return;
    }
    this.audit.record(requestId, AuditEventType.DEAD_LETTERED, {
      topic: deadLetter.message.topic,
      messageId: deadLetter.message.messageId,
      reason: deadLetter.reason,
    });
  }
}

function requestIdOf(deadLetter: DeadLetter): string | null {
  const parsed = triggerPayloadSchema.safeParse(deadLetter.message.payload);
  return parsed.success ? parsed.data.requestId : null;
}

function createAnalyzer(config: ReliefConfig): ImageryAnalyzer {
  if (config.analyzerUrl) {
    return new HttpImageryAnalyzer({ url: config.analyzerUrl });
  }
  log.warn('RELIEF_ANALYZER_URL is not set; damage analysis will fail every request');
  return new UnconfiguredImageryAnalyzer();
}

function createPlanner(config: ReliefConfig): PlanGenerator {
  if (config.plannerUrl) {
    return new HttpPlanGenerator({ url: config.plannerUrl });
  }
  log.warn('RELIEF_PLANNER_URL is not set; logistics planning will fail every request');
  return new UnconfiguredPlanGenerator();
}

export function createPipeline(options: PipelineOptions = {}): ReliefPipeline {
  return new ReliefPipeline(options);
}
