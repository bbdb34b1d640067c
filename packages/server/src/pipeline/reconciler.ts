import {
  AnalysisStatus,
  claimKey,
  PlanStatus,
  RequestStatus,
  type ClaimRecord,
  type DamageReport,
  type LogisticsPlan,
  type PipelineStage,
  type ReconcileReport,
  type ReprocessAck,
  type RescueRequest,
  type StuckRequest,
} from '@relief-pipeline/shared';
import type { StateStore } from '../store/types.js';
import { createLogger } from '../utils/logger.js';
import { AuditEventType, type AuditLog } from './audit-log.js';
import { ConflictError, NotFoundError, StoreConflictError } from './errors.js';
import { advanceRequestStatus } from './request-status.js';
import { StageStateMachine } from './stage-machine.js';
import type { TriggerPublisher } from './trigger-publisher.js';

const log = createLogger('reconciler');

export const STALLED_ERROR = 'stalled: no progress';

export interface ReconcilerConfig {
  damageTopic: string;
  logisticsTopic: string;
  /** Age after which a missing hand-off counts as stuck */
  stuckAfterMs: number;
  stageTimeoutMs: number;
  /** Period of the background run; 0 disables it */
  intervalMs: number;
}

export interface ReconcilerDeps {
  store: StateStore;
  publisher: TriggerPublisher;
  audit: AuditLog;
}

/**
 * Finds requests whose trigger was lost or whose stage stopped making
 * progress, and repairs them. Also hosts the operator reprocess action.
 *
 * Republishing is always safe: a duplicate trigger is absorbed by the
 * workers' guard.
 */
export class Reconciler {
  private timer: NodeJS.Timeout | null = null;
  private scheduledRun: Promise<void> | null = null;

  constructor(
    private readonly deps: ReconcilerDeps,
    private readonly config: ReconcilerConfig
  ) {}

  start(): void {
    if (this.config.intervalMs <= 0) {
      log.debug('Periodic reconciliation disabled');
      return;
    }
    if (this.timer) {
      log.warn('Reconciler already started');
      return;
    }

    log.info({ intervalMs: this.config.intervalMs }, 'Starting reconciler');
    this.timer = setInterval(() => {
      if (!this.scheduledRun) {
        this.scheduledRun = this.runScheduled().finally(() => {
          this.scheduledRun = null;
        });
      }
    }, this.config.intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.scheduledRun) {
      await this.scheduledRun;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Report stuck requests as of `now` without changing anything.
   */
  async scan(now: Date = new Date()): Promise<StuckRequest[]> {
    const { store } = this.deps;
    const [requests, reports, plans, claims] = await Promise.all([
      store.list('requests'),
      store.list('damage_reports'),
      store.list('logistics_plans'),
      store.list('claims'),
    ]);

    const reportsById = new Map<string, DamageReport>(reports.map((r) => [r.requestId, r]));
    const plansById = new Map<string, LogisticsPlan>(plans.map((p) => [p.requestId, p]));
    const claimsByKey = new Map<string, ClaimRecord>(claims.map((c) => [c.key, c]));

    const stuck: StuckRequest[] = [];
    for (const request of requests) {
      const found = this.checkRequest(
        request,
        reportsById.get(request.requestId) ?? null,
        plansById.get(request.requestId) ?? null,
        claimsByKey,
        now.getTime()
      );
      if (found) {
        stuck.push(found);
      }
    }
    return stuck;
  }

  async reconcile(options: { dryRun?: boolean; now?: Date } = {}): Promise<ReconcileReport> {
    const dryRun = options.dryRun ?? false;
    const now = options.now ?? new Date();
    const stuck = await this.scan(now);

    let applied = 0;
    if (!dryRun) {
      for (const item of stuck) {
        try {
          if (await this.apply(item)) {
            applied++;
          }
        } catch (error) {
          if (error instanceof StoreConflictError) {
            log.info({ requestId: item.requestId, reason: item.reason }, 'Record moved on; skipped');
            continue;
          }
          log.error({ err: error, requestId: item.requestId, reason: item.reason }, 'Repair failed');
        }
      }
    }

    if (stuck.length > 0) {
      log.info({ stuck: stuck.length, applied, dryRun }, 'Reconciliation finished');
    }
    return { dryRun, scannedAt: now.toISOString(), stuck, applied };
  }

  /**
   * Reset a failed stage record to `pending` with the next attempt number and
   * trigger the stage again.
   */
  async reprocess(requestId: string, stage: PipelineStage): Promise<ReprocessAck> {
    const { store, audit, publisher } = this.deps;

    const request = await store.read('requests', requestId);
    if (!request) {
      throw new NotFoundError('Request', requestId);
    }

    const machine = new StageStateMachine({ stage, requestId, initialState: 'failed' });
    const updatedAt = new Date().toISOString();
    let attempt: number;

    if (stage === 'damage') {
      const report = await store.read('damage_reports', requestId);
      assertFailed('Damage report', requestId, report);
      attempt = report.attempt + 1;
      machine.reset({ attempt });
      await resetOrConflict(requestId, () =>
        store.update(
          'damage_reports',
          requestId,
          { status: AnalysisStatus.PENDING, attempt, findings: [], updatedAt },
          {
            expectStatus: AnalysisStatus.FAILED,
            unset: ['error', 'completedAt', 'claimedBy', 'summary', 'analysisModel'],
          }
        )
      );
    } else {
      const report = await store.read('damage_reports', requestId);
      if (report?.status !== AnalysisStatus.COMPLETE) {
        throw new ConflictError(
          `Logistics for ${requestId} cannot be reprocessed before damage analysis is complete`,
          { damageStatus: report?.status ?? null }
        );
      }
      const plan = await store.read('logistics_plans', requestId);
      assertFailed('Logistics plan', requestId, plan);
      attempt = plan.attempt + 1;
      machine.reset({ attempt });
      await resetOrConflict(requestId, () =>
        store.update(
          'logistics_plans',
          requestId,
          { status: PlanStatus.PENDING, attempt, actions: [], updatedAt },
          {
            expectStatus: PlanStatus.FAILED,
            unset: ['error', 'completedAt', 'claimedBy', 'summary', 'planningModel'],
          }
        )
      );
    }

    try {
      // Only a failed Request goes back; one already moved on keeps its status
      await store.update(
        'requests',
        requestId,
        { status: machine.requestStatus, updatedAt },
        { expectStatus: RequestStatus.FAILED }
      );
    } catch (error) {
      if (!(error instanceof StoreConflictError)) {
        throw error;
      }
      log.info({ requestId, stage }, 'Request status is not failed; left as is');
    }
    audit.record(requestId, AuditEventType.REPROCESS_REQUESTED, { stage, attempt });
    log.info({ requestId, stage, attempt }, 'Stage reset for reprocessing');

    const topic = stage === 'damage' ? this.config.damageTopic : this.config.logisticsTopic;
    const receipt = await publisher.publishOrThrow(topic, requestId);
    return { requestId, stage, attempt, messageId: receipt.messageId };
  }

  private async runScheduled(): Promise<void> {
    try {
      await this.reconcile();
    } catch (error) {
      log.error({ err: error }, 'Scheduled reconciliation failed');
    }
  }

  private checkRequest(
    request: RescueRequest,
    report: DamageReport | null,
    plan: LogisticsPlan | null,
    claims: Map<string, ClaimRecord>,
    now: number
  ): StuckRequest | null {
    const { requestId } = request;
    const stalledAfter = this.config.stageTimeoutMs + this.config.stuckAfterMs;
    const olderThan = (timestamp: string, ms: number): boolean => now - Date.parse(timestamp) > ms;

    const stalled = (stage: PipelineStage, since: string): StuckRequest => ({
      requestId,
      reason: 'stalled',
      stage,
      action: 'mark_failed',
      since,
    });

    // Damage stage not started, or claimed and then abandoned before the record moved.
    // A trigger published more than stuckAfterMs ago with nothing to show for it counts as lost.
    // The same holds for the logistics hand-off below.
    if (!report || report.status === AnalysisStatus.PENDING) {
      const claim = claims.get(claimKey('damage', requestId, report?.attempt ?? 0));
      if (claim) {
        return olderThan(claim.claimedAt, stalledAfter) ? stalled('damage', claim.claimedAt) : null;
      }
      const since = report?.updatedAt ?? request.triggerPublishedAt ?? request.createdAt;
      return olderThan(since, this.config.stuckAfterMs)
        ? { requestId, reason: 'untriggered', stage: 'damage', action: 'republish_damage_trigger', since }
        : null;
    }

    if (report.status === AnalysisStatus.ANALYZING) {
      return olderThan(report.updatedAt, stalledAfter) ? stalled('damage', report.updatedAt) : null;
    }

    if (report.status !== AnalysisStatus.COMPLETE) {
      return null;
    }

    if (!plan || plan.status === PlanStatus.PENDING) {
      const claim = claims.get(claimKey('logistics', requestId, plan?.attempt ?? 0));
      if (claim) {
        return olderThan(claim.claimedAt, stalledAfter) ? stalled('logistics', claim.claimedAt) : null;
      }
      const since =
        plan?.updatedAt ?? request.handoffRepublishedAt ?? report.completedAt ?? report.updatedAt;
      return olderThan(since, this.config.stuckAfterMs)
        ? {
            requestId,
            reason: 'handoff_lost',
            stage: 'logistics',
            action: 'republish_logistics_trigger',
            since,
          }
        : null;
    }

    if (plan.status === PlanStatus.PLANNING) {
      return olderThan(plan.updatedAt, stalledAfter) ? stalled('logistics', plan.updatedAt) : null;
    }

    return null;
  }

  /**
   * Returns false when a republish could not be enqueued.
   */
  private async apply(item: StuckRequest): Promise<boolean> {
    const { store, audit, publisher } = this.deps;

    if (item.action === 'mark_failed') {
      await this.markFailed(item.requestId, item.stage);
      return true;
    }

    const topic =
      item.action === 'republish_damage_trigger' ? this.config.damageTopic : this.config.logisticsTopic;
    const receipt = await publisher.publish(topic, item.requestId);
    if (!receipt) {
      return false;
    }

    // Restarts the window so the next scan does not republish again
    await store.update(
      'requests',
      item.requestId,
      item.reason === 'untriggered'
        ? { triggerPublishedAt: receipt.enqueuedAt }
        : { handoffRepublishedAt: receipt.enqueuedAt }
    );
    audit.record(item.requestId, AuditEventType.TRIGGER_REPUBLISHED, {
      topic,
      reason: item.reason,
      messageId: receipt.messageId,
    });
    return true;
  }

  /**
   * Fail a stage that stopped making progress so an operator can reprocess it.
   * A claim without a record gets a failed record of its own.
   */
  private async markFailed(requestId: string, stage: PipelineStage): Promise<void> {
    const { store, audit } = this.deps;
    const machine = new StageStateMachine({ stage, requestId, initialState: 'running' });
    machine.fail(STALLED_ERROR);
    const now = new Date().toISOString();

    if (stage === 'damage') {
      const report = await store.read('damage_reports', requestId);
      if (!report) {
        await store.create('damage_reports', requestId, {
          requestId,
          findings: [],
          status: AnalysisStatus.FAILED,
          attempt: 0,
          error: STALLED_ERROR,
          createdAt: now,
          updatedAt: now,
        });
      } else if (report.status === AnalysisStatus.ANALYZING || report.status === AnalysisStatus.PENDING) {
        await store.update(
          'damage_reports',
          requestId,
          { status: AnalysisStatus.FAILED, error: STALLED_ERROR, updatedAt: now },
          { expectStatus: report.status }
        );
      } else {
        throw new StoreConflictError('damage_reports', requestId, `Report is already ${report.status}`);
      }
    } else {
      const plan = await store.read('logistics_plans', requestId);
      if (!plan) {
        await store.create('logistics_plans', requestId, {
          requestId,
          actions: [],
          status: PlanStatus.FAILED,
          attempt: 0,
          error: STALLED_ERROR,
          createdAt: now,
          updatedAt: now,
        });
      } else if (plan.status === PlanStatus.PLANNING || plan.status === PlanStatus.PENDING) {
        await store.update(
          'logistics_plans',
          requestId,
          { status: PlanStatus.FAILED, error: STALLED_ERROR, updatedAt: now },
          { expectStatus: plan.status }
        );
      } else {
        throw new StoreConflictError('logistics_plans', requestId, `Plan is already ${plan.status}`);
      }
    }

    await advanceRequestStatus(store, requestId, machine.requestStatus, now);
    audit.record(requestId, AuditEventType.STALLED_MARKED_FAILED, { stage, error: STALLED_ERROR });
    log.warn({ requestId, stage }, 'Stalled stage marked failed');
  }
}

function assertFailed<T extends DamageReport | LogisticsPlan>(
  label: string,
  requestId: string,
  record: T | null
): asserts record is T {
  if (!record) {
    throw new ConflictError(`${label} for ${requestId} does not exist`, { status: null });
  }
  if (record.status !== 'failed') {
    throw new ConflictError(
      `${label} for ${requestId} is ${record.status}; only failed records can be reprocessed`,
      { status: record.status }
    );
  }
}

async function resetOrConflict(requestId: string, reset: () => Promise<unknown>): Promise<void> {
  try {
    await reset();
  } catch (error) {
    if (error instanceof StoreConflictError) {
      throw new ConflictError(`Record for ${requestId} changed while resetting: ${error.message}`);
    }
    throw error;
  }
}
