import { AnalysisStatus, PlanStatus } from '@relief-pipeline/shared';
import { Outcome, type BusMessage, type DeliveryOutcome } from '../bus/types.js';
import { runExternal } from '../engines/timeout.js';
import type { InventorySource, PlanGenerator, PlanResult } from '../engines/types.js';
import { AuditEventType } from './audit-log.js';
import { BusRedeliveryDuplicate, ExternalFunctionError, PreconditionError } from './errors.js';
import { StageWorker, type StageWorkerConfig, type StageWorkerDeps } from './stage-worker.js';

export interface LogisticsWorkerDeps extends StageWorkerDeps {
  planner: PlanGenerator;
  inventory: InventorySource;
}

/**
 * Logistics planning stage: `triggered → planning → (complete | failed)`.
 *
 * Runs only on a complete DamageReport. The trigger may arrive before the
 * report write is visible, so an absent or unfinished report is requeued; a
 * failed report ends the pipeline without writing a plan.
 */
export class LogisticsWorker extends StageWorker {
  private readonly planner: PlanGenerator;
  private readonly inventory: InventorySource;

  constructor(deps: LogisticsWorkerDeps, config: StageWorkerConfig) {
    super('logistics', deps, config);
    this.planner = deps.planner;
    this.inventory = deps.inventory;
  }

  protected async process(requestId: string, message: BusMessage): Promise<DeliveryOutcome> {
    const { store, audit } = this.deps;

    const existing = await store.read('logistics_plans', requestId);
    if (existing && existing.status !== PlanStatus.PENDING) {
      throw new BusRedeliveryDuplicate(requestId, existing.status);
    }

    const report = await store.read('damage_reports', requestId);
    if (!report) {
      throw new PreconditionError(requestId, `No damage report for ${requestId} yet`);
    }
    if (report.status === AnalysisStatus.FAILED) {
      this.logger.info({ requestId }, 'Damage analysis failed; no plan will be generated');
      audit.record(requestId, AuditEventType.PIPELINE_HALTED, {
        stage: this.stage,
        reason: 'damage analysis failed',
        messageId: message.messageId,
      });
      return Outcome.ack();
    }
    if (report.status !== AnalysisStatus.COMPLETE) {
      throw new PreconditionError(
        requestId,
        `Damage report for ${requestId} is ${report.status}, not complete`
      );
    }

    const request = await store.read('requests', requestId);
    if (!request) {
      throw new PreconditionError(requestId, `Request ${requestId} not found`);
    }

    const attempt = existing?.attempt ?? 0;
    const machine = this.createMachine(requestId, existing ? 'pending' : 'triggered');

    await this.claimAttempt(requestId, attempt);
    machine.claim({ messageId: message.messageId, attempt });

    const startedAt = new Date().toISOString();
    if (existing) {
      await store.update(
        'logistics_plans',
        requestId,
        { status: PlanStatus.PLANNING, claimedBy: this.config.workerId, updatedAt: startedAt },
        { expectStatus: PlanStatus.PENDING }
      );
    } else {
      await store.create('logistics_plans', requestId, {
        requestId,
        actions: [],
        status: PlanStatus.PLANNING,
        attempt,
        claimedBy: this.config.workerId,
        createdAt: startedAt,
        updatedAt: startedAt,
      });
    }
    await this.setRequestStatus(requestId, machine.requestStatus);
    audit.record(requestId, AuditEventType.STAGE_STARTED, {
      stage: this.stage,
      attempt,
      workerId: this.config.workerId,
      planner: this.planner.name,
    });

    let result: PlanResult;
    try {
      result = await runExternal('Plan generation', this.config.stageTimeoutMs, async (signal) => {
        const inventory = await this.inventory.snapshot();
        return this.planner.generate({ requestId, findings: report.findings, inventory }, { signal });
      });
    } catch (error) {
      if (!(error instanceof ExternalFunctionError)) {
        throw error;
      }
      machine.fail(error.message);
      await store.update(
        'logistics_plans',
        requestId,
        { status: PlanStatus.FAILED, error: error.message, updatedAt: new Date().toISOString() },
        { expectStatus: PlanStatus.PLANNING }
      );
      await this.setRequestStatus(requestId, machine.requestStatus);
      audit.record(requestId, AuditEventType.STAGE_FAILED, {
        stage: this.stage,
        attempt,
        error: error.message,
        timedOut: error.timedOut,
      });
      this.logger.warn({ requestId, attempt, timedOut: error.timedOut }, 'Logistics planning failed');
      return Outcome.ack();
    }

    machine.complete({ actions: result.actions.length });
    const completedAt = new Date().toISOString();
    await store.update(
      'logistics_plans',
      requestId,
      {
        actions: result.actions,
        ...(result.summary !== undefined && { summary: result.summary }),
        ...(result.model !== undefined && { planningModel: result.model }),
        status: PlanStatus.COMPLETE,
        updatedAt: completedAt,
        completedAt,
      },
      { expectStatus: PlanStatus.PLANNING }
    );
    await this.setRequestStatus(requestId, machine.requestStatus);
    audit.record(requestId, AuditEventType.STAGE_COMPLETED, {
      stage: this.stage,
      attempt,
      actions: result.actions.length,
      ...(result.model !== undefined && { model: result.model }),
    });
    this.logger.info({ requestId, attempt, actions: result.actions.length }, 'Logistics plan complete');

    return Outcome.ack();
  }
}
