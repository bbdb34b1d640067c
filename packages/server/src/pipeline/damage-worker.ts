import { AnalysisStatus } from '@relief-pipeline/shared';
import { Outcome, type BusMessage, type DeliveryOutcome } from '../bus/types.js';
import { runExternal } from '../engines/timeout.js';
import type { AnalysisResult, ImageryAnalyzer } from '../engines/types.js';
import { AuditEventType } from './audit-log.js';
import { BusRedeliveryDuplicate, ExternalFunctionError, PreconditionError } from './errors.js';
import { StageWorker, type StageWorkerConfig, type StageWorkerDeps } from './stage-worker.js';
import type { TriggerPublisher } from './trigger-publisher.js';

export interface DamageWorkerDeps extends StageWorkerDeps {
  analyzer: ImageryAnalyzer;
  publisher: TriggerPublisher;
}

export interface DamageWorkerConfig extends StageWorkerConfig {
  /** Topic the hand-off trigger is published to */
  logisticsTopic: string;
}

/**
 * Damage analysis stage: `triggered → analyzing → (complete | failed)`.
 *
 * On success the report is completed before the logistics trigger is
 * published, so a consumer of that trigger always finds a complete report
 * once the store write is visible.
 */
export class DamageWorker extends StageWorker {
  private readonly analyzer: ImageryAnalyzer;
  private readonly publisher: TriggerPublisher;
  private readonly logisticsTopic: string;

  constructor(deps: DamageWorkerDeps, config: DamageWorkerConfig) {
    super('damage', deps, config);
    this.analyzer = deps.analyzer;
    this.publisher = deps.publisher;
    this.logisticsTopic = config.logisticsTopic;
  }

  protected async process(requestId: string, message: BusMessage): Promise<DeliveryOutcome> {
    const { store, audit } = this.deps;

    const existing = await store.read('damage_reports', requestId);
    if (existing && existing.status !== AnalysisStatus.PENDING) {
      throw new BusRedeliveryDuplicate(requestId, existing.status);
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
        'damage_reports',
        requestId,
        { status: AnalysisStatus.ANALYZING, claimedBy: this.config.workerId, updatedAt: startedAt },
        { expectStatus: AnalysisStatus.PENDING }
      );
    } else {
      await store.create('damage_reports', requestId, {
        requestId,
        findings: [],
        status: AnalysisStatus.ANALYZING,
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
      analyzer: this.analyzer.name,
    });

    let result: AnalysisResult;
    try {
      result = await runExternal('Imagery analysis', this.config.stageTimeoutMs, (signal) =>
        this.analyzer.analyze(
          { requestId, location: request.location, imagery: request.imagery },
          { signal }
        )
      );
    } catch (error) {
      if (!(error instanceof ExternalFunctionError)) {
        throw error;
      }
      machine.fail(error.message);
      await store.update(
        'damage_reports',
        requestId,
        { status: AnalysisStatus.FAILED, error: error.message, updatedAt: new Date().toISOString() },
        { expectStatus: AnalysisStatus.ANALYZING }
      );
      await this.setRequestStatus(requestId, machine.requestStatus);
      audit.record(requestId, AuditEventType.STAGE_FAILED, {
        stage: this.stage,
        attempt,
        error: error.message,
        timedOut: error.timedOut,
      });
      this.logger.warn({ requestId, attempt, timedOut: error.timedOut }, 'Damage analysis failed');
      return Outcome.ack();
    }

    machine.complete({ findings: result.findings.length });
    const completedAt = new Date().toISOString();
    await store.update(
      'damage_reports',
      requestId,
      {
        findings: result.findings,
        ...(result.summary !== undefined && { summary: result.summary }),
        ...(result.model !== undefined && { analysisModel: result.model }),
        status: AnalysisStatus.COMPLETE,
        updatedAt: completedAt,
        completedAt,
      },
      { expectStatus: AnalysisStatus.ANALYZING }
    );
    await this.setRequestStatus(requestId, machine.requestStatus);
    audit.record(requestId, AuditEventType.STAGE_COMPLETED, {
      stage: this.stage,
      attempt,
      findings: result.findings.length,
      ...(result.model !== undefined && { model: result.model }),
    });
    this.logger.info({ requestId, attempt, findings: result.findings.length }, 'Damage analysis complete');

    // A failed hand-off is left to the reconciler.
    await this.publisher.publish(this.logisticsTopic, requestId);
    return Outcome.ack();
  }
}
