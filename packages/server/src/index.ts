/**
 * Relief Pipeline Library API
 *
 * Exports the pipeline, its building blocks and the HTTP server for
 * programmatic usage.
 */

export * from '@relief-pipeline/shared';

// Pipeline (main entry point)
export { ReliefPipeline, createPipeline, type PipelineOptions } from './pipeline/pipeline.js';
export { IntakeRouter, generateRequestId } from './pipeline/intake-router.js';
export { DamageWorker } from './pipeline/damage-worker.js';
export { LogisticsWorker } from './pipeline/logistics-worker.js';
export { StageWorker, type StageWorkerConfig, type StageWorkerDeps } from './pipeline/stage-worker.js';
export { Reconciler, STALLED_ERROR, type ReconcilerConfig } from './pipeline/reconciler.js';
export { IdempotencyGuard, type ClaimResult } from './pipeline/idempotency-guard.js';
export { TriggerPublisher } from './pipeline/trigger-publisher.js';
export { AuditLog, AuditEventType } from './pipeline/audit-log.js';
export { StageStateMachine, InvalidTransitionError, type StageState } from './pipeline/stage-machine.js';
export { deriveProgress, getPipelineStatus } from './pipeline/status.js';
export * from './pipeline/errors.js';

// Stores and bus
export * as store from './store/index.js';
export * as bus from './bus/index.js';

// External engines
export * as engines from './engines/index.js';

// Configuration
export { getConfig, loadConfig, resetConfig, type ReliefConfig } from './config/index.js';

// HTTP server
export { createApp, startServer, EventBroadcaster, type AppConfig } from './server/index.js';

// CLI
export { createProgram, runCli } from './control-plane/cli.js';
