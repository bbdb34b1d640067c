/**
 * Relief Pipeline Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Inventory file shipped with the server package
 */
export const DEFAULT_INVENTORY_FILE = fileURLToPath(
  new URL('../../data/inventory.json', import.meta.url)
);

/**
 * Bus redelivery backoff schedule
 */
const redeliverySchema = z.object({
  /** Delay before the first redelivery */
  baseDelayMs: z.coerce.number().int().min(0).max(600000).default(1000),
  /** Cap on a single redelivery delay */
  maxDelayMs: z.coerce.number().int().min(0).max(3600000).default(60000),
  backoffMultiplier: z.coerce.number().min(1).max(10).default(2),
  /** Random extra delay as a fraction of the computed delay (0-1) */
  jitterFactor: z.coerce.number().min(0).max(1).default(0.1),
});

export type RedeliveryConfig = z.infer<typeof redeliverySchema>;

/**
 * Trigger publish retry policy, shared by the router and the damage worker
 */
const publishRetrySchema = z.object({
  maxAttempts: z.coerce.number().int().min(1).max(20).default(3),
  baseDelayMs: z.coerce.number().int().min(0).max(60000).default(200),
  maxDelayMs: z.coerce.number().int().min(0).max(600000).default(5000),
});

export type PublishRetryConfig = z.infer<typeof publishRetrySchema>;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Paths
  dataDir: z.string().min(1).default(join(homedir(), '.relief')),
  inventoryFile: z.string().min(1).default(DEFAULT_INVENTORY_FILE),

  // Server
  port: z.coerce.number().int().min(1).max(65535).default(3001),
  host: z.string().default('0.0.0.0'),
  apiKey: z.string().min(1).optional(),

  // Topics
  damageTopic: z.string().min(1).default('damage-analysis'),
  logisticsTopic: z.string().min(1).default('logistics-planning'),

  // Stage execution
  stageTimeoutMs: z.coerce.number().int().min(100).max(3600000).default(120000),
  workerConcurrency: z.coerce.number().int().min(1).max(64).default(4),

  // Delivery
  maxDeliveries: z.coerce.number().int().min(1).max(100).default(8),
  maxPreconditionAttempts: z.coerce.number().int().min(1).max(100).default(5),
  redelivery: redeliverySchema,
  publishRetry: publishRetrySchema,

  // Reconciliation
  stuckAfterMs: z.coerce.number().int().min(1000).max(86400000).default(300000),
  /** 0 disables the periodic reconciler */
  reconcileIntervalMs: z.coerce.number().int().min(0).max(86400000).default(0),

  // File store
  lockStaleMs: z.coerce.number().int().min(100).max(600000).default(30000),

  // External engines
  analyzerUrl: z.string().url().optional(),
  plannerUrl: z.string().url().optional(),
});

export type ReliefConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(): ReliefConfig {
  const raw = {
    dataDir: process.env.RELIEF_DATA_DIR,
    inventoryFile: process.env.RELIEF_INVENTORY_FILE,
    port: process.env.RELIEF_PORT,
    host: process.env.RELIEF_HOST,
    apiKey: process.env.RELIEF_API_KEY,
    damageTopic: process.env.RELIEF_DAMAGE_TOPIC,
    logisticsTopic: process.env.RELIEF_LOGISTICS_TOPIC,
    stageTimeoutMs: process.env.RELIEF_STAGE_TIMEOUT_MS,
    workerConcurrency: process.env.RELIEF_WORKER_CONCURRENCY,
    maxDeliveries: process.env.RELIEF_MAX_DELIVERIES,
    maxPreconditionAttempts: process.env.RELIEF_MAX_PRECONDITION_ATTEMPTS,
    redelivery: {
      baseDelayMs: process.env.RELIEF_REDELIVERY_BASE_DELAY_MS,
      maxDelayMs: process.env.RELIEF_REDELIVERY_MAX_DELAY_MS,
      backoffMultiplier: process.env.RELIEF_REDELIVERY_BACKOFF_MULTIPLIER,
      jitterFactor: process.env.RELIEF_REDELIVERY_JITTER_FACTOR,
    },
    publishRetry: {
      maxAttempts: process.env.RELIEF_PUBLISH_MAX_ATTEMPTS,
      baseDelayMs: process.env.RELIEF_PUBLISH_BASE_DELAY_MS,
      maxDelayMs: process.env.RELIEF_PUBLISH_MAX_DELAY_MS,
    },
    stuckAfterMs: process.env.RELIEF_STUCK_AFTER_MS,
    reconcileIntervalMs: process.env.RELIEF_RECONCILE_INTERVAL_MS,
    lockStaleMs: process.env.RELIEF_LOCK_STALE_MS,
    analyzerUrl: process.env.RELIEF_ANALYZER_URL,
    plannerUrl: process.env.RELIEF_PLANNER_URL,
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.info(
    {
      dataDir: result.data.dataDir,
      stageTimeoutMs: result.data.stageTimeoutMs,
      workerConcurrency: result.data.workerConcurrency,
      maxDeliveries: result.data.maxDeliveries,
      reconcileIntervalMs: result.data.reconcileIntervalMs,
      analyzerConfigured: result.data.analyzerUrl !== undefined,
      plannerConfigured: result.data.plannerUrl !== undefined,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: ReliefConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): ReliefConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Settings reported on the health endpoint. Never includes the API key.
 */
export function getPublicSettings(config: ReliefConfig = getConfig()): {
  damageTopic: string;
  logisticsTopic: string;
  stageTimeoutMs: number;
  workerConcurrency: number;
  maxDeliveries: number;
  reconcileIntervalMs: number;
  apiKeyConfigured: boolean;
} {
  return {
    damageTopic: config.damageTopic,
    logisticsTopic: config.logisticsTopic,
    stageTimeoutMs: config.stageTimeoutMs,
    workerConcurrency: config.workerConcurrency,
    maxDeliveries: config.maxDeliveries,
    reconcileIntervalMs: config.reconcileIntervalMs,
    apiKeyConfigured: config.apiKey !== undefined,
  };
}
