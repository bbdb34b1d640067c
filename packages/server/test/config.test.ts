/**
 * Configuration Module Tests
 *
 * Environment variable loading, validation and the public settings view.
 */

import { access } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  DEFAULT_INVENTORY_FILE,
  getConfig,
  getPublicSettings,
  loadConfig,
  resetConfig,
} from '../src/config/index.js';

describe('Configuration Module', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetConfig();
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('RELIEF_') && key !== 'RELIEF_LOG_LEVEL') {
        delete process.env[key];
      }
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    process.env = { ...originalEnv };
    resetConfig();
  });

  describe('DEFAULT_INVENTORY_FILE', () => {
    it('should point at the inventory shipped in the server package', async () => {
      expect(DEFAULT_INVENTORY_FILE).toBe(fileURLToPath(new URL('../data/inventory.json', import.meta.url)));
      await expect(access(DEFAULT_INVENTORY_FILE)).resolves.toBeUndefined();
    });
  });

  describe('loadConfig', () => {
    it('should return the defaults when no env vars are set', () => {
      const config = loadConfig();

      expect(config.port).toBe(3001);
      expect(config.host).toBe('0.0.0.0');
      expect(config.apiKey).toBeUndefined();
      expect(config.damageTopic).toBe('damage-analysis');
      expect(config.logisticsTopic).toBe('logistics-planning');
      expect(config.stageTimeoutMs).toBe(120000);
      expect(config.workerConcurrency).toBe(4);
      expect(config.maxDeliveries).toBe(8);
      expect(config.maxPreconditionAttempts).toBe(5);
      expect(config.redelivery).toEqual({
        baseDelayMs: 1000,
        maxDelayMs: 60000,
        backoffMultiplier: 2,
        jitterFactor: 0.1,
      });
      expect(config.publishRetry).toEqual({ maxAttempts: 3, baseDelayMs: 200, maxDelayMs: 5000 });
      expect(config.stuckAfterMs).toBe(300000);
      expect(config.reconcileIntervalMs).toBe(0);
      expect(config.inventoryFile).toBe(DEFAULT_INVENTORY_FILE);
      expect(config.analyzerUrl).toBeUndefined();
    });

    it('should parse numeric env vars', () => {
      vi.stubEnv('RELIEF_PORT', '8080');
      vi.stubEnv('RELIEF_STAGE_TIMEOUT_MS', '5000');
      vi.stubEnv('RELIEF_REDELIVERY_JITTER_FACTOR', '0');
      vi.stubEnv('RELIEF_PUBLISH_MAX_ATTEMPTS', '5');

      const config = loadConfig();

      expect(config.port).toBe(8080);
      expect(config.stageTimeoutMs).toBe(5000);
      expect(config.redelivery.jitterFactor).toBe(0);
      expect(config.publishRetry.maxAttempts).toBe(5);
    });

    it('should read the engine endpoints and API key', () => {
      vi.stubEnv('RELIEF_ANALYZER_URL', 'http://analyzer.test/analyze');
      vi.stubEnv('RELIEF_PLANNER_URL', 'http://planner.test/plan');
      vi.stubEnv('RELIEF_API_KEY', 'test-secret');

      const config = loadConfig();

      expect(config.analyzerUrl).toBe('http://analyzer.test/analyze');
      expect(config.plannerUrl).toBe('http://planner.test/plan');
      expect(config.apiKey).toBe('test-secret');
    });

    it('should reject a value out of range', () => {
      vi.stubEnv('RELIEF_STUCK_AFTER_MS', '10');

      expect(() => loadConfig()).toThrow(/^Configuration validation failed: /);
    });

    it('should reject a value that is not a number', () => {
      vi.stubEnv('RELIEF_MAX_DELIVERIES', 'many');

      expect(() => loadConfig()).toThrow(/^Configuration validation failed: /);
    });

    it('should reject an engine endpoint that is not a URL', () => {
      vi.stubEnv('RELIEF_ANALYZER_URL', 'analyzer');

      expect(() => loadConfig()).toThrow(/^Configuration validation failed: /);
    });
  });

  describe('getConfig', () => {
    it('should cache the configuration until reset', () => {
      const first = getConfig();
      vi.stubEnv('RELIEF_PORT', '9000');

      expect(getConfig()).toBe(first);

      resetConfig();
      expect(getConfig().port).toBe(9000);
    });
  });

  describe('getPublicSettings', () => {
    it('should report whether an API key is set without revealing it', () => {
      vi.stubEnv('RELIEF_API_KEY', 'test-secret');

      const settings = getPublicSettings(loadConfig());

      expect(settings.apiKeyConfigured).toBe(true);
      expect(Object.values(settings)).not.toContain('test-secret');
    });
  });
});
