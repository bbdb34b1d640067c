/**
 * Pipeline Status Tests
 */

import { describe, it, expect } from 'vitest';
import { NotFoundError } from '../src/pipeline/errors.js';
import { deriveProgress, getPipelineStatus } from '../src/pipeline/status.js';
import { InMemoryStateStore } from '../src/store/memory-state-store.js';
import { makePlan, makeReport, makeRequest } from './helpers/pipeline.js';

describe('deriveProgress', () => {
  it.each([
    ['intake', null, null],
    ['damage_analysis', 'pending', null],
    ['damage_analysis', 'analyzing', null],
    ['logistics_planning', 'complete', null],
    ['logistics_planning', 'complete', 'planning'],
    ['done', 'complete', 'complete'],
    ['failed', 'failed', null],
    ['failed', 'complete', 'failed'],
  ] as const)('should report %s for report %s and plan %s', (expected, reportStatus, planStatus) => {
    const report = reportStatus === null ? null : makeReport('req_1', { status: reportStatus });
    const plan = planStatus === null ? null : makePlan('req_1', { status: planStatus });

    expect(deriveProgress(report, plan)).toBe(expected);
  });
});

describe('getPipelineStatus', () => {
  it('should combine the three records', async () => {
    const store = new InMemoryStateStore();
    await store.create('requests', 'req_1', makeRequest('req_1', { status: 'analyzing' }));
    await store.create('damage_reports', 'req_1', makeReport('req_1'));

    const status = await getPipelineStatus(store, 'req_1');

    expect(status).toEqual({
      requestId: 'req_1',
      progress: 'damage_analysis',
      request: makeRequest('req_1', { status: 'analyzing' }),
      damageReport: makeReport('req_1'),
      logisticsPlan: null,
    });
  });

  it('should throw NotFoundError for an unknown request', async () => {
    const store = new InMemoryStateStore();

    const error: unknown = await getPipelineStatus(store, 'x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ message: 'Request not found: x' });
  });
});
