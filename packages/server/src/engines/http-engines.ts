import type { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { ExternalFunctionError } from '../pipeline/errors.js';
import {
  analysisResultSchema,
  planResultSchema,
  type AnalysisInput,
  type AnalysisResult,
  type EngineCallOptions,
  type ImageryAnalyzer,
  type PlanGenerator,
  type PlanInput,
  type PlanResult,
} from './types.js';

const log = createLogger('http-engines');

export interface HttpEngineConfig {
  url: string;
  /** Injected in tests */
  fetch?: typeof fetch;
}

/**
 * POST `body` as JSON and validate the reply against `schema`.
 */
async function postJson<T>(
  fetchFn: typeof fetch,
  url: string,
  body: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  signal: AbortSignal
): Promise<T> {
  const response = await fetchFn(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
    body: JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    throw new ExternalFunctionError(`${url} responded with HTTP ${response.status}`);
  }

  const data: unknown = await response.json();
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    log.warn({ url, errors: parsed.error.errors }, 'Engine reply failed validation');
    throw new ExternalFunctionError(`Invalid reply from ${url}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Imagery analyzer reached over HTTP. The service receives
 * `{ requestId, location, imagery }` and answers `{ findings, summary?, model? }`.
 */
export class HttpImageryAnalyzer implements ImageryAnalyzer {
  readonly name = 'http-analyzer';
  private readonly fetchFn: typeof fetch;

  constructor(private readonly config: HttpEngineConfig) {
    this.fetchFn = config.fetch ?? fetch;
  }

  analyze(input: AnalysisInput, options: EngineCallOptions): Promise<AnalysisResult> {
    return postJson(this.fetchFn, this.config.url, input, analysisResultSchema, options.signal);
  }
}

/**
 * Plan generator reached over HTTP. The service receives
 * `{ requestId, findings, inventory }` and answers `{ actions, summary?, model? }`.
 */
export class HttpPlanGenerator implements PlanGenerator {
  readonly name = 'http-planner';
  private readonly fetchFn: typeof fetch;

  constructor(private readonly config: HttpEngineConfig) {
    this.fetchFn = config.fetch ?? fetch;
  }

  generate(input: PlanInput, options: EngineCallOptions): Promise<PlanResult> {
    return postJson(this.fetchFn, this.config.url, input, planResultSchema, options.signal);
  }
}

/**
 * Stands in when no analyzer URL is configured; every run fails its stage.
 */
export class UnconfiguredImageryAnalyzer implements ImageryAnalyzer {
  readonly name = 'unconfigured';

  analyze(): Promise<AnalysisResult> {
    return Promise.reject(
      new ExternalFunctionError('No imagery analyzer configured (set RELIEF_ANALYZER_URL)')
    );
  }
}

export class UnconfiguredPlanGenerator implements PlanGenerator {
  readonly name = 'unconfigured';

  generate(): Promise<PlanResult> {
    return Promise.reject(
      new ExternalFunctionError('No plan generator configured (set RELIEF_PLANNER_URL)')
    );
  }
}
