import { z } from 'zod';
import {
  damageFindingSchema,
  deploymentActionSchema,
  type DamageFinding,
  type ImageryRefs,
  type Location,
} from '@relief-pipeline/shared';

/**
 * Reply expected from an imagery analyzer.
 */
export const analysisResultSchema = z.object({
  findings: z.array(damageFindingSchema),
  summary: z.string().optional(),
  model: z.string().optional(),
});

export type AnalysisResult = z.infer<typeof analysisResultSchema>;

/**
 * Reply expected from a plan generator. Actions keep the order they arrive in.
 */
export const planResultSchema = z.object({
  actions: z.array(deploymentActionSchema),
  summary: z.string().optional(),
  model: z.string().optional(),
});

export type PlanResult = z.infer<typeof planResultSchema>;

/** Resource name to available quantity */
export type InventorySnapshot = Record<string, number>;

export interface AnalysisInput {
  requestId: string;
  location: Location;
  imagery: ImageryRefs;
}

export interface PlanInput {
  requestId: string;
  findings: DamageFinding[];
  inventory: InventorySnapshot;
}

export interface EngineCallOptions {
  /** Aborted when the stage timeout elapses */
  signal: AbortSignal;
}

export interface ImageryAnalyzer {
  readonly name: string;
  analyze(input: AnalysisInput, options: EngineCallOptions): Promise<AnalysisResult>;
}

export interface PlanGenerator {
  readonly name: string;
  generate(input: PlanInput, options: EngineCallOptions): Promise<PlanResult>;
}

export interface InventorySource {
  snapshot(): Promise<InventorySnapshot>;
}
