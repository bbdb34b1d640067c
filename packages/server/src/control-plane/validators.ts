import { z, type ZodError } from 'zod';
import { PipelineStage, RequestStatus } from '@relief-pipeline/shared';

/**
 * Individual validation error.
 */
export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Convert Zod errors to the CLI's validation issue format.
 */
export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

/**
 * Options shared by every command that talks to a running server
 */
export const clientOptionsSchema = z.object({
  server: z.string().url().default(process.env['RELIEF_SERVER_URL'] ?? 'http://localhost:3001'),
  apiKey: z.string().min(1).optional(),
  timeout: z.coerce.number().int().min(100).max(600000).default(30000),
  json: z.boolean().default(false),
});

export type ClientOptions = z.infer<typeof clientOptionsSchema>;

const coordinate = (min: number, max: number) => z.coerce.number().min(min).max(max).optional();

export const submitOptionsSchema = clientOptionsSchema.extend({
  file: z.string().min(1).optional(),
  location: z.string().min(1).optional(),
  lat: coordinate(-90, 90),
  lon: coordinate(-180, 180),
  event: z.string().min(1).optional(),
  pre: z.array(z.string().min(1)).optional(),
  post: z.array(z.string().min(1)).optional(),
});

export type SubmitOptions = z.infer<typeof submitOptionsSchema>;

export const listOptionsSchema = clientOptionsSchema.extend({
  status: z.nativeEnum(RequestStatus).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export type ListOptions = z.infer<typeof listOptionsSchema>;

export const reprocessOptionsSchema = clientOptionsSchema.extend({
  stage: z.nativeEnum(PipelineStage),
});

export type ReprocessOptions = z.infer<typeof reprocessOptionsSchema>;

export const reconcileOptionsSchema = clientOptionsSchema.extend({
  dryRun: z.boolean().default(false),
});

export type ReconcileOptions = z.infer<typeof reconcileOptionsSchema>;
