import type { Command } from 'commander';
import { z, type ZodError } from 'zod';
import { ReliefClient, ValidationError } from '@relief-pipeline/client';
import { formatError, formatValidationErrors, printError } from './formatter.js';
import { toValidationIssues, type ClientOptions, type ValidationIssue } from './validators.js';

const issueDetailsSchema = z.object({
  issues: z.array(z.object({ path: z.string(), message: z.string() })),
});

/**
 * Build an API client from the shared command options. The API key falls
 * back to RELIEF_API_KEY.
 */
export function createClient(options: ClientOptions): ReliefClient {
  const apiKey = options.apiKey ?? process.env['RELIEF_API_KEY'];
  return new ReliefClient({
    baseUrl: options.server,
    timeout: options.timeout,
    ...(apiKey !== undefined && apiKey !== '' && { apiKey }),
  });
}

function printValidationIssues(issues: ValidationIssue[]): void {
  printError(formatValidationErrors(issues));
  process.exitCode = 1;
}

/**
 * Print invalid command options and mark the process as failed.
 */
export function reportInvalidOptions(error: ZodError): void {
  printValidationIssues(toValidationIssues(error));
}

/**
 * Print a command failure. Field-level issues returned by the server are
 * listed one per line.
 */
export function reportCommandError(error: unknown): void {
  if (error instanceof ValidationError) {
    const details = issueDetailsSchema.safeParse(error.details);
    if (details.success) {
      printValidationIssues(details.data.issues);
      return;
    }
  }
  printError(formatError(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
}

/**
 * Add the connection and output options every client command takes.
 */
export function withClientOptions(command: Command): Command {
  return command
    .option('-s, --server <url>', 'Server URL (default: RELIEF_SERVER_URL or http://localhost:3001)')
    .option('-k, --api-key <key>', 'API key (default: RELIEF_API_KEY)')
    .option('--timeout <ms>', 'Request timeout in milliseconds', '30000')
    .option('--json', 'Output result as JSON', false);
}
