import { Command } from 'commander';
import { createClient, reportCommandError, reportInvalidOptions, withClientOptions } from '../client-factory.js';
import { formatJson, formatReconcileReport, print } from '../formatter.js';
import { reconcileOptionsSchema } from '../validators.js';

/**
 * Create the reconcile command.
 */
export function createReconcileCommand(): Command {
  const command = new Command('reconcile')
    .description('Find requests stuck between stages and republish or fail them')
    .option('--dry-run', 'Only report stuck requests', false);

  return withClientOptions(command).action(async (options: Record<string, unknown>) => {
    try {
      await executeReconcile(options);
    } catch (error) {
      reportCommandError(error);
    }
  });
}

async function executeReconcile(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = reconcileOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    reportInvalidOptions(optionsResult.error);
    return;
  }
  const options = optionsResult.data;

  const report = await createClient(options).operator.reconcile({ dryRun: options.dryRun });

  print(options.json ? formatJson(report) : formatReconcileReport(report));
}
