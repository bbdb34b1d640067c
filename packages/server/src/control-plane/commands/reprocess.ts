import { Command } from 'commander';
import { PipelineStage } from '@relief-pipeline/shared';
import { createClient, reportCommandError, reportInvalidOptions, withClientOptions } from '../client-factory.js';
import { formatJson, formatReprocessAck, print } from '../formatter.js';
import { reprocessOptionsSchema } from '../validators.js';

/**
 * Create the reprocess command.
 */
export function createReprocessCommand(): Command {
  const command = new Command('reprocess')
    .description('Reset a failed stage of a request and trigger it again')
    .argument('<id>', 'Request ID')
    .requiredOption('--stage <stage>', `Stage to rerun (${Object.values(PipelineStage).join(', ')})`);

  return withClientOptions(command).action(async (id: string, options: Record<string, unknown>) => {
    try {
      await executeReprocess(id, options);
    } catch (error) {
      reportCommandError(error);
    }
  });
}

async function executeReprocess(id: string, rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = reprocessOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    reportInvalidOptions(optionsResult.error);
    return;
  }
  const options = optionsResult.data;

  const ack = await createClient(options).requests.reprocess(id.trim(), options.stage);

  print(options.json ? formatJson(ack) : formatReprocessAck(ack));
}
