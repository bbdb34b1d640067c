import { Command } from 'commander';
import { createClient, reportCommandError, reportInvalidOptions, withClientOptions } from '../client-factory.js';
import { formatJson, formatRequestDetail, print } from '../formatter.js';
import { clientOptionsSchema } from '../validators.js';

/**
 * Create the status command.
 */
export function createStatusCommand(): Command {
  const command = new Command('status')
    .description('Show a request with its damage report and logistics plan')
    .argument('<id>', 'Request ID');

  return withClientOptions(command).action(async (id: string, options: Record<string, unknown>) => {
    try {
      await executeStatus(id, options);
    } catch (error) {
      reportCommandError(error);
    }
  });
}

async function executeStatus(id: string, rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = clientOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    reportInvalidOptions(optionsResult.error);
    return;
  }
  const options = optionsResult.data;

  const view = await createClient(options).requests.get(id.trim());

  if (options.json) {
    print(formatJson(view));
  } else {
    print(formatRequestDetail(view));
  }
}
