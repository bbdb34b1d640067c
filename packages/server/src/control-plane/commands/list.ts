import { Command } from 'commander';
import { RequestStatus } from '@relief-pipeline/shared';
import { createClient, reportCommandError, reportInvalidOptions, withClientOptions } from '../client-factory.js';
import { dim, formatJson, formatRequestList, print } from '../formatter.js';
import { listOptionsSchema } from '../validators.js';

/**
 * Create the list command.
 */
export function createListCommand(): Command {
  const command = new Command('list')
    .alias('ls')
    .description('List rescue requests, newest first')
    .option('--status <status>', `Filter by status (${Object.values(RequestStatus).join(', ')})`)
    .option('-l, --limit <n>', 'Maximum number of results', '20')
    .option('-o, --offset <n>', 'Skip first N results', '0');

  return withClientOptions(command).action(async (options: Record<string, unknown>) => {
    try {
      await executeList(options);
    } catch (error) {
      reportCommandError(error);
    }
  });
}

async function executeList(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = listOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    reportInvalidOptions(optionsResult.error);
    return;
  }
  const options = optionsResult.data;

  const page = await createClient(options).requests.list({
    limit: options.limit,
    offset: options.offset,
    ...(options.status !== undefined && { status: options.status }),
  });

  if (options.json) {
    print(formatJson(page));
    return;
  }

  print(formatRequestList(page.items));
  if (page.hasMore) {
    print('');
    print(
      dim(
        `Showing ${page.items.length} of ${page.total}. Use --offset ${page.offset + page.items.length} to see more.`
      )
    );
  }
}
