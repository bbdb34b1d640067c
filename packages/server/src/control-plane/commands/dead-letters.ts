import { Command } from 'commander';
import { createClient, reportCommandError, reportInvalidOptions, withClientOptions } from '../client-factory.js';
import { formatDeadLetters, formatJson, print } from '../formatter.js';
import { clientOptionsSchema } from '../validators.js';

/**
 * Create the dead-letters command.
 */
export function createDeadLettersCommand(): Command {
  const command = new Command('dead-letters').description(
    'List triggers that exhausted their deliveries'
  );

  return withClientOptions(command).action(async (options: Record<string, unknown>) => {
    try {
      const optionsResult = clientOptionsSchema.safeParse(options);
      if (!optionsResult.success) {
        reportInvalidOptions(optionsResult.error);
        return;
      }
      const deadLetters = await createClient(optionsResult.data).operator.deadLetters();
      print(optionsResult.data.json ? formatJson(deadLetters) : formatDeadLetters(deadLetters));
    } catch (error) {
      reportCommandError(error);
    }
  });
}
