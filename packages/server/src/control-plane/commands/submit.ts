import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import { intakeRequestSchema } from '@relief-pipeline/shared';
import { createClient, reportCommandError, reportInvalidOptions, withClientOptions } from '../client-factory.js';
import { formatIntakeAck, formatJson, print, printError, formatError } from '../formatter.js';
import { submitOptionsSchema, type SubmitOptions } from '../validators.js';

/**
 * Create the submit command.
 */
export function createSubmitCommand(): Command {
  const command = new Command('submit')
    .description('Submit a rescue request for damage analysis and logistics planning')
    .option('-f, --file <path>', 'Read the request body from a JSON file')
    .option('-l, --location <name>', 'Name of the affected area')
    .option('--lat <degrees>', 'Latitude of the affected area')
    .option('--lon <degrees>', 'Longitude of the affected area')
    .option('-e, --event <name>', 'Name of the disaster event')
    .option('--pre <refs...>', 'Pre-event imagery references')
    .option('--post <refs...>', 'Post-event imagery references');

  return withClientOptions(command).action(async (options: Record<string, unknown>) => {
    try {
      await executeSubmit(options);
    } catch (error) {
      reportCommandError(error);
    }
  });
}

/**
 * Assemble the intake body from a file or from flags.
 */
export async function buildIntakeBody(options: SubmitOptions): Promise<unknown> {
  if (options.file) {
    const content = await readFile(options.file, 'utf-8');
    try {
      return JSON.parse(content);
    } catch (error) {
      throw new Error(
        `${options.file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  return {
    location: {
      name: options.location,
      ...(options.lat !== undefined && { latitude: options.lat }),
      ...(options.lon !== undefined && { longitude: options.lon }),
    },
    ...(options.event !== undefined && { eventName: options.event }),
    imagery: {
      preEvent: options.pre ?? [],
      postEvent: options.post ?? [],
    },
  };
}

async function executeSubmit(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = submitOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    reportInvalidOptions(optionsResult.error);
    return;
  }
  const options = optionsResult.data;

  if (!options.file && !options.location) {
    printError(formatError('Either --file or --location is required'));
    process.exitCode = 1;
    return;
  }

  const bodyResult = intakeRequestSchema.safeParse(await buildIntakeBody(options));
  if (!bodyResult.success) {
    reportInvalidOptions(bodyResult.error);
    return;
  }

  const ack = await createClient(options).requests.submit(bodyResult.data);

  if (options.json) {
    print(formatJson(ack));
  } else {
    print(formatIntakeAck(ack));
  }
}
