import { Command } from 'commander';
import { createSubmitCommand } from './commands/submit.js';
import { createStatusCommand } from './commands/status.js';
import { createListCommand } from './commands/list.js';
import { createReprocessCommand } from './commands/reprocess.js';
import { createReconcileCommand } from './commands/reconcile.js';
import { createDeadLettersCommand } from './commands/dead-letters.js';
import { createAuditCommand } from './commands/audit.js';
import { createServeCommand } from './commands/serve.js';

const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('relief')
    .description('Relief pipeline - intake, damage analysis and logistics planning for rescue requests')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createServeCommand());
  program.addCommand(createSubmitCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createListCommand());
  program.addCommand(createReprocessCommand());
  program.addCommand(createReconcileCommand());
  program.addCommand(createDeadLettersCommand());
  program.addCommand(createAuditCommand());

  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
    ) {
      return;
    }
    throw error;
  }
}

export { createSubmitCommand } from './commands/submit.js';
export { createStatusCommand } from './commands/status.js';
export { createListCommand } from './commands/list.js';
export { createReprocessCommand } from './commands/reprocess.js';
export { createReconcileCommand } from './commands/reconcile.js';
export { createDeadLettersCommand } from './commands/dead-letters.js';
export { createAuditCommand } from './commands/audit.js';
export { createServeCommand } from './commands/serve.js';
