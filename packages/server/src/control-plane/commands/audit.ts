import { Command } from 'commander';
import { createClient, reportCommandError, reportInvalidOptions, withClientOptions } from '../client-factory.js';
import { formatAuditTrail, formatJson, print } from '../formatter.js';
import { clientOptionsSchema } from '../validators.js';

/**
 * Create the audit command.
 */
export function createAuditCommand(): Command {
  const command = new Command('audit')
    .description('Show the audit trail of a request')
    .argument('<id>', 'Request ID');

  return withClientOptions(command).action(async (id: string, options: Record<string, unknown>) => {
    try {
      const optionsResult = clientOptionsSchema.safeParse(options);
      if (!optionsResult.success) {
        reportInvalidOptions(optionsResult.error);
        return;
      }
      const events = await createClient(optionsResult.data).operator.audit(id.trim());
      print(optionsResult.data.json ? formatJson(events) : formatAuditTrail(events));
    } catch (error) {
      reportCommandError(error);
    }
  });
}
