import { Command } from 'commander';
import { z } from 'zod';
import { getConfig } from '../../config/index.js';
import { createPipeline } from '../../pipeline/pipeline.js';
import { EventBroadcaster, startServer, type AppConfig } from '../../server/index.js';
import { createLogger } from '../../utils/logger.js';
import { reportCommandError, reportInvalidOptions } from '../client-factory.js';
import { bold, cyan, formatError, print, printError } from '../formatter.js';

const log = createLogger('serve-command');

/**
 * Schema for serve command options
 */
const serveOptionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional(),
  host: z.string().min(1).optional(),
  corsOrigin: z.string().optional(),
  apiKey: z.string().min(1).optional(),
  workers: z.coerce.number().int().min(1).max(32).default(1),
});

/**
 * Create the serve command.
 */
export function createServeCommand(): Command {
  const command = new Command('serve')
    .description('Start the stage workers and the HTTP API')
    .option('-p, --port <port>', 'Port to listen on (default: RELIEF_PORT or 3001)')
    .option('-H, --host <host>', 'Host to bind to (default: RELIEF_HOST or 0.0.0.0)')
    .option('--cors-origin <origin>', 'CORS origin to allow (can specify multiple with comma)')
    .option('--api-key <key>', 'API key for protected endpoints (default: RELIEF_API_KEY)')
    .option('-w, --workers <n>', 'Worker instances per stage', '1')
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeServe(options);
      } catch (error) {
        reportCommandError(error);
      }
    });

  return command;
}

async function executeServe(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = serveOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    reportInvalidOptions(optionsResult.error);
    return;
  }
  const options = optionsResult.data;

  const config = getConfig();
  const port = options.port ?? config.port;
  const host = options.host ?? config.host;
  const apiKey = options.apiKey ?? config.apiKey;
  const corsOrigins = options.corsOrigin
    ? options.corsOrigin.split(',').map((o) => o.trim())
    : ['*'];

  print('Starting relief pipeline...');
  print('');
  print(`${bold('Server Configuration:')}`);
  print(`  ${bold('Port:')} ${cyan(String(port))}`);
  print(`  ${bold('Host:')} ${cyan(host)}`);
  print(`  ${bold('CORS Origins:')} ${cyan(corsOrigins.join(', '))}`);
  print(`  ${bold('API Key:')} ${cyan(apiKey ? '(configured)' : '(none - auth disabled)')}`);
  print('');
  print(`${bold('Pipeline Configuration:')}`);
  print(`  ${bold('Data Dir:')} ${cyan(config.dataDir)}`);
  print(`  ${bold('Topics:')} ${cyan(`${config.damageTopic}, ${config.logisticsTopic}`)}`);
  print(`  ${bold('Workers:')} ${cyan(`${options.workers} x ${config.workerConcurrency} per stage`)}`);
  print(`  ${bold('Stage Timeout:')} ${cyan(`${config.stageTimeoutMs}ms`)}`);
  print(`  ${bold('Max Deliveries:')} ${cyan(String(config.maxDeliveries))}`);
  print(
    `  ${bold('Reconciler:')} ${cyan(config.reconcileIntervalMs > 0 ? `every ${config.reconcileIntervalMs}ms` : 'manual')}`
  );
  print('');

  const pipeline = createPipeline({ config, workersPerStage: options.workers });
  await pipeline.start();

  const serverConfig: AppConfig = {
    pipeline,
    broadcaster: new EventBroadcaster(),
    port,
    host,
    corsOrigins,
  };
  if (apiKey) {
    serverConfig.apiKey = apiKey;
  }

  let server: Awaited<ReturnType<typeof startServer>>;
  try {
    server = await startServer(serverConfig);
  } catch (error) {
    await pipeline.stop();
    throw error;
  }

  let shuttingDown = false;
  const shutdown = (): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    print('');
    print('Shutting down...');

    const shutdownAsync = async (): Promise<void> => {
      await server.close();
      await pipeline.stop();
      print('Stopped');
      process.exit(0);
    };

    shutdownAsync().catch((err: unknown) => {
      log.error({ err }, 'Shutdown failed');
      printError(formatError(err instanceof Error ? err.message : String(err)));
      process.exit(1);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  print(`Server is running at ${cyan(`http://${host}:${port}`)}`);
  print('');
  print('Available endpoints:');
  print(`  ${cyan('GET')}  /health                        - Health check`);
  print(`  ${cyan('GET')}  /health/ready                  - Readiness check`);
  print(`  ${cyan('POST')} /api/v1/requests               - Submit a rescue request`);
  print(`  ${cyan('GET')}  /api/v1/requests               - List requests`);
  print(`  ${cyan('GET')}  /api/v1/requests/:id           - Request status`);
  print(`  ${cyan('POST')} /api/v1/requests/:id/reprocess - Rerun a failed stage`);
  print(`  ${cyan('POST')} /api/v1/reconcile              - Repair stuck requests`);
  print(`  ${cyan('GET')}  /api/v1/dead-letters           - Dead-lettered triggers`);
  print(`  ${cyan('GET')}  /api/v1/audit/:id              - Audit trail`);
  print(`  ${cyan('WS')}   /ws                            - Record change events`);
  print('');
  print('Press Ctrl+C to stop');
}
