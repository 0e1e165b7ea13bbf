import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { startServer } from '../../server/index.js';
import { errorMessage } from '../../utils/errors.js';
import { z } from 'zod';
import {
  print,
  printError,
  formatError,
  formatValidationErrors,
  bold,
  cyan,
} from '../formatter.js';
import { openEngine } from '../runtime.js';
import { engineOptionsSchema, withEngineOptions } from './engine-options.js';

/**
 * Schema for serve command options
 */
const serveOptionsSchema = engineOptionsSchema.extend({
  port: z.coerce.number().int().min(1).max(65535).optional(),
  host: z.string().optional(),
});

/**
 * Create the serve command.
 */
export function createServeCommand(): Command {
  const command = withEngineOptions(
    new Command('serve')
      .description('Start the HTTP approval server')
      .option('-p, --port <port>', 'Port to listen on (defaults to TASKLOOM_PORT)')
      .option('-H, --host <host>', 'Host to bind to (defaults to TASKLOOM_HOST)')
  ).action(async (options: Record<string, unknown>) => {
    try {
      await executeServe(options);
    } catch (error) {
      printError(formatError(errorMessage(error)));
      process.exitCode = 1;
    }
  });

  return command;
}

/**
 * Execute the serve command.
 */
async function executeServe(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = serveOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(
      formatValidationErrors(
        optionsResult.error.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const options = optionsResult.data;
  const config = getConfig();
  const port = options.port ?? config.port;
  const host = options.host ?? config.host;

  const { engine, gate } = await openEngine(options, config);
  const recovered = await engine.recover();

  print(`Starting taskloom approval server...`);
  print('');
  print(`${bold('Port:')} ${cyan(String(port))}`);
  print(`${bold('Host:')} ${cyan(host)}`);
  print(`${bold('Suspended threads:')} ${cyan(String(recovered.length))}`);
  print('');

  const server = await startServer({ engine, gate, port, host });

  const shutdown = (): void => {
    print('');
    print('Shutting down server...');
    server.close().then(() => {
      print('Server stopped');
      process.exit(0);
    }).catch((err: unknown) => {
      printError(formatError(errorMessage(err)));
      process.exit(1);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  print(`Server is running at ${cyan(`http://${host}:${port}`)}`);
  print('');
  print('Available endpoints:');
  print(`  ${cyan('GET')}  /health                      - Health check`);
  print(`  ${cyan('GET')}  /api/v1/approvals            - Pending approvals`);
  print(`  ${cyan('POST')} /api/v1/approvals/:handle    - Answer an approval`);
  print(`  ${cyan('GET')}  /api/v1/threads/:threadId    - Thread summary`);
  print('');
  print('Press Ctrl+C to stop the server');
}
