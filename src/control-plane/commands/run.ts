import { Command } from 'commander';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { getConfig } from '../../config/index.js';
import { errorMessage } from '../../utils/errors.js';
import {
  formatError,
  formatJson,
  formatRunOutcome,
  formatValidationErrors,
  print,
  printError,
} from '../formatter.js';
import { openEngine } from '../runtime.js';
import { engineOptionsSchema, withEngineOptions } from './engine-options.js';

const runOptionsSchema = engineOptionsSchema.extend({
  thread: z.string().min(1).optional(),
});

/**
 * Create the run command.
 */
export function createRunCommand(): Command {
  const command = withEngineOptions(
    new Command('run')
      .description('Decompose an objective and run it until it finishes or waits for approval')
      .argument('<objective>', 'What the thread should achieve')
      .option('-t, --thread <id>', 'Thread ID (generated when omitted)')
      .option('--json', 'Output result as JSON', false)
  ).action(async (objective: string, options: Record<string, unknown>) => {
    try {
      await executeRun(objective, options);
    } catch (error) {
      printError(formatError(errorMessage(error)));
      process.exitCode = 1;
    }
  });

  return command;
}

async function executeRun(objective: string, rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = runOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(
      formatValidationErrors(
        optionsResult.error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const options = optionsResult.data;
  const { engine } = await openEngine(options, getConfig());
  const outcome = await engine.start(options.thread ?? nanoid(12), objective);
  print(options.json ? formatJson(outcome) : formatRunOutcome(outcome));
}
