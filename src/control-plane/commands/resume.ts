import { Command } from 'commander';
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

const resumeOptionsSchema = engineOptionsSchema
  .extend({
    approve: z.boolean().default(false),
    reject: z.boolean().default(false),
    feedback: z.string().optional(),
    by: z.string().optional(),
  })
  .refine((options) => options.approve !== options.reject, {
    message: 'pass exactly one of --approve or --reject',
    path: ['approve'],
  });

/**
 * Create the resume command.
 */
export function createResumeCommand(): Command {
  const command = withEngineOptions(
    new Command('resume')
      .description('Answer a pending approval and continue its thread')
      .argument('<handle>', 'Approval handle')
      .option('--approve', 'Accept the rejected result', false)
      .option('--reject', 'Reject the result and retry the subtask', false)
      .option('-f, --feedback <text>', 'Feedback passed to the worker or recorded with the decision')
      .option('--by <name>', 'Who made the decision')
      .option('--json', 'Output result as JSON', false)
  ).action(async (handle: string, options: Record<string, unknown>) => {
    try {
      await executeResume(handle, options);
    } catch (error) {
      printError(formatError(errorMessage(error)));
      process.exitCode = 1;
    }
  });

  return command;
}

async function executeResume(handle: string, rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = resumeOptionsSchema.safeParse(rawOptions);
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
  await engine.recover();

  const result = await engine.resume(handle, {
    approved: options.approve,
    ...(options.feedback !== undefined && { feedback: options.feedback }),
    ...(options.by !== undefined && { decidedBy: options.by }),
  });
  if (!result.ok) {
    printError(formatError(result.error.message));
    process.exitCode = 1;
    return;
  }
  print(options.json ? formatJson(result.outcome) : formatRunOutcome(result.outcome));
}
