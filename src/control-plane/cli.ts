import { Command } from 'commander';
import { createResumeCommand } from './commands/resume.js';
import { createRunCommand } from './commands/run.js';
import { createServeCommand } from './commands/serve.js';
import { createThreadsCommand } from './commands/threads.js';
import { hasErrorCode } from '../utils/errors.js';

/**
 * Package version - should match package.json
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('taskloom')
    .description('Checkpointed task orchestration with human approval gates')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createRunCommand());
  program.addCommand(createResumeCommand());
  program.addCommand(createThreadsCommand());
  program.addCommand(createServeCommand());

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
    if (hasErrorCode(error, 'commander.helpDisplayed') || hasErrorCode(error, 'commander.version')) {
      return;
    }
    throw error;
  }
}

export { createResumeCommand } from './commands/resume.js';
export { createRunCommand } from './commands/run.js';
export { createServeCommand } from './commands/serve.js';
export { createThreadsCommand } from './commands/threads.js';
