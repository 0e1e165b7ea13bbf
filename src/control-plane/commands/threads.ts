import { Command } from 'commander';
import { z } from 'zod';
import { createCheckpointStore } from '../../checkpoint/index.js';
import type { CheckpointStore } from '../../checkpoint/store.js';
import { getConfig } from '../../config/index.js';
import { summarizeThread, type ThreadSummary } from '../../orchestrator/summary.js';
import { errorMessage } from '../../utils/errors.js';
import {
  formatError,
  formatJson,
  formatSuccess,
  formatThreadDetail,
  formatThreadList,
  formatValidationErrors,
  print,
  printError,
} from '../formatter.js';

const storeOptionsSchema = z.object({
  dataDir: z.string().min(1).optional(),
  json: z.boolean().default(false),
});

type StoreOptions = z.infer<typeof storeOptionsSchema>;

/**
 * Create the threads command with its list, show and delete subcommands.
 */
export function createThreadsCommand(): Command {
  const command = new Command('threads').description('Inspect checkpointed threads');

  command
    .command('list')
    .description('List threads with their latest checkpoint')
    .option('-d, --data-dir <dir>', 'Data directory (defaults to TASKLOOM_DATA_DIR)')
    .option('--json', 'Output as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      await withStore(options, (store, parsed) => executeList(store, parsed));
    });

  command
    .command('show')
    .description('Show the latest checkpoint of a thread')
    .argument('<threadId>', 'Thread ID')
    .option('-d, --data-dir <dir>', 'Data directory (defaults to TASKLOOM_DATA_DIR)')
    .option('--json', 'Output as JSON', false)
    .action(async (threadId: string, options: Record<string, unknown>) => {
      await withStore(options, (store, parsed) => executeShow(store, threadId, parsed));
    });

  command
    .command('delete')
    .description('Delete every checkpoint of a thread')
    .argument('<threadId>', 'Thread ID')
    .option('-d, --data-dir <dir>', 'Data directory (defaults to TASKLOOM_DATA_DIR)')
    .action(async (threadId: string, options: Record<string, unknown>) => {
      await withStore(options, (store) => executeDelete(store, threadId));
    });

  return command;
}

async function withStore(
  rawOptions: Record<string, unknown>,
  run: (store: CheckpointStore, options: StoreOptions) => Promise<void>
): Promise<void> {
  const optionsResult = storeOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(
      formatValidationErrors(
        optionsResult.error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }))
      )
    );
    process.exitCode = 1;
    return;
  }

  try {
    const config = getConfig();
    const store = createCheckpointStore({
      checkpointBackend: 'file',
      dataDir: optionsResult.data.dataDir ?? config.dataDir,
    });
    await run(store, optionsResult.data);
  } catch (error) {
    printError(formatError(errorMessage(error)));
    process.exitCode = 1;
  }
}

async function loadSummaries(store: CheckpointStore): Promise<ThreadSummary[]> {
  const summaries: ThreadSummary[] = [];
  for (const threadId of await store.listThreads()) {
    const checkpoint = await store.get(threadId);
    if (checkpoint) {
      summaries.push(summarizeThread(checkpoint));
    }
  }
  return summaries;
}

async function executeList(store: CheckpointStore, options: StoreOptions): Promise<void> {
  const summaries = await loadSummaries(store);
  print(options.json ? formatJson(summaries) : formatThreadList(summaries));
}

async function executeShow(store: CheckpointStore, threadId: string, options: StoreOptions): Promise<void> {
  const checkpoint = await store.get(threadId);
  if (!checkpoint) {
    printError(formatError(`Thread not found: ${threadId}`));
    process.exitCode = 1;
    return;
  }
  print(options.json ? formatJson(summarizeThread(checkpoint)) : formatThreadDetail(summarizeThread(checkpoint)));
}

async function executeDelete(store: CheckpointStore, threadId: string): Promise<void> {
  if (!(await store.delete(threadId))) {
    printError(formatError(`Thread not found: ${threadId}`));
    process.exitCode = 1;
    return;
  }
  print(formatSuccess(`Deleted thread ${threadId}`));
}
