import type { Command } from 'commander';
import { z } from 'zod';

/**
 * Options shared by commands that drive an engine
 */
export const engineOptionsSchema = z.object({
  runtime: z.string().min(1, 'runtime module path is required'),
  workers: z.string().min(1, 'workers file path is required'),
  dataDir: z.string().min(1).optional(),
  json: z.boolean().default(false),
});

export type EngineOptions = z.infer<typeof engineOptionsSchema>;

export function withEngineOptions(command: Command): Command {
  return command
    .requiredOption('-r, --runtime <module>', 'Module exporting the decomposer, reviewer and workers')
    .requiredOption('-w, --workers <file>', 'YAML file with worker definitions')
    .option('-d, --data-dir <dir>', 'Data directory (defaults to TASKLOOM_DATA_DIR)');
}
