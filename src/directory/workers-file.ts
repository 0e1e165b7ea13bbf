/**
 * Worker definitions from a YAML file:
 *
 * ```yaml
 * workers:
 *   - name: researcher
 *     capabilities: [search, summarize]
 *     phaseAffinity: [execution]
 * ```
 */

import * as fs from 'node:fs/promises';
import * as YAML from 'yaml';
import { workersFileSchema, type WorkerDefinition } from '../types/index.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('workers-file');

export function parseWorkersFile(content: string, source = '<inline>'): WorkerDefinition[] {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    throw new ConfigError(`Failed to parse YAML in ${source}: ${errorMessage(err)}`);
  }

  const result = workersFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Invalid workers file ${source}: ${issues.join('; ')}`, issues);
  }

  const seen = new Set<string>();
  for (const worker of result.data.workers) {
    if (seen.has(worker.name)) {
      throw new ConfigError(`Duplicate worker name in ${source}: ${worker.name}`);
    }
    seen.add(worker.name);
  }

  return result.data.workers;
}

export async function loadWorkersFile(filePath: string): Promise<WorkerDefinition[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read workers file ${filePath}: ${errorMessage(err)}`);
  }
  const workers = parseWorkersFile(content, filePath);
  log.debug({ filePath, count: workers.length }, 'Workers file loaded');
  return workers;
}
