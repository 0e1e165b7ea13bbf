/**
 * Application runtime for the CLI.
 *
 * `taskloom run` and `taskloom serve` load a module whose default export
 * supplies the collaborators the engine calls:
 *
 * ```ts
 * export default {
 *   decomposer: { decompose: async (objective) => ({ goal: objective, subtasks: [...] }) },
 *   reviewer: { evaluate: async (subtask, text) => ({ approved: true, feedback: '', missingCriteria: [] }) },
 *   workers: { researcher: { execute: async (description, context) => '...' } },
 * };
 * ```
 *
 * Worker names are matched against the definitions of a workers file.
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import { ApprovalGate } from '../approval/approval-gate.js';
import { InMemoryApprovalChannel } from '../approval/channel.js';
import { createCheckpointStore } from '../checkpoint/index.js';
import type { CheckpointStore } from '../checkpoint/store.js';
import type { TaskloomConfig } from '../config/index.js';
import { ConsensusPanel } from '../consensus/panel.js';
import { createDefaultRaters, type RaterEvaluatorFactory } from '../consensus/profiles.js';
import { AgentDirectory } from '../directory/agent-directory.js';
import { loadWorkersFile } from '../directory/workers-file.js';
import { OrchestrationEngine, engineSettingsFrom } from '../orchestrator/engine.js';
import type {
  Adjudicator,
  Decomposer,
  QuestionDesigner,
  Reviewer,
  Synthesizer,
  Worker,
  WorkerDefinition,
} from '../types/index.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('runtime');

function implementing(...methods: string[]) {
  return (value: unknown): boolean =>
    typeof value === 'object' &&
    value !== null &&
    methods.every((method) => typeof Reflect.get(value, method) === 'function');
}

export const runtimeModuleSchema = z.object({
  decomposer: z.custom<Decomposer>(implementing('decompose'), 'decomposer must implement decompose()'),
  reviewer: z.custom<Reviewer>(implementing('evaluate'), 'reviewer must implement evaluate()'),
  synthesizer: z
    .custom<Synthesizer>(implementing('synthesize'), 'synthesizer must implement synthesize()')
    .optional(),
  workers: z.record(z.custom<Worker>(implementing('execute'), 'worker must implement execute()')),
  /** Builds each panel rater's evaluate function; needed for arbitration */
  raters: z
    .custom<RaterEvaluatorFactory>((value) => typeof value === 'function', 'raters must be a function')
    .optional(),
  adjudicator: z
    .custom<Adjudicator>(
      implementing('draftTieBreaker', 'judge'),
      'adjudicator must implement draftTieBreaker() and judge()'
    )
    .optional(),
  questionDesigner: z
    .custom<QuestionDesigner>(implementing('design'), 'questionDesigner must implement design()')
    .optional(),
});

export type RuntimeModule = z.infer<typeof runtimeModuleSchema>;

export function parseRuntimeModule(value: unknown, source = '<inline>'): RuntimeModule {
  const result = runtimeModuleSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new ConfigError(`Invalid runtime module ${source}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export async function loadRuntime(modulePath: string): Promise<RuntimeModule> {
  const url = pathToFileURL(resolve(modulePath)).href;
  let loaded: unknown;
  try {
    loaded = await import(url);
  } catch (err) {
    throw new ConfigError(`Cannot load runtime module ${modulePath}: ${errorMessage(err)}`);
  }
  const exported: unknown =
    typeof loaded === 'object' && loaded !== null ? Reflect.get(loaded, 'default') : undefined;
  const runtime = parseRuntimeModule(exported, modulePath);
  log.debug({ modulePath, workers: Object.keys(runtime.workers) }, 'Runtime module loaded');
  return runtime;
}

export interface AssembledEngine {
  engine: OrchestrationEngine;
  gate: ApprovalGate;
  directory: AgentDirectory;
  store: CheckpointStore;
}

/**
 * Wire a runtime and worker definitions into an engine for the given config.
 */
export function assembleEngine(
  runtime: RuntimeModule,
  definitions: WorkerDefinition[],
  config: TaskloomConfig,
  store: CheckpointStore = createCheckpointStore(config)
): AssembledEngine {
  const directory = new AgentDirectory();
  for (const definition of definitions) {
    const worker = runtime.workers[definition.name];
    if (!worker) {
      throw new ConfigError(`Runtime module has no implementation for worker ${definition.name}`);
    }
    directory.register(definition, worker);
  }

  let panel: ConsensusPanel | undefined;
  if (config.arbitration) {
    if (!runtime.raters || !runtime.adjudicator) {
      throw new ConfigError('Arbitration requires raters and an adjudicator in the runtime module');
    }
    panel = new ConsensusPanel({
      raters: createDefaultRaters(config.panelSize, runtime.raters),
      adjudicator: runtime.adjudicator,
      tieBreakLeaders: config.tieBreakLeaders,
      ...(runtime.questionDesigner && { questionDesigner: runtime.questionDesigner }),
    });
  }

  const gate = new ApprovalGate(new InMemoryApprovalChannel());
  const engine = new OrchestrationEngine({
    decomposer: runtime.decomposer,
    reviewer: runtime.reviewer,
    directory,
    store,
    gate,
    settings: engineSettingsFrom(config),
    ...(runtime.synthesizer && { synthesizer: runtime.synthesizer }),
    ...(panel && { panel }),
  });
  return { engine, gate, directory, store };
}

export interface EngineSources {
  runtime: string;
  workers: string;
  dataDir?: string | undefined;
}

/**
 * Load a runtime module and workers file and assemble a file-backed engine.
 */
export async function openEngine(sources: EngineSources, config: TaskloomConfig): Promise<AssembledEngine> {
  const [runtime, definitions] = await Promise.all([
    loadRuntime(sources.runtime),
    loadWorkersFile(sources.workers),
  ]);
  return assembleEngine(runtime, definitions, {
    ...config,
    checkpointBackend: 'file',
    dataDir: sources.dataDir ?? config.dataDir,
  });
}
