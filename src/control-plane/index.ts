// Runtime
export {
  runtimeModuleSchema,
  parseRuntimeModule,
  loadRuntime,
  assembleEngine,
  openEngine,
  type RuntimeModule,
  type AssembledEngine,
  type EngineSources,
} from './runtime.js';

// Formatter
export {
  bold,
  dim,
  red,
  green,
  yellow,
  cyan,
  formatNode,
  truncate,
  padRight,
  padLeft,
  formatTable,
  formatThreadList,
  formatThreadDetail,
  formatRunOutcome,
  formatSuccess,
  formatError,
  formatJson,
  formatValidationErrors,
  print,
  printError,
  type TableColumn,
} from './formatter.js';

// CLI
export {
  createProgram,
  runCli,
  createRunCommand,
  createResumeCommand,
  createThreadsCommand,
  createServeCommand,
} from './cli.js';
