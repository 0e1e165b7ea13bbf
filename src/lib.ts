/**
 * taskloom library API
 *
 * Exports the orchestration core for programmatic usage.
 */

// Types
export * from './types/index.js';

// Task graph
export { TaskGraph, type GraphStatusSummary } from './graph/task-graph.js';

// Agent directory
export {
  AgentDirectory,
  successRate,
  scoreDescriptor,
  type RankedWorker,
  type AgentDirectoryEvents,
} from './directory/agent-directory.js';
export { parseWorkersFile, loadWorkersFile } from './directory/workers-file.js';

// Checkpoints
export * from './checkpoint/index.js';

// Approval
export {
  ApprovalGate,
  type PendingApproval,
  type ResolvedApproval,
  type ResumeResult,
} from './approval/approval-gate.js';
export {
  InMemoryApprovalChannel,
  type ApprovalChannel,
  type ApprovalRequest,
  type PublishedRequest,
} from './approval/channel.js';

// Consensus
export {
  ConsensusPanel,
  pickQuestion,
  type ConsensusPanelOptions,
  type EvaluateOptions,
} from './consensus/panel.js';
export {
  RATER_PROFILES,
  createDefaultRaters,
  type RaterProfile,
  type RaterEvaluatorFactory,
} from './consensus/profiles.js';
export { rankCandidates, weightedScore, clampMetrics } from './consensus/scoring.js';

// Orchestration
export {
  OrchestrationEngine,
  engineSettingsFrom,
  type EngineSettings,
  type OrchestrationEngineOptions,
  type OrchestrationEngineEvents,
  type RunOutcome,
  type ResumeOutcome,
} from './orchestrator/engine.js';
export {
  TRANSITIONS,
  HALTING_NODES,
  validEvents,
  canTransition,
  getTransition,
  mostUrgent,
} from './orchestrator/state-machine.js';
export { defaultSynthesizer, buildSynthesisInput, type SynthesisInput } from './orchestrator/synthesis.js';
export { summarizeThread, type ThreadSummary } from './orchestrator/summary.js';

// Configuration
export { loadConfig, getConfig, resetConfig, type TaskloomConfig } from './config/index.js';

// Errors
export * from './utils/errors.js';

// HTTP server
export { createApp, startServer, stopServer, type AppConfig } from './server/index.js';

// Control plane
export { assembleEngine, openEngine, parseRuntimeModule, type RuntimeModule } from './control-plane/runtime.js';

// Utilities
export { createLogger, logger } from './utils/logger.js';
