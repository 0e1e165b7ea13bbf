/**
 * Orchestration Engine
 *
 * Drives one thread per objective through decompose, assign, execute,
 * review and synthesize. Each `step` performs one node action, routes the
 * outcome through the transition table and writes a checkpoint, so a thread
 * reloaded from its latest checkpoint never repeats a finished worker call.
 */

import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import type { ApprovalGate } from '../approval/approval-gate.js';
import { cloneState, isValidThreadId } from '../checkpoint/codec.js';
import type { CheckpointStore } from '../checkpoint/store.js';
import { getConfig, type TaskloomConfig } from '../config/index.js';
import type { ConsensusPanel } from '../consensus/panel.js';
import type { AgentDirectory } from '../directory/agent-directory.js';
import { TaskGraph } from '../graph/task-graph.js';
import {
  AssignmentPhase,
  OrchestrationEvent,
  OrchestrationNode,
  TransitionEffect,
  createSubtask,
  decompositionPlanSchema,
  reviewVerdictSchema,
  type ApprovalDecision,
  type ArbitrationRecord,
  type Assignment,
  type Candidate,
  type Checkpoint,
  type Decomposer,
  type ExecutionOutcome,
  type OrchestrationState,
  type Reviewer,
  type ReviewVerdict,
  type Subtask,
  type SynthesisReport,
  type Synthesizer,
  type Task,
  type TransitionRecord,
  type Worker,
  type WorkerContext,
} from '../types/index.js';
import {
  AssignmentError,
  CheckpointIOError,
  ConfigError,
  ExecutionFailure,
  GraphError,
  HandleNotFoundError,
  ReviewRejection,
  ThreadExistsError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { HALTING_NODES, createTransitionRecord, mostUrgent } from './state-machine.js';
import { buildSynthesisInput, defaultSynthesizer } from './synthesis.js';

const log = createLogger('orchestrator');

export type EngineSettings = Pick<
  TaskloomConfig,
  | 'maxRetries'
  | 'maxParallel'
  | 'rejectionPolicy'
  | 'failurePolicy'
  | 'defaultPhase'
  | 'arbitration'
  | 'arbitrationCandidates'
>;

export function engineSettingsFrom(config: TaskloomConfig): EngineSettings {
  return {
    maxRetries: config.maxRetries,
    maxParallel: config.maxParallel,
    rejectionPolicy: config.rejectionPolicy,
    failurePolicy: config.failurePolicy,
    defaultPhase: config.defaultPhase,
    arbitration: config.arbitration,
    arbitrationCandidates: config.arbitrationCandidates,
  };
}

export interface OrchestrationEngineOptions {
  decomposer: Decomposer;
  reviewer: Reviewer;
  directory: AgentDirectory;
  store: CheckpointStore;
  gate: ApprovalGate;
  synthesizer?: Synthesizer;
  /** Required when arbitration is enabled */
  panel?: ConsensusPanel;
  /** Overrides for values otherwise taken from the environment config */
  settings?: Partial<EngineSettings>;
}

/**
 * Events emitted by the engine.
 */
export interface OrchestrationEngineEvents {
  transition: (threadId: string, record: TransitionRecord) => void;
  assignment: (threadId: string, assignment: Assignment) => void;
  suspended: (threadId: string, handles: string[]) => void;
  done: (threadId: string, report: SynthesisReport | null) => void;
}

export interface RunOutcome {
  threadId: string;
  status: 'done' | 'suspended';
  state: OrchestrationState;
  report: SynthesisReport | null;
  /** Handles a human must answer before the thread continues */
  pendingApprovals: string[];
}

export type ResumeOutcome =
  | { ok: true; outcome: RunOutcome }
  | { ok: false; error: HandleNotFoundError };

interface ThreadRuntime {
  state: OrchestrationState;
  /** True while the in-memory state is ahead of the latest checkpoint */
  dirty: boolean;
}

interface ReviewRoute {
  event: OrchestrationEvent;
  retryCount: number;
}

interface EffectInput {
  assignment: Assignment;
  subtask: Subtask;
  retryCount: number;
  resultText?: string;
  reason?: string;
  handle?: string;
}

export class OrchestrationEngine extends EventEmitter {
  private readonly settings: EngineSettings;
  private readonly synthesizer: Synthesizer;
  private readonly threads = new Map<string, ThreadRuntime>();
  private readonly locks = new Map<string, Promise<unknown>>();

  constructor(private readonly options: OrchestrationEngineOptions) {
    super();
    this.settings = { ...engineSettingsFrom(getConfig()), ...options.settings };
    this.synthesizer = options.synthesizer ?? defaultSynthesizer;
    if (this.settings.arbitration && !options.panel) {
      throw new ConfigError('Arbitration is enabled but no consensus panel was provided');
    }
  }

  /**
   * Create a thread for an objective and run it until it is done or suspended.
   */
  start(threadId: string, objective: string): Promise<RunOutcome> {
    return this.withThread(threadId, async () => {
      if (this.threads.has(threadId) || (await this.options.store.get(threadId)) !== null) {
        throw new ThreadExistsError(threadId);
      }
      const now = new Date();
      const runtime: ThreadRuntime = {
        state: {
          threadId,
          objective,
          node: OrchestrationNode.DECOMPOSE,
          task: null,
          assignments: [],
          arbitrations: [],
          report: null,
          history: [],
          createdAt: now,
          updatedAt: now,
        },
        dirty: true,
      };
      this.threads.set(threadId, runtime);
      log.info({ threadId, objective }, 'Thread started');
      return this.runLocked(runtime);
    });
  }

  /**
   * Step a thread until it is done or suspended, loading it from its latest
   * checkpoint when it is not in memory.
   */
  run(threadId: string): Promise<RunOutcome> {
    return this.withThread(threadId, async () => this.runLocked(await this.load(threadId)));
  }

  /**
   * Perform exactly one node action. A no-op on suspended and done threads.
   */
  step(threadId: string): Promise<OrchestrationState> {
    return this.withThread(threadId, async () => {
      const runtime = await this.load(threadId);
      await this.stepLocked(runtime);
      return cloneState(runtime.state);
    });
  }

  /**
   * Answer a pending approval and continue its thread. Unknown or already
   * consumed handles change nothing.
   */
  async resume(handle: string, decision: ApprovalDecision): Promise<ResumeOutcome> {
    const pending = this.options.gate.get(handle);
    if (!pending) {
      return { ok: false, error: new HandleNotFoundError(handle) };
    }
    const threadId = pending.threadId;

    return this.withThread(threadId, async (): Promise<ResumeOutcome> => {
      const runtime = await this.load(threadId);
      const resolved = this.options.gate.resume(handle, decision);
      if (!resolved.ok) {
        return resolved;
      }

      const { state } = runtime;
      const assignment = state.assignments.find((a) => a.approvalHandle === handle);
      if (!assignment) {
        log.warn({ threadId, handle }, 'Approval handle has no waiting assignment');
        return { ok: false, error: new HandleNotFoundError(handle) };
      }

      const subtask = this.requireSubtask(state, assignment.subtaskId);
      const record = this.transition(state, OrchestrationEvent.RESUMED, subtask.id);
      this.applyEffect(state, record.effect, { assignment, subtask, retryCount: subtask.retryCount });
      assignment.decision = decision;
      state.node = record.to;
      state.updatedAt = new Date();
      runtime.dirty = true;

      return { ok: true, outcome: await this.runLocked(runtime) };
    });
  }

  /**
   * Load every checkpointed thread that is waiting for approval, so its
   * handles can be answered after a restart. Returns the loaded thread ids.
   */
  async recover(): Promise<string[]> {
    const recovered: string[] = [];
    for (const threadId of await this.options.store.listThreads()) {
      const checkpoint = await this.options.store.get(threadId);
      if (checkpoint?.state.node === OrchestrationNode.SUSPENDED) {
        await this.withThread(threadId, () => this.load(threadId));
        recovered.push(threadId);
      }
    }
    log.info({ threads: recovered }, 'Suspended threads recovered');
    return recovered;
  }

  /**
   * Latest stored checkpoint of a thread; null for unknown or malformed ids.
   */
  async latestCheckpoint(threadId: string): Promise<Checkpoint | null> {
    if (!isValidThreadId(threadId)) {
      return null;
    }
    return this.options.store.get(threadId);
  }

  /**
   * Ids of the threads held in memory: running, or suspended for approval.
   */
  activeThreads(): string[] {
    return [...this.threads.keys()].sort();
  }

  async getState(threadId: string): Promise<OrchestrationState | null> {
    const runtime = this.threads.get(threadId);
    if (runtime) {
      return cloneState(runtime.state);
    }
    return (await this.options.store.get(threadId))?.state ?? null;
  }

  /**
   * Abandon a thread: drop its claims and pending approvals and delete its
   * checkpoints.
   */
  deleteThread(threadId: string): Promise<boolean> {
    return this.withThread(threadId, async () => {
      const state = this.threads.get(threadId)?.state ?? (await this.options.store.get(threadId))?.state;
      for (const assignment of state?.assignments ?? []) {
        this.options.directory.cancelClaim(assignment.workerName, claimKey(threadId, assignment.subtaskId));
      }
      this.options.gate.discard(threadId);
      const inMemory = this.threads.delete(threadId);
      const stored = await this.options.store.delete(threadId);
      log.info({ threadId }, 'Thread deleted');
      return inMemory || stored;
    });
  }

  // ==========================================================================
  // Stepping
  // ==========================================================================

  private async runLocked(runtime: ThreadRuntime): Promise<RunOutcome> {
    if (runtime.dirty) {
      await this.persist(runtime);
    }
    while (!HALTING_NODES.includes(runtime.state.node)) {
      await this.stepLocked(runtime);
    }

    const state = cloneState(runtime.state);
    return {
      threadId: state.threadId,
      status: state.node === OrchestrationNode.DONE ? 'done' : 'suspended',
      state,
      report: state.report,
      pendingApprovals: pendingHandles(state),
    };
  }

  private async stepLocked(runtime: ThreadRuntime): Promise<void> {
    // An earlier checkpoint write failed; it must land before the thread advances
    if (runtime.dirty) {
      await this.persist(runtime);
    }

    const { state } = runtime;
    const from = state.node;
    switch (from) {
      case OrchestrationNode.DECOMPOSE:
        await this.decompose(state);
        break;
      case OrchestrationNode.ASSIGN:
        await this.assign(state);
        break;
      case OrchestrationNode.EXECUTE:
        await this.execute(state);
        break;
      case OrchestrationNode.REVIEW:
        await this.review(state);
        break;
      case OrchestrationNode.SYNTHESIZE:
        await this.synthesize(state);
        break;
      case OrchestrationNode.SUSPENDED:
      case OrchestrationNode.DONE:
        return;
    }

    state.updatedAt = new Date();
    runtime.dirty = true;
    await this.persist(runtime);

    if (state.node === OrchestrationNode.SUSPENDED) {
      const handles = pendingHandles(state);
      log.info({ threadId: state.threadId, handles }, 'Thread suspended');
      this.emit('suspended', state.threadId, handles);
    }
    if (state.node === OrchestrationNode.DONE) {
      // Finished threads are served from the store from now on
      this.threads.delete(state.threadId);
      this.options.gate.discard(state.threadId);
      log.info({ threadId: state.threadId }, 'Thread done');
      this.emit('done', state.threadId, state.report);
    }
  }

  private async decompose(state: OrchestrationState): Promise<void> {
    const plan = await this.options.decomposer.decompose(state.objective);
    const parsed = decompositionPlanSchema.safeParse(plan);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new GraphError(`Invalid decomposition: ${issues.join('; ')}`);
    }

    const now = new Date();
    const task: Task = {
      id: nanoid(),
      goal: parsed.data.goal,
      subtasks: parsed.data.subtasks.map(createSubtask),
      createdAt: now,
      updatedAt: now,
      metadata: parsed.data.metadata,
    };
    // Throws GraphError on cycles and unknown ids before the state changes
    TaskGraph.fromTask(task);

    state.task = task;
    log.info({ threadId: state.threadId, taskId: task.id, subtasks: task.subtasks.length }, 'Objective decomposed');
    this.move(
      state,
      task.subtasks.length > 0 ? OrchestrationEvent.DECOMPOSED : OrchestrationEvent.DECOMPOSED_EMPTY
    );
  }

  private async assign(state: OrchestrationState): Promise<void> {
    const task = requireTask(state);
    if (task.subtasks.length === 0) {
      this.move(state, OrchestrationEvent.NO_SUBTASKS);
      return;
    }

    const graph = TaskGraph.fromTask(task);
    const ready = graph.ready();
    if (ready.length === 0) {
      this.move(state, OrchestrationEvent.NOTHING_READY);
      return;
    }

    const capacity = Math.max(0, this.settings.maxParallel - state.assignments.length);
    const claimed: Array<{ subtask: Subtask; workerName: string }> = [];
    const arbitrations: ArbitrationRecord[] = [];
    try {
      for (const subtask of ready.slice(0, capacity)) {
        const workerName = await this.chooseWorker(state, task, subtask, arbitrations);
        if (workerName === null) break;
        claimed.push({ subtask, workerName });
      }
    } catch (err) {
      this.cancelClaims(state.threadId, claimed);
      throw err;
    }

    if (claimed.length === 0) {
      throw new AssignmentError(
        `No eligible worker for ready subtasks: ${ready.map((s) => s.id).join(', ')}`
      );
    }

    state.arbitrations.push(...arbitrations);
    for (const { subtask, workerName } of claimed) {
      graph.markInProgress(subtask.id, workerName);
      const assignment: Assignment = {
        subtaskId: subtask.id,
        workerName,
        phase: AssignmentPhase.EXECUTE,
        outcome: null,
        verdict: null,
        decision: null,
        approvalHandle: null,
      };
      state.assignments.push(assignment);
      this.emit('assignment', state.threadId, assignment);
    }
    this.move(state, OrchestrationEvent.ASSIGNED, batchSubtaskId(claimed.map((c) => c.subtask.id)));
  }

  /**
   * Claim a worker for a subtask, through the consensus panel when
   * arbitration is on and more than one worker is available.
   */
  private async chooseWorker(
    state: OrchestrationState,
    task: Task,
    subtask: Subtask,
    arbitrations: ArbitrationRecord[]
  ): Promise<string | null> {
    const { directory } = this.options;
    const key = claimKey(state.threadId, subtask.id);
    const phase = this.settings.defaultPhase;
    const ranked = directory.rank(subtask.capabilities, phase);
    if (ranked.length === 0) {
      return null;
    }

    const panel = this.options.panel;
    if (this.settings.arbitration && panel && ranked.length >= 2) {
      const candidates = ranked
        .slice(0, this.settings.arbitrationCandidates)
        .flatMap(({ name }) => {
          const worker = directory.getWorker(name);
          return worker ? [workerCandidate(name, worker, task.goal)] : [];
        });
      const result = await panel.evaluate(subtask.description, candidates);
      arbitrations.push({
        subtaskId: subtask.id,
        sessionId: result.sessionId,
        winner: result.winner,
        confidence: result.confidence,
        tieBreakUsed: result.tieBreakUsed,
        ranking: result.ranking,
      });
      if (directory.claim(result.winner, key)) {
        return result.winner;
      }
      log.warn({ subtaskId: subtask.id, winner: result.winner }, 'Arbitration winner was claimed meanwhile');
      for (const { name } of directory.rank(subtask.capabilities, phase)) {
        if (directory.claim(name, key)) return name;
      }
      return null;
    }

    const best = directory.findBest(subtask.capabilities, phase);
    return directory.claim(best.name, key) ? best.name : null;
  }

  private async execute(state: OrchestrationState): Promise<void> {
    const task = requireTask(state);
    const graph = TaskGraph.fromTask(task);
    const due = state.assignments.filter((a) => a.phase === AssignmentPhase.EXECUTE);

    const outcomes = await Promise.all(
      due.map(async (assignment) => ({ assignment, outcome: await this.invoke(state, task, graph, assignment) }))
    );
    for (const { assignment, outcome } of outcomes) {
      assignment.outcome = outcome;
      assignment.phase = AssignmentPhase.REVIEW;
    }
    this.move(state, OrchestrationEvent.EXECUTED, batchSubtaskId(due.map((a) => a.subtaskId)));
  }

  /**
   * Call the worker. Failures become an outcome rather than an exception.
   */
  private async invoke(
    state: OrchestrationState,
    task: Task,
    graph: TaskGraph,
    assignment: Assignment
  ): Promise<ExecutionOutcome> {
    const subtask = graph.get(assignment.subtaskId);
    const worker = this.options.directory.getWorker(assignment.workerName);
    if (!subtask || !worker) {
      return { ok: false, error: `Worker ${assignment.workerName} is not registered` };
    }

    const context: WorkerContext = {
      purpose: 'subtask',
      taskGoal: task.goal,
      threadId: state.threadId,
      subtaskId: subtask.id,
      attempt: subtask.retryCount + 1,
      acceptanceCriteria: subtask.acceptanceCriteria,
      dependencyResults: Object.fromEntries(
        subtask.dependencies.map((dep): [string, string] => [dep, graph.get(dep)?.result ?? ''])
      ),
    };
    if (assignment.verdict) {
      context.feedback = assignment.verdict.feedback;
      context.missingCriteria = assignment.verdict.missingCriteria;
    }

    log.debug(
      { threadId: state.threadId, subtaskId: subtask.id, worker: assignment.workerName, attempt: context.attempt },
      'Executing subtask'
    );
    try {
      const text: unknown = await worker.execute(subtask.description, context);
      if (typeof text !== 'string') {
        throw new Error(`expected a string result, got ${text === null ? 'null' : typeof text}`);
      }
      return { ok: true, text };
    } catch (err) {
      const failure = new ExecutionFailure(subtask.id, assignment.workerName, err);
      log.warn({ threadId: state.threadId, subtaskId: subtask.id, err: failure }, 'Worker call failed');
      return { ok: false, error: failure.message };
    }
  }

  private async review(state: OrchestrationState): Promise<void> {
    const due = state.assignments.filter((a) => a.phase === AssignmentPhase.REVIEW);

    for (const assignment of due) {
      const subtask = this.requireSubtask(state, assignment.subtaskId);
      const outcome = assignment.outcome;

      if (!outcome || !outcome.ok) {
        const record = this.transition(state, OrchestrationEvent.EXECUTION_FAILED, subtask.id);
        this.applyEffect(state, record.effect, {
          assignment,
          subtask,
          retryCount: subtask.retryCount,
          reason: outcome && !outcome.ok ? outcome.error : 'No execution result recorded',
        });
        continue;
      }

      const external = assignment.decision !== null;
      const verdict = assignment.decision
        ? verdictFromDecision(assignment.decision)
        : await this.evaluate(state, subtask, outcome.text);
      if (typeof verdict === 'string') {
        const record = this.transition(state, OrchestrationEvent.EXECUTION_FAILED, subtask.id);
        this.applyEffect(state, record.effect, {
          assignment,
          subtask,
          retryCount: subtask.retryCount,
          reason: verdict,
        });
        continue;
      }
      assignment.verdict = verdict;

      const route = this.routeVerdict(subtask, verdict, external);
      let handle: string | undefined;
      if (route.event === OrchestrationEvent.REJECTED_ESCALATE) {
        const request = approvalRequest(subtask, assignment, outcome.text, route.retryCount);
        handle = await this.options.gate.suspend(state.threadId, request.question, request.details);
      }

      const record = this.transition(state, route.event, subtask.id);
      this.applyEffect(state, record.effect, {
        assignment,
        subtask,
        retryCount: route.retryCount,
        resultText: outcome.text,
        ...(!verdict.approved && {
          reason: new ReviewRejection(subtask.id, verdict.feedback, verdict.missingCriteria, route.retryCount)
            .message,
        }),
        ...(handle !== undefined && { handle }),
      });
    }

    state.node = mostUrgent(state.assignments.map((a) => phaseNode(a.phase)));
  }

  /**
   * Ask the reviewer for a verdict. A malformed verdict comes back as the
   * failure reason to record on the subtask.
   */
  private async evaluate(
    state: OrchestrationState,
    subtask: Subtask,
    resultText: string
  ): Promise<ReviewVerdict | string> {
    const raw: unknown = await this.options.reviewer.evaluate(subtask, resultText);
    const parsed = reviewVerdictSchema.safeParse(raw);
    if (parsed.success) {
      return parsed.data;
    }
    const issues = parsed.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    const reason = `Invalid review verdict for subtask ${subtask.id}: ${issues.join('; ')}`;
    log.warn({ threadId: state.threadId, subtaskId: subtask.id, issues }, 'Reviewer returned an invalid verdict');
    return reason;
  }

  /**
   * Pick the review event. A judge rejection counts as a used attempt; an
   * external rejection was already counted when it was escalated.
   */
  private routeVerdict(subtask: Subtask, verdict: ReviewVerdict, external: boolean): ReviewRoute {
    if (verdict.approved) {
      return { event: OrchestrationEvent.APPROVED, retryCount: subtask.retryCount };
    }
    const retryCount = external ? subtask.retryCount : subtask.retryCount + 1;
    const exhausted = retryCount >= this.settings.maxRetries;
    const policy = this.settings.rejectionPolicy;

    if (!external && (policy === 'escalate' || (policy === 'escalate-final' && exhausted))) {
      return { event: OrchestrationEvent.REJECTED_ESCALATE, retryCount };
    }
    if (!exhausted) {
      return { event: OrchestrationEvent.REJECTED_RETRY, retryCount };
    }
    return { event: OrchestrationEvent.REJECTED_EXHAUSTED, retryCount };
  }

  private applyEffect(state: OrchestrationState, effect: TransitionEffect, input: EffectInput): void {
    const { assignment, subtask } = input;
    const graph = TaskGraph.fromTask(requireTask(state));
    const key = claimKey(state.threadId, subtask.id);

    switch (effect) {
      case TransitionEffect.COMPLETE_SUBTASK:
        graph.markComplete(subtask.id, input.resultText ?? '');
        this.settle(state, assignment, key, true);
        break;
      case TransitionEffect.SCHEDULE_RETRY:
        subtask.retryCount = input.retryCount;
        graph.markInProgress(subtask.id);
        assignment.phase = AssignmentPhase.EXECUTE;
        assignment.outcome = null;
        assignment.decision = null;
        log.info({ threadId: state.threadId, subtaskId: subtask.id, retryCount: subtask.retryCount }, 'Retry scheduled');
        break;
      case TransitionEffect.REQUEST_APPROVAL:
        subtask.retryCount = input.retryCount;
        assignment.phase = AssignmentPhase.AWAITING_APPROVAL;
        assignment.approvalHandle = input.handle ?? null;
        break;
      case TransitionEffect.FAIL_SUBTASK: {
        subtask.retryCount = input.retryCount;
        const reason = input.reason ?? 'failed';
        graph.markFailed(subtask.id, reason);
        this.settle(state, assignment, key, false);
        log.warn({ threadId: state.threadId, subtaskId: subtask.id, reason }, 'Subtask failed');
        if (this.settings.failurePolicy === 'block-dependents') {
          graph.blockDependents(subtask.id, `Dependency ${subtask.id} failed`);
        }
        break;
      }
      case TransitionEffect.APPLY_DECISION:
        assignment.phase = AssignmentPhase.REVIEW;
        assignment.approvalHandle = null;
        break;
      case TransitionEffect.NONE:
        break;
    }
  }

  /**
   * Release the worker and drop the finished assignment.
   */
  private settle(state: OrchestrationState, assignment: Assignment, key: string, success: boolean): void {
    const holder = this.options.directory.get(assignment.workerName)?.currentSubtask;
    if (holder === key) {
      this.options.directory.release(assignment.workerName, success);
    }
    state.assignments = state.assignments.filter((a) => a !== assignment);
  }

  private async synthesize(state: OrchestrationState): Promise<void> {
    const input = state.task
      ? buildSynthesisInput(state.task)
      : { goal: state.objective, completed: [], failed: [], blocked: [], unreached: [] };
    const artifact = await this.synthesizer.synthesize(input.goal, input);
    state.report = { ...input, artifact };
    log.info(
      {
        threadId: state.threadId,
        completed: input.completed.length,
        failed: input.failed.length,
        blocked: input.blocked.length,
        unreached: input.unreached.length,
      },
      'Synthesis complete'
    );
    this.move(state, OrchestrationEvent.SYNTHESIZED);
  }

  // ==========================================================================
  // Bookkeeping
  // ==========================================================================

  private transition(
    state: OrchestrationState,
    event: OrchestrationEvent,
    subtaskId: string | null = null
  ): TransitionRecord {
    const record = createTransitionRecord(state.node, event, subtaskId);
    state.history.push(record);
    log.info(
      { threadId: state.threadId, from: record.from, event, to: record.to, subtaskId },
      'Transition'
    );
    this.emit('transition', state.threadId, record);
    return record;
  }

  private move(state: OrchestrationState, event: OrchestrationEvent, subtaskId: string | null = null): void {
    state.node = this.transition(state, event, subtaskId).to;
  }

  private async persist(runtime: ThreadRuntime): Promise<void> {
    await this.options.store.put(runtime.state.threadId, runtime.state);
    runtime.dirty = false;
  }

  private async load(threadId: string): Promise<ThreadRuntime> {
    const cached = this.threads.get(threadId);
    if (cached) {
      return cached;
    }

    const checkpoint = await this.options.store.get(threadId);
    if (!checkpoint) {
      throw new CheckpointIOError(threadId, 'no checkpoint found');
    }
    const runtime: ThreadRuntime = { state: checkpoint.state, dirty: false };
    if (runtime.state.node === OrchestrationNode.DONE) {
      return runtime;
    }
    this.reclaimWorkers(runtime.state);
    this.restoreApprovals(runtime.state);
    this.threads.set(threadId, runtime);
    log.info({ threadId, sequence: checkpoint.sequence, node: runtime.state.node }, 'Thread loaded from checkpoint');
    return runtime;
  }

  /**
   * Take back the claims a checkpointed thread held when it was saved.
   */
  private reclaimWorkers(state: OrchestrationState): void {
    const { directory } = this.options;
    const taken: Array<{ subtask: Subtask; workerName: string }> = [];
    for (const assignment of state.assignments) {
      const key = claimKey(state.threadId, assignment.subtaskId);
      const holder = directory.get(assignment.workerName);
      if (!holder) {
        this.cancelClaims(state.threadId, taken);
        throw new AssignmentError(`Worker ${assignment.workerName} is not registered`, assignment.workerName);
      }
      if (holder.currentSubtask === key) continue;
      if (!directory.claim(assignment.workerName, key)) {
        this.cancelClaims(state.threadId, taken);
        throw new AssignmentError(
          `Worker ${assignment.workerName} is held by ${holder.currentSubtask ?? 'another thread'}`,
          assignment.workerName
        );
      }
      taken.push({ subtask: this.requireSubtask(state, assignment.subtaskId), workerName: assignment.workerName });
    }
  }

  private restoreApprovals(state: OrchestrationState): void {
    const task = state.task;
    if (!task) return;
    for (const assignment of state.assignments) {
      const subtask = task.subtasks.find((s) => s.id === assignment.subtaskId);
      const text = assignment.outcome?.ok ? assignment.outcome.text : '';
      if (assignment.approvalHandle === null || !subtask) continue;
      const request = approvalRequest(subtask, assignment, text, subtask.retryCount);
      this.options.gate.restore({
        handle: assignment.approvalHandle,
        threadId: state.threadId,
        question: request.question,
        details: request.details,
        createdAt: state.updatedAt,
      });
    }
  }

  private cancelClaims(threadId: string, claimed: ReadonlyArray<{ subtask: Subtask; workerName: string }>): void {
    for (const { subtask, workerName } of claimed) {
      this.options.directory.cancelClaim(workerName, claimKey(threadId, subtask.id));
    }
  }

  private requireSubtask(state: OrchestrationState, subtaskId: string): Subtask {
    const subtask = requireTask(state).subtasks.find((s) => s.id === subtaskId);
    if (!subtask) {
      throw new GraphError(`Unknown subtask: ${subtaskId}`, [subtaskId]);
    }
    return subtask;
  }

  /**
   * Run `work` after every earlier operation on the same thread has settled.
   */
  private withThread<T>(threadId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(threadId) ?? Promise.resolve();
    const current = previous.then(work, work);
    this.locks.set(threadId, current);
    const prune = (): void => {
      if (this.locks.get(threadId) === current) {
        this.locks.delete(threadId);
      }
    };
    void current.then(prune, prune);
    return current;
  }
}

/**
 * Present a worker to the consensus panel as a candidate.
 */
export function workerCandidate(name: string, worker: Worker, taskGoal: string): Candidate {
  return {
    id: name,
    answer: (question) => worker.execute(question.text, { purpose: 'interview', taskGoal }),
  };
}

/**
 * Directory claim key; unique across threads sharing one directory.
 */
export function claimKey(threadId: string, subtaskId: string): string {
  return `${threadId}/${subtaskId}`;
}

function requireTask(state: OrchestrationState): Task {
  if (!state.task) {
    throw new GraphError(`Thread ${state.threadId} has no task`);
  }
  return state.task;
}

function batchSubtaskId(ids: readonly string[]): string | null {
  return ids.length === 1 ? (ids[0] ?? null) : null;
}

function pendingHandles(state: OrchestrationState): string[] {
  return state.assignments
    .map((a) => a.approvalHandle)
    .filter((handle): handle is string => handle !== null);
}

function phaseNode(phase: AssignmentPhase): OrchestrationNode {
  switch (phase) {
    case AssignmentPhase.AWAITING_APPROVAL:
      return OrchestrationNode.SUSPENDED;
    case AssignmentPhase.EXECUTE:
      return OrchestrationNode.EXECUTE;
    case AssignmentPhase.REVIEW:
      return OrchestrationNode.REVIEW;
  }
}

function verdictFromDecision(decision: ApprovalDecision): ReviewVerdict {
  return {
    approved: decision.approved,
    feedback: decision.feedback ?? (decision.approved ? 'Approved on review' : 'Rejected on review'),
    missingCriteria: [],
  };
}

function approvalRequest(
  subtask: Subtask,
  assignment: Assignment,
  resultText: string,
  attempts: number
): { question: string; details: Record<string, unknown> } {
  const feedback = assignment.verdict?.feedback ?? '';
  return {
    question: `Subtask ${subtask.id} was rejected on review: ${feedback}. Accept the result anyway?`,
    details: {
      subtaskId: subtask.id,
      description: subtask.description,
      worker: assignment.workerName,
      attempts,
      result: resultText,
      feedback,
      missingCriteria: assignment.verdict?.missingCriteria ?? [],
    },
  };
}
