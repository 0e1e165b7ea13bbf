/**
 * OrchestrationEngine Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { ApprovalGate } from '../src/approval/approval-gate.js';
import { InMemoryApprovalChannel } from '../src/approval/channel.js';
import { InMemoryCheckpointStore, type CheckpointStore } from '../src/checkpoint/store.js';
import { ConsensusPanel } from '../src/consensus/panel.js';
import { createDefaultRaters } from '../src/consensus/profiles.js';
import { AgentDirectory } from '../src/directory/agent-directory.js';
import { OrchestrationEngine, type EngineSettings } from '../src/orchestrator/engine.js';
import type {
  Checkpoint,
  DecompositionPlan,
  OrchestrationState,
  PlannedSubtask,
  Reviewer,
  ReviewVerdict,
  TransitionRecord,
  Worker,
  WorkerContext,
} from '../src/types/index.js';
import {
  AssignmentError,
  CheckpointIOError,
  ConfigError,
  GraphError,
  HandleNotFoundError,
  ThreadExistsError,
} from '../src/utils/errors.js';

const SETTINGS: EngineSettings = {
  maxRetries: 3,
  maxParallel: 1,
  rejectionPolicy: 'retry',
  failurePolicy: 'leave-pending',
  defaultPhase: 'execution',
  arbitration: false,
  arbitrationCandidates: 3,
};

function plan(...subtasks: PlannedSubtask[]): DecompositionPlan {
  return { goal: 'Ship the release', subtasks };
}

const chain = plan(
  { id: 'a', description: 'step a' },
  { id: 'b', description: 'step b', dependencies: ['a'] },
  { id: 'c', description: 'step c', dependencies: ['b'] }
);

const approveAll: Reviewer = {
  evaluate: () => Promise.resolve({ approved: true, feedback: 'looks good', missingCriteria: [] }),
};

const rejectAll: Reviewer = {
  evaluate: () => Promise.resolve({ approved: false, feedback: 'missing tests', missingCriteria: ['tests'] }),
};

/** Rejects every first attempt and approves the rest */
const rejectFirstAttempt: Reviewer = {
  evaluate: (_subtask, resultText) =>
    Promise.resolve(
      resultText.endsWith('(attempt 1)')
        ? { approved: false, feedback: 'too short', missingCriteria: [] }
        : { approved: true, feedback: 'fine', missingCriteria: [] }
    ),
};

function echoWorker() {
  const execute = vi.fn((description: string, context: WorkerContext) =>
    Promise.resolve(`${description} (attempt ${context.attempt ?? 0})`)
  );
  const worker: Worker = { execute };
  return { worker, execute };
}

interface HarnessOptions {
  plan: DecompositionPlan;
  reviewer?: Reviewer;
  settings?: Partial<EngineSettings>;
  store?: CheckpointStore;
  workerNames?: string[];
  worker?: Worker;
  panel?: ConsensusPanel;
}

function harness(options: HarnessOptions) {
  const directory = new AgentDirectory();
  const echo = echoWorker();
  const worker = options.worker ?? echo.worker;
  for (const name of options.workerNames ?? ['alpha']) {
    directory.register({ name, capabilities: [], phaseAffinity: [] }, worker);
  }
  const channel = new InMemoryApprovalChannel();
  const gate = new ApprovalGate(channel);
  const store = options.store ?? new InMemoryCheckpointStore();
  const engine = new OrchestrationEngine({
    decomposer: { decompose: () => Promise.resolve(options.plan) },
    reviewer: options.reviewer ?? approveAll,
    directory,
    store,
    gate,
    settings: { ...SETTINGS, ...options.settings },
    ...(options.panel && { panel: options.panel }),
  });
  return { engine, directory, channel, gate, store, execute: echo.execute };
}

function events(history: TransitionRecord[]): string[] {
  return history.map((record) => record.event);
}

function trail(history: TransitionRecord[]): Array<Pick<TransitionRecord, 'from' | 'event' | 'to' | 'subtaskId'>> {
  return history.map(({ from, event, to, subtaskId }) => ({ from, event, to, subtaskId }));
}

function subtask(state: OrchestrationState | null, id: string) {
  return state?.task?.subtasks.find((s) => s.id === id);
}

class FlakyStore extends InMemoryCheckpointStore {
  failures = 0;

  override async put(threadId: string, state: OrchestrationState): Promise<Checkpoint> {
    if (this.failures > 0) {
      this.failures--;
      throw new CheckpointIOError(threadId, 'disk full');
    }
    return super.put(threadId, state);
  }
}

describe('OrchestrationEngine', () => {
  describe('scheduling', () => {
    it('should run a chain one subtask at a time', async () => {
      const { engine, execute } = harness({ plan: chain, settings: { maxParallel: 3 } });

      const outcome = await engine.start('thread-1', 'Ship the release');

      expect(outcome.status).toBe('done');
      expect(events(outcome.state.history)).toEqual([
        'DECOMPOSED',
        'ASSIGNED',
        'EXECUTED',
        'APPROVED',
        'ASSIGNED',
        'EXECUTED',
        'APPROVED',
        'ASSIGNED',
        'EXECUTED',
        'APPROVED',
        'NOTHING_READY',
        'SYNTHESIZED',
      ]);
      expect(
        outcome.state.history.filter((r) => r.event === 'ASSIGNED').map((r) => r.subtaskId)
      ).toEqual(['a', 'b', 'c']);
      expect(execute.mock.calls[1]?.[1].dependencyResults).toEqual({ a: 'step a (attempt 1)' });
    });

    it('should synthesize completed results into the report', async () => {
      const { engine } = harness({ plan: chain });

      const outcome = await engine.start('thread-1', 'Ship the release');

      expect(outcome.report?.completed.map((c) => c.id)).toEqual(['a', 'b', 'c']);
      expect(outcome.report?.artifact).toBe(
        [
          '# Ship the release',
          '## a: step a\n\nstep a (attempt 1)',
          '## b: step b\n\nstep b (attempt 1)',
          '## c: step c\n\nstep c (attempt 1)',
        ].join('\n\n')
      );
    });

    it('should run up to maxParallel subtasks concurrently', async () => {
      let running = 0;
      let peak = 0;
      const worker: Worker = {
        execute: async (description) => {
          running++;
          peak = Math.max(peak, running);
          await new Promise<void>((resolve) => setImmediate(() => resolve()));
          running--;
          return description;
        },
      };
      const { engine } = harness({
        plan: plan(
          { id: 'a', description: 'step a' },
          { id: 'b', description: 'step b' },
          { id: 'c', description: 'step c' }
        ),
        settings: { maxParallel: 2 },
        workerNames: ['alpha', 'beta'],
        worker,
      });

      const outcome = await engine.start('thread-1', 'Ship the release');

      expect(peak).toBe(2);
      expect(outcome.state.history.filter((r) => r.event === 'ASSIGNED').map((r) => r.subtaskId)).toEqual([
        null,
        'c',
      ]);
      expect(subtask(outcome.state, 'a')?.assignedTo).toBe('alpha');
      expect(subtask(outcome.state, 'b')?.assignedTo).toBe('beta');
    });

    it('should finish at once when the decomposition is empty', async () => {
      const { engine } = harness({ plan: plan() });

      const outcome = await engine.start('thread-1', 'Ship the release');

      expect(outcome.status).toBe('done');
      expect(events(outcome.state.history)).toEqual(['DECOMPOSED_EMPTY']);
      expect(outcome.report).toBeNull();
    });

    it('should surface a claimed-out directory and continue once a worker frees up', async () => {
      const { engine, directory } = harness({ plan: plan({ id: 'a', description: 'step a' }) });
      directory.claim('alpha', 'other/x');

      await expect(engine.start('thread-1', 'Ship the release')).rejects.toThrow(AssignmentError);
      expect((await engine.getState('thread-1'))?.node).toBe('assign');

      directory.cancelClaim('alpha', 'other/x');
      const outcome = await engine.run('thread-1');

      expect(outcome.status).toBe('done');
      expect(subtask(outcome.state, 'a')?.status).toBe('completed');
    });
  });

  describe('review loop', () => {
    it('should stop after maxRetries rejected attempts and never ready dependents', async () => {
      const { engine, execute, directory } = harness({
        plan: plan({ id: 'a', description: 'step a' }, { id: 'b', description: 'step b', dependencies: ['a'] }),
        reviewer: rejectAll,
      });

      const outcome = await engine.start('thread-1', 'Ship the release');

      expect(execute).toHaveBeenCalledTimes(3);
      expect(execute.mock.calls.map((call) => call[1].attempt)).toEqual([1, 2, 3]);
      expect(execute.mock.calls[1]?.[1].feedback).toBe('missing tests');
      expect(events(outcome.state.history)).toEqual([
        'DECOMPOSED',
        'ASSIGNED',
        'EXECUTED',
        'REJECTED_RETRY',
        'EXECUTED',
        'REJECTED_RETRY',
        'EXECUTED',
        'REJECTED_EXHAUSTED',
        'NOTHING_READY',
        'SYNTHESIZED',
      ]);
      expect(subtask(outcome.state, 'a')).toMatchObject({
        status: 'failed',
        retryCount: 3,
        error: 'Subtask a rejected after 3 attempt(s): missing tests',
      });
      expect(subtask(outcome.state, 'b')?.status).toBe('pending');
      expect(outcome.report?.unreached).toEqual([{ id: 'b', description: 'step b', waitingOn: ['a'] }]);
      expect(directory.status()).toMatchObject({ availableWorkers: 1, totalTasksFailed: 1 });
    });

    it('should block dependents under the block-dependents policy', async () => {
      const { engine } = harness({
        plan: plan({ id: 'a', description: 'step a' }, { id: 'b', description: 'step b', dependencies: ['a'] }),
        reviewer: rejectAll,
        settings: { failurePolicy: 'block-dependents' },
      });

      const outcome = await engine.start('thread-1', 'Ship the release');

      expect(outcome.report?.blocked).toEqual([{ id: 'b', description: 'step b', reason: 'Dependency a failed' }]);
      expect(outcome.report?.unreached).toEqual([]);
    });

    it('should fail a subtask whose worker raises without retrying it', async () => {
      const execute = vi.fn(() => Promise.reject(new Error('boom')));
      const { engine } = harness({ plan: plan({ id: 'a', description: 'step a' }), worker: { execute } });

      const outcome = await engine.start('thread-1', 'Ship the release');

      expect(execute).toHaveBeenCalledTimes(1);
      expect(events(outcome.state.history)).toContain('EXECUTION_FAILED');
      expect(outcome.report?.failed).toEqual([
        { id: 'a', description: 'step a', reason: 'Worker alpha failed on subtask a: boom' },
      ]);
    });

    it('should fail a subtask whose reviewer returns a malformed verdict', async () => {
      const verdict: ReviewVerdict = { approved: false, feedback: 'no', missingCriteria: [] };
      Reflect.deleteProperty(verdict, 'missingCriteria');
      const { engine, store, directory } = harness({
        plan: plan({ id: 'a', description: 'step a' }),
        reviewer: { evaluate: () => Promise.resolve(verdict) },
      });

      const outcome = await engine.start('thread-1', 'Ship the release');

      expect(outcome.status).toBe('done');
      expect(events(outcome.state.history)).toContain('EXECUTION_FAILED');
      expect(outcome.report?.failed).toEqual([
        {
          id: 'a',
          description: 'step a',
          reason: 'Invalid review verdict for subtask a: missingCriteria: Required',
        },
      ]);
      expect(directory.get('alpha')?.tasksFailed).toBe(1);
      expect((await store.get('thread-1'))?.state.node).toBe('done');
    });

    it('should fail a subtask whose worker returns something other than text', async () => {
      const execute = vi.fn().mockResolvedValue(42);
      const { engine, store } = harness({ plan: plan({ id: 'a', description: 'step a' }), worker: { execute } });

      const outcome = await engine.start('thread-1', 'Ship the release');

      expect(outcome.report?.failed).toEqual([
        {
          id: 'a',
          description: 'step a',
          reason: 'Worker alpha failed on subtask a: expected a string result, got number',
        },
      ]);
      expect((await store.history('thread-1')).map((c) => c.state.node)).toEqual([
        'decompose',
        'assign',
        'execute',
        'review',
        'assign',
        'synthesize',
        'done',
      ]);
    });
  });

  describe('approvals', () => {
    it('should suspend on rejection and apply a resume exactly once', async () => {
      const { engine, channel, execute } = harness({
        plan: plan({ id: 'a', description: 'step a' }),
        reviewer: rejectAll,
        settings: { rejectionPolicy: 'escalate' },
      });

      const suspended = await engine.start('thread-1', 'Ship the release');
      const handle = channel.published[0]?.handle ?? '';

      expect(suspended.status).toBe('suspended');
      expect(suspended.pendingApprovals).toEqual([handle]);
      expect(channel.published[0]?.question).toBe(
        'Subtask a was rejected on review: missing tests. Accept the result anyway?'
      );

      const first = await engine.resume(handle, { approved: true, decidedBy: 'ops' });
      const second = await engine.resume(handle, { approved: true, decidedBy: 'ops' });

      expect(first.ok && first.outcome.status).toBe('done');
      expect(second.ok).toBe(false);
      expect(!second.ok && second.error).toBeInstanceOf(HandleNotFoundError);
      expect(execute).toHaveBeenCalledTimes(1);

      const state = await engine.getState('thread-1');
      expect(subtask(state, 'a')).toMatchObject({ status: 'completed', result: 'step a (attempt 1)' });
      expect(events(state?.history ?? []).filter((e) => e === 'APPROVED')).toHaveLength(1);
    });

    it('should apply only one of two concurrent resumes', async () => {
      const { engine, channel } = harness({
        plan: plan({ id: 'a', description: 'step a' }),
        reviewer: rejectAll,
        settings: { rejectionPolicy: 'escalate' },
      });
      await engine.start('thread-1', 'Ship the release');
      const handle = channel.published[0]?.handle ?? '';

      const results = await Promise.all([
        engine.resume(handle, { approved: true }),
        engine.resume(handle, { approved: true }),
      ]);

      expect(results.map((r) => r.ok)).toEqual([true, false]);
      const state = await engine.getState('thread-1');
      expect(events(state?.history ?? []).filter((e) => e === 'RESUMED')).toHaveLength(1);
    });

    it('should retry after an external rejection', async () => {
      const { engine, channel, execute } = harness({
        plan: plan({ id: 'a', description: 'step a' }),
        reviewer: rejectAll,
        settings: { rejectionPolicy: 'escalate' },
      });
      await engine.start('thread-1', 'Ship the release');

      const result = await engine.resume(channel.published[0]?.handle ?? '', {
        approved: false,
        feedback: 'add a changelog entry',
      });

      expect(result.ok && result.outcome.status).toBe('suspended');
      expect(execute).toHaveBeenCalledTimes(2);
      expect(execute.mock.calls[1]?.[1]).toMatchObject({ attempt: 2, feedback: 'add a changelog entry' });
      expect(channel.published).toHaveLength(2);
    });

    it('should escalate only the final rejection under escalate-final', async () => {
      const { engine, execute } = harness({
        plan: plan({ id: 'a', description: 'step a' }),
        reviewer: rejectAll,
        settings: { rejectionPolicy: 'escalate-final', maxRetries: 2 },
      });

      const outcome = await engine.start('thread-1', 'Ship the release');

      expect(outcome.status).toBe('suspended');
      expect(execute).toHaveBeenCalledTimes(2);
      expect(events(outcome.state.history).slice(-2)).toEqual(['EXECUTED', 'REJECTED_ESCALATE']);
    });

    it('should return an error for an unknown handle', async () => {
      const { engine } = harness({ plan: chain });

      const result = await engine.resume('missing', { approved: true });

      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.message).toBe('No pending approval for handle missing');
    });

    it('should answer approvals of a thread suspended before a restart', async () => {
      const store = new InMemoryCheckpointStore();
      const before = harness({
        plan: plan({ id: 'a', description: 'step a' }),
        reviewer: rejectAll,
        settings: { rejectionPolicy: 'escalate' },
        store,
      });
      await before.engine.start('thread-1', 'Ship the release');
      const handle = before.channel.published[0]?.handle ?? '';

      const after = harness({ plan: chain, store, settings: { rejectionPolicy: 'escalate' } });
      expect(await after.engine.recover()).toEqual(['thread-1']);
      expect(after.gate.pending().map((p) => p.handle)).toEqual([handle]);
      expect(after.directory.get('alpha')?.currentSubtask).toBe('thread-1/a');

      const result = await after.engine.resume(handle, { approved: true });

      expect(result.ok && result.outcome.status).toBe('done');
      expect(after.execute).not.toHaveBeenCalled();
      expect(after.directory.get('alpha')).toMatchObject({ available: true, tasksCompleted: 1 });
    });

    it('should keep only unfinished threads in memory', async () => {
      const { engine, channel, gate } = harness({
        plan: plan({ id: 'a', description: 'step a' }),
        reviewer: rejectAll,
        settings: { rejectionPolicy: 'escalate' },
      });
      await engine.start('thread-1', 'Ship the release');
      expect(engine.activeThreads()).toEqual(['thread-1']);

      const result = await engine.resume(channel.published[0]?.handle ?? '', { approved: true });

      expect(result.ok && result.outcome.status).toBe('done');
      expect(engine.activeThreads()).toEqual([]);
      expect(gate.consumedCount()).toBe(0);
      expect((await engine.getState('thread-1'))?.node).toBe('done');
    });

    it('should drop claims and approvals of a deleted thread', async () => {
      const { engine, channel, directory, gate } = harness({
        plan: plan({ id: 'a', description: 'step a' }),
        reviewer: rejectAll,
        settings: { rejectionPolicy: 'escalate' },
      });
      await engine.start('thread-1', 'Ship the release');

      expect(await engine.deleteThread('thread-1')).toBe(true);
      expect(directory.get('alpha')?.available).toBe(true);
      expect(gate.pending()).toEqual([]);
      expect(await engine.getState('thread-1')).toBeNull();

      const result = await engine.resume(channel.published[0]?.handle ?? '', { approved: true });
      expect(result.ok).toBe(false);
    });
  });

  describe('checkpoints', () => {
    it('should replay from a checkpoint into the same transitions', async () => {
      const reference = harness({ plan: chain, reviewer: rejectFirstAttempt });
      const uninterrupted = await reference.engine.start('thread-1', 'Ship the release');

      const store = new InMemoryCheckpointStore();
      let reviews = 0;
      const crashing: Reviewer = {
        evaluate: (s, text) => {
          reviews++;
          if (reviews === 2) return Promise.reject(new Error('reviewer crashed'));
          return rejectFirstAttempt.evaluate(s, text);
        },
      };
      const first = harness({ plan: chain, reviewer: crashing, store });
      await expect(first.engine.start('thread-1', 'Ship the release')).rejects.toThrow('reviewer crashed');

      const second = harness({ plan: chain, reviewer: rejectFirstAttempt, store });
      const replayed = await second.engine.run('thread-1');

      expect(trail(replayed.state.history)).toEqual(trail(uninterrupted.state.history));
      expect(first.execute.mock.calls.length + second.execute.mock.calls.length).toBe(
        reference.execute.mock.calls.length
      );
      expect(events(uninterrupted.state.history).slice(1, 6)).toEqual([
        'ASSIGNED',
        'EXECUTED',
        'REJECTED_RETRY',
        'EXECUTED',
        'APPROVED',
      ]);
    });

    it('should write the pending checkpoint before advancing after a failed write', async () => {
      const store = new FlakyStore();
      let calls = 0;
      const execute = vi.fn((description: string) => {
        calls++;
        if (calls === 1) store.failures = 1;
        return Promise.resolve(description);
      });
      const { engine } = harness({ plan: plan({ id: 'a', description: 'step a' }), store, worker: { execute } });

      await expect(engine.start('thread-1', 'Ship the release')).rejects.toThrow(CheckpointIOError);
      expect((await store.get('thread-1'))?.state.node).toBe('execute');

      const outcome = await engine.run('thread-1');

      expect(outcome.status).toBe('done');
      expect(execute).toHaveBeenCalledTimes(1);
      expect(events(outcome.state.history)).toEqual([
        'DECOMPOSED',
        'ASSIGNED',
        'EXECUTED',
        'APPROVED',
        'NOTHING_READY',
        'SYNTHESIZED',
      ]);
    });

    it('should checkpoint every step', async () => {
      const { engine, store } = harness({ plan: plan({ id: 'a', description: 'step a' }) });

      await engine.start('thread-1', 'Ship the release');

      const nodes = (await store.history('thread-1')).map((c) => c.state.node);
      expect(nodes).toEqual(['decompose', 'assign', 'execute', 'review', 'assign', 'synthesize', 'done']);
    });

    it('should refuse to start a thread twice', async () => {
      const { engine } = harness({ plan: chain });
      await engine.start('thread-1', 'Ship the release');

      const second = engine.start('thread-1', 'Ship the release');

      await expect(second).rejects.toThrow(ThreadExistsError);
      await expect(second).rejects.toThrow('Thread already exists: thread-1');
    });

    it('should treat a step on a finished thread as a no-op', async () => {
      const { engine, store } = harness({ plan: plan({ id: 'a', description: 'step a' }) });
      await expect(engine.start('thread-1', 'Ship the release')).resolves.toMatchObject({ status: 'done' });

      const state = await engine.step('thread-1');

      expect(state.node).toBe('done');
      expect(await store.history('thread-1')).toHaveLength(7);
    });
  });

  describe('decomposition', () => {
    it('should reject a cyclic decomposition without leaving decompose', async () => {
      const { engine } = harness({
        plan: plan(
          { id: 'a', description: 'step a', dependencies: ['b'] },
          { id: 'b', description: 'step b', dependencies: ['a'] }
        ),
      });

      await expect(engine.start('thread-1', 'Ship the release')).rejects.toThrow(GraphError);
      expect((await engine.getState('thread-1'))?.node).toBe('decompose');
    });

    it('should reject a malformed decomposition', async () => {
      const { engine } = harness({ plan: { goal: '', subtasks: [] } });

      await expect(engine.start('thread-1', 'Ship the release')).rejects.toThrow(
        'Invalid decomposition: goal: String must contain at least 1 character(s)'
      );
    });
  });

  describe('arbitration', () => {
    function panelFavouring(name: string): ConsensusPanel {
      return new ConsensusPanel({
        raters: createDefaultRaters(3, (profile) => (input) =>
          Promise.resolve({
            metrics: {
              accuracy: 4,
              relevance: 4,
              completeness: 4,
              explainability: 4,
              efficiency: 4,
              safety: 4,
            },
            vote: input.candidate === name ? 'accept' : 'reject',
            rationale: profile.specialty,
          })
        ),
        adjudicator: {
          draftTieBreaker: () => Promise.resolve({ id: 'tb', text: 'Pick one', focus: 'general' }),
          judge: () => Promise.resolve({ selected: null, justification: 'none', scores: {} }),
        },
      });
    }

    it('should let the panel pick among eligible workers', async () => {
      const { engine, execute } = harness({
        plan: plan({ id: 'a', description: 'step a' }),
        workerNames: ['alpha', 'beta'],
        settings: { arbitration: true },
        panel: panelFavouring('beta'),
      });

      const outcome = await engine.start('thread-1', 'Ship the release');

      expect(outcome.state.arbitrations).toHaveLength(1);
      expect(outcome.state.arbitrations[0]).toMatchObject({
        subtaskId: 'a',
        winner: 'beta',
        confidence: 'high',
        tieBreakUsed: false,
      });
      expect(subtask(outcome.state, 'a')?.assignedTo).toBe('beta');
      expect(execute.mock.calls.filter((call) => call[1].purpose === 'subtask')).toHaveLength(1);
    });

    it('should require a panel when arbitration is on', () => {
      expect(() => harness({ plan: chain, settings: { arbitration: true } })).toThrow(ConfigError);
    });
  });
});
