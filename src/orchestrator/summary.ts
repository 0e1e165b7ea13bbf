import { TaskGraph, type GraphStatusSummary } from '../graph/task-graph.js';
import type { Checkpoint, OrchestrationNode, TransitionRecord } from '../types/index.js';

/**
 * Compact view of a thread's latest checkpoint, shared by the HTTP surface
 * and the CLI.
 */
export interface ThreadSummary {
  threadId: string;
  objective: string;
  node: OrchestrationNode;
  sequence: number;
  goal: string | null;
  subtasks: GraphStatusSummary | null;
  pendingApprovals: string[];
  lastTransition: Pick<TransitionRecord, 'from' | 'event' | 'to' | 'subtaskId'> | null;
  transitions: number;
  createdAt: string;
  updatedAt: string;
}

export function summarizeThread(checkpoint: Checkpoint): ThreadSummary {
  const { state } = checkpoint;
  const last = state.history.at(-1);
  return {
    threadId: state.threadId,
    objective: state.objective,
    node: state.node,
    sequence: checkpoint.sequence,
    goal: state.task?.goal ?? null,
    subtasks: state.task ? TaskGraph.fromTask(state.task).statusSummary() : null,
    pendingApprovals: state.assignments
      .map((a) => a.approvalHandle)
      .filter((handle): handle is string => handle !== null),
    lastTransition: last
      ? { from: last.from, event: last.event, to: last.to, subtaskId: last.subtaskId }
      : null,
    transitions: state.history.length,
    createdAt: state.createdAt.toISOString(),
    updatedAt: state.updatedAt.toISOString(),
  };
}
