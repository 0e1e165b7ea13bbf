/**
 * Orchestration transition table.
 *
 * Every edge the engine may take is listed here as
 * `(node, event) -> { to, effect }`. Pairs that are missing are invalid and
 * raise InvalidTransitionError.
 */

import {
  OrchestrationEvent,
  OrchestrationNode,
  TransitionEffect,
  type TransitionRecord,
} from '../types/index.js';
import { InvalidTransitionError } from '../utils/errors.js';

export interface TransitionTarget {
  to: OrchestrationNode;
  effect: TransitionEffect;
}

const edge = (to: OrchestrationNode, effect: TransitionEffect = TransitionEffect.NONE): TransitionTarget => ({
  to,
  effect,
});

export const TRANSITIONS: Readonly<
  Record<OrchestrationNode, Partial<Record<OrchestrationEvent, TransitionTarget>>>
> = {
  [OrchestrationNode.DECOMPOSE]: {
    [OrchestrationEvent.DECOMPOSED]: edge(OrchestrationNode.ASSIGN),
    [OrchestrationEvent.DECOMPOSED_EMPTY]: edge(OrchestrationNode.DONE),
  },
  [OrchestrationNode.ASSIGN]: {
    [OrchestrationEvent.ASSIGNED]: edge(OrchestrationNode.EXECUTE),
    [OrchestrationEvent.NOTHING_READY]: edge(OrchestrationNode.SYNTHESIZE),
    [OrchestrationEvent.NO_SUBTASKS]: edge(OrchestrationNode.DONE),
  },
  [OrchestrationNode.EXECUTE]: {
    [OrchestrationEvent.EXECUTED]: edge(OrchestrationNode.REVIEW),
  },
  [OrchestrationNode.REVIEW]: {
    [OrchestrationEvent.APPROVED]: edge(OrchestrationNode.ASSIGN, TransitionEffect.COMPLETE_SUBTASK),
    [OrchestrationEvent.REJECTED_RETRY]: edge(OrchestrationNode.EXECUTE, TransitionEffect.SCHEDULE_RETRY),
    [OrchestrationEvent.REJECTED_ESCALATE]: edge(
      OrchestrationNode.SUSPENDED,
      TransitionEffect.REQUEST_APPROVAL
    ),
    [OrchestrationEvent.REJECTED_EXHAUSTED]: edge(OrchestrationNode.ASSIGN, TransitionEffect.FAIL_SUBTASK),
    [OrchestrationEvent.EXECUTION_FAILED]: edge(OrchestrationNode.ASSIGN, TransitionEffect.FAIL_SUBTASK),
  },
  [OrchestrationNode.SUSPENDED]: {
    [OrchestrationEvent.RESUMED]: edge(OrchestrationNode.REVIEW, TransitionEffect.APPLY_DECISION),
  },
  [OrchestrationNode.SYNTHESIZE]: {
    [OrchestrationEvent.SYNTHESIZED]: edge(OrchestrationNode.DONE),
  },
  [OrchestrationNode.DONE]: {},
};

/**
 * Nodes at which `run` stops and hands control back to the caller.
 */
export const HALTING_NODES: readonly OrchestrationNode[] = [
  OrchestrationNode.SUSPENDED,
  OrchestrationNode.DONE,
];

export function validEvents(from: OrchestrationNode): OrchestrationEvent[] {
  return Object.values(OrchestrationEvent).filter((event) => TRANSITIONS[from][event] !== undefined);
}

export function canTransition(from: OrchestrationNode, event: OrchestrationEvent): boolean {
  return TRANSITIONS[from][event] !== undefined;
}

export function getTransition(from: OrchestrationNode, event: OrchestrationEvent): TransitionTarget {
  const target = TRANSITIONS[from][event];
  if (!target) {
    throw new InvalidTransitionError(from, event, validEvents(from));
  }
  return target;
}

/**
 * Look up an edge and produce its audit record.
 */
export function createTransitionRecord(
  from: OrchestrationNode,
  event: OrchestrationEvent,
  subtaskId: string | null = null
): TransitionRecord {
  const { to, effect } = getTransition(from, event);
  return { from, event, to, effect, subtaskId, at: new Date() };
}

/**
 * Node that follows a review of a batch: any assignment awaiting a human
 * decision parks the thread; any assignment due for re-execution runs next.
 */
export function mostUrgent(targets: readonly OrchestrationNode[]): OrchestrationNode {
  if (targets.includes(OrchestrationNode.SUSPENDED)) return OrchestrationNode.SUSPENDED;
  if (targets.includes(OrchestrationNode.EXECUTE)) return OrchestrationNode.EXECUTE;
  return OrchestrationNode.ASSIGN;
}
