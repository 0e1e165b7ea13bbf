import { z } from 'zod';
import { taskSchema } from './task.js';

/**
 * Nodes of the orchestration state machine.
 */
export const OrchestrationNode = {
  DECOMPOSE: 'decompose',
  ASSIGN: 'assign',
  EXECUTE: 'execute',
  REVIEW: 'review',
  SUSPENDED: 'suspended',
  SYNTHESIZE: 'synthesize',
  DONE: 'done',
} as const;

export type OrchestrationNode = (typeof OrchestrationNode)[keyof typeof OrchestrationNode];

export const orchestrationNodeSchema = z.enum([
  OrchestrationNode.DECOMPOSE,
  OrchestrationNode.ASSIGN,
  OrchestrationNode.EXECUTE,
  OrchestrationNode.REVIEW,
  OrchestrationNode.SUSPENDED,
  OrchestrationNode.SYNTHESIZE,
  OrchestrationNode.DONE,
]);

/**
 * Events that drive transitions.
 */
export const OrchestrationEvent = {
  DECOMPOSED: 'DECOMPOSED',
  DECOMPOSED_EMPTY: 'DECOMPOSED_EMPTY',
  ASSIGNED: 'ASSIGNED',
  NOTHING_READY: 'NOTHING_READY',
  NO_SUBTASKS: 'NO_SUBTASKS',
  EXECUTED: 'EXECUTED',
  APPROVED: 'APPROVED',
  REJECTED_RETRY: 'REJECTED_RETRY',
  REJECTED_ESCALATE: 'REJECTED_ESCALATE',
  REJECTED_EXHAUSTED: 'REJECTED_EXHAUSTED',
  EXECUTION_FAILED: 'EXECUTION_FAILED',
  RESUMED: 'RESUMED',
  SYNTHESIZED: 'SYNTHESIZED',
} as const;

export type OrchestrationEvent = (typeof OrchestrationEvent)[keyof typeof OrchestrationEvent];

export const orchestrationEventSchema = z.nativeEnum(OrchestrationEvent);

/**
 * Side effect attached to a transition. Effects only mutate orchestration
 * state; external calls happen in node actions before the event is known.
 */
export const TransitionEffect = {
  NONE: 'none',
  COMPLETE_SUBTASK: 'complete-subtask',
  SCHEDULE_RETRY: 'schedule-retry',
  REQUEST_APPROVAL: 'request-approval',
  FAIL_SUBTASK: 'fail-subtask',
  APPLY_DECISION: 'apply-decision',
} as const;

export type TransitionEffect = (typeof TransitionEffect)[keyof typeof TransitionEffect];

export const transitionEffectSchema = z.nativeEnum(TransitionEffect);

export const transitionRecordSchema = z.object({
  from: orchestrationNodeSchema,
  event: orchestrationEventSchema,
  to: orchestrationNodeSchema,
  effect: transitionEffectSchema,
  subtaskId: z.string().nullable(),
  at: z.coerce.date(),
});

export type TransitionRecord = z.infer<typeof transitionRecordSchema>;

export const executionOutcomeSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), text: z.string() }),
  z.object({ ok: z.literal(false), error: z.string() }),
]);

export type ExecutionOutcome = z.infer<typeof executionOutcomeSchema>;

export const reviewVerdictSchema = z.object({
  approved: z.boolean(),
  feedback: z.string(),
  missingCriteria: z.array(z.string()),
});

export type ReviewVerdict = z.infer<typeof reviewVerdictSchema>;

export const approvalDecisionSchema = z.object({
  approved: z.boolean(),
  feedback: z.string().optional(),
  decidedBy: z.string().optional(),
});

export type ApprovalDecision = z.infer<typeof approvalDecisionSchema>;

export const AssignmentPhase = {
  EXECUTE: 'execute',
  REVIEW: 'review',
  AWAITING_APPROVAL: 'awaiting-approval',
} as const;

export type AssignmentPhase = (typeof AssignmentPhase)[keyof typeof AssignmentPhase];

/**
 * A subtask bound to a worker for the duration of its execute/review loop.
 */
export const assignmentSchema = z.object({
  subtaskId: z.string(),
  workerName: z.string(),
  phase: z.nativeEnum(AssignmentPhase),
  /** Result of the latest worker call, kept so replay never re-executes */
  outcome: executionOutcomeSchema.nullable(),
  /** Latest verdict, fed back to the worker on retry */
  verdict: reviewVerdictSchema.nullable(),
  /** External decision substituted for the judge on resume */
  decision: approvalDecisionSchema.nullable(),
  approvalHandle: z.string().nullable(),
});

export type Assignment = z.infer<typeof assignmentSchema>;

export const arbitrationRecordSchema = z.object({
  subtaskId: z.string(),
  sessionId: z.string(),
  winner: z.string(),
  confidence: z.enum(['low', 'medium', 'high']),
  tieBreakUsed: z.boolean(),
  ranking: z.array(z.tuple([z.string(), z.number()])),
});

export type ArbitrationRecord = z.infer<typeof arbitrationRecordSchema>;

export const synthesisReportSchema = z.object({
  goal: z.string(),
  artifact: z.string(),
  completed: z.array(z.object({ id: z.string(), description: z.string(), result: z.string() })),
  failed: z.array(z.object({ id: z.string(), description: z.string(), reason: z.string() })),
  blocked: z.array(z.object({ id: z.string(), description: z.string(), reason: z.string() })),
  /** Pending subtasks that could never become ready */
  unreached: z.array(
    z.object({ id: z.string(), description: z.string(), waitingOn: z.array(z.string()) })
  ),
});

export type SynthesisReport = z.infer<typeof synthesisReportSchema>;

/**
 * Complete orchestration state of one thread. This is the checkpointed blob.
 */
export const orchestrationStateSchema = z.object({
  threadId: z.string(),
  objective: z.string(),
  node: orchestrationNodeSchema,
  task: taskSchema.nullable(),
  assignments: z.array(assignmentSchema),
  arbitrations: z.array(arbitrationRecordSchema),
  report: synthesisReportSchema.nullable(),
  history: z.array(transitionRecordSchema),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type OrchestrationState = z.infer<typeof orchestrationStateSchema>;

/**
 * One durable snapshot of a thread.
 */
export interface Checkpoint {
  threadId: string;
  sequence: number;
  state: OrchestrationState;
  timestamp: Date;
}
