import { z } from 'zod';

// Subtask Status
export const SubtaskStatus = {
  PENDING: 'pending',
  IN_PROGRESS: 'in_progress',
  COMPLETED: 'completed',
  FAILED: 'failed',
  BLOCKED: 'blocked',
} as const;

export type SubtaskStatus = (typeof SubtaskStatus)[keyof typeof SubtaskStatus];

export const subtaskStatusSchema = z.enum([
  SubtaskStatus.PENDING,
  SubtaskStatus.IN_PROGRESS,
  SubtaskStatus.COMPLETED,
  SubtaskStatus.FAILED,
  SubtaskStatus.BLOCKED,
]);

/**
 * Statuses a subtask never leaves.
 */
export const TERMINAL_STATUSES: readonly SubtaskStatus[] = [
  SubtaskStatus.COMPLETED,
  SubtaskStatus.FAILED,
  SubtaskStatus.BLOCKED,
];

export function isTerminalStatus(status: SubtaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export const subtaskSchema = z.object({
  id: z.string().min(1),
  description: z.string(),
  /** Worker currently or last bound to this subtask */
  assignedTo: z.string().nullable(),
  status: subtaskStatusSchema,
  acceptanceCriteria: z.array(z.string()),
  /** Ids of subtasks in the same task that must complete first */
  dependencies: z.array(z.string()),
  /** Capability tags used to pick a worker */
  capabilities: z.array(z.string()),
  result: z.string().nullable(),
  retryCount: z.number().int().min(0),
  /** Failure or block reason */
  error: z.string().nullable(),
});

export type Subtask = z.infer<typeof subtaskSchema>;

export const taskSchema = z.object({
  id: z.string().min(1),
  goal: z.string(),
  subtasks: z.array(subtaskSchema),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  metadata: z.record(z.unknown()),
});

export type Task = z.infer<typeof taskSchema>;

/**
 * Subtask as produced by a decomposition, before any execution state.
 */
export const plannedSubtaskSchema = z.object({
  id: z.string().min(1),
  description: z.string().min(1),
  acceptanceCriteria: z.array(z.string()).default([]),
  dependencies: z.array(z.string()).default([]),
  capabilities: z.array(z.string()).default([]),
});

export type PlannedSubtask = z.input<typeof plannedSubtaskSchema>;

export const decompositionPlanSchema = z.object({
  goal: z.string().min(1),
  subtasks: z.array(plannedSubtaskSchema),
  metadata: z.record(z.unknown()).default({}),
});

export type DecompositionPlan = z.input<typeof decompositionPlanSchema>;

/**
 * Create a pending subtask with defaults for everything but id and description.
 */
export function createSubtask(input: PlannedSubtask): Subtask {
  return {
    id: input.id,
    description: input.description,
    assignedTo: null,
    status: SubtaskStatus.PENDING,
    acceptanceCriteria: [...(input.acceptanceCriteria ?? [])],
    dependencies: [...(input.dependencies ?? [])],
    capabilities: [...(input.capabilities ?? [])],
    result: null,
    retryCount: 0,
    error: null,
  };
}
