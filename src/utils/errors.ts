/**
 * Error taxonomy for the orchestration core.
 *
 * GraphError, CheckpointIOError, AssignmentError and InvalidTransitionError
 * halt the current step and surface to the caller. ExecutionFailure and
 * ReviewRejection are absorbed into subtask status. HandleNotFoundError is
 * returned as a value by resume operations.
 */

export type TaskloomErrorCode =
  | 'GRAPH_ERROR'
  | 'ASSIGNMENT_ERROR'
  | 'EXECUTION_FAILURE'
  | 'REVIEW_REJECTION'
  | 'CHECKPOINT_IO_ERROR'
  | 'HANDLE_NOT_FOUND'
  | 'THREAD_EXISTS'
  | 'INVALID_TRANSITION'
  | 'CONFIG_ERROR';

/**
 * Base class for every error raised by taskloom.
 */
export abstract class TaskloomError extends Error {
  abstract readonly code: TaskloomErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Cycle, unknown dependency, duplicate id or unknown subtask.
 * The graph is left unchanged.
 */
export class GraphError extends TaskloomError {
  override readonly name = 'GraphError';
  readonly code = 'GRAPH_ERROR' as const;
  readonly subtaskIds: string[];

  constructor(message: string, subtaskIds: string[] = []) {
    super(message);
    this.subtaskIds = subtaskIds;
  }
}

/**
 * No eligible worker could be claimed. The caller may retry later.
 */
export class AssignmentError extends TaskloomError {
  override readonly name = 'AssignmentError';
  readonly code = 'ASSIGNMENT_ERROR' as const;
  readonly workerName: string | null;

  constructor(message: string, workerName: string | null = null) {
    super(message);
    this.workerName = workerName;
  }
}

/**
 * A worker call raised. Recorded on the subtask, siblings continue.
 */
export class ExecutionFailure extends TaskloomError {
  override readonly name = 'ExecutionFailure';
  readonly code = 'EXECUTION_FAILURE' as const;
  readonly subtaskId: string;
  readonly workerName: string;

  constructor(subtaskId: string, workerName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Worker ${workerName} failed on subtask ${subtaskId}: ${reason}`, { cause });
    this.subtaskId = subtaskId;
    this.workerName = workerName;
  }
}

/**
 * The reviewer rejected a result. Drives the retry/suspend loop.
 */
export class ReviewRejection extends TaskloomError {
  override readonly name = 'ReviewRejection';
  readonly code = 'REVIEW_REJECTION' as const;
  readonly subtaskId: string;
  readonly feedback: string;
  readonly missingCriteria: string[];
  readonly attempts: number;

  constructor(subtaskId: string, feedback: string, missingCriteria: string[], attempts: number) {
    super(`Subtask ${subtaskId} rejected after ${attempts} attempt(s): ${feedback}`);
    this.subtaskId = subtaskId;
    this.feedback = feedback;
    this.missingCriteria = missingCriteria;
    this.attempts = attempts;
  }
}

/**
 * The checkpoint store could not be read or written.
 */
export class CheckpointIOError extends TaskloomError {
  override readonly name = 'CheckpointIOError';
  readonly code = 'CHECKPOINT_IO_ERROR' as const;
  readonly threadId: string;

  constructor(threadId: string, message: string, cause?: unknown) {
    super(`Checkpoint I/O failed for thread ${threadId}: ${message}`, { cause });
    this.threadId = threadId;
  }
}

/**
 * Resume on an unknown, expired or already consumed suspension handle.
 */
export class HandleNotFoundError extends TaskloomError {
  override readonly name = 'HandleNotFoundError';
  readonly code = 'HANDLE_NOT_FOUND' as const;
  readonly handle: string;

  constructor(handle: string) {
    super(`No pending approval for handle ${handle}`);
    this.handle = handle;
  }
}

/**
 * `start` on a thread id that is already in memory or checkpointed.
 */
export class ThreadExistsError extends TaskloomError {
  override readonly name = 'ThreadExistsError';
  readonly code = 'THREAD_EXISTS' as const;
  readonly threadId: string;

  constructor(threadId: string) {
    super(`Thread already exists: ${threadId}`);
    this.threadId = threadId;
  }
}

export class InvalidTransitionError extends TaskloomError {
  override readonly name = 'InvalidTransitionError';
  readonly code = 'INVALID_TRANSITION' as const;
  readonly fromState: string;
  readonly event: string;
  readonly validEvents: string[];

  constructor(fromState: string, event: string, validEvents: string[]) {
    super(
      `Invalid transition: cannot apply '${event}' in state '${fromState}'. ` +
        `Valid events: [${validEvents.join(', ')}]`
    );
    this.fromState = fromState;
    this.event = event;
    this.validEvents = validEvents;
  }
}

export class ConfigError extends TaskloomError {
  override readonly name = 'ConfigError';
  readonly code = 'CONFIG_ERROR' as const;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.issues = issues;
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Whether a thrown value is a Node system error with the given code.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
