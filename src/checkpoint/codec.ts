/**
 * JSON encoding of checkpoints, shared by every store. Decoding validates
 * the record and restores Date fields.
 */

import { z } from 'zod';
import { orchestrationStateSchema, type Checkpoint, type OrchestrationState } from '../types/index.js';
import { CheckpointIOError, errorMessage } from '../utils/errors.js';

export const checkpointRecordSchema = z.object({
  threadId: z.string(),
  sequence: z.number().int().min(1),
  state: orchestrationStateSchema,
  timestamp: z.coerce.date(),
});

const THREAD_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

export function isValidThreadId(threadId: string): boolean {
  return THREAD_ID_PATTERN.test(threadId) && threadId !== '.' && threadId !== '..';
}

export function assertValidThreadId(threadId: string): void {
  if (!isValidThreadId(threadId)) {
    throw new CheckpointIOError(threadId, 'invalid thread id');
  }
}

/**
 * Encode a checkpoint. A record that would not decode again is refused
 * before anything is written.
 */
export function serializeCheckpoint(checkpoint: Checkpoint): string {
  const result = checkpointRecordSchema.safeParse(checkpoint);
  if (!result.success) {
    throw new CheckpointIOError(checkpoint.threadId, `refusing to write invalid checkpoint: ${formatIssues(result.error)}`);
  }
  return JSON.stringify(result.data, null, 2);
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
}

export function deserializeCheckpoint(content: string, threadId: string): Checkpoint {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new CheckpointIOError(threadId, `corrupt checkpoint: ${errorMessage(err)}`, err);
  }

  const result = checkpointRecordSchema.safeParse(raw);
  if (!result.success) {
    throw new CheckpointIOError(threadId, `invalid checkpoint: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Deep copy through the codec, so a stored state never aliases live objects.
 */
export function cloneState(state: OrchestrationState): OrchestrationState {
  return orchestrationStateSchema.parse(JSON.parse(JSON.stringify(state)));
}
