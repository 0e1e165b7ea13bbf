import type { Checkpoint, OrchestrationState } from '../types/index.js';
import { assertValidThreadId, deserializeCheckpoint, serializeCheckpoint } from './codec.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('checkpoint-store');

/**
 * Durable, per-thread snapshots of orchestration state. Each `put` writes a
 * complete snapshot with the next sequence number; `get` returns the latest.
 */
export interface CheckpointStore {
  put(threadId: string, state: OrchestrationState): Promise<Checkpoint>;
  get(threadId: string): Promise<Checkpoint | null>;
  /** All checkpoints of a thread, oldest first */
  history(threadId: string): Promise<Checkpoint[]>;
  listThreads(): Promise<string[]>;
  delete(threadId: string): Promise<boolean>;
}

/**
 * Store that keeps encoded checkpoints in memory. Used by tests and by
 * short-lived runs that do not need to survive a restart.
 */
export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly threads = new Map<string, string[]>();

  async put(threadId: string, state: OrchestrationState): Promise<Checkpoint> {
    assertValidThreadId(threadId);
    const records = this.threads.get(threadId) ?? [];
    const checkpoint: Checkpoint = {
      threadId,
      sequence: records.length + 1,
      state,
      timestamp: new Date(),
    };
    const encoded = serializeCheckpoint(checkpoint);
    records.push(encoded);
    this.threads.set(threadId, records);
    log.debug({ threadId, sequence: checkpoint.sequence, node: state.node }, 'Checkpoint written');
    return deserializeCheckpoint(encoded, threadId);
  }

  async get(threadId: string): Promise<Checkpoint | null> {
    const latest = this.threads.get(threadId)?.at(-1);
    return latest === undefined ? null : deserializeCheckpoint(latest, threadId);
  }

  async history(threadId: string): Promise<Checkpoint[]> {
    const records = this.threads.get(threadId) ?? [];
    return records.map((record) => deserializeCheckpoint(record, threadId));
  }

  async listThreads(): Promise<string[]> {
    return [...this.threads.keys()].sort();
  }

  async delete(threadId: string): Promise<boolean> {
    return this.threads.delete(threadId);
  }
}
