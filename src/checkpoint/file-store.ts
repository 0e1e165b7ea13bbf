/**
 * File-backed checkpoint store.
 *
 * Layout: `<dataDir>/checkpoints/<threadId>/<sequence>.json`. Each snapshot
 * is written to a temp file and hard-linked into place, so readers only ever
 * see complete files and no sequence is overwritten, even by another process
 * sharing the directory. Writes for one thread in one store run one after
 * another.
 */

import { link, mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { nanoid } from 'nanoid';
import type { Checkpoint, OrchestrationState } from '../types/index.js';
import { CheckpointIOError, errorMessage, hasErrorCode } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { assertValidThreadId, deserializeCheckpoint, serializeCheckpoint } from './codec.js';
import type { CheckpointStore } from './store.js';

const log = createLogger('file-checkpoint-store');

const CHECKPOINT_FILE = /^(\d+)\.json$/;
const MAX_CLAIM_ATTEMPTS = 10;

export class FileCheckpointStore implements CheckpointStore {
  private readonly root: string;
  private readonly writeChains = new Map<string, Promise<Checkpoint>>();

  constructor(dataDir: string) {
    this.root = join(dataDir, 'checkpoints');
  }

  async put(threadId: string, state: OrchestrationState): Promise<Checkpoint> {
    assertValidThreadId(threadId);
    const previous = this.writeChains.get(threadId);
    // A failed write was already reported to its own caller
    const ready = previous ? previous.then(noop, noop) : Promise.resolve();
    const next = ready.then(() => this.write(threadId, state));
    this.writeChains.set(threadId, next);
    return next;
  }

  async get(threadId: string): Promise<Checkpoint | null> {
    assertValidThreadId(threadId);
    const sequences = await this.sequences(threadId);
    const latest = sequences.at(-1);
    return latest === undefined ? null : this.read(threadId, latest);
  }

  async history(threadId: string): Promise<Checkpoint[]> {
    assertValidThreadId(threadId);
    const sequences = await this.sequences(threadId);
    const checkpoints: Checkpoint[] = [];
    for (const sequence of sequences) {
      checkpoints.push(await this.read(threadId, sequence));
    }
    return checkpoints;
  }

  async listThreads(): Promise<string[]> {
    try {
      const entries = await readdir(this.root, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        return [];
      }
      throw new CheckpointIOError('*', `cannot list threads: ${errorMessage(err)}`, err);
    }
  }

  async delete(threadId: string): Promise<boolean> {
    assertValidThreadId(threadId);
    const existed = (await this.sequences(threadId)).length > 0;
    try {
      await rm(this.threadDir(threadId), { recursive: true, force: true });
    } catch (err) {
      throw new CheckpointIOError(threadId, `cannot delete: ${errorMessage(err)}`, err);
    }
    this.writeChains.delete(threadId);
    if (existed) {
      log.info({ threadId }, 'Thread checkpoints deleted');
    }
    return existed;
  }

  private threadDir(threadId: string): string {
    return join(this.root, threadId);
  }

  private fileFor(threadId: string, sequence: number): string {
    return join(this.threadDir(threadId), `${String(sequence).padStart(8, '0')}.json`);
  }

  /**
   * Write the next sequence. The file is linked into place, which fails when
   * another writer already took that sequence; the sequence is then re-read.
   */
  private async write(threadId: string, state: OrchestrationState): Promise<Checkpoint> {
    try {
      await mkdir(this.threadDir(threadId), { recursive: true });
    } catch (err) {
      throw new CheckpointIOError(threadId, `cannot create thread directory: ${errorMessage(err)}`, err);
    }

    for (let attempt = 1; attempt <= MAX_CLAIM_ATTEMPTS; attempt++) {
      const sequences = await this.sequences(threadId);
      const checkpoint: Checkpoint = {
        threadId,
        sequence: (sequences.at(-1) ?? 0) + 1,
        state,
        timestamp: new Date(),
      };
      const encoded = serializeCheckpoint(checkpoint);
      if (await this.claim(threadId, checkpoint.sequence, encoded)) {
        log.debug({ threadId, sequence: checkpoint.sequence, node: state.node }, 'Checkpoint written');
        return deserializeCheckpoint(encoded, threadId);
      }
      log.debug({ threadId, sequence: checkpoint.sequence, attempt }, 'Sequence taken by another writer');
    }

    throw new CheckpointIOError(
      threadId,
      `gave up after ${MAX_CLAIM_ATTEMPTS} attempts: every sequence was taken by another writer`
    );
  }

  /**
   * Returns false when the sequence file already exists.
   */
  private async claim(threadId: string, sequence: number, encoded: string): Promise<boolean> {
    const target = this.fileFor(threadId, sequence);
    const temp = join(this.threadDir(threadId), `.${nanoid(8)}.tmp`);
    try {
      await writeFile(temp, encoded);
      await link(temp, target);
      return true;
    } catch (err) {
      if (hasErrorCode(err, 'EEXIST')) {
        return false;
      }
      throw new CheckpointIOError(threadId, `cannot write sequence ${sequence}: ${errorMessage(err)}`, err);
    } finally {
      await rm(temp, { force: true }).catch((cleanupErr: unknown) => {
        log.warn({ threadId, temp, err: cleanupErr }, 'Failed to remove temp checkpoint');
      });
    }
  }

  private async read(threadId: string, sequence: number): Promise<Checkpoint> {
    let content: string;
    try {
      content = await readFile(this.fileFor(threadId, sequence), 'utf-8');
    } catch (err) {
      throw new CheckpointIOError(threadId, `cannot read sequence ${sequence}: ${errorMessage(err)}`, err);
    }
    return deserializeCheckpoint(content, threadId);
  }

  /**
   * Sequence numbers on disk, ascending. Temp files are ignored.
   */
  private async sequences(threadId: string): Promise<number[]> {
    let names: string[];
    try {
      names = await readdir(this.threadDir(threadId));
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        return [];
      }
      throw new CheckpointIOError(threadId, `cannot list checkpoints: ${errorMessage(err)}`, err);
    }
    return names
      .map((name) => CHECKPOINT_FILE.exec(name)?.[1])
      .filter((match): match is string => match !== undefined)
      .map(Number)
      .sort((a, b) => a - b);
  }
}

function noop(): void {
  // chain continues regardless of the previous outcome
}
