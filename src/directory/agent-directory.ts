/**
 * Agent Directory
 *
 * Registry of workers with capability scoring and exclusive claims.
 * A directory may be shared by several engines; claims are checked and set
 * in one synchronous step so two threads never hold the same worker.
 */

import { EventEmitter } from 'node:events';
import type {
  Worker,
  WorkerDefinition,
  WorkerDescriptor,
  WorkerPoolStatus,
} from '../types/index.js';
import { AssignmentError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('agent-directory');

export const CAPABILITY_WEIGHT = 10;
export const AFFINITY_WEIGHT = 5;
export const SUCCESS_WEIGHT = 3;

export interface AgentDirectoryEvents {
  'worker-claimed': (name: string, subtaskId: string) => void;
  'worker-released': (name: string, success: boolean) => void;
}

export interface RankedWorker {
  name: string;
  score: number;
}

interface Entry {
  descriptor: WorkerDescriptor;
  worker: Worker;
}

export class AgentDirectory extends EventEmitter {
  private readonly entries = new Map<string, Entry>();

  /**
   * Register a worker. Names are unique within the directory.
   */
  register(definition: WorkerDefinition, worker: Worker): WorkerDescriptor {
    if (this.entries.has(definition.name)) {
      throw new AssignmentError(`Worker already registered: ${definition.name}`, definition.name);
    }
    const descriptor: WorkerDescriptor = {
      name: definition.name,
      capabilities: [...definition.capabilities],
      phaseAffinity: [...definition.phaseAffinity],
      available: true,
      tasksCompleted: 0,
      tasksFailed: 0,
      currentSubtask: null,
    };
    this.entries.set(definition.name, { descriptor, worker });
    log.info({ worker: definition.name, capabilities: descriptor.capabilities }, 'Worker registered');
    return { ...descriptor };
  }

  unregister(name: string): boolean {
    const removed = this.entries.delete(name);
    if (removed) {
      log.info({ worker: name }, 'Worker unregistered');
    }
    return removed;
  }

  get(name: string): WorkerDescriptor | undefined {
    const entry = this.entries.get(name);
    return entry ? { ...entry.descriptor } : undefined;
  }

  getWorker(name: string): Worker | undefined {
    return this.entries.get(name)?.worker;
  }

  list(): WorkerDescriptor[] {
    return [...this.entries.values()].map((entry) => ({ ...entry.descriptor }));
  }

  available(): WorkerDescriptor[] {
    return this.list().filter((descriptor) => descriptor.available);
  }

  /**
   * Suitability of a worker for the given capabilities and phase.
   */
  score(name: string, capabilities: readonly string[], phase: string): number {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new AssignmentError(`Unknown worker: ${name}`, name);
    }
    return scoreDescriptor(entry.descriptor, capabilities, phase);
  }

  /**
   * Available workers by descending score; equal scores keep registration order.
   */
  rank(capabilities: readonly string[], phase: string): RankedWorker[] {
    return this.available()
      .map((descriptor) => ({
        name: descriptor.name,
        score: scoreDescriptor(descriptor, capabilities, phase),
      }))
      .sort((a, b) => b.score - a.score);
  }

  /**
   * Best available worker. Falls back to the first available worker when
   * nothing scores above zero.
   */
  findBest(capabilities: readonly string[], phase: string): WorkerDescriptor {
    const ranked = this.rank(capabilities, phase);
    const first = ranked[0];
    if (!first) {
      throw new AssignmentError('No available worker');
    }
    const best = this.get(first.name);
    if (!best) {
      throw new AssignmentError(`Unknown worker: ${first.name}`, first.name);
    }
    if (first.score <= 0) {
      log.debug({ worker: best.name, capabilities, phase }, 'No scoring worker, using first available');
    }
    return best;
  }

  /**
   * Claim a free worker for a subtask. Returns false when the worker is
   * unknown or already claimed; an existing claim is never overwritten.
   */
  claim(name: string, subtaskId: string): boolean {
    const entry = this.entries.get(name);
    if (!entry || !entry.descriptor.available) {
      log.debug(
        { worker: name, subtaskId, heldBy: entry?.descriptor.currentSubtask ?? null },
        'Claim refused'
      );
      return false;
    }
    entry.descriptor.available = false;
    entry.descriptor.currentSubtask = subtaskId;
    log.info({ worker: name, subtaskId }, 'Worker claimed');
    this.emit('worker-claimed', name, subtaskId);
    return true;
  }

  /**
   * Claim that throws on contention.
   */
  assign(name: string, subtaskId: string): WorkerDescriptor {
    if (!this.entries.has(name)) {
      throw new AssignmentError(`Unknown worker: ${name}`, name);
    }
    if (!this.claim(name, subtaskId)) {
      throw new AssignmentError(`Worker ${name} is already claimed`, name);
    }
    const descriptor = this.get(name);
    if (!descriptor) {
      throw new AssignmentError(`Unknown worker: ${name}`, name);
    }
    return descriptor;
  }

  /**
   * Free a claimed worker and record the outcome. Releasing a free worker
   * changes nothing.
   */
  release(name: string, success: boolean): void {
    const entry = this.entries.get(name);
    if (!entry) {
      log.warn({ worker: name }, 'Attempted to release unknown worker');
      return;
    }
    if (entry.descriptor.available) {
      log.warn({ worker: name }, 'Attempted to release a free worker');
      return;
    }

    const subtaskId = entry.descriptor.currentSubtask;
    entry.descriptor.available = true;
    entry.descriptor.currentSubtask = null;
    if (success) {
      entry.descriptor.tasksCompleted++;
    } else {
      entry.descriptor.tasksFailed++;
    }
    log.info({ worker: name, subtaskId, success }, 'Worker released');
    this.emit('worker-released', name, success);
  }

  /**
   * Drop a claim without recording an outcome, only if it is still held for
   * `subtaskId`. Used when a thread is abandoned.
   */
  cancelClaim(name: string, subtaskId: string): boolean {
    const entry = this.entries.get(name);
    if (!entry || entry.descriptor.currentSubtask !== subtaskId) {
      return false;
    }
    entry.descriptor.available = true;
    entry.descriptor.currentSubtask = null;
    log.info({ worker: name, subtaskId }, 'Worker claim cancelled');
    return true;
  }

  status(): WorkerPoolStatus {
    const descriptors = this.list();
    const availableWorkers = descriptors.filter((d) => d.available).length;
    return {
      totalWorkers: descriptors.length,
      availableWorkers,
      busyWorkers: descriptors.length - availableWorkers,
      totalTasksCompleted: descriptors.reduce((sum, d) => sum + d.tasksCompleted, 0),
      totalTasksFailed: descriptors.reduce((sum, d) => sum + d.tasksFailed, 0),
    };
  }
}

export function successRate(descriptor: WorkerDescriptor): number {
  const total = descriptor.tasksCompleted + descriptor.tasksFailed;
  return total === 0 ? 0 : descriptor.tasksCompleted / total;
}

export function scoreDescriptor(
  descriptor: WorkerDescriptor,
  capabilities: readonly string[],
  phase: string
): number {
  const overlap = new Set(capabilities.filter((cap) => descriptor.capabilities.includes(cap))).size;
  const affinity = descriptor.phaseAffinity.includes(phase) ? 1 : 0;
  return (
    CAPABILITY_WEIGHT * overlap + AFFINITY_WEIGHT * affinity + SUCCESS_WEIGHT * successRate(descriptor)
  );
}
