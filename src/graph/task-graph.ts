/**
 * Dependency graph over the subtasks of one task.
 *
 * Readiness is recomputed on every call rather than cached, so changes made
 * directly on the subtask objects are always reflected.
 */

import { SubtaskStatus, isTerminalStatus, type Subtask, type Task } from '../types/index.js';
import { GraphError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('task-graph');

/**
 * Forward order of statuses. A subtask may only move to a higher rank,
 * except the in_progress -> in_progress re-execution edge.
 */
const STATUS_RANK: Record<SubtaskStatus, number> = {
  [SubtaskStatus.PENDING]: 0,
  [SubtaskStatus.IN_PROGRESS]: 1,
  [SubtaskStatus.COMPLETED]: 2,
  [SubtaskStatus.FAILED]: 2,
  [SubtaskStatus.BLOCKED]: 2,
};

export interface GraphStatusSummary {
  total: number;
  pending: number;
  ready: number;
  inProgress: number;
  completed: number;
  failed: number;
  blocked: number;
}

export class TaskGraph {
  private readonly nodes = new Map<string, Subtask>();

  constructor(subtasks: Subtask[] = []) {
    if (subtasks.length > 0) {
      this.addAll(subtasks);
    }
  }

  /**
   * Build a graph that shares the task's subtask objects, so every status
   * change lands on the task as well.
   */
  static fromTask(task: Task): TaskGraph {
    return new TaskGraph(task.subtasks);
  }

  get size(): number {
    return this.nodes.size;
  }

  /**
   * Add one subtask. Dependencies must already be in the graph.
   * When `dependencies` is given it replaces the subtask's own list.
   */
  add(subtask: Subtask, dependencies: string[] = subtask.dependencies): void {
    if (this.nodes.has(subtask.id)) {
      throw new GraphError(`Duplicate subtask id: ${subtask.id}`, [subtask.id]);
    }
    const deps = [...new Set(dependencies)];
    if (deps.includes(subtask.id)) {
      throw new GraphError(`Subtask ${subtask.id} cannot depend on itself`, [subtask.id]);
    }
    const unknown = deps.filter((dep) => !this.nodes.has(dep));
    if (unknown.length > 0) {
      throw new GraphError(
        `Subtask ${subtask.id} references unknown dependencies: ${unknown.join(', ')}`,
        unknown
      );
    }

    subtask.dependencies = deps;
    this.nodes.set(subtask.id, subtask);
    log.debug({ subtaskId: subtask.id, dependencies: deps }, 'Subtask added');
  }

  /**
   * Add a batch of subtasks whose dependencies may point forward within the
   * batch. The whole batch is validated before anything is added.
   */
  addAll(subtasks: Subtask[]): void {
    const batchIds = new Set<string>();
    for (const subtask of subtasks) {
      if (this.nodes.has(subtask.id) || batchIds.has(subtask.id)) {
        throw new GraphError(`Duplicate subtask id: ${subtask.id}`, [subtask.id]);
      }
      batchIds.add(subtask.id);
    }

    for (const subtask of subtasks) {
      const unknown = subtask.dependencies.filter(
        (dep) => !batchIds.has(dep) && !this.nodes.has(dep)
      );
      if (unknown.length > 0) {
        throw new GraphError(
          `Subtask ${subtask.id} references unknown dependencies: ${unknown.join(', ')}`,
          unknown
        );
      }
    }

    const edges = new Map<string, string[]>();
    for (const [id, node] of this.nodes) {
      edges.set(id, node.dependencies);
    }
    for (const subtask of subtasks) {
      edges.set(subtask.id, [...new Set(subtask.dependencies)]);
    }
    const cycle = findCycle(edges);
    if (cycle) {
      throw new GraphError(`Dependency cycle detected: ${cycle.join(' -> ')}`, cycle);
    }

    for (const subtask of subtasks) {
      subtask.dependencies = edges.get(subtask.id) ?? [];
      this.nodes.set(subtask.id, subtask);
    }
    log.debug({ count: subtasks.length }, 'Subtasks added');
  }

  /**
   * Add a dependency edge between two existing subtasks.
   */
  addDependency(subtaskId: string, dependencyId: string): void {
    const subtask = this.require(subtaskId);
    this.require(dependencyId);

    if (subtaskId === dependencyId || this.dependsOn(dependencyId, subtaskId)) {
      throw new GraphError(
        `Adding ${subtaskId} -> ${dependencyId} would create a cycle`,
        [subtaskId, dependencyId]
      );
    }
    if (!subtask.dependencies.includes(dependencyId)) {
      subtask.dependencies = [...subtask.dependencies, dependencyId];
    }
  }

  get(id: string): Subtask | undefined {
    return this.nodes.get(id);
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  /**
   * All subtasks in insertion order.
   */
  all(): Subtask[] {
    return [...this.nodes.values()];
  }

  /**
   * Pending subtasks whose every dependency is completed, in insertion order.
   */
  ready(): Subtask[] {
    return this.all().filter(
      (subtask) =>
        subtask.status === SubtaskStatus.PENDING &&
        subtask.dependencies.every(
          (dep) => this.nodes.get(dep)?.status === SubtaskStatus.COMPLETED
        )
    );
  }

  inProgress(): Subtask[] {
    return this.all().filter((subtask) => subtask.status === SubtaskStatus.IN_PROGRESS);
  }

  /**
   * Dependencies of a subtask that are not completed yet.
   */
  waitingOn(id: string): string[] {
    const subtask = this.require(id);
    return subtask.dependencies.filter(
      (dep) => this.nodes.get(dep)?.status !== SubtaskStatus.COMPLETED
    );
  }

  markInProgress(id: string, workerName?: string): Subtask {
    const subtask = this.moveTo(id, SubtaskStatus.IN_PROGRESS);
    if (workerName !== undefined) {
      subtask.assignedTo = workerName;
    }
    return subtask;
  }

  markComplete(id: string, result: string | null = null): Subtask {
    const subtask = this.moveTo(id, SubtaskStatus.COMPLETED);
    subtask.result = result;
    subtask.error = null;
    return subtask;
  }

  markFailed(id: string, reason: string): Subtask {
    const subtask = this.moveTo(id, SubtaskStatus.FAILED);
    subtask.error = reason;
    return subtask;
  }

  markBlocked(id: string, reason: string): Subtask {
    const subtask = this.moveTo(id, SubtaskStatus.BLOCKED);
    subtask.error = reason;
    return subtask;
  }

  /**
   * Mark every pending transitive dependent of a failed subtask as blocked.
   * Returns the ids that changed.
   */
  blockDependents(id: string, reason: string): string[] {
    const changed: string[] = [];
    for (const dependentId of this.dependentsOf(id)) {
      const dependent = this.nodes.get(dependentId);
      if (dependent && dependent.status === SubtaskStatus.PENDING) {
        this.markBlocked(dependentId, reason);
        changed.push(dependentId);
      }
    }
    if (changed.length > 0) {
      log.info({ subtaskId: id, blocked: changed }, 'Dependents blocked');
    }
    return changed;
  }

  /**
   * Transitive dependents of a subtask, in insertion order.
   */
  dependentsOf(id: string): string[] {
    this.require(id);
    const found = new Set<string>();
    let frontier = [id];
    while (frontier.length > 0) {
      const next: string[] = [];
      for (const node of this.nodes.values()) {
        if (found.has(node.id)) continue;
        if (node.dependencies.some((dep) => frontier.includes(dep))) {
          found.add(node.id);
          next.push(node.id);
        }
      }
      frontier = next;
    }
    return this.all()
      .map((subtask) => subtask.id)
      .filter((subtaskId) => found.has(subtaskId));
  }

  /**
   * True when every subtask is completed, failed or blocked.
   */
  isComplete(): boolean {
    return this.all().every((subtask) => isTerminalStatus(subtask.status));
  }

  /**
   * Kahn ordering; among subtasks ready at the same time, insertion order wins.
   */
  topologicalOrder(): string[] {
    const remaining = new Map<string, number>();
    for (const node of this.nodes.values()) {
      remaining.set(node.id, node.dependencies.length);
    }

    const order: string[] = [];
    while (order.length < this.nodes.size) {
      const next = this.all().find(
        (node) => remaining.get(node.id) === 0 && !order.includes(node.id)
      );
      if (!next) {
        // Unreachable for a validated graph
        throw new GraphError('Dependency cycle detected while ordering subtasks');
      }
      order.push(next.id);
      for (const node of this.nodes.values()) {
        if (node.dependencies.includes(next.id)) {
          remaining.set(node.id, (remaining.get(node.id) ?? 0) - 1);
        }
      }
    }
    return order;
  }

  statusSummary(): GraphStatusSummary {
    const summary: GraphStatusSummary = {
      total: this.nodes.size,
      pending: 0,
      ready: this.ready().length,
      inProgress: 0,
      completed: 0,
      failed: 0,
      blocked: 0,
    };
    for (const subtask of this.nodes.values()) {
      switch (subtask.status) {
        case SubtaskStatus.PENDING:
          summary.pending++;
          break;
        case SubtaskStatus.IN_PROGRESS:
          summary.inProgress++;
          break;
        case SubtaskStatus.COMPLETED:
          summary.completed++;
          break;
        case SubtaskStatus.FAILED:
          summary.failed++;
          break;
        case SubtaskStatus.BLOCKED:
          summary.blocked++;
          break;
      }
    }
    return summary;
  }

  private require(id: string): Subtask {
    const subtask = this.nodes.get(id);
    if (!subtask) {
      throw new GraphError(`Unknown subtask: ${id}`, [id]);
    }
    return subtask;
  }

  private moveTo(id: string, status: SubtaskStatus): Subtask {
    const subtask = this.require(id);
    const from = STATUS_RANK[subtask.status];
    const to = STATUS_RANK[status];
    const reentry = subtask.status === SubtaskStatus.IN_PROGRESS && status === SubtaskStatus.IN_PROGRESS;
    if (to <= from && !reentry) {
      throw new GraphError(
        `Subtask ${id} cannot move from ${subtask.status} to ${status}`,
        [id]
      );
    }
    subtask.status = status;
    return subtask;
  }

  /**
   * Whether `from` reaches `to` by following dependency edges.
   */
  private dependsOn(from: string, to: string): boolean {
    const seen = new Set<string>();
    const stack = [from];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || seen.has(current)) continue;
      if (current === to) return true;
      seen.add(current);
      stack.push(...(this.nodes.get(current)?.dependencies ?? []));
    }
    return false;
  }
}

/**
 * Depth-first search for a cycle. Returns the cycle path or null.
 */
function findCycle(edges: Map<string, string[]>): string[] | null {
  const state = new Map<string, 'visiting' | 'done'>();
  const path: string[] = [];

  const visit = (id: string): string[] | null => {
    const mark = state.get(id);
    if (mark === 'done') return null;
    if (mark === 'visiting') {
      return [...path.slice(path.indexOf(id)), id];
    }
    state.set(id, 'visiting');
    path.push(id);
    for (const dep of edges.get(id) ?? []) {
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    path.pop();
    state.set(id, 'done');
    return null;
  };

  for (const id of edges.keys()) {
    const cycle = visit(id);
    if (cycle) return cycle;
  }
  return null;
}
