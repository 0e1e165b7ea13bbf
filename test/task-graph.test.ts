/**
 * TaskGraph Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { TaskGraph } from '../src/graph/task-graph.js';
import { createSubtask, SubtaskStatus, type Subtask, type Task } from '../src/types/index.js';
import { GraphError } from '../src/utils/errors.js';

function subtask(id: string, dependencies: string[] = []): Subtask {
  return createSubtask({ id, description: `Do ${id}`, dependencies });
}

function readyIds(graph: TaskGraph): string[] {
  return graph.ready().map((s) => s.id);
}

describe('TaskGraph', () => {
  describe('add', () => {
    it('should make a subtask without dependencies ready', () => {
      const graph = new TaskGraph();
      graph.add(subtask('a'));

      expect(readyIds(graph)).toEqual(['a']);
    });

    it('should reject unknown dependencies without mutating the graph', () => {
      const graph = new TaskGraph();
      graph.add(subtask('a'));

      expect(() => graph.add(subtask('b', ['missing']))).toThrow(GraphError);
      expect(graph.size).toBe(1);
      expect(graph.has('b')).toBe(false);
    });

    it('should reject duplicate ids', () => {
      const graph = new TaskGraph([subtask('a')]);

      expect(() => graph.add(subtask('a'))).toThrow(/Duplicate subtask id: a/);
    });

    it('should reject a self edge', () => {
      const graph = new TaskGraph();

      expect(() => graph.add(subtask('a', ['a']))).toThrow(GraphError);
      expect(graph.size).toBe(0);
    });

    it('should let explicit dependencies replace the subtask list', () => {
      const graph = new TaskGraph([subtask('a')]);
      const b = subtask('b');
      graph.add(b, ['a', 'a']);

      expect(b.dependencies).toEqual(['a']);
      expect(readyIds(graph)).toEqual(['a']);
    });
  });

  describe('addAll', () => {
    it('should accept forward references inside the batch', () => {
      const graph = new TaskGraph();
      graph.addAll([subtask('b', ['a']), subtask('a')]);

      expect(readyIds(graph)).toEqual(['a']);
      expect(graph.topologicalOrder()).toEqual(['a', 'b']);
    });

    it('should detect a cycle and leave the graph empty', () => {
      const graph = new TaskGraph();

      let caught: unknown;
      try {
        graph.addAll([subtask('a', ['c']), subtask('b', ['a']), subtask('c', ['b'])]);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(GraphError);
      expect(caught instanceof GraphError && caught.subtaskIds).toEqual(['a', 'c', 'b', 'a']);
      expect(graph.size).toBe(0);
    });
  });

  describe('addDependency', () => {
    it('should refuse an edge that closes a cycle', () => {
      const graph = new TaskGraph([subtask('a'), subtask('b', ['a'])]);

      expect(() => graph.addDependency('a', 'b')).toThrow(/would create a cycle/);
      expect(graph.get('a')?.dependencies).toEqual([]);
    });

    it('should add a valid edge', () => {
      const graph = new TaskGraph([subtask('a'), subtask('b')]);
      graph.addDependency('b', 'a');

      expect(readyIds(graph)).toEqual(['a']);
    });
  });

  describe('ready', () => {
    it('should release a chain one subtask at a time', () => {
      const graph = new TaskGraph([subtask('a'), subtask('b', ['a']), subtask('c', ['b'])]);

      expect(readyIds(graph)).toEqual(['a']);
      graph.markInProgress('a', 'worker-1');
      expect(readyIds(graph)).toEqual([]);
      graph.markComplete('a', 'result a');
      expect(readyIds(graph)).toEqual(['b']);
      graph.markInProgress('b');
      graph.markComplete('b', 'result b');
      expect(readyIds(graph)).toEqual(['c']);
      graph.markInProgress('c');
      graph.markComplete('c', 'result c');
      expect(readyIds(graph)).toEqual([]);
      expect(graph.isComplete()).toBe(true);
    });

    it('should report independent subtasks together in insertion order', () => {
      const graph = new TaskGraph([subtask('x'), subtask('y'), subtask('z', ['x', 'y'])]);

      expect(readyIds(graph)).toEqual(['x', 'y']);
    });

    it('should never release dependents of a failed subtask', () => {
      const graph = new TaskGraph([subtask('a'), subtask('b', ['a'])]);
      graph.markInProgress('a');
      graph.markFailed('a', 'worker crashed');

      expect(readyIds(graph)).toEqual([]);
      expect(graph.isComplete()).toBe(false);
      expect(graph.waitingOn('b')).toEqual(['a']);
    });
  });

  describe('status transitions', () => {
    it('should record the worker and result', () => {
      const graph = new TaskGraph([subtask('a')]);
      graph.markInProgress('a', 'worker-1');
      const done = graph.markComplete('a', 'output');

      expect(done.assignedTo).toBe('worker-1');
      expect(done.result).toBe('output');
      expect(done.status).toBe(SubtaskStatus.COMPLETED);
    });

    it('should allow re-entering in_progress for a retry', () => {
      const graph = new TaskGraph([subtask('a')]);
      graph.markInProgress('a');

      expect(() => graph.markInProgress('a')).not.toThrow();
    });

    it('should refuse to move a terminal subtask', () => {
      const graph = new TaskGraph([subtask('a')]);
      graph.markInProgress('a');
      graph.markComplete('a', 'done');

      expect(() => graph.markInProgress('a')).toThrow(
        'Subtask a cannot move from completed to in_progress'
      );
      expect(() => graph.markFailed('a', 'late')).toThrow(GraphError);
    });

    it('should throw for unknown ids', () => {
      const graph = new TaskGraph();

      expect(() => graph.markComplete('ghost')).toThrow('Unknown subtask: ghost');
    });
  });

  describe('blockDependents', () => {
    it('should block pending transitive dependents only', () => {
      const graph = new TaskGraph([
        subtask('a'),
        subtask('b', ['a']),
        subtask('c', ['b']),
        subtask('d'),
      ]);
      graph.markInProgress('a');
      graph.markFailed('a', 'boom');

      expect(graph.dependentsOf('a')).toEqual(['b', 'c']);
      expect(graph.blockDependents('a', 'dependency a failed')).toEqual(['b', 'c']);
      expect(graph.get('c')?.status).toBe(SubtaskStatus.BLOCKED);
      expect(graph.get('c')?.error).toBe('dependency a failed');
      expect(graph.get('d')?.status).toBe(SubtaskStatus.PENDING);
    });
  });

  describe('isComplete', () => {
    it('should be true for an empty graph', () => {
      expect(new TaskGraph().isComplete()).toBe(true);
    });
  });

  describe('statusSummary', () => {
    it('should count each status', () => {
      const graph = new TaskGraph([subtask('a'), subtask('b'), subtask('c', ['a'])]);
      graph.markInProgress('a');
      graph.markComplete('a', 'ok');
      graph.markInProgress('b');

      expect(graph.statusSummary()).toEqual({
        total: 3,
        pending: 1,
        ready: 1,
        inProgress: 1,
        completed: 1,
        failed: 0,
        blocked: 0,
      });
    });
  });

  describe('fromTask', () => {
    it('should share subtask objects with the task', () => {
      const task: Task = {
        id: 'task-1',
        goal: 'ship it',
        subtasks: [subtask('a'), subtask('b', ['a'])],
        createdAt: new Date('2025-01-01T00:00:00Z'),
        updatedAt: new Date('2025-01-01T00:00:00Z'),
        metadata: {},
      };
      const graph = TaskGraph.fromTask(task);
      graph.markInProgress('a');
      graph.markComplete('a', 'done');

      expect(task.subtasks[0]?.status).toBe(SubtaskStatus.COMPLETED);
      expect(TaskGraph.fromTask(task).ready().map((s) => s.id)).toEqual(['b']);
    });
  });
});
