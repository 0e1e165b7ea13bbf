import { TaskGraph } from '../graph/task-graph.js';
import { SubtaskStatus, type SynthesisReport, type Synthesizer, type Task } from '../types/index.js';

export type SynthesisInput = Omit<SynthesisReport, 'artifact'>;

/**
 * Sort the task's subtasks into the report sections, in task order.
 * Only completed subtasks feed the artifact.
 */
export function buildSynthesisInput(task: Task): SynthesisInput {
  const graph = TaskGraph.fromTask(task);
  const input: SynthesisInput = { goal: task.goal, completed: [], failed: [], blocked: [], unreached: [] };

  for (const subtask of task.subtasks) {
    const { id, description } = subtask;
    switch (subtask.status) {
      case SubtaskStatus.COMPLETED:
        input.completed.push({ id, description, result: subtask.result ?? '' });
        break;
      case SubtaskStatus.FAILED:
        input.failed.push({ id, description, reason: subtask.error ?? 'failed' });
        break;
      case SubtaskStatus.BLOCKED:
        input.blocked.push({ id, description, reason: subtask.error ?? 'blocked' });
        break;
      default:
        input.unreached.push({ id, description, waitingOn: graph.waitingOn(id) });
    }
  }
  return input;
}

/**
 * Joins completed results under the goal, one section per subtask.
 */
export const defaultSynthesizer: Synthesizer = {
  synthesize(goal, report) {
    const sections = report.completed.map((item) => `## ${item.id}: ${item.description}\n\n${item.result}`);
    const body = sections.length > 0 ? sections : ['No subtasks completed.'];
    return Promise.resolve([`# ${goal}`, ...body].join('\n\n'));
  },
};
