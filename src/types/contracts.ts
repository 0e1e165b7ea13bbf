/**
 * Collaborators consumed by the orchestration core. None of them are
 * implemented here beyond test doubles and simple defaults.
 */

import type { DecompositionPlan, Subtask } from './task.js';
import type { ReviewVerdict, SynthesisReport } from './orchestration.js';

export interface WorkerContext {
  purpose: 'subtask' | 'interview';
  taskGoal: string;
  threadId?: string;
  subtaskId?: string;
  /** 1-based execution attempt */
  attempt?: number;
  acceptanceCriteria?: string[];
  /** Reviewer feedback from the previous attempt */
  feedback?: string;
  missingCriteria?: string[];
  /** Results of the subtask's direct dependencies */
  dependencyResults?: Record<string, string>;
}

export interface Worker {
  execute(description: string, context: WorkerContext): Promise<string>;
}

export interface Reviewer {
  evaluate(subtask: Subtask, resultText: string): Promise<ReviewVerdict>;
}

export interface Decomposer {
  decompose(objective: string): Promise<DecompositionPlan>;
}

export interface Synthesizer {
  synthesize(goal: string, report: Omit<SynthesisReport, 'artifact'>): Promise<string>;
}
