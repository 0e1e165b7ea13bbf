import { z } from 'zod';

/**
 * Static worker definition, as declared in a workers file.
 */
export const workerDefinitionSchema = z.object({
  name: z.string().min(1),
  capabilities: z.array(z.string()).default([]),
  phaseAffinity: z.array(z.string()).default([]),
});

export type WorkerDefinition = z.infer<typeof workerDefinitionSchema>;

export const workersFileSchema = z.object({
  workers: z.array(workerDefinitionSchema),
});

/**
 * Runtime view of a registered worker.
 */
export interface WorkerDescriptor extends WorkerDefinition {
  /** False while the worker is bound to an in-flight subtask */
  available: boolean;
  tasksCompleted: number;
  tasksFailed: number;
  currentSubtask: string | null;
}

export interface WorkerPoolStatus {
  totalWorkers: number;
  availableWorkers: number;
  busyWorkers: number;
  totalTasksCompleted: number;
  totalTasksFailed: number;
}
