import type { TaskloomConfig } from '../config/index.js';
import { FileCheckpointStore } from './file-store.js';
import { InMemoryCheckpointStore, type CheckpointStore } from './store.js';

/**
 * Store for the configured backend.
 */
export function createCheckpointStore(
  config: Pick<TaskloomConfig, 'checkpointBackend' | 'dataDir'>
): CheckpointStore {
  return config.checkpointBackend === 'memory'
    ? new InMemoryCheckpointStore()
    : new FileCheckpointStore(config.dataDir);
}

export { FileCheckpointStore } from './file-store.js';
export { InMemoryCheckpointStore, type CheckpointStore } from './store.js';
export {
  checkpointRecordSchema,
  cloneState,
  deserializeCheckpoint,
  isValidThreadId,
  serializeCheckpoint,
} from './codec.js';
