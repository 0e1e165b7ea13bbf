/**
 * Type exports
 */

export * from './task.js';
export * from './worker.js';
export * from './consensus.js';
export * from './orchestration.js';
export * from './contracts.js';
