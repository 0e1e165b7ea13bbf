/**
 * taskloom Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Accepts 'true'/'false'/'1'/'0' from the environment. z.coerce.boolean()
 * would read the string 'false' as true.
 */
const envBoolean = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

export const REJECTION_POLICIES = ['retry', 'escalate', 'escalate-final'] as const;
export type RejectionPolicy = (typeof REJECTION_POLICIES)[number];

export const FAILURE_POLICIES = ['leave-pending', 'block-dependents'] as const;
export type FailurePolicy = (typeof FAILURE_POLICIES)[number];

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Review loop
  /** Total execution attempts allowed per subtask */
  maxRetries: z.coerce.number().int().min(1).max(20).default(3),
  /** What a reviewer rejection does before retries run out */
  rejectionPolicy: z.enum(REJECTION_POLICIES).default('retry'),
  /** What happens to dependents of a failed subtask */
  failurePolicy: z.enum(FAILURE_POLICIES).default('leave-pending'),

  // Scheduling
  maxParallel: z.coerce.number().int().min(1).max(64).default(1),
  defaultPhase: z.string().min(1).default('execution'),

  // Consensus
  arbitration: envBoolean.default(false),
  arbitrationCandidates: z.coerce.number().int().min(2).max(10).default(3),
  panelSize: z.coerce
    .number()
    .int()
    .min(3)
    .max(5)
    .refine((n) => n % 2 === 1, 'panelSize must be odd')
    .default(3),
  tieBreakLeaders: z.coerce.number().int().min(1).max(5).default(2),

  // Persistence
  dataDir: z.string().default('.taskloom/data'),
  checkpointBackend: z.enum(['file', 'memory']).default('file'),

  // Approval server
  port: z.coerce.number().int().min(1).max(65535).default(3100),
  host: z.string().default('127.0.0.1'),
});

export type TaskloomConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TaskloomConfig {
  const raw = {
    maxRetries: env['TASKLOOM_MAX_RETRIES'],
    rejectionPolicy: env['TASKLOOM_REJECTION_POLICY'],
    failurePolicy: env['TASKLOOM_FAILURE_POLICY'],
    maxParallel: env['TASKLOOM_MAX_PARALLEL'],
    defaultPhase: env['TASKLOOM_DEFAULT_PHASE'],
    arbitration: env['TASKLOOM_ARBITRATION'],
    arbitrationCandidates: env['TASKLOOM_ARBITRATION_CANDIDATES'],
    panelSize: env['TASKLOOM_PANEL_SIZE'],
    tieBreakLeaders: env['TASKLOOM_TIE_BREAK_LEADERS'],
    dataDir: env['TASKLOOM_DATA_DIR'],
    checkpointBackend: env['TASKLOOM_CHECKPOINT_BACKEND'],
    port: env['TASKLOOM_PORT'],
    host: env['TASKLOOM_HOST'],
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    log.error({ errors: issues }, 'Invalid configuration');
    throw new ConfigError(`Configuration validation failed: ${issues.join('; ')}`, issues);
  }

  log.debug(
    {
      maxRetries: result.data.maxRetries,
      maxParallel: result.data.maxParallel,
      rejectionPolicy: result.data.rejectionPolicy,
      failurePolicy: result.data.failurePolicy,
      checkpointBackend: result.data.checkpointBackend,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: TaskloomConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): TaskloomConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
