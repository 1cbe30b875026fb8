// packages/core/src/config/schema.ts

import { z } from 'zod';
import { DEFAULT_MAX_RETRY_BACKOFF_MS, DEFAULT_RETRY_BACKOFF_MS, STATE_DIR } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const checkpointConfigSchema = z.object({
  backend: z.enum(['file', 'sqlite', 'memory', 'none']).default('file'),
  dir: z.string().min(1).default(`${STATE_DIR}/checkpoints`),
  dbPath: z.string().min(1).default(`${STATE_DIR}/db/stageflow.db`),
});

const retryConfigSchema = z
  .object({
    backoffMs: z.number().int().nonnegative().default(DEFAULT_RETRY_BACKOFF_MS),
    maxBackoffMs: z.number().int().nonnegative().default(DEFAULT_MAX_RETRY_BACKOFF_MS),
  })
  .refine((r) => r.maxBackoffMs >= r.backoffMs, {
    message: 'maxBackoffMs must be greater than or equal to backoffMs',
    path: ['maxBackoffMs'],
  });

export const engineConfigSchema = z.object({
  workflowsDir: z.string().min(1).default('workflows'),
  checkpoint: checkpointConfigSchema.default({}),
  retry: retryConfigSchema.default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): z.output<typeof engineConfigSchema> {
  const result = engineConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field);
  }
  return result.data;
}
