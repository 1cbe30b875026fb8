// packages/core/src/utils/index.ts -- barrel re-export

export { generateWorkflowId } from './id.js';
export {
  ConfigError,
  WorkflowError,
  CheckpointError,
  DatabaseError,
  NotImplementedError,
  StageTimeoutError,
  toError,
} from './errors.js';
export { withRetry, backoffDelay } from './retry.js';
export type { RetryOptions } from './retry.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { sleep } from './sleep.js';
