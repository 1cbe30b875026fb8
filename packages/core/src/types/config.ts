// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export type CheckpointBackend = 'file' | 'sqlite' | 'memory' | 'none';

export interface CheckpointConfig {
  backend: CheckpointBackend;
  /** Directory for the file backend, relative to the project dir. */
  dir: string;
  /** Database path for the sqlite backend, relative to the project dir. */
  dbPath: string;
}

export interface RetryConfig {
  backoffMs: number;
  maxBackoffMs: number;
}

export interface EngineConfig {
  workflowsDir: string;
  checkpoint: CheckpointConfig;
  retry: RetryConfig;
  logLevel: LogLevel;
}
