// packages/core/src/config/defaults.ts

import type { EngineConfig } from '../types/config.js';
import { DEFAULT_MAX_RETRY_BACKOFF_MS, DEFAULT_RETRY_BACKOFF_MS, STATE_DIR } from '../utils/constants.js';

export const DEFAULT_CONFIG: EngineConfig = {
  workflowsDir: 'workflows',
  checkpoint: {
    backend: 'file',
    dir: `${STATE_DIR}/checkpoints`,
    dbPath: `${STATE_DIR}/db/stageflow.db`,
  },
  retry: {
    backoffMs: DEFAULT_RETRY_BACKOFF_MS,
    maxBackoffMs: DEFAULT_MAX_RETRY_BACKOFF_MS,
  },
  logLevel: 'info',
};
