// packages/core/src/checkpoint/factory.ts

import { isAbsolute, join } from 'node:path';
import type { CheckpointConfig } from '../types/config.js';
import type { CheckpointStore } from './checkpoint-store.js';
import { openDatabase } from './database.js';
import { FileCheckpointStore } from './file-store.js';
import { MemoryCheckpointStore } from './memory-store.js';
import { SqliteCheckpointStore } from './sqlite-store.js';

function resolvePath(projectDir: string, path: string): string {
  return isAbsolute(path) ? path : join(projectDir, path);
}

/**
 * Build the store selected by `checkpoint.backend`.
 * Relative paths resolve against the project directory; 'none' yields undefined.
 */
export function createCheckpointStore(
  config: CheckpointConfig,
  projectDir: string,
): CheckpointStore | undefined {
  switch (config.backend) {
    case 'file':
      return new FileCheckpointStore(resolvePath(projectDir, config.dir));
    case 'sqlite':
      return new SqliteCheckpointStore(openDatabase(resolvePath(projectDir, config.dbPath)));
    case 'memory':
      return new MemoryCheckpointStore();
    case 'none':
      return undefined;
  }
}
