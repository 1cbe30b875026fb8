// packages/cli/src/utils.ts

import { ConfigError, createCheckpointStore, loadConfig, toError } from '@stageflow/core';
import type { CheckpointStore, EngineConfig } from '@stageflow/core';
import chalk from 'chalk';
import { resolve } from 'node:path';

export interface ProjectOptions {
  projectDir: string;
}

export function resolveProjectDir(options?: Partial<ProjectOptions>): string {
  return resolve(options?.projectDir ?? process.cwd());
}

export function loadProjectConfig(projectDir: string): EngineConfig {
  return loadConfig({ projectDir });
}

/** Print an error in the CLI's format and mark the process as failed. */
export function fail(error: unknown): void {
  console.error(chalk.red(`Error: ${toError(error).message}`));
  process.exitCode = 1;
}

/**
 * Run a command function against the project's configured checkpoint store,
 * closing the store afterwards even when the function throws.
 */
export async function withCheckpointStore<T>(
  projectDir: string,
  fn: (store: CheckpointStore) => T | Promise<T>,
): Promise<T> {
  const config = loadProjectConfig(projectDir);
  if (config.checkpoint.backend === 'none' || config.checkpoint.backend === 'memory') {
    throw new ConfigError(
      `No persistent checkpoint store configured (checkpoint.backend: ${config.checkpoint.backend})`,
      'checkpoint.backend',
    );
  }

  const store = createCheckpointStore(config.checkpoint, projectDir);
  if (!store) {
    throw new ConfigError('Checkpoint store could not be created', 'checkpoint.backend');
  }
  try {
    return await fn(store);
  } finally {
    store.close?.();
  }
}
