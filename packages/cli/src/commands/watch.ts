// packages/cli/src/commands/watch.ts — Re-validate workflow files as they change

import { extname, join, resolve } from 'node:path';

import { toError } from '@stageflow/core';
import chalk from 'chalk';
import { watch } from 'chokidar';

import { loadProjectConfig, resolveProjectDir } from '../utils.js';
import type { ProjectOptions } from '../utils.js';
import { Debouncer } from '../watch/debouncer.js';
import type { ChangeBatch } from '../watch/debouncer.js';
import { checkWorkflowFile, renderCheck } from './validate.js';

interface WatchOptions extends ProjectOptions {
  quietMs: number;
  maxWaitMs: number;
}

const WORKFLOW_EXTENSIONS = new Set(['.yml', '.yaml']);

export function isWorkflowFile(path: string): boolean {
  return WORKFLOW_EXTENSIONS.has(extname(path).toLowerCase());
}

/** Validation output for one debounced batch of changes under `dir`. */
export function renderBatch(dir: string, batch: ChangeBatch): string[] {
  const lines: string[] = [];
  for (const change of batch.changes) {
    if (!isWorkflowFile(change.path)) continue;
    if (change.event === 'unlink') {
      lines.push(chalk.gray(`- ${change.path} removed`));
      continue;
    }
    lines.push(...renderCheck(checkWorkflowFile(join(dir, change.path))));
  }
  return lines;
}

export async function watchCommand(dirArg: string | undefined, options: WatchOptions): Promise<void> {
  const projectDir = resolveProjectDir(options);
  const dir = dirArg ? resolve(dirArg) : join(projectDir, loadProjectConfig(projectDir).workflowsDir);

  const debouncer = new Debouncer(
    (batch) => {
      for (const line of renderBatch(dir, batch)) console.log(line);
    },
    { quietMs: options.quietMs, maxWaitMs: options.maxWaitMs },
  );

  console.error(chalk.cyan(`Watching ${dir} for workflow changes...`));
  console.error(chalk.dim(`  quiet=${options.quietMs}ms, maxWait=${options.maxWaitMs}ms`));

  const watcher = watch('.', {
    cwd: dir,
    ignoreInitial: true,
    awaitWriteFinish: { stabilityThreshold: 200, pollInterval: 50 },
  });

  watcher.on('all', (event, path) => {
    if ((event === 'add' || event === 'change' || event === 'unlink') && isWorkflowFile(path)) {
      debouncer.push({ path, event, ts: Date.now() });
    }
  });
  watcher.on('error', (error) => {
    console.error(chalk.red(`Watcher error: ${toError(error).message}`));
  });

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    console.error(chalk.dim('\nShutting down watcher...'));
    debouncer.flushNow();
    debouncer.destroy();
    await watcher.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      console.error(chalk.red(`Error: ${toError(error).message}`));
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}
