// packages/cli/src/commands/checkpoints.ts

import chalk from 'chalk';

import { print, renderCheckpoint, renderCheckpointTable } from '../render.js';
import { fail, resolveProjectDir, withCheckpointStore } from '../utils.js';
import type { ProjectOptions } from '../utils.js';

interface ListOptions extends ProjectOptions {
  limit?: number;
  json?: boolean;
}

interface ShowOptions extends ProjectOptions {
  json?: boolean;
}

export async function checkpointsListCommand(options: ListOptions): Promise<void> {
  try {
    await withCheckpointStore(resolveProjectDir(options), (store) => {
      const summaries = store.list().slice(0, options.limit ?? 20);
      if (options.json) {
        console.log(JSON.stringify(summaries, null, 2));
        return;
      }
      print(renderCheckpointTable(summaries));
    });
  } catch (error) {
    fail(error);
  }
}

export async function checkpointsShowCommand(workflowId: string, options: ShowOptions): Promise<void> {
  try {
    await withCheckpointStore(resolveProjectDir(options), (store) => {
      const state = store.load(workflowId);
      if (!state) {
        console.error(chalk.red(`Checkpoint not found: ${workflowId}`));
        process.exitCode = 1;
        return;
      }
      if (options.json) {
        console.log(JSON.stringify(state.toDict(), null, 2));
        return;
      }
      print(renderCheckpoint(state));
    });
  } catch (error) {
    fail(error);
  }
}

export async function checkpointsDeleteCommand(workflowId: string, options: ProjectOptions): Promise<void> {
  try {
    await withCheckpointStore(resolveProjectDir(options), (store) => {
      if (store.delete(workflowId)) {
        console.log(chalk.green(`Deleted checkpoint ${workflowId}`));
      } else {
        console.error(chalk.red(`Checkpoint not found: ${workflowId}`));
        process.exitCode = 1;
      }
    });
  } catch (error) {
    fail(error);
  }
}
