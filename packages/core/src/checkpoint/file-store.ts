// packages/core/src/checkpoint/file-store.ts

import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  renameSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import { WorkflowState, checkpointSchema } from '../engine/workflow-state.js';
import type { CheckpointSummary } from '../types/checkpoint.js';
import { CheckpointError, toError } from '../utils/errors.js';
import { byUpdatedDesc, summarize } from './checkpoint-store.js';
import type { CheckpointStore } from './checkpoint-store.js';

const SAFE_ID = /^[A-Za-z0-9._-]+$/;

/**
 * One pretty-printed JSON file per workflow run: `<dir>/<workflowId>.json`.
 * Writes go to a temp file first and are renamed into place.
 */
export class FileCheckpointStore implements CheckpointStore {
  constructor(private dir: string) {
    mkdirSync(dir, { recursive: true });
  }

  save(state: WorkflowState): void {
    const target = this.pathFor(state.workflowId);
    const temp = `${target}.${process.pid}.tmp`;
    try {
      writeFileSync(temp, `${JSON.stringify(state.toDict(), null, 2)}\n`, 'utf-8');
      renameSync(temp, target);
    } catch (err) {
      if (existsSync(temp)) unlinkSync(temp);
      throw new CheckpointError(
        `Failed to write checkpoint for "${state.workflowId}": ${toError(err).message}`,
        state.workflowId,
      );
    }
  }

  load(workflowId: string): WorkflowState | null {
    const path = this.pathFor(workflowId);
    if (!existsSync(path)) return null;
    return WorkflowState.fromDict(this.readJson(path, workflowId));
  }

  list(): CheckpointSummary[] {
    const summaries: CheckpointSummary[] = [];
    for (const file of readdirSync(this.dir)) {
      if (!file.endsWith('.json')) continue;
      const path = join(this.dir, file);
      let raw: unknown;
      try {
        raw = this.readJson(path, file.slice(0, -5));
      } catch (err) {
        // Unreadable files are not listed; load() still reports them
        if (err instanceof CheckpointError) continue;
        throw err;
      }
      const parsed = checkpointSchema.safeParse(raw);
      if (!parsed.success) continue;
      summaries.push(summarize(parsed.data, statSync(path).mtime.toISOString()));
    }
    return summaries.sort(byUpdatedDesc);
  }

  delete(workflowId: string): boolean {
    const path = this.pathFor(workflowId);
    if (!existsSync(path)) return false;
    unlinkSync(path);
    return true;
  }

  private pathFor(workflowId: string): string {
    if (!SAFE_ID.test(workflowId)) {
      throw new CheckpointError(`Invalid workflow id for a checkpoint file: "${workflowId}"`, workflowId);
    }
    return join(this.dir, `${workflowId}.json`);
  }

  private readJson(path: string, workflowId: string): unknown {
    try {
      return JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new CheckpointError(
        `Failed to read checkpoint "${workflowId}": ${toError(err).message}`,
        workflowId,
      );
    }
  }
}
