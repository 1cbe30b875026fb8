// packages/core/src/checkpoint/sqlite-store.ts

import type Database from 'better-sqlite3';
import { WorkflowState, checkpointSchema } from '../engine/workflow-state.js';
import type { CheckpointSummary } from '../types/checkpoint.js';
import { CheckpointError, toError } from '../utils/errors.js';
import { summarize } from './checkpoint-store.js';
import type { CheckpointStore } from './checkpoint-store.js';
import { isRecord } from './database.js';

/** SQLite-backed checkpoints; one row per workflow run, replaced on every save. */
export class SqliteCheckpointStore implements CheckpointStore {
  constructor(private db: Database.Database) {}

  save(state: WorkflowState): void {
    const data = state.toDict();
    try {
      this.db.transaction(() => {
        this.db
          .prepare(
            `INSERT INTO checkpoints (workflow_id, conversation_id, user_request, current_stage, start_time, end_time, state_json, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(workflow_id) DO UPDATE SET
             current_stage = excluded.current_stage,
             end_time = excluded.end_time,
             state_json = excluded.state_json,
             updated_at = excluded.updated_at`,
          )
          .run(
            data.workflow_id,
            data.conversation_id,
            data.user_request,
            data.current_stage,
            data.start_time,
            data.end_time,
            JSON.stringify(data),
            new Date().toISOString(),
          );
      })();
    } catch (err) {
      throw new CheckpointError(
        `Failed to write checkpoint for "${state.workflowId}": ${toError(err).message}`,
        state.workflowId,
      );
    }
  }

  load(workflowId: string): WorkflowState | null {
    const row: unknown = this.db
      .prepare('SELECT state_json FROM checkpoints WHERE workflow_id = ?')
      .get(workflowId);
    if (!isRecord(row) || typeof row.state_json !== 'string') return null;
    return WorkflowState.fromDict(this.parse(row.state_json, workflowId));
  }

  list(): CheckpointSummary[] {
    const rows: unknown[] = this.db
      .prepare('SELECT workflow_id, state_json, updated_at FROM checkpoints ORDER BY updated_at DESC')
      .all();

    const summaries: CheckpointSummary[] = [];
    for (const row of rows) {
      if (!isRecord(row) || typeof row.state_json !== 'string' || typeof row.updated_at !== 'string') {
        continue;
      }
      const workflowId = typeof row.workflow_id === 'string' ? row.workflow_id : '';
      const parsed = checkpointSchema.safeParse(this.parse(row.state_json, workflowId));
      if (parsed.success) summaries.push(summarize(parsed.data, row.updated_at));
    }
    return summaries;
  }

  delete(workflowId: string): boolean {
    const result = this.db.prepare('DELETE FROM checkpoints WHERE workflow_id = ?').run(workflowId);
    return result.changes > 0;
  }

  close(): void {
    this.db.close();
  }

  private parse(json: string, workflowId: string): unknown {
    try {
      return JSON.parse(json);
    } catch (err) {
      throw new CheckpointError(
        `Corrupt checkpoint row for "${workflowId}": ${toError(err).message}`,
        workflowId,
      );
    }
  }
}
