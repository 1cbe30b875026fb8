import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { getSchemaVersion, openDatabase } from '../../../src/checkpoint/database.js';
import { SqliteCheckpointStore } from '../../../src/checkpoint/sqlite-store.js';
import { WorkflowState } from '../../../src/engine/workflow-state.js';
import { StageStatus } from '../../../src/types/stage.js';
import { CheckpointError, DatabaseError } from '../../../src/utils/errors.js';

let db: Database.Database;
let store: SqliteCheckpointStore;

function makeState(workflowId: string, conversationId = 'conv-1'): WorkflowState {
  const state = new WorkflowState({ workflowId, conversationId, userRequest: 'Refactor the parser' });
  state.setStageStatus('analyze', StageStatus.SUCCESS);
  state.setStageStatus('rewrite', StageStatus.PENDING);
  state.setStageOutput('analyze', { hotspots: ['lexer.ts'] });
  return state;
}

beforeEach(() => {
  db = openDatabase(':memory:');
  store = new SqliteCheckpointStore(db);
});

afterEach(() => {
  db.close();
});

describe('openDatabase', () => {
  it('creates the checkpoints table and records the schema version', () => {
    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all()
      .map((row) => (typeof row === 'object' && row !== null && 'name' in row ? row.name : undefined));
    expect(tables).toContain('checkpoints');
    expect(tables).toContain('schema_meta');
    expect(getSchemaVersion(db)).toBe('1');
  });

  it('refuses a database written by a newer schema', () => {
    const dir = mkdtempSync(join(tmpdir(), 'stageflow-schema-'));
    const dbPath = join(dir, 'checkpoints.db');
    try {
      const fileDb = openDatabase(dbPath);
      fileDb.prepare("UPDATE schema_meta SET value = '2' WHERE key = 'version'").run();
      fileDb.close();

      expect(() => openDatabase(dbPath)).toThrow(DatabaseError);
      expect(() => openDatabase(dbPath)).toThrow(
        `Failed to open database at "${dbPath}": schema version 2 is newer than supported version 1`,
      );
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('reopens a database at the current schema', () => {
    const dir = mkdtempSync(join(tmpdir(), 'stageflow-schema-'));
    const dbPath = join(dir, 'checkpoints.db');
    try {
      openDatabase(dbPath).close();
      const reopened = openDatabase(dbPath);
      expect(getSchemaVersion(reopened)).toBe('1');
      reopened.close();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('SqliteCheckpointStore', () => {
  it('round-trips a state', () => {
    const state = makeState('wf_sql');
    store.save(state);
    expect(store.load('wf_sql')?.toDict()).toEqual(state.toDict());
  });

  it('keeps a single row per workflow', () => {
    const state = makeState('wf_sql');
    store.save(state);
    state.setStageStatus('rewrite', StageStatus.SUCCESS);
    state.endTime = '2026-02-02T10:00:00.000Z';
    store.save(state);

    const count = db.prepare('SELECT COUNT(*) AS n FROM checkpoints').pluck().get();
    expect(count).toBe(1);
    expect(store.load('wf_sql')?.getStageStatus('rewrite')).toBe(StageStatus.SUCCESS);
    expect(store.load('wf_sql')?.endTime).toBe('2026-02-02T10:00:00.000Z');
  });

  it('returns null for an unknown workflow', () => {
    expect(store.load('wf_none')).toBeNull();
  });

  it('lists summaries newest first', () => {
    store.save(makeState('wf_a'));
    store.save(makeState('wf_b', 'conv-2'));
    db.prepare('UPDATE checkpoints SET updated_at = ? WHERE workflow_id = ?').run('2026-01-01T00:00:00.000Z', 'wf_a');
    db.prepare('UPDATE checkpoints SET updated_at = ? WHERE workflow_id = ?').run('2026-01-03T00:00:00.000Z', 'wf_b');

    const summaries = store.list();

    expect(summaries.map((s) => s.workflowId)).toEqual(['wf_b', 'wf_a']);
    expect(summaries[0]).toMatchObject({
      conversationId: 'conv-2',
      statusCounts: { success: 1, pending: 1 },
      updatedAt: '2026-01-03T00:00:00.000Z',
    });
  });

  it('throws CheckpointError for a corrupt row', () => {
    store.save(makeState('wf_bad'));
    db.prepare('UPDATE checkpoints SET state_json = ? WHERE workflow_id = ?').run('{oops', 'wf_bad');
    expect(() => store.load('wf_bad')).toThrow(CheckpointError);
  });

  it('deletes a checkpoint', () => {
    store.save(makeState('wf_sql'));
    expect(store.delete('wf_sql')).toBe(true);
    expect(store.delete('wf_sql')).toBe(false);
    expect(store.list()).toEqual([]);
  });
});
