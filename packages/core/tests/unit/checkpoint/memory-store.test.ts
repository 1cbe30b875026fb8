import { mkdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { countStatuses } from '../../../src/checkpoint/checkpoint-store.js';
import { createCheckpointStore } from '../../../src/checkpoint/factory.js';
import { FileCheckpointStore } from '../../../src/checkpoint/file-store.js';
import { MemoryCheckpointStore } from '../../../src/checkpoint/memory-store.js';
import { SqliteCheckpointStore } from '../../../src/checkpoint/sqlite-store.js';
import { WorkflowState } from '../../../src/engine/workflow-state.js';
import { StageStatus } from '../../../src/types/stage.js';

const TEST_DIR = join(tmpdir(), `stageflow-stores-${process.pid}-${Date.now()}`);

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('MemoryCheckpointStore', () => {
  it('isolates snapshots from later changes to the state', () => {
    const store = new MemoryCheckpointStore();
    const state = new WorkflowState({ workflowId: 'wf_mem', conversationId: 'c', userRequest: 'r' });
    state.setStageStatus('a', StageStatus.RUNNING);
    store.save(state);

    state.setStageStatus('a', StageStatus.SUCCESS);
    const loaded = store.load('wf_mem');
    expect(loaded?.getStageStatus('a')).toBe(StageStatus.RUNNING);

    loaded?.setStageStatus('a', StageStatus.FAILED);
    expect(store.load('wf_mem')?.getStageStatus('a')).toBe(StageStatus.RUNNING);
  });

  it('lists, loads and deletes', () => {
    const store = new MemoryCheckpointStore();
    store.save(new WorkflowState({ workflowId: 'wf_x', conversationId: 'c', userRequest: 'r' }));
    expect(store.list().map((s) => s.workflowId)).toEqual(['wf_x']);
    expect(store.load('wf_y')).toBeNull();
    expect(store.delete('wf_x')).toBe(true);
    expect(store.list()).toEqual([]);
  });
});

describe('countStatuses', () => {
  it('counts stages per status', () => {
    expect(
      countStatuses({ a: StageStatus.SUCCESS, b: StageStatus.SUCCESS, c: StageStatus.SKIPPED }),
    ).toEqual({ success: 2, skipped: 1 });
  });
});

describe('createCheckpointStore', () => {
  const base = { dir: 'state/checkpoints', dbPath: 'state/db/checkpoints.db' };

  it('builds a file store under the project directory', () => {
    mkdirSync(TEST_DIR, { recursive: true });
    const store = createCheckpointStore({ ...base, backend: 'file' }, TEST_DIR);
    expect(store).toBeInstanceOf(FileCheckpointStore);
    store?.save(new WorkflowState({ workflowId: 'wf_f', conversationId: 'c', userRequest: 'r' }));
    expect(new FileCheckpointStore(join(TEST_DIR, 'state/checkpoints')).load('wf_f')).not.toBeNull();
  });

  it('builds a sqlite store and opens its database', () => {
    const store = createCheckpointStore({ ...base, backend: 'sqlite' }, TEST_DIR);
    expect(store).toBeInstanceOf(SqliteCheckpointStore);
    store?.save(new WorkflowState({ workflowId: 'wf_s', conversationId: 'c', userRequest: 'r' }));
    expect(store?.load('wf_s')?.workflowId).toBe('wf_s');
    store?.close?.();
  });

  it('builds a memory store', () => {
    expect(createCheckpointStore({ ...base, backend: 'memory' }, TEST_DIR)).toBeInstanceOf(MemoryCheckpointStore);
  });

  it('returns undefined when checkpoints are disabled', () => {
    expect(createCheckpointStore({ ...base, backend: 'none' }, TEST_DIR)).toBeUndefined();
  });
});
