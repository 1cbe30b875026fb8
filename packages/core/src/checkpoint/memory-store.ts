// packages/core/src/checkpoint/memory-store.ts

import { WorkflowState } from '../engine/workflow-state.js';
import type { CheckpointData, CheckpointSummary } from '../types/checkpoint.js';
import { byUpdatedDesc, summarize } from './checkpoint-store.js';
import type { CheckpointStore } from './checkpoint-store.js';

/** In-process store. Snapshots are serialized on save, so later mutation of the state does not leak in. */
export class MemoryCheckpointStore implements CheckpointStore {
  private entries = new Map<string, { data: CheckpointData; updatedAt: string }>();

  save(state: WorkflowState): void {
    this.entries.set(state.workflowId, {
      data: structuredClone(state.toDict()),
      updatedAt: new Date().toISOString(),
    });
  }

  load(workflowId: string): WorkflowState | null {
    const entry = this.entries.get(workflowId);
    return entry ? WorkflowState.fromDict(structuredClone(entry.data)) : null;
  }

  list(): CheckpointSummary[] {
    return [...this.entries.values()]
      .map((entry) => summarize(entry.data, entry.updatedAt))
      .sort(byUpdatedDesc);
  }

  delete(workflowId: string): boolean {
    return this.entries.delete(workflowId);
  }
}
