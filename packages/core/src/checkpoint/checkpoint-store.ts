// packages/core/src/checkpoint/checkpoint-store.ts

import type { CheckpointData, CheckpointSummary } from '../types/checkpoint.js';
import type { StageStatus } from '../types/stage.js';
import type { WorkflowState } from '../engine/workflow-state.js';

/**
 * Durable snapshots of WorkflowState keyed by workflow id.
 * `save` overwrites the previous snapshot as a whole.
 */
export interface CheckpointStore {
  save(state: WorkflowState): void;
  load(workflowId: string): WorkflowState | null;
  /** Newest first. */
  list(): CheckpointSummary[];
  delete(workflowId: string): boolean;
  /** Release any handle the store holds. */
  close?(): void;
}

export function countStatuses(
  statuses: Record<string, StageStatus>,
): Partial<Record<StageStatus, number>> {
  const counts: Partial<Record<StageStatus, number>> = {};
  for (const status of Object.values(statuses)) {
    counts[status] = (counts[status] ?? 0) + 1;
  }
  return counts;
}

export function summarize(data: CheckpointData, updatedAt: string): CheckpointSummary {
  return {
    workflowId: data.workflow_id,
    conversationId: data.conversation_id,
    userRequest: data.user_request,
    currentStage: data.current_stage,
    startTime: data.start_time,
    endTime: data.end_time,
    statusCounts: countStatuses(data.stage_statuses),
    updatedAt,
  };
}

export function byUpdatedDesc(a: CheckpointSummary, b: CheckpointSummary): number {
  return b.updatedAt.localeCompare(a.updatedAt);
}
