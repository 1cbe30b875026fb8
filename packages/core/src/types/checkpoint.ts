// packages/core/src/types/checkpoint.ts

import type { StageOutput, StageStatus } from './stage.js';

/** Lowercase wire form of a StageStatus. */
export type StageStatusValue = `${StageStatus}`;

/** Serialized WorkflowState as persisted by a CheckpointStore. */
export interface CheckpointData {
  workflow_id: string;
  conversation_id: string;
  user_request: string;
  context: Record<string, unknown>;
  stage_outputs: Record<string, StageOutput>;
  stage_statuses: Record<string, StageStatus>;
  start_time: string | null;
  end_time: string | null;
  current_stage: string | null;
  config: Record<string, unknown>;
  stage_errors?: Record<string, string>;
}

export interface CheckpointSummary {
  workflowId: string;
  conversationId: string;
  userRequest: string;
  currentStage: string | null;
  startTime: string | null;
  endTime: string | null;
  /** Stage count per status, e.g. `{ success: 2, failed: 1 }`. */
  statusCounts: Partial<Record<StageStatus, number>>;
  updatedAt: string;
}
