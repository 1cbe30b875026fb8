// packages/core/src/engine/workflow-state.ts

import { z } from 'zod';
import type { CheckpointData } from '../types/checkpoint.js';
import { StageStatus } from '../types/stage.js';
import type { StageOutput } from '../types/stage.js';
import { CheckpointError } from '../utils/errors.js';

const recordSchema = z.record(z.string(), z.unknown());

export const checkpointSchema = z.object({
  workflow_id: z.string().min(1),
  conversation_id: z.string(),
  user_request: z.string(),
  context: recordSchema.default({}),
  stage_outputs: z.record(z.string(), recordSchema).default({}),
  stage_statuses: z.record(z.string(), z.nativeEnum(StageStatus)).default({}),
  start_time: z.string().nullable().default(null),
  end_time: z.string().nullable().default(null),
  current_stage: z.string().nullable().default(null),
  config: recordSchema.default({}),
  stage_errors: z.record(z.string(), z.string()).optional(),
});

export interface WorkflowStateInit {
  workflowId: string;
  conversationId: string;
  userRequest: string;
  context?: Record<string, unknown>;
  config?: Record<string, unknown>;
  startTime?: string | null;
}

/**
 * Progress of one workflow run. Shared with every stage executor, but only
 * the owning orchestrator writes to it.
 */
export class WorkflowState {
  readonly workflowId: string;
  readonly conversationId: string;
  readonly userRequest: string;
  context: Record<string, unknown>;
  stageOutputs: Record<string, StageOutput> = {};
  stageStatuses: Record<string, StageStatus> = {};
  stageErrors: Record<string, string> = {};
  startTime: string | null;
  endTime: string | null = null;
  currentStage: string | null = null;
  config: Record<string, unknown>;

  constructor(init: WorkflowStateInit) {
    this.workflowId = init.workflowId;
    this.conversationId = init.conversationId;
    this.userRequest = init.userRequest;
    this.context = init.context ?? {};
    this.config = init.config ?? {};
    this.startTime = init.startTime ?? null;
  }

  getStageOutput(stageId: string): StageOutput | undefined {
    return this.stageOutputs[stageId];
  }

  setStageOutput(stageId: string, output: StageOutput): void {
    this.stageOutputs[stageId] = output;
  }

  getStageStatus(stageId: string): StageStatus | undefined {
    return this.stageStatuses[stageId];
  }

  setStageStatus(stageId: string, status: StageStatus): void {
    this.stageStatuses[stageId] = status;
  }

  getStageError(stageId: string): string | undefined {
    return this.stageErrors[stageId];
  }

  setStageError(stageId: string, message: string): void {
    this.stageErrors[stageId] = message;
  }

  clearStageError(stageId: string): void {
    delete this.stageErrors[stageId];
  }

  /** Back to PENDING with no output or error, ready to run again. */
  resetStage(stageId: string): void {
    this.stageStatuses[stageId] = StageStatus.PENDING;
    delete this.stageOutputs[stageId];
    delete this.stageErrors[stageId];
  }

  /** True when every tracked stage finished with SUCCESS. */
  isComplete(): boolean {
    const statuses = Object.values(this.stageStatuses);
    return statuses.length > 0 && statuses.every((s) => s === StageStatus.SUCCESS);
  }

  failedStages(): string[] {
    return Object.entries(this.stageStatuses)
      .filter(([, status]) => status === StageStatus.FAILED)
      .map(([stageId]) => stageId);
  }

  toDict(): CheckpointData {
    const data: CheckpointData = {
      workflow_id: this.workflowId,
      conversation_id: this.conversationId,
      user_request: this.userRequest,
      context: structuredClone(this.context),
      stage_outputs: structuredClone(this.stageOutputs),
      stage_statuses: { ...this.stageStatuses },
      start_time: this.startTime,
      end_time: this.endTime,
      current_stage: this.currentStage,
      config: structuredClone(this.config),
    };
    if (Object.keys(this.stageErrors).length > 0) {
      data.stage_errors = { ...this.stageErrors };
    }
    return data;
  }

  /** Rebuild a state from its checkpoint form. Throws CheckpointError on malformed input. */
  static fromDict(data: unknown): WorkflowState {
    const parsed = checkpointSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new CheckpointError(`Invalid checkpoint: ${issues}`);
    }

    const d = parsed.data;
    const state = new WorkflowState({
      workflowId: d.workflow_id,
      conversationId: d.conversation_id,
      userRequest: d.user_request,
      context: d.context,
      config: d.config,
      startTime: d.start_time,
    });
    state.stageOutputs = d.stage_outputs;
    state.stageStatuses = d.stage_statuses;
    state.stageErrors = d.stage_errors ?? {};
    state.endTime = d.end_time;
    state.currentStage = d.current_stage;
    return state;
  }
}
