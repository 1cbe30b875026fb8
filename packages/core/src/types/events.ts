// packages/core/src/types/events.ts

/**
 * Engine events emitted by the orchestrator and consumed by CLIs or hosts.
 * Type names are dot-separated.
 */

// -- Workflow lifecycle --
export interface WorkflowStartedEvent {
  type: 'workflow.started';
  workflowId: string;
  definitionId: string;
  conversationId: string;
  executionOrder: string[];
  timestamp: string;
}

export interface WorkflowResumedEvent {
  type: 'workflow.resumed';
  workflowId: string;
  definitionId: string;
  fromStage: string | null;
  timestamp: string;
}

export interface WorkflowCompletedEvent {
  type: 'workflow.completed';
  workflowId: string;
  durationMs: number;
  failedOptional: string[];
  timestamp: string;
}

export interface WorkflowFailedEvent {
  type: 'workflow.failed';
  workflowId: string;
  failedStage: string;
  error: string;
  timestamp: string;
}

// -- Stage events --
export interface StageStartedEvent {
  type: 'stage.started';
  workflowId: string;
  stageId: string;
  timestamp: string;
}

export interface StageCompletedEvent {
  type: 'stage.completed';
  workflowId: string;
  stageId: string;
  durationMs: number;
  attempts: number;
  timestamp: string;
}

export interface StageFailedEvent {
  type: 'stage.failed';
  workflowId: string;
  stageId: string;
  error: string;
  required: boolean;
  retriesExhausted: boolean;
  timestamp: string;
}

export interface StageRetryEvent {
  type: 'stage.retry';
  workflowId: string;
  stageId: string;
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: string;
  timestamp: string;
}

export interface StageSkippedEvent {
  type: 'stage.skipped';
  workflowId: string;
  stageId: string;
  blockedBy: string[];
  timestamp: string;
}

// -- Persistence --
export interface CheckpointSavedEvent {
  type: 'checkpoint.saved';
  workflowId: string;
  stageId: string | null;
  timestamp: string;
}

// -- Union type --
export type EngineEvent =
  | WorkflowStartedEvent
  | WorkflowResumedEvent
  | WorkflowCompletedEvent
  | WorkflowFailedEvent
  | StageStartedEvent
  | StageCompletedEvent
  | StageFailedEvent
  | StageRetryEvent
  | StageSkippedEvent
  | CheckpointSavedEvent;
