// packages/core/src/types/index.ts -- barrel re-export

export { StageStatus } from './stage.js';
export type {
  StageOutput,
  StageResult,
  StageDefinition,
  StageDefinitionInput,
} from './stage.js';

export type {
  WorkflowDefinitionInput,
  WorkflowDocument,
  StageDocument,
} from './workflow.js';

export type {
  CheckpointData,
  CheckpointSummary,
  StageStatusValue,
} from './checkpoint.js';

export type {
  CheckpointBackend,
  CheckpointConfig,
  RetryConfig,
  EngineConfig,
} from './config.js';

export type {
  WorkflowStartedEvent,
  WorkflowResumedEvent,
  WorkflowCompletedEvent,
  WorkflowFailedEvent,
  StageStartedEvent,
  StageCompletedEvent,
  StageFailedEvent,
  StageRetryEvent,
  StageSkippedEvent,
  CheckpointSavedEvent,
  EngineEvent,
} from './events.js';
