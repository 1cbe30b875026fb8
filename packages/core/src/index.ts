// @stageflow/core - DAG workflow orchestration engine

export const VERSION = '0.1.0';

// Type definitions
export { StageStatus } from './types/index.js';
export type {
  // Stages
  StageOutput,
  StageResult,
  StageDefinition,
  StageDefinitionInput,
  // Workflow documents
  WorkflowDefinitionInput,
  WorkflowDocument,
  StageDocument,
  // Checkpoints
  CheckpointData,
  CheckpointSummary,
  StageStatusValue,
  // Config
  CheckpointBackend,
  CheckpointConfig,
  RetryConfig,
  EngineConfig,
  // Events
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
} from './types/index.js';

// Utilities
export {
  generateWorkflowId,
  ConfigError,
  WorkflowError,
  CheckpointError,
  DatabaseError,
  NotImplementedError,
  StageTimeoutError,
  toError,
  withRetry,
  backoffDelay,
  createLogger,
  sleep,
} from './utils/index.js';
export type { RetryOptions, Logger, LogLevel } from './utils/index.js';
export {
  DEFAULT_STAGE_TIMEOUT_SEC,
  MAX_STAGE_TIMEOUT_SEC,
  DEFAULT_WORKFLOW_VERSION,
  DEFAULT_RETRY_BACKOFF_MS,
  DEFAULT_MAX_RETRY_BACKOFF_MS,
  WATCH_DEBOUNCE_MS,
  STATE_DIR,
} from './utils/constants.js';

// Configuration
export {
  DEFAULT_CONFIG,
  engineConfigSchema,
  validateConfig,
  CONFIG_FILENAME,
  loadConfig,
  writeConfig,
} from './config/index.js';
export type { EngineConfigInput, ConfigOverrides } from './config/index.js';

// Checkpoints
export {
  byUpdatedDesc,
  countStatuses,
  summarize,
  getSchemaVersion,
  openDatabase,
  runMigrations,
  createCheckpointStore,
  FileCheckpointStore,
  MemoryCheckpointStore,
  SqliteCheckpointStore,
} from './checkpoint/index.js';
export type { CheckpointStore } from './checkpoint/index.js';

// Engine
export {
  WorkflowDefinition,
  defineStage,
  WorkflowState,
  checkpointSchema,
  createStageResult,
  stageSuccess,
  stageFailure,
  withDuration,
  BaseStageExecutor,
  fromFunction,
  StageRunner,
  EventBus,
  WorkflowOrchestrator,
  createOrchestrator,
  WorkflowLoader,
  loadWorkflowFile,
  parseWorkflowDefinition,
  workflowDocumentSchema,
  workflowToDocument,
} from './engine/index.js';
export type {
  WorkflowStateInit,
  StageExecutor,
  StageFunction,
  StageRunContext,
  StageRunnerOptions,
  StageRunOutcome,
  EngineEventMap,
  ContextProvider,
  OrchestratorOptions,
  CreateOrchestratorOptions,
} from './engine/index.js';
