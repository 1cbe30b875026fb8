// packages/core/src/engine/index.ts -- barrel re-export

export { WorkflowDefinition, defineStage } from './workflow-definition.js';
export { WorkflowState, checkpointSchema } from './workflow-state.js';
export type { WorkflowStateInit } from './workflow-state.js';
export { createStageResult, stageSuccess, stageFailure, withDuration } from './stage-result.js';
export { BaseStageExecutor, fromFunction } from './stage-executor.js';
export type { StageExecutor, StageFunction, StageRunContext } from './stage-executor.js';
export { StageRunner } from './stage-runner.js';
export type { StageRunnerOptions, StageRunOutcome } from './stage-runner.js';
export { EventBus } from './event-bus.js';
export type { EngineEventMap } from './event-bus.js';
export { WorkflowOrchestrator } from './orchestrator.js';
export type { ContextProvider, OrchestratorOptions } from './orchestrator.js';
export { createOrchestrator } from './factory.js';
export type { CreateOrchestratorOptions } from './factory.js';
export {
  WorkflowLoader,
  loadWorkflowFile,
  parseWorkflowDefinition,
  workflowDocumentSchema,
  workflowToDocument,
} from './workflow-loader.js';
