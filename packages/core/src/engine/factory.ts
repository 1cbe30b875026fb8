// packages/core/src/engine/factory.ts

import { createCheckpointStore } from '../checkpoint/factory.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { EngineConfig } from '../types/config.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { WorkflowOrchestrator } from './orchestrator.js';
import type { ContextProvider } from './orchestrator.js';
import type { WorkflowDefinition } from './workflow-definition.js';

export interface CreateOrchestratorOptions {
  config?: EngineConfig;
  projectDir?: string;
  contextProvider?: ContextProvider;
  logger?: Logger;
}

/**
 * Wire an orchestrator from an EngineConfig: the checkpoint backend,
 * retry backoff and log level all come from config.
 */
export function createOrchestrator(
  definition: WorkflowDefinition,
  options: CreateOrchestratorOptions = {},
): WorkflowOrchestrator {
  const config = options.config ?? DEFAULT_CONFIG;
  const projectDir = options.projectDir ?? process.cwd();

  return new WorkflowOrchestrator(definition, {
    checkpointStore: createCheckpointStore(config.checkpoint, projectDir),
    contextProvider: options.contextProvider,
    retryBackoffMs: config.retry.backoffMs,
    maxRetryBackoffMs: config.retry.maxBackoffMs,
    logger: options.logger ?? createLogger(config.logLevel, 'orchestrator'),
  });
}
