// packages/core/src/types/workflow.ts

import type { StageDefinitionInput } from './stage.js';

/** Input accepted by the WorkflowDefinition constructor. */
export interface WorkflowDefinitionInput {
  workflowId: string;
  name: string;
  description?: string;
  version?: string;
  stages: StageDefinitionInput[];
}

/**
 * On-disk workflow document (snake_case), as produced by a YAML/JSON loader.
 */
export interface WorkflowDocument {
  workflow_id: string;
  name: string;
  description: string;
  version: string;
  stages: StageDocument[];
}

export interface StageDocument {
  id: string;
  script: string;
  description?: string;
  required: boolean;
  depends_on: string[];
  retryable: boolean;
  max_retries: number;
  timeout_seconds: number;
}
