// packages/core/src/engine/workflow-loader.ts

import { existsSync, readFileSync, readdirSync } from 'node:fs';
import { extname, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { WorkflowDocument } from '../types/workflow.js';
import {
  DEFAULT_STAGE_TIMEOUT_SEC,
  DEFAULT_WORKFLOW_VERSION,
  MAX_STAGE_TIMEOUT_SEC,
} from '../utils/constants.js';
import { WorkflowError, toError } from '../utils/errors.js';
import { WorkflowDefinition } from './workflow-definition.js';

const WORKFLOW_EXTENSIONS = ['.yml', '.yaml'];

const stageDocumentSchema = z.object({
  id: z.string().min(1),
  script: z.string().default(''),
  description: z.string().optional(),
  required: z.boolean().default(true),
  depends_on: z.array(z.string().min(1)).default([]),
  retryable: z.boolean().default(false),
  max_retries: z.number().int().nonnegative().default(0),
  timeout_seconds: z
    .number()
    .int()
    .nonnegative()
    .max(MAX_STAGE_TIMEOUT_SEC)
    .default(DEFAULT_STAGE_TIMEOUT_SEC),
});

export const workflowDocumentSchema = z.object({
  workflow_id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(''),
  // YAML reads an unquoted 1.0 as a number
  version: z.union([z.string(), z.number()]).transform(String).default(DEFAULT_WORKFLOW_VERSION),
  stages: z.array(stageDocumentSchema).min(1),
});

/**
 * Validate a parsed workflow document and build its definition.
 * DAG problems are not checked here; see WorkflowDefinition.validateDag().
 */
export function parseWorkflowDefinition(raw: unknown, source = 'workflow'): WorkflowDefinition {
  const result = workflowDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new WorkflowError(`Invalid workflow document "${source}": ${issues}`);
  }

  const doc = result.data;
  return new WorkflowDefinition({
    workflowId: doc.workflow_id,
    name: doc.name,
    description: doc.description,
    version: doc.version,
    stages: doc.stages.map((s) => ({
      id: s.id,
      script: s.script,
      description: s.description,
      required: s.required,
      dependsOn: s.depends_on,
      retryable: s.retryable,
      maxRetries: s.max_retries,
      timeoutSeconds: s.timeout_seconds,
    })),
  });
}

/** Read and parse a YAML (or JSON, which is valid YAML) workflow file. */
export function loadWorkflowFile(filePath: string): WorkflowDefinition {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch {
    throw new WorkflowError(`Workflow file not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new WorkflowError(`Invalid YAML in workflow ${filePath}: ${toError(err).message}`);
  }

  return parseWorkflowDefinition(parsed, filePath);
}

/** Inverse of parseWorkflowDefinition: the snake_case document form. */
export function workflowToDocument(definition: WorkflowDefinition): WorkflowDocument {
  return {
    workflow_id: definition.workflowId,
    name: definition.name,
    description: definition.description,
    version: definition.version,
    stages: definition.stages.map((s) => ({
      id: s.id,
      script: s.script,
      ...(s.description ? { description: s.description } : {}),
      required: s.required,
      depends_on: [...s.dependsOn],
      retryable: s.retryable,
      max_retries: s.maxRetries,
      timeout_seconds: s.timeoutSeconds,
    })),
  };
}

/** Resolves workflow names to `<dir>/<name>.yml` or `<dir>/<name>.yaml`. */
export class WorkflowLoader {
  constructor(private workflowDir: string) {}

  load(workflowName: string): WorkflowDefinition {
    for (const ext of WORKFLOW_EXTENSIONS) {
      const filePath = join(this.workflowDir, `${workflowName}${ext}`);
      if (existsSync(filePath)) return loadWorkflowFile(filePath);
    }
    throw new WorkflowError(
      `Workflow "${workflowName}" not found in ${this.workflowDir} (tried ${WORKFLOW_EXTENSIONS.join(', ')})`,
    );
  }

  /** Workflow names available in the directory, sorted. */
  list(): string[] {
    if (!existsSync(this.workflowDir)) return [];
    return readdirSync(this.workflowDir)
      .filter((file) => WORKFLOW_EXTENSIONS.includes(extname(file)))
      .map((file) => file.slice(0, -extname(file).length))
      .sort();
  }
}
