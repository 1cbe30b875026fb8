// packages/core/src/engine/workflow-definition.ts

import type { StageDefinition, StageDefinitionInput } from '../types/stage.js';
import type { WorkflowDefinitionInput } from '../types/workflow.js';
import {
  DEFAULT_STAGE_TIMEOUT_SEC,
  DEFAULT_WORKFLOW_VERSION,
  MAX_STAGE_TIMEOUT_SEC,
} from '../utils/constants.js';
import { WorkflowError } from '../utils/errors.js';

/** Fill defaults and freeze a stage definition. */
export function defineStage(input: StageDefinitionInput): StageDefinition {
  const timeoutSeconds = input.timeoutSeconds ?? DEFAULT_STAGE_TIMEOUT_SEC;
  if (!Number.isInteger(timeoutSeconds) || timeoutSeconds < 0 || timeoutSeconds > MAX_STAGE_TIMEOUT_SEC) {
    throw new WorkflowError(
      `Stage '${input.id}' timeoutSeconds must be a whole number from 0 to ${MAX_STAGE_TIMEOUT_SEC}, got ${timeoutSeconds}`,
      input.id,
    );
  }

  return Object.freeze({
    id: input.id,
    script: input.script,
    description: input.description ?? '',
    required: input.required ?? true,
    dependsOn: Object.freeze([...(input.dependsOn ?? [])]),
    retryable: input.retryable ?? false,
    maxRetries: input.maxRetries ?? 0,
    timeoutSeconds,
  });
}

interface KahnResult {
  order: string[];
  /** Stages never drained: members of, or downstream of, a cycle. */
  blocked: string[];
}

/**
 * A named, versioned set of stages forming a dependency DAG.
 * Read-only after construction; validation and ordering are computed once.
 */
export class WorkflowDefinition {
  readonly workflowId: string;
  readonly name: string;
  readonly description: string;
  readonly version: string;
  readonly stages: readonly StageDefinition[];

  private readonly stageIndex: Map<string, number>;
  private cachedErrors: string[] | undefined;
  private cachedKahn: KahnResult | undefined;

  constructor(input: WorkflowDefinitionInput) {
    if (!input.stages || input.stages.length === 0) {
      throw new WorkflowError(`Workflow "${input.workflowId}" has no stages`);
    }

    this.workflowId = input.workflowId;
    this.name = input.name;
    this.description = input.description ?? '';
    this.version = input.version ?? DEFAULT_WORKFLOW_VERSION;
    this.stages = Object.freeze(input.stages.map(defineStage));

    this.stageIndex = new Map();
    this.stages.forEach((stage, index) => {
      if (!stage.id) {
        throw new WorkflowError(`Stage at position ${index} in "${this.workflowId}" is missing an id`);
      }
      // Stage ids become keys of plain records in WorkflowState and checkpoints
      if (stage.id === '__proto__') {
        throw new WorkflowError(`Stage id "__proto__" is reserved in "${this.workflowId}"`, stage.id);
      }
      if (this.stageIndex.has(stage.id)) {
        throw new WorkflowError(`Duplicate stage id "${stage.id}" in "${this.workflowId}"`, stage.id);
      }
      this.stageIndex.set(stage.id, index);
    });
  }

  get stageIds(): string[] {
    return this.stages.map((s) => s.id);
  }

  hasStage(stageId: string): boolean {
    return this.stageIndex.has(stageId);
  }

  getStage(stageId: string): StageDefinition {
    const index = this.stageIndex.get(stageId);
    if (index === undefined) {
      throw new WorkflowError(`Stage definition not found: ${stageId}`, stageId);
    }
    return this.stages[index];
  }

  /** Stages that list `stageId` in their `dependsOn`, in declaration order. */
  dependentsOf(stageId: string): string[] {
    return this.stages.filter((s) => s.dependsOn.includes(stageId)).map((s) => s.id);
  }

  /**
   * Returns every problem with the dependency graph: one message per
   * missing dependency reference, plus a single message if a cycle exists.
   * Empty when the definition is a valid DAG.
   */
  validateDag(): string[] {
    if (this.cachedErrors) return [...this.cachedErrors];

    const errors: string[] = [];
    for (const stage of this.stages) {
      for (const dep of stage.dependsOn) {
        if (!this.stageIndex.has(dep)) {
          errors.push(`Stage '${stage.id}' depends on non-existent stage '${dep}'`);
        }
      }
    }

    const { blocked } = this.kahn();
    if (blocked.length > 0) {
      errors.push(
        `Workflow contains circular dependencies (cycle detected among: ${blocked.join(', ')})`,
      );
    }

    this.cachedErrors = errors;
    return [...errors];
  }

  /**
   * Topological order of stage ids. When several stages are eligible at
   * once, the one declared first wins, so the order is reproducible.
   */
  getExecutionOrder(): string[] {
    const { order, blocked } = this.kahn();
    if (blocked.length > 0) {
      throw new WorkflowError(
        `Workflow "${this.workflowId}" contains circular dependencies; no execution order exists`,
      );
    }
    return [...order];
  }

  // Kahn's algorithm; edges run dependency -> dependent. References to
  // unknown stages are ignored here and reported by validateDag().
  private kahn(): KahnResult {
    if (this.cachedKahn) return this.cachedKahn;

    const count = this.stages.length;
    const dependents: number[][] = this.stages.map(() => []);
    const pending: number[] = new Array<number>(count).fill(0);

    this.stages.forEach((stage, index) => {
      const deps = new Set(stage.dependsOn);
      for (const dep of deps) {
        const depIndex = this.stageIndex.get(dep);
        if (depIndex === undefined) continue;
        dependents[depIndex].push(index);
        pending[index]++;
      }
    });

    // Ready set kept sorted by declaration index
    const ready: number[] = [];
    for (let i = 0; i < count; i++) {
      if (pending[i] === 0) ready.push(i);
    }

    const order: string[] = [];
    while (ready.length > 0) {
      const current = ready.shift();
      if (current === undefined) break;
      order.push(this.stages[current].id);

      for (const next of dependents[current]) {
        pending[next]--;
        if (pending[next] === 0) insertSorted(ready, next);
      }
    }

    const blocked = this.stages.filter((_, i) => pending[i] > 0).map((s) => s.id);
    this.cachedKahn = { order, blocked };
    return this.cachedKahn;
  }
}

function insertSorted(queue: number[], value: number): void {
  let i = 0;
  while (i < queue.length && queue[i] < value) i++;
  queue.splice(i, 0, value);
}
