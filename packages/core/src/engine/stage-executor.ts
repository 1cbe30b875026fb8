// packages/core/src/engine/stage-executor.ts

import type { StageDefinition, StageResult } from '../types/stage.js';
import { NotImplementedError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { WorkflowState } from './workflow-state.js';

/** Per-attempt information handed to an executor. */
export interface StageRunContext {
  stage: StageDefinition;
  /** 1-based attempt number. */
  attempt: number;
  /** Aborted when the attempt exceeds the stage timeout. */
  signal: AbortSignal;
}

/**
 * Capability contract for the work behind one stage id.
 * Only `execute` is mandatory.
 */
export interface StageExecutor {
  execute(state: WorkflowState, context: StageRunContext): StageResult | Promise<StageResult>;
  /** Pre-check; returning false fails the stage without calling `execute`. */
  validateInput?(state: WorkflowState): boolean | Promise<boolean>;
  /** Cleanup or alerting once the stage has failed. Errors and rejections are logged, not propagated. */
  onFailure?(state: WorkflowState, error: Error): void | Promise<void>;
}

/**
 * Default behaviour for class-based executors. Subclasses override `execute`.
 */
export class BaseStageExecutor implements StageExecutor {
  protected readonly logger: Logger;

  constructor(
    readonly stageId: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('warn', stageId);
  }

  execute(_state: WorkflowState, _context?: StageRunContext): StageResult | Promise<StageResult> {
    throw new NotImplementedError(`Stage '${this.stageId}' must implement execute()`);
  }

  validateInput(_state: WorkflowState): boolean | Promise<boolean> {
    return true;
  }

  onFailure(_state: WorkflowState, error: Error): void {
    this.logger.warn(`Stage '${this.stageId}' failed: ${error.message}`);
  }
}

export type StageFunction = (
  state: WorkflowState,
  context: StageRunContext,
) => StageResult | Promise<StageResult>;

/** Wrap a plain function as an executor. */
export function fromFunction(
  fn: StageFunction,
  hooks?: Pick<StageExecutor, 'validateInput' | 'onFailure'>,
): StageExecutor {
  return {
    execute: fn,
    ...(hooks?.validateInput ? { validateInput: hooks.validateInput } : {}),
    ...(hooks?.onFailure ? { onFailure: hooks.onFailure } : {}),
  };
}
