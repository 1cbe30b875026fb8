// packages/core/src/engine/stage-runner.ts

import { StageStatus } from '../types/stage.js';
import type { StageDefinition, StageResult } from '../types/stage.js';
import { StageTimeoutError, toError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { EventBus } from './event-bus.js';
import type { StageExecutor } from './stage-executor.js';
import { createStageResult, stageFailure, withDuration } from './stage-result.js';
import type { WorkflowState } from './workflow-state.js';

export interface StageRunnerOptions {
  retryBackoffMs: number;
  maxRetryBackoffMs: number;
  logger: Logger;
  now?: () => number;
}

export interface StageRunOutcome {
  result: StageResult;
  attempts: number;
  /** True when a retryable stage used up every attempt. */
  retriesExhausted: boolean;
  /** What the executor threw (or the timeout), when the failure was not a returned result. */
  error?: Error;
}

interface AttemptOutcome {
  result: StageResult;
  error?: Error;
}

/** Carries a FAILED result through withRetry so it can be retried. */
class FailedAttempt extends Error {
  constructor(
    readonly result: StageResult,
    readonly thrown?: Error,
  ) {
    super(result.error ?? `Stage '${result.stageId}' failed`);
    this.name = 'FailedAttempt';
  }
}

/**
 * Runs one stage against its executor: input validation, then up to
 * `maxRetries + 1` attempts (when retryable), each bounded by the stage timeout.
 * Never throws; every failure comes back as a FAILED result.
 */
export class StageRunner {
  private readonly now: () => number;

  constructor(
    private eventBus: EventBus,
    private options: StageRunnerOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  async run(
    stage: StageDefinition,
    executor: StageExecutor,
    state: WorkflowState,
  ): Promise<StageRunOutcome> {
    const start = this.now();

    let valid: boolean;
    try {
      valid = executor.validateInput ? await executor.validateInput(state) : true;
    } catch (error) {
      const thrown = toError(error);
      const message = `Stage '${stage.id}' input validation threw: ${thrown.message}`;
      return {
        result: stageFailure(stage.id, message, this.now() - start),
        attempts: 0,
        retriesExhausted: false,
        error: thrown,
      };
    }
    if (!valid) {
      const message = `Stage '${stage.id}' input validation failed`;
      return { result: stageFailure(stage.id, message, this.now() - start), attempts: 0, retriesExhausted: false };
    }

    const maxAttempts = stage.retryable ? stage.maxRetries + 1 : 1;
    let attempts = 0;

    try {
      const result = await withRetry(
        async (attempt) => {
          attempts = attempt;
          const { result, error } = await this.attempt(stage, executor, state, attempt);
          if (result.status !== StageStatus.SUCCESS) {
            throw new FailedAttempt(result, error);
          }
          return result;
        },
        {
          attempts: maxAttempts,
          backoff: this.options.retryBackoffMs,
          maxBackoff: this.options.maxRetryBackoffMs,
          onRetry: (error, attempt, delayMs) => {
            this.options.logger.warn(
              `Stage '${stage.id}' attempt ${attempt}/${maxAttempts} failed, retrying in ${delayMs}ms: ${toError(error).message}`,
            );
            this.eventBus.emitEvent({
              type: 'stage.retry',
              workflowId: state.workflowId,
              stageId: stage.id,
              attempt,
              maxAttempts,
              delayMs,
              error: toError(error).message,
              timestamp: '',
            });
          },
        },
      );
      return {
        result: withDuration(result, this.now() - start),
        attempts,
        retriesExhausted: false,
      };
    } catch (error) {
      const failed =
        error instanceof FailedAttempt
          ? { result: error.result, thrown: error.thrown }
          : { result: stageFailure(stage.id, toError(error).message), thrown: toError(error) };
      return {
        result: withDuration(failed.result, this.now() - start),
        attempts,
        retriesExhausted: stage.retryable && attempts >= maxAttempts,
        ...(failed.thrown ? { error: failed.thrown } : {}),
      };
    }
  }

  /**
   * One call to `execute`, normalized: thrown errors, timeouts and results
   * with a non-terminal status all become FAILED results.
   */
  private async attempt(
    stage: StageDefinition,
    executor: StageExecutor,
    state: WorkflowState,
    attempt: number,
  ): Promise<AttemptOutcome> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const execution = Promise.resolve().then(() =>
      executor.execute(state, { stage, attempt, signal: controller.signal }),
    );

    const racers: Promise<StageResult>[] = [execution];
    if (stage.timeoutSeconds > 0) {
      racers.push(
        new Promise<StageResult>((_, reject) => {
          timer = setTimeout(() => {
            const timeout = new StageTimeoutError(stage.id, stage.timeoutSeconds);
            controller.abort(timeout);
            void execution.catch((error: unknown) => {
              this.options.logger.debug(
                `Timed-out attempt ${attempt} of '${stage.id}' rejected late: ${toError(error).message}`,
              );
            });
            reject(timeout);
          }, stage.timeoutSeconds * 1000);
        }),
      );
    }

    try {
      const result = await Promise.race(racers);
      if (result.status === StageStatus.SUCCESS || result.status === StageStatus.FAILED) {
        return { result: createStageResult({ ...result, stageId: stage.id }) };
      }
      return {
        result: stageFailure(
          stage.id,
          `Stage '${stage.id}' returned non-terminal status '${result.status}'`,
          result.durationMs,
          result.output,
        ),
      };
    } catch (error) {
      const thrown = toError(error);
      const message =
        thrown instanceof StageTimeoutError
          ? thrown.message
          : `Stage '${stage.id}' execution failed: ${thrown.message}`;
      return { result: stageFailure(stage.id, message), error: thrown };
    } finally {
      if (timer !== undefined) clearTimeout(timer);
    }
  }
}
