// packages/core/src/engine/orchestrator.ts

import { EventEmitter } from 'eventemitter3';
import type { CheckpointStore } from '../checkpoint/checkpoint-store.js';
import { StageStatus } from '../types/stage.js';
import type { StageResult } from '../types/stage.js';
import { DEFAULT_MAX_RETRY_BACKOFF_MS, DEFAULT_RETRY_BACKOFF_MS } from '../utils/constants.js';
import { CheckpointError, WorkflowError, toError } from '../utils/errors.js';
import { generateWorkflowId } from '../utils/id.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { EventBus } from './event-bus.js';
import type { EngineEventMap } from './event-bus.js';
import type { StageExecutor } from './stage-executor.js';
import { stageFailure } from './stage-result.js';
import { StageRunner } from './stage-runner.js';
import type { StageRunOutcome } from './stage-runner.js';
import type { WorkflowDefinition } from './workflow-definition.js';
import { WorkflowState } from './workflow-state.js';

/** Supplies conversation context once per run, before the first stage. */
export interface ContextProvider {
  injectContext(conversationId: string): Record<string, unknown> | Promise<Record<string, unknown>>;
}

export interface OrchestratorOptions {
  /** Where snapshots go after every stage. Without one, runs cannot be resumed. */
  checkpointStore?: CheckpointStore;
  contextProvider?: ContextProvider;
  retryBackoffMs?: number;
  maxRetryBackoffMs?: number;
  logger?: Logger;
  now?: () => Date;
}

interface RunHalt {
  stageId: string;
  error: string;
}

/**
 * Drives a validated WorkflowDefinition through its stage executors.
 * Stages run one at a time in topological order; the orchestrator is the
 * only writer of the WorkflowState it creates or restores.
 */
export class WorkflowOrchestrator extends EventEmitter<EngineEventMap> {
  readonly definition: WorkflowDefinition;
  readonly executionOrder: readonly string[];
  readonly checkpointStore: CheckpointStore | undefined;

  private executors = new Map<string, StageExecutor>();
  private contextProvider: ContextProvider | undefined;
  private eventBus: EventBus;
  private stageRunner: StageRunner;
  private logger: Logger;
  private now: () => Date;

  constructor(definition: WorkflowDefinition, options: OrchestratorOptions = {}) {
    super();

    const errors = definition.validateDag();
    if (errors.length > 0) {
      throw new WorkflowError(`Invalid workflow DAG: ${errors.join(', ')}`);
    }

    this.definition = definition;
    this.executionOrder = Object.freeze(definition.getExecutionOrder());
    this.checkpointStore = options.checkpointStore;
    this.contextProvider = options.contextProvider;
    this.logger = options.logger ?? createLogger('warn', 'orchestrator');
    this.now = options.now ?? (() => new Date());

    this.eventBus = new EventBus();
    this.stageRunner = new StageRunner(this.eventBus, {
      retryBackoffMs: options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS,
      maxRetryBackoffMs: options.maxRetryBackoffMs ?? DEFAULT_MAX_RETRY_BACKOFF_MS,
      logger: this.logger,
    });

    // Forward all events from eventBus to this orchestrator
    this.eventBus.on('event', (event) => this.emit('event', event));
  }

  /** Bind an executor to a stage id. A later call for the same id replaces it. */
  registerStage(stageId: string, executor: StageExecutor): void {
    if (!this.definition.hasStage(stageId)) {
      throw new WorkflowError(
        `Cannot register executor: "${this.definition.workflowId}" has no stage '${stageId}'`,
        stageId,
      );
    }
    this.executors.set(stageId, executor);
  }

  hasExecutor(stageId: string): boolean {
    return this.executors.has(stageId);
  }

  /** Stage ids, in execution order, that have no executor bound. */
  unregisteredStages(): string[] {
    return this.executionOrder.filter((id) => !this.executors.has(id));
  }

  /**
   * Start a new run. Resolves with the final state whether the run completed
   * or halted; stage failures never reject.
   */
  async execute(
    userRequest: string,
    conversationId: string,
    config?: Record<string, unknown>,
  ): Promise<WorkflowState> {
    const state = new WorkflowState({
      workflowId: generateWorkflowId(),
      conversationId,
      userRequest,
      config: config ?? {},
      startTime: this.timestamp(),
    });

    if (this.contextProvider) {
      state.context = await this.contextProvider.injectContext(conversationId);
    }

    for (const stageId of this.executionOrder) {
      state.setStageStatus(stageId, StageStatus.PENDING);
    }

    this.logger.info(`Starting ${this.definition.workflowId} as ${state.workflowId}`);
    this.eventBus.emitEvent({
      type: 'workflow.started',
      workflowId: state.workflowId,
      definitionId: this.definition.workflowId,
      conversationId,
      executionOrder: [...this.executionOrder],
      timestamp: '',
    });

    return this.run(state, 0);
  }

  /**
   * Continue a checkpointed run from the first stage that is not SUCCESS.
   * SUCCESS stages keep their outputs and are not invoked again.
   */
  async resume(workflowId: string): Promise<WorkflowState> {
    if (!this.checkpointStore) {
      throw new CheckpointError('Cannot resume: no checkpoint store configured', workflowId);
    }
    const state = this.checkpointStore.load(workflowId);
    if (!state) {
      throw new CheckpointError(`Checkpoint not found: ${workflowId}`, workflowId);
    }

    for (const stageId of this.executionOrder) {
      if (state.getStageStatus(stageId) !== StageStatus.SUCCESS) {
        state.resetStage(stageId);
      }
    }
    state.endTime = null;

    const startIndex = this.executionOrder.findIndex(
      (id) => state.getStageStatus(id) !== StageStatus.SUCCESS,
    );
    const fromStage = startIndex === -1 ? null : this.executionOrder[startIndex];

    this.logger.info(`Resuming ${workflowId} from ${fromStage ?? '(nothing left to run)'}`);
    this.eventBus.emitEvent({
      type: 'workflow.resumed',
      workflowId,
      definitionId: this.definition.workflowId,
      fromStage,
      timestamp: '',
    });

    return this.run(state, startIndex === -1 ? this.executionOrder.length : startIndex);
  }

  private async run(state: WorkflowState, startIndex: number): Promise<WorkflowState> {
    let halt: RunHalt | undefined;
    try {
      halt = await this.runStages(state, startIndex);
    } finally {
      state.endTime = this.timestamp();
    }

    if (!halt) state.currentStage = null;
    this.saveCheckpoint(state, null);

    if (halt) {
      this.logger.info(`${state.workflowId} halted at '${halt.stageId}'`);
      this.eventBus.emitEvent({
        type: 'workflow.failed',
        workflowId: state.workflowId,
        failedStage: halt.stageId,
        error: halt.error,
        timestamp: '',
      });
    } else {
      this.logger.info(`${state.workflowId} completed`);
      this.eventBus.emitEvent({
        type: 'workflow.completed',
        workflowId: state.workflowId,
        durationMs: this.elapsedSince(state.startTime),
        failedOptional: state.failedStages(),
        timestamp: '',
      });
    }
    return state;
  }

  /** The stage loop. Returns the halting stage, if any. */
  private async runStages(state: WorkflowState, startIndex: number): Promise<RunHalt | undefined> {
    for (const stageId of this.executionOrder.slice(startIndex)) {
      if (state.getStageStatus(stageId) === StageStatus.SUCCESS) continue;

      const stage = this.definition.getStage(stageId);

      const blockedBy = stage.dependsOn.filter(
        (dep) => state.getStageStatus(dep) !== StageStatus.SUCCESS,
      );
      if (blockedBy.length > 0) {
        state.setStageStatus(stageId, StageStatus.SKIPPED);
        this.logger.debug(`Skipping '${stageId}': ${blockedBy.join(', ')} did not succeed`);
        this.eventBus.emitEvent({
          type: 'stage.skipped',
          workflowId: state.workflowId,
          stageId,
          blockedBy,
          timestamp: '',
        });
        const checkpointError = this.saveCheckpoint(state, stageId);
        if (checkpointError) return { stageId, error: checkpointError.message };
        continue;
      }

      state.setStageStatus(stageId, StageStatus.RUNNING);
      state.currentStage = stageId;
      this.logger.debug(`Running '${stageId}'`);
      this.eventBus.emitEvent({
        type: 'stage.started',
        workflowId: state.workflowId,
        stageId,
        timestamp: '',
      });

      const executor = this.executors.get(stageId);
      let outcome: StageRunOutcome;
      if (executor) {
        outcome = await this.stageRunner.run(stage, executor, state);
      } else {
        const message = `No executor registered for stage '${stageId}'`;
        this.logger.error(message);
        outcome = { result: stageFailure(stageId, message), attempts: 0, retriesExhausted: false };
      }

      this.record(state, outcome.result);

      // A stage whose snapshot cannot be stored fails, and the run cannot go past it
      const checkpointError = this.writeCheckpoint(state, stageId);
      if (checkpointError) {
        state.setStageOutput(stageId, {});
        state.setStageStatus(stageId, StageStatus.FAILED);
        state.setStageError(stageId, checkpointError.message);
      }

      if (state.getStageStatus(stageId) === StageStatus.FAILED) {
        const error = state.getStageError(stageId) ?? `Stage '${stageId}' failed`;
        if (executor) {
          await this.notifyFailure(executor, state, stageId, checkpointError ?? outcome.error ?? new Error(error));
        }
        this.eventBus.emitEvent({
          type: 'stage.failed',
          workflowId: state.workflowId,
          stageId,
          error,
          required: stage.required,
          retriesExhausted: outcome.retriesExhausted,
          timestamp: '',
        });
        if (!checkpointError) this.emitCheckpointSaved(state, stageId);

        // A missing executor is a configuration error and ends the run regardless of `required`
        if (stage.required || !executor || checkpointError) {
          return { stageId, error };
        }
        continue;
      }

      this.eventBus.emitEvent({
        type: 'stage.completed',
        workflowId: state.workflowId,
        stageId,
        durationMs: outcome.result.durationMs,
        attempts: outcome.attempts,
        timestamp: '',
      });
      this.emitCheckpointSaved(state, stageId);
    }
    return undefined;
  }

  private record(state: WorkflowState, result: StageResult): void {
    state.setStageOutput(result.stageId, { ...result.output });
    state.setStageStatus(result.stageId, result.status);
    if (result.status === StageStatus.FAILED) {
      state.setStageError(result.stageId, result.error ?? 'Stage failed');
    } else {
      state.clearStageError(result.stageId);
    }
  }

  private async notifyFailure(
    executor: StageExecutor,
    state: WorkflowState,
    stageId: string,
    error: Error,
  ): Promise<void> {
    if (!executor.onFailure) return;
    await Promise.resolve()
      .then(() => executor.onFailure?.(state, error))
      .catch((err: unknown) => {
        this.logger.warn(`onFailure hook for stage '${stageId}' threw: ${toError(err).message}`);
      });
  }

  private saveCheckpoint(state: WorkflowState, stageId: string | null): CheckpointError | undefined {
    const error = this.writeCheckpoint(state, stageId);
    if (!error) this.emitCheckpointSaved(state, stageId);
    return error;
  }

  /** Store a snapshot. A failed write is logged and returned, never thrown. */
  private writeCheckpoint(state: WorkflowState, stageId: string | null): CheckpointError | undefined {
    if (!this.checkpointStore) return undefined;
    try {
      this.checkpointStore.save(state);
      return undefined;
    } catch (err) {
      const where = stageId === null ? 'at the end of the run' : `after stage '${stageId}'`;
      const error = new CheckpointError(
        `Checkpoint ${where} could not be saved: ${toError(err).message}`,
        state.workflowId,
      );
      this.logger.error(error.message);
      return error;
    }
  }

  private emitCheckpointSaved(state: WorkflowState, stageId: string | null): void {
    if (!this.checkpointStore) return;
    this.eventBus.emitEvent({
      type: 'checkpoint.saved',
      workflowId: state.workflowId,
      stageId,
      timestamp: '',
    });
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private elapsedSince(start: string | null): number {
    if (!start) return 0;
    return Math.max(0, this.now().getTime() - Date.parse(start));
  }
}
