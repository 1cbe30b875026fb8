// packages/core/src/types/stage.ts

/**
 * Lifecycle of a stage within one run:
 * PENDING -> RUNNING -> SUCCESS | FAILED, or PENDING -> SKIPPED when an
 * upstream optional stage did not succeed.
 */
export enum StageStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  SUCCESS = 'success',
  FAILED = 'failed',
  SKIPPED = 'skipped',
}

export type StageOutput = Record<string, unknown>;

/** Outcome of a single stage attempt. Frozen on creation. */
export interface StageResult {
  readonly stageId: string;
  readonly status: StageStatus;
  readonly durationMs: number;
  readonly output: StageOutput;
  readonly error?: string;
  readonly timestamp: string;
}

/** Declarative metadata for one stage. */
export interface StageDefinition {
  readonly id: string;
  /** Descriptive only; the engine never runs it. */
  readonly script: string;
  readonly description: string;
  readonly required: boolean;
  readonly dependsOn: readonly string[];
  readonly retryable: boolean;
  readonly maxRetries: number;
  /** Per-attempt bound. 0 disables the timeout. */
  readonly timeoutSeconds: number;
}

/** Constructor input: everything but `id` and `script` has a default. */
export type StageDefinitionInput = Pick<StageDefinition, 'id' | 'script'> &
  Partial<Omit<StageDefinition, 'id' | 'script' | 'dependsOn'>> & {
    dependsOn?: readonly string[];
  };
