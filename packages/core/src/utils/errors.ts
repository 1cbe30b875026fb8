// packages/core/src/utils/errors.ts

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly stageId?: string,
  ) {
    super(message);
    this.name = 'WorkflowError';
  }
}

export class CheckpointError extends Error {
  constructor(
    message: string,
    public readonly workflowId?: string,
  ) {
    super(message);
    this.name = 'CheckpointError';
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/** Thrown by executors that have not overridden `execute()`. */
export class NotImplementedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotImplementedError';
  }
}

export class StageTimeoutError extends Error {
  constructor(
    public readonly stageId: string,
    public readonly timeoutSeconds: number,
  ) {
    super(`Stage '${stageId}' timed out after ${timeoutSeconds}s`);
    this.name = 'StageTimeoutError';
  }
}

/** Normalize anything thrown into an Error instance. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
