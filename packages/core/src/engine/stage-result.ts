// packages/core/src/engine/stage-result.ts

import { StageStatus } from '../types/stage.js';
import type { StageOutput, StageResult } from '../types/stage.js';

export function createStageResult(fields: {
  stageId: string;
  status: StageStatus;
  durationMs?: number;
  output?: StageOutput;
  error?: string;
  timestamp?: string;
}): StageResult {
  const result: StageResult = {
    stageId: fields.stageId,
    status: fields.status,
    durationMs: fields.durationMs ?? 0,
    output: Object.freeze({ ...(fields.output ?? {}) }),
    timestamp: fields.timestamp ?? new Date().toISOString(),
    ...(fields.error !== undefined ? { error: fields.error } : {}),
  };
  return Object.freeze(result);
}

export function stageSuccess(stageId: string, output: StageOutput = {}, durationMs = 0): StageResult {
  return createStageResult({ stageId, status: StageStatus.SUCCESS, output, durationMs });
}

export function stageFailure(
  stageId: string,
  error: string,
  durationMs = 0,
  output: StageOutput = {},
): StageResult {
  return createStageResult({ stageId, status: StageStatus.FAILED, error, output, durationMs });
}

/** Same result with the duration measured by the caller. */
export function withDuration(result: StageResult, durationMs: number): StageResult {
  return createStageResult({ ...result, durationMs });
}
