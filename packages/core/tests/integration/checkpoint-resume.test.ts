import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileCheckpointStore } from '../../src/checkpoint/file-store.js';
import { SqliteCheckpointStore } from '../../src/checkpoint/sqlite-store.js';
import { loadConfig } from '../../src/config/loader.js';
import { createOrchestrator } from '../../src/engine/factory.js';
import { WorkflowOrchestrator } from '../../src/engine/orchestrator.js';
import { BaseStageExecutor } from '../../src/engine/stage-executor.js';
import type { StageRunContext } from '../../src/engine/stage-executor.js';
import { stageFailure, stageSuccess } from '../../src/engine/stage-result.js';
import { WorkflowLoader } from '../../src/engine/workflow-loader.js';
import type { WorkflowState } from '../../src/engine/workflow-state.js';
import type { EngineEvent } from '../../src/types/events.js';
import { StageStatus } from '../../src/types/stage.js';
import type { StageResult } from '../../src/types/stage.js';
import { createLogger } from '../../src/utils/logger.js';

const TEST_DIR = join(tmpdir(), `stageflow-integration-${process.pid}-${Date.now()}`);
const SAMPLE_WORKFLOWS = fileURLToPath(new URL('../../../../workflows/', import.meta.url));

const FEATURE_STAGES = ['clarify', 'plan', 'implement', 'test', 'validate', 'cleanup', 'document', 'review'];

/** Records the stage it ran and whether it should fail this time. */
class ScriptedStage extends BaseStageExecutor {
  constructor(
    stageId: string,
    private readonly log: string[],
    private readonly failing = false,
  ) {
    super(stageId, createLogger('silent'));
  }

  override execute(state: WorkflowState, context?: StageRunContext): StageResult {
    this.log.push(this.stageId);
    if (this.failing) return stageFailure(this.stageId, `${this.stageId} failed on attempt ${context?.attempt ?? 0}`);
    const upstream = Object.keys(state.stageOutputs).length;
    return stageSuccess(this.stageId, { upstream });
  }
}

function registerFeatureStages(orchestrator: WorkflowOrchestrator, log: string[], failing: string[] = []): void {
  for (const id of FEATURE_STAGES) {
    orchestrator.registerStage(id, new ScriptedStage(id, log, failing.includes(id)));
  }
}

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('feature-development workflow with file checkpoints', () => {
  it('runs, halts on a failing required stage, and resumes in a new orchestrator', async () => {
    const definition = new WorkflowLoader(SAMPLE_WORKFLOWS).load('feature-development');
    const storeDir = join(TEST_DIR, 'checkpoints');
    const log: string[] = [];

    const first = new WorkflowOrchestrator(definition, {
      checkpointStore: new FileCheckpointStore(storeDir),
      logger: createLogger('silent'),
      retryBackoffMs: 0,
      maxRetryBackoffMs: 0,
    });
    registerFeatureStages(first, log, ['test']);
    const halted = await first.execute('Add CSV export', 'conv-42');

    // `test` is retryable with max_retries 1, so it runs twice before the halt
    expect(log).toEqual(['clarify', 'plan', 'implement', 'test', 'test']);
    expect(halted.stageStatuses).toMatchObject({
      clarify: StageStatus.SUCCESS,
      implement: StageStatus.SUCCESS,
      test: StageStatus.FAILED,
      validate: StageStatus.PENDING,
      review: StageStatus.PENDING,
    });
    expect(halted.getStageError('test')).toBe('test failed on attempt 2');

    const onDisk = JSON.parse(readFileSync(join(storeDir, `${halted.workflowId}.json`), 'utf-8'));
    expect(onDisk.stage_statuses.test).toBe('failed');
    expect(onDisk.current_stage).toBe('test');
    expect(onDisk.stage_errors).toEqual({ test: 'test failed on attempt 2' });

    log.length = 0;
    const second = new WorkflowOrchestrator(definition, {
      checkpointStore: new FileCheckpointStore(storeDir),
      logger: createLogger('silent'),
    });
    registerFeatureStages(second, log);
    const resumed = await second.resume(halted.workflowId);

    expect(log).toEqual(['test', 'validate', 'cleanup', 'document', 'review']);
    expect(resumed.isComplete()).toBe(true);
    expect(resumed.getStageOutput('clarify')).toEqual({ upstream: 0 });
    expect(resumed.getStageOutput('test')).toEqual({ upstream: 3 });
  });
});

describe('createOrchestrator', () => {
  it('wires a sqlite checkpoint store from .stageflow.yml', async () => {
    writeFileSync(
      join(TEST_DIR, '.stageflow.yml'),
      'logLevel: silent\ncheckpoint:\n  backend: sqlite\nretry:\n  backoffMs: 0\n  maxBackoffMs: 0\n',
      'utf-8',
    );
    const config = loadConfig({ projectDir: TEST_DIR });
    const definition = new WorkflowLoader(SAMPLE_WORKFLOWS).load('bug-fix');
    const orchestrator = createOrchestrator(definition, { config, projectDir: TEST_DIR });

    const events: EngineEvent[] = [];
    orchestrator.on('event', (e) => events.push(e));
    const log: string[] = [];
    for (const id of definition.stageIds) {
      orchestrator.registerStage(id, new ScriptedStage(id, log, id === 'changelog'));
    }

    const state = await orchestrator.execute('Fix crash on empty input', 'conv-7');

    expect(log).toEqual(['reproduce', 'diagnose', 'fix', 'regression-test', 'changelog', 'verify']);
    expect(state.stageStatuses).toEqual({
      reproduce: StageStatus.SUCCESS,
      diagnose: StageStatus.SUCCESS,
      fix: StageStatus.SUCCESS,
      'regression-test': StageStatus.SUCCESS,
      changelog: StageStatus.FAILED,
      verify: StageStatus.SUCCESS,
    });
    expect(events.at(-1)).toMatchObject({ type: 'workflow.completed', failedOptional: ['changelog'] });

    const store = orchestrator.checkpointStore;
    try {
      expect(store).toBeInstanceOf(SqliteCheckpointStore);
      const summaries = store?.list() ?? [];
      expect(summaries).toHaveLength(1);
      expect(summaries[0]).toMatchObject({
        workflowId: state.workflowId,
        conversationId: 'conv-7',
        currentStage: null,
        statusCounts: { success: 5, failed: 1 },
      });
    } finally {
      store?.close?.();
    }
  });
});
