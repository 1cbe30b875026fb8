import { describe, expect, it } from 'vitest';
import { WorkflowState } from '../../../src/engine/workflow-state.js';
import { StageStatus } from '../../../src/types/stage.js';
import { CheckpointError } from '../../../src/utils/errors.js';

function sampleState(): WorkflowState {
  const state = new WorkflowState({
    workflowId: 'wf_sample',
    conversationId: 'conv-1',
    userRequest: 'Add a health check endpoint',
    context: { repo: 'service-a', tags: ['api'] },
    config: { dryRun: true },
    startTime: '2026-01-05T10:00:00.000Z',
  });
  state.setStageStatus('plan', StageStatus.SUCCESS);
  state.setStageOutput('plan', { steps: ['route', 'handler'], estimate: 3 });
  state.setStageStatus('build', StageStatus.FAILED);
  state.setStageError('build', 'compile error');
  state.setStageStatus('ship', StageStatus.PENDING);
  state.currentStage = 'build';
  state.endTime = '2026-01-05T10:05:00.000Z';
  return state;
}

describe('WorkflowState', () => {
  it('starts empty', () => {
    const state = new WorkflowState({ workflowId: 'wf_1', conversationId: 'c', userRequest: 'r' });
    expect(state.stageStatuses).toEqual({});
    expect(state.context).toEqual({});
    expect(state.startTime).toBeNull();
    expect(state.endTime).toBeNull();
    expect(state.currentStage).toBeNull();
    expect(state.isComplete()).toBe(false);
  });

  it('tracks outputs, statuses and errors per stage', () => {
    const state = sampleState();
    expect(state.getStageOutput('plan')).toEqual({ steps: ['route', 'handler'], estimate: 3 });
    expect(state.getStageOutput('ship')).toBeUndefined();
    expect(state.getStageStatus('build')).toBe(StageStatus.FAILED);
    expect(state.getStageError('build')).toBe('compile error');
    expect(state.failedStages()).toEqual(['build']);

    state.clearStageError('build');
    expect(state.getStageError('build')).toBeUndefined();
  });

  it('resets a stage to PENDING without output or error', () => {
    const state = sampleState();
    state.setStageOutput('build', { partial: true });
    state.resetStage('build');
    expect(state.getStageStatus('build')).toBe(StageStatus.PENDING);
    expect(state.getStageOutput('build')).toBeUndefined();
    expect(state.getStageError('build')).toBeUndefined();
  });

  it('is complete only when every tracked stage succeeded', () => {
    const state = new WorkflowState({ workflowId: 'wf_1', conversationId: 'c', userRequest: 'r' });
    state.setStageStatus('a', StageStatus.SUCCESS);
    state.setStageStatus('b', StageStatus.SKIPPED);
    expect(state.isComplete()).toBe(false);
    state.setStageStatus('b', StageStatus.SUCCESS);
    expect(state.isComplete()).toBe(true);
  });

  it('serializes with snake_case keys and lowercase statuses', () => {
    expect(sampleState().toDict()).toEqual({
      workflow_id: 'wf_sample',
      conversation_id: 'conv-1',
      user_request: 'Add a health check endpoint',
      context: { repo: 'service-a', tags: ['api'] },
      stage_outputs: { plan: { steps: ['route', 'handler'], estimate: 3 } },
      stage_statuses: { plan: 'success', build: 'failed', ship: 'pending' },
      start_time: '2026-01-05T10:00:00.000Z',
      end_time: '2026-01-05T10:05:00.000Z',
      current_stage: 'build',
      config: { dryRun: true },
      stage_errors: { build: 'compile error' },
    });
  });

  it('omits stage_errors when there are none', () => {
    const state = new WorkflowState({ workflowId: 'wf_1', conversationId: 'c', userRequest: 'r' });
    expect('stage_errors' in state.toDict()).toBe(false);
  });

  it('round-trips through toDict and fromDict', () => {
    const original = sampleState();
    const restored = WorkflowState.fromDict(JSON.parse(JSON.stringify(original.toDict())));
    expect(restored.toDict()).toEqual(original.toDict());
    expect(restored.getStageStatus('plan')).toBe(StageStatus.SUCCESS);
    expect(restored.getStageError('build')).toBe('compile error');
  });

  it('snapshots are independent of later mutation', () => {
    const state = sampleState();
    const snapshot = state.toDict();
    state.context.repo = 'service-b';
    state.setStageStatus('ship', StageStatus.RUNNING);
    expect(snapshot.context.repo).toBe('service-a');
    expect(snapshot.stage_statuses.ship).toBe('pending');
  });

  it('loads a snapshot without stage_errors', () => {
    const state = WorkflowState.fromDict({
      workflow_id: 'wf_old',
      conversation_id: 'c',
      user_request: 'r',
      context: {},
      stage_outputs: {},
      stage_statuses: { a: 'success' },
      start_time: null,
      end_time: null,
      current_stage: null,
      config: {},
    });
    expect(state.stageErrors).toEqual({});
    expect(state.getStageStatus('a')).toBe(StageStatus.SUCCESS);
  });

  it('rejects an unknown status string', () => {
    const data = { ...sampleState().toDict(), stage_statuses: { a: 'done' } };
    expect(() => WorkflowState.fromDict(data)).toThrow(CheckpointError);
    expect(() => WorkflowState.fromDict(data)).toThrow(/stage_statuses\.a/);
  });

  it('rejects a snapshot missing its workflow id', () => {
    expect(() => WorkflowState.fromDict({ conversation_id: 'c', user_request: 'r' })).toThrow(
      /^Invalid checkpoint: workflow_id: Required$/,
    );
  });

  it('rejects non-object input', () => {
    expect(() => WorkflowState.fromDict('not a checkpoint')).toThrow(/^Invalid checkpoint: \(root\)/);
  });
});
