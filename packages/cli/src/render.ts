// packages/cli/src/render.ts — Terminal rendering for workflows and checkpoints

import { StageStatus } from '@stageflow/core';
import type { CheckpointSummary, WorkflowDefinition, WorkflowState } from '@stageflow/core';
import chalk from 'chalk';

const statusColors: Record<StageStatus, (text: string) => string> = {
  [StageStatus.PENDING]: chalk.gray,
  [StageStatus.RUNNING]: chalk.cyan,
  [StageStatus.SUCCESS]: chalk.green,
  [StageStatus.FAILED]: chalk.red,
  [StageStatus.SKIPPED]: chalk.yellow,
};

const STATUS_ORDER: StageStatus[] = [
  StageStatus.SUCCESS,
  StageStatus.FAILED,
  StageStatus.SKIPPED,
  StageStatus.RUNNING,
  StageStatus.PENDING,
];

function colorStatus(status: StageStatus): string {
  return statusColors[status](status);
}

/** One line per stage in execution order, with its dependency edges underneath. */
export function renderPlan(definition: WorkflowDefinition): string[] {
  const lines = [
    chalk.bold(`${definition.name} (${definition.workflowId} v${definition.version})`),
  ];
  if (definition.description) lines.push(chalk.gray(definition.description));
  lines.push('');

  definition.getExecutionOrder().forEach((stageId, index) => {
    const stage = definition.getStage(stageId);
    const flags: string[] = [];
    if (!stage.required) flags.push('optional');
    if (stage.retryable) flags.push(`retry x${stage.maxRetries}`);
    flags.push(stage.timeoutSeconds > 0 ? `timeout ${stage.timeoutSeconds}s` : 'no timeout');

    lines.push(`${String(index + 1).padStart(2)}. ${chalk.cyan(stageId)}  ${stage.script}  ${chalk.gray(`[${flags.join(', ')}]`)}`);
    if (stage.description) lines.push(`    ${chalk.gray(stage.description)}`);
    if (stage.dependsOn.length > 0) lines.push(`    after: ${stage.dependsOn.join(', ')}`);
    const dependents = definition.dependentsOf(stageId);
    if (dependents.length > 0) lines.push(`    before: ${dependents.join(', ')}`);
  });
  return lines;
}

export function formatStatusCounts(counts: CheckpointSummary['statusCounts']): string {
  const parts: string[] = [];
  for (const status of STATUS_ORDER) {
    const n = counts[status];
    if (n) parts.push(`${n} ${colorStatus(status)}`);
  }
  return parts.join(', ');
}

export function renderCheckpointTable(summaries: CheckpointSummary[]): string[] {
  if (summaries.length === 0) return [chalk.gray('No checkpoints found.')];

  const idWidth = Math.max('WORKFLOW'.length, ...summaries.map((s) => s.workflowId.length));
  const lines = [chalk.bold(`${'WORKFLOW'.padEnd(idWidth)}  ${'UPDATED'.padEnd(24)}  ${'STATE'.padEnd(9)}  STAGES`)];
  for (const s of summaries) {
    const runState = s.endTime === null ? 'open' : s.currentStage === null ? 'completed' : 'halted';
    lines.push(
      `${s.workflowId.padEnd(idWidth)}  ${s.updatedAt.padEnd(24)}  ${runState.padEnd(9)}  ${formatStatusCounts(s.statusCounts)}`,
    );
  }
  return lines;
}

export function renderCheckpoint(state: WorkflowState): string[] {
  const lines = [
    chalk.bold(`Workflow ${state.workflowId}`),
    `  Conversation: ${state.conversationId}`,
    `  Request:      ${state.userRequest}`,
    `  Started:      ${state.startTime ?? '-'}`,
    `  Ended:        ${state.endTime ?? '-'}`,
    `  Current:      ${state.currentStage ?? '-'}`,
    '',
    chalk.bold('Stages'),
  ];

  for (const [stageId, status] of Object.entries(state.stageStatuses)) {
    lines.push(`  ${statusColors[status](status.padEnd(9))} ${stageId}`);
    const error = state.getStageError(stageId);
    if (error) lines.push(`            ${chalk.red(error)}`);
  }
  return lines;
}

export function print(lines: string[]): void {
  for (const line of lines) console.log(line);
}
