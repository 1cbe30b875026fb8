// packages/cli/src/commands/validate.ts

import { loadWorkflowFile, toError } from '@stageflow/core';
import type { WorkflowDefinition } from '@stageflow/core';
import chalk from 'chalk';

export interface WorkflowCheck {
  file: string;
  definition?: WorkflowDefinition;
  problems: string[];
}

/** Load a workflow file and collect every schema and DAG problem. */
export function checkWorkflowFile(file: string): WorkflowCheck {
  let definition: WorkflowDefinition;
  try {
    definition = loadWorkflowFile(file);
  } catch (err) {
    return { file, problems: [toError(err).message] };
  }
  return { file, definition, problems: definition.validateDag() };
}

export function renderCheck(check: WorkflowCheck): string[] {
  if (check.problems.length === 0 && check.definition) {
    const count = check.definition.stages.length;
    return [chalk.green(`✓ ${check.definition.workflowId}: ${count} stage${count === 1 ? '' : 's'}, valid`)];
  }
  const n = check.problems.length;
  return [
    chalk.red(`✗ ${check.file}: ${n} problem${n === 1 ? '' : 's'}`),
    ...check.problems.map((p) => chalk.red(`  - ${p}`)),
  ];
}

export async function validateCommand(file: string): Promise<void> {
  const check = checkWorkflowFile(file);
  const lines = renderCheck(check);
  if (check.problems.length > 0) {
    for (const line of lines) console.error(line);
    process.exitCode = 1;
    return;
  }
  for (const line of lines) console.log(line);
}
