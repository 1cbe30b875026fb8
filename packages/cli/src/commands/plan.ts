// packages/cli/src/commands/plan.ts

import { workflowToDocument } from '@stageflow/core';
import chalk from 'chalk';
import { stringify as stringifyYaml } from 'yaml';

import { print, renderPlan } from '../render.js';
import { checkWorkflowFile, renderCheck } from './validate.js';

interface PlanOptions {
  yaml?: boolean;
}

export async function planCommand(file: string, options: PlanOptions = {}): Promise<void> {
  const check = checkWorkflowFile(file);
  if (!check.definition || check.problems.length > 0) {
    for (const line of renderCheck(check)) console.error(line);
    console.error(chalk.red('No execution plan: fix the problems above first.'));
    process.exitCode = 1;
    return;
  }

  if (options.yaml) {
    process.stdout.write(stringifyYaml(workflowToDocument(check.definition)));
    return;
  }
  print(renderPlan(check.definition));
}
