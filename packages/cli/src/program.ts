// packages/cli/src/program.ts

import { Command, InvalidArgumentError } from 'commander';

import { VERSION, WATCH_DEBOUNCE_MS } from '@stageflow/core';

import {
  checkpointsDeleteCommand,
  checkpointsListCommand,
  checkpointsShowCommand,
} from './commands/checkpoints.js';
import { initCommand } from './commands/init.js';
import { planCommand } from './commands/plan.js';
import { validateCommand } from './commands/validate.js';
import { watchCommand } from './commands/watch.js';

function positiveInt(label: string): (value: string) => number {
  return (value: string) => {
    if (!/^\d+$/.test(value)) throw new InvalidArgumentError(`${label} must be a positive integer`);
    const n = Number.parseInt(value, 10);
    if (n <= 0) throw new InvalidArgumentError(`${label} must be a positive integer`);
    return n;
  };
}

const PROJECT_DIR_FLAG = '--project-dir <path>';
const PROJECT_DIR_HELP = 'Project directory holding .stageflow.yml';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('stageflow')
    .description('Validate, plan and inspect DAG workflow runs')
    .version(VERSION);

  program
    .command('validate')
    .description('Check a workflow file for schema and dependency problems')
    .argument('<file>', 'Workflow YAML file')
    .action(validateCommand);

  program
    .command('plan')
    .description('Print the execution order of a workflow')
    .argument('<file>', 'Workflow YAML file')
    .option('--yaml', 'Print the normalized workflow document instead', false)
    .action(planCommand);

  program
    .command('init')
    .description('Write a default .stageflow.yml in the project')
    .option('--force', 'Overwrite an existing .stageflow.yml', false)
    .option(PROJECT_DIR_FLAG, PROJECT_DIR_HELP, '.')
    .action(initCommand);

  // ── Checkpoints ──

  const checkpoints = program
    .command('checkpoints')
    .description('Inspect saved workflow checkpoints');

  checkpoints
    .command('list')
    .description('List checkpoints, newest first')
    .option('--limit <n>', 'Max results', positiveInt('Limit'), 20)
    .option('--json', 'Machine-readable JSON output', false)
    .option(PROJECT_DIR_FLAG, PROJECT_DIR_HELP, '.')
    .action(checkpointsListCommand);

  checkpoints
    .command('show')
    .description('Show the stages of one checkpointed run')
    .argument('<workflow-id>', 'Workflow run id')
    .option('--json', 'Print the raw checkpoint', false)
    .option(PROJECT_DIR_FLAG, PROJECT_DIR_HELP, '.')
    .action(checkpointsShowCommand);

  checkpoints
    .command('delete')
    .description('Delete a checkpoint')
    .argument('<workflow-id>', 'Workflow run id')
    .option(PROJECT_DIR_FLAG, PROJECT_DIR_HELP, '.')
    .action(checkpointsDeleteCommand);

  // ── Watch (workflow file change → re-validate) ──

  program
    .command('watch')
    .description('Re-validate workflow files whenever they change')
    .argument('[dir]', 'Directory to watch (default: workflowsDir from config)')
    .option('--quiet-ms <ms>', 'Quiet period before validating', positiveInt('Quiet period'), WATCH_DEBOUNCE_MS)
    .option('--max-wait-ms <ms>', 'Max wait before a forced validation', positiveInt('Max wait'), 3000)
    .option(PROJECT_DIR_FLAG, PROJECT_DIR_HELP, '.')
    .action(watchCommand);

  return program;
}
