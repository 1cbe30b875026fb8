// packages/cli/src/commands/init.ts

import { existsSync, mkdirSync } from 'node:fs';
import { join, relative } from 'node:path';

import { CONFIG_FILENAME, loadConfig, writeConfig } from '@stageflow/core';
import chalk from 'chalk';

import { fail, resolveProjectDir } from '../utils.js';
import type { ProjectOptions } from '../utils.js';

interface InitOptions extends ProjectOptions {
  force?: boolean;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const projectDir = resolveProjectDir(options);
  const configPath = join(projectDir, CONFIG_FILENAME);

  if (existsSync(configPath) && !options.force) {
    console.error(chalk.red(`Already initialized (${CONFIG_FILENAME} exists). Use --force to overwrite.`));
    process.exitCode = 1;
    return;
  }

  try {
    // Skip the existing file on --force so the defaults are written back
    const config = loadConfig({ projectDir, skipFile: true });
    writeConfig(config, projectDir);

    const workflowsDir = join(projectDir, config.workflowsDir);
    mkdirSync(workflowsDir, { recursive: true });

    console.log(chalk.green(`Wrote ${CONFIG_FILENAME}`));
    console.log(chalk.gray(`  workflows:   ${relative(projectDir, workflowsDir) || '.'}`));
    console.log(chalk.gray(`  checkpoints: ${config.checkpoint.backend}`));
    console.log(chalk.gray(`\nNext: stageflow validate ${config.workflowsDir}/<name>.yml`));
  } catch (error) {
    fail(error);
  }
}
