// packages/core/src/config/loader.ts

import { appendFileSync, existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { EngineConfig } from '../types/config.js';
import { STATE_DIR } from '../utils/constants.js';
import { ConfigError, toError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

export const CONFIG_FILENAME = '.stageflow.yml';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged.
 */
function deepMerge(target: object, source: object): PlainObject {
  const result: PlainObject = { ...target };
  for (const [key, srcVal] of Object.entries(source)) {
    const tgtVal = result[key];
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

export type ConfigOverrides = {
  [K in keyof EngineConfig]?: EngineConfig[K] extends object ? Partial<EngineConfig[K]> : EngineConfig[K];
};

/**
 * Load config with precedence: overrides > .stageflow.yml > defaults.
 *
 * 1. Start with hardcoded defaults
 * 2. Merge .stageflow.yml from projectDir on top
 * 3. Merge programmatic overrides on top
 * 4. Validate the final result
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: ConfigOverrides;
  skipFile?: boolean;
}): EngineConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged = deepMerge({}, structuredClone(DEFAULT_CONFIG));

  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${CONFIG_FILENAME}: ${toError(err).message}`);
    }
    if (isPlainObject(fileConfig)) {
      merged = deepMerge(merged, fileConfig);
    } else if (fileConfig !== null && fileConfig !== undefined) {
      throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping at the top level`);
    }
  }

  if (options?.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return validateConfig(merged);
}

/**
 * Write an EngineConfig to .stageflow.yml in the given directory and make sure
 * the state directory is git-ignored.
 */
export function writeConfig(config: EngineConfig, dir: string): string {
  const configPath = join(dir, CONFIG_FILENAME);
  writeFileSync(configPath, stringifyYaml(config, { lineWidth: 100 }), 'utf-8');

  const gitignorePath = join(dir, '.gitignore');
  const entry = `${STATE_DIR}/`;
  if (existsSync(gitignorePath)) {
    const content = readFileSync(gitignorePath, 'utf-8');
    if (!content.includes(entry)) {
      appendFileSync(gitignorePath, `\n${entry}\n`);
    }
  } else {
    writeFileSync(gitignorePath, `${entry}\n`, 'utf-8');
  }
  return configPath;
}

export { deepMerge };
