import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { engineConfigSchema, validateConfig } from '../../../src/config/schema.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('engineConfigSchema', () => {
  it('accepts the defaults', () => {
    expect(engineConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('fills every default from an empty object', () => {
    expect(validateConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('fills nested defaults', () => {
    const config = validateConfig({ checkpoint: { backend: 'sqlite' } });
    expect(config.checkpoint).toEqual({
      backend: 'sqlite',
      dir: '.stageflow/checkpoints',
      dbPath: '.stageflow/db/stageflow.db',
    });
  });
});

describe('validateConfig', () => {
  it('rejects an unknown backend', () => {
    expect(() => validateConfig({ checkpoint: { backend: 'redis' } })).toThrow(ConfigError);
  });

  it('names the offending field', () => {
    try {
      validateConfig({ retry: { backoffMs: -5 } });
      expect.unreachable('validateConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.field).toBe('retry.backoffMs');
        expect(error.message).toBe(
          'Invalid configuration: retry.backoffMs: Number must be greater than or equal to 0',
        );
      }
    }
  });

  it('requires maxBackoffMs to be at least backoffMs', () => {
    expect(() => validateConfig({ retry: { backoffMs: 5000, maxBackoffMs: 100 } })).toThrow(
      'Invalid configuration: retry.maxBackoffMs: maxBackoffMs must be greater than or equal to backoffMs',
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => validateConfig({ logLevel: 'verbose' })).toThrow(/^Invalid configuration: logLevel: /);
  });
});
