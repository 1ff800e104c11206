import { describe, expect, it } from 'vitest';
import {
  ConfigValidationError,
  assertConfigValid,
  getDefaultConfig,
  validateConfig,
  type BatchSourceConfig,
  type Config,
} from './index.js';

function withBatches(batches: BatchSourceConfig[]): Config {
  return { ...getDefaultConfig(), batches };
}

describe('Config Validator', () => {
  it('should accept the default configuration', () => {
    expect(validateConfig(getDefaultConfig())).toEqual({ valid: true, errors: [] });
  });

  it('should accept catalog and module batches', () => {
    const result = validateConfig(
      withBatches([
        { name: 'testing', catalog: 'schemas/testing.toml' },
        { name: 'rag', module: 'dist/rag.js', export: 'ragBatch' },
      ])
    );
    expect(result.valid).toBe(true);
  });

  it('should report duplicate batch names', () => {
    const result = validateConfig(
      withBatches([
        { name: 'same', catalog: 'a.toml' },
        { name: 'same', catalog: 'b.toml' },
      ])
    );
    expect(result.errors).toEqual([
      { field: 'batches[1].name', value: 'same', message: "Duplicate batch name 'same'" },
    ]);
  });

  it('should report batches without exactly one source', () => {
    const result = validateConfig(
      withBatches([{ name: 'none' }, { name: 'both', catalog: 'a.toml', module: 'a.js' }])
    );
    expect(result.errors.map((error) => error.message)).toEqual([
      "Batch 'none' needs either 'catalog' or 'module'",
      "Batch 'both' sets both 'catalog' and 'module'",
    ]);
  });

  it('should report invalid names and stray exports', () => {
    const result = validateConfig(
      withBatches([{ name: '../escape', catalog: 'a.toml', export: 'batch' }])
    );
    expect(result.errors.map((error) => error.field)).toEqual([
      'batches[0].name',
      'batches[0].export',
    ]);
  });

  it('should report an empty output directory', () => {
    const config = getDefaultConfig();
    config.output.directory = ' ';
    expect(validateConfig(config).errors[0]?.field).toBe('output.directory');
  });

  describe('assertConfigValid', () => {
    it('should throw with every error listed', () => {
      expect(() => assertConfigValid(withBatches([{ name: 'none' }]))).toThrow(
        ConfigValidationError
      );
      expect(() => assertConfigValid(withBatches([{ name: 'none' }]))).toThrow(
        "Configuration validation failed:\n  - batches[0]: Batch 'none' needs either 'catalog' or 'module'"
      );
    });

    it('should not throw for valid configurations', () => {
      expect(() => assertConfigValid(getDefaultConfig())).not.toThrow();
    });
  });
});
