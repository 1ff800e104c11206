/**
 * Tests for CLI option parsing and config loading.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigValidationError, DEFAULT_CONFIG, EnvCoercionError } from '../config/index.js';
import { CliUsageError, createCliApp, loadCliConfig, parseCliOptions } from './app.js';

describe('parseCliOptions', () => {
  it('uses defaults when no options are given', () => {
    expect(parseCliOptions([])).toEqual({
      configPath: 'typegen.toml',
      explicitConfig: false,
      verify: false,
    });
  });

  it('reads --config in both forms and --verify', () => {
    expect(parseCliOptions(['--config', 'a.toml', '--verify'])).toEqual({
      configPath: 'a.toml',
      explicitConfig: true,
      verify: true,
    });
    expect(parseCliOptions(['--config=b.toml']).configPath).toBe('b.toml');
    expect(parseCliOptions(['-c', 'c.toml']).configPath).toBe('c.toml');
  });

  it('rejects a --config without a path', () => {
    expect(() => parseCliOptions(['--config'])).toThrow(CliUsageError);
    expect(() => parseCliOptions(['--config', '--verify'])).toThrow(
      "Option '--config' requires a path"
    );
  });

  it('rejects unknown options', () => {
    expect(() => parseCliOptions(['--watch'])).toThrow('Unknown option: --watch');
  });
});

describe('loadCliConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'typegen-cli-app-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('uses defaults when the default file is absent', async () => {
    const loaded = await loadCliConfig(createCliApp([], { cwd: tempDir, env: {} }));
    expect(loaded.config).toEqual(DEFAULT_CONFIG);
    expect(loaded.fromFile).toBe(false);
    expect(loaded.baseDir).toBe(tempDir);
  });

  it('fails when an explicit file is absent', async () => {
    const context = createCliApp(['--config', 'missing.toml'], { cwd: tempDir, env: {} });
    await expect(loadCliConfig(context)).rejects.toThrow(
      'Configuration file not found: missing.toml'
    );
  });

  it('applies environment overrides over the file', async () => {
    await writeFile(join(tempDir, 'typegen.toml'), '[output]\ndirectory = "from-file"\n', 'utf-8');
    const loaded = await loadCliConfig(
      createCliApp([], {
        cwd: tempDir,
        env: { TYPEGEN_OUTPUT_DIRECTORY: 'from-env', TYPEGEN_DEBUG: 'true' },
      })
    );
    expect(loaded.fromFile).toBe(true);
    expect(loaded.config.output.directory).toBe('from-env');
    expect(loaded.config.logging.debug).toBe(true);
  });

  it('rejects environment values that cannot be coerced', async () => {
    const context = createCliApp([], { cwd: tempDir, env: { TYPEGEN_JSON_SCHEMA: 'maybe' } });
    await expect(loadCliConfig(context)).rejects.toThrow(EnvCoercionError);
  });

  it('rejects invalid configurations', async () => {
    await writeFile(
      join(tempDir, 'typegen.toml'),
      '[[batches]]\nname = "orphan"\n',
      'utf-8'
    );
    const context = createCliApp([], { cwd: tempDir, env: {} });
    await expect(loadCliConfig(context)).rejects.toThrow(ConfigValidationError);
  });
});
