import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { ConfigParseError, DEFAULT_CONFIG, getDefaultConfig, parseConfig } from './index.js';

describe('Config Parser', () => {
  describe('parseConfig', () => {
    describe('valid TOML parsing', () => {
      it('should parse empty TOML to default config', () => {
        expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
      });

      it('should parse complete valid configuration', () => {
        const toml = `
[output]
directory = "src/generated"
json_schema = false
banner_source = "app.models"
regenerate_command = "npm run generate"
include_descriptions = false

[logging]
debug = true

[[batches]]
name = "testing"
catalog = "schemas/testing.toml"

[[batches]]
name = "rag"
module = "dist/schemas/rag.js"
export = "ragBatch"
`;
        expect(parseConfig(toml)).toEqual({
          output: {
            directory: 'src/generated',
            json_schema: false,
            banner_source: 'app.models',
            regenerate_command: 'npm run generate',
            include_descriptions: false,
          },
          logging: { debug: true },
          batches: [
            { name: 'testing', catalog: 'schemas/testing.toml' },
            { name: 'rag', module: 'dist/schemas/rag.js', export: 'ragBatch' },
          ],
        });
      });

      it('should merge partial sections with defaults', () => {
        const config = parseConfig('[output]\ndirectory = "out"\n');
        expect(config.output).toEqual({ ...DEFAULT_CONFIG.output, directory: 'out' });
        expect(config.logging).toEqual(DEFAULT_CONFIG.logging);
        expect(config.batches).toEqual([]);
      });

      it('should ignore unknown keys', () => {
        expect(parseConfig('[output]\ncolor = "blue"\n\n[extra]\nvalue = 1\n')).toEqual(
          DEFAULT_CONFIG
        );
      });

      it('should not share default objects between results', () => {
        const config = parseConfig('');
        config.output.directory = 'changed';
        expect(DEFAULT_CONFIG.output.directory).toBe('generated/typescript');
      });
    });

    describe('invalid TOML', () => {
      it('should throw ConfigParseError on syntax errors', () => {
        expect(() => parseConfig('[output')).toThrow(ConfigParseError);
        expect(() => parseConfig('[output')).toThrow(/^Invalid TOML syntax: /);
      });

      it('should report wrong value types with the field path', () => {
        expect(() => parseConfig('[output]\njson_schema = "yes"\n')).toThrow(
          "Invalid type for 'output.json_schema': expected boolean, got string"
        );
        expect(() => parseConfig('[logging]\ndebug = 1\n')).toThrow(
          "Invalid type for 'logging.debug': expected boolean, got number"
        );
      });

      it('should require batch names', () => {
        expect(() => parseConfig('[[batches]]\ncatalog = "a.toml"\n')).toThrow(
          "Missing required field: 'batches[0].name'"
        );
      });

      it('should reject a batches table that is not an array', () => {
        expect(() => parseConfig('[batches]\nname = "x"\n')).toThrow(
          "Invalid type for 'batches': expected array of tables, got object"
        );
      });
    });

    it('should round-trip any output directory string', () => {
      fc.assert(
        fc.property(fc.string(), (directory) => {
          const config = parseConfig(`[output]\ndirectory = ${JSON.stringify(directory)}\n`);
          return config.output.directory === directory;
        }),
        { numRuns: 50 }
      );
    });
  });

  describe('getDefaultConfig', () => {
    it('should return an equal but fresh copy', () => {
      const config = getDefaultConfig();
      expect(config).toEqual(DEFAULT_CONFIG);
      expect(config.output).not.toBe(DEFAULT_CONFIG.output);
    });
  });
});
