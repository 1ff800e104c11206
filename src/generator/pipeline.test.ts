import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { defineBatch, defineEnum, defineModel } from '../catalog/define.js';
import { parseCatalog } from '../catalog/parser.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { Config } from '../config/types.js';
import { Logger } from '../utils/logger.js';
import {
  BatchLoadError,
  checkGeneration,
  generateBatch,
  loadSourceBatch,
  runGeneration,
  type ModuleLoader,
} from './pipeline.js';

const CATALOG = `
[meta]
name = "catalog-name"

[enums.Status]
members = [
  { name = "OPEN", value = "open" },
  { name = "CLOSED", value = "closed" },
]

[models.Ticket]
description = "A support ticket."
fields = [
  { name = "id", type = "int" },
  { name = "status", type = "Status" },
  { name = "notes", type = "list[str] | None", required = false },
]
`;

const EXPECTED_TICKETS_TS = [
  '/**',
  ' * Auto-generated TypeScript types from schema-typegen',
  ' * DO NOT EDIT - regenerate with: npx schema-typegen generate',
  ' */',
  '',
  'export enum Status {',
  '  OPEN = "open",',
  '  CLOSED = "closed",',
  '}',
  '',
  '/** A support ticket. */',
  'export interface Ticket {',
  '  id: number;',
  '  status: Status;',
  '  notes?: string[] | null;',
  '}',
  '',
].join('\n');

const Color = defineEnum('Color', ['red', 'green']);
const widgets = defineBatch('widgets', [
  Color,
  defineModel('Widget', { id: z.string(), color: Color.schema }),
]);

function captureLogger(): { logger: Logger; events: string[] } {
  const events: string[] = [];
  const logger = new Logger({
    component: 'test',
    debugMode: true,
    sink: (line) => {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed === 'object' && parsed !== null && 'event' in parsed) {
        events.push(String(parsed.event));
      }
    },
  });
  return { logger, events };
}

describe('Generation pipeline', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'typegen-pipeline-'));
    await mkdir(join(tempDir, 'schemas'));
    await writeFile(join(tempDir, 'schemas', 'tickets.toml'), CATALOG, 'utf-8');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  function config(overrides: Partial<Config> = {}): Config {
    return {
      ...DEFAULT_CONFIG,
      output: { ...DEFAULT_CONFIG.output, directory: 'out' },
      batches: [{ name: 'tickets', catalog: 'schemas/tickets.toml' }],
      ...overrides,
    };
  }

  describe('generateBatch', () => {
    it('should produce declarations and a schema document', () => {
      const generated = generateBatch(parseCatalog(CATALOG));
      expect(generated.name).toBe('catalog-name');
      expect(generated.typescript).toBe(EXPECTED_TICKETS_TS);
      expect(generated.jsonSchema?.$id).toBe('urn:schema-typegen:catalog-name');
      expect(Object.keys(generated.jsonSchema?.definitions ?? {})).toEqual(['Status', 'Ticket']);
      expect(generated.warnings).toEqual([]);
    });

    it('should skip the schema document when disabled', () => {
      expect(generateBatch(widgets, { jsonSchema: false }).jsonSchema).toBeUndefined();
    });
  });

  describe('loadSourceBatch', () => {
    it('should rename catalog batches after the configured name', async () => {
      const source = await loadSourceBatch(
        { name: 'tickets', catalog: 'schemas/tickets.toml' },
        { baseDir: tempDir }
      );
      expect(source.name).toBe('tickets');
      expect(source.declarations.map((declaration) => declaration.name)).toEqual([
        'Status',
        'Ticket',
      ]);
    });

    it('should wrap unreadable catalogs', async () => {
      let caught: unknown;
      try {
        await loadSourceBatch({ name: 'gone', catalog: 'missing.toml' }, { baseDir: tempDir });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(BatchLoadError);
      expect(caught instanceof BatchLoadError ? caught.batchName : undefined).toBe('gone');
      expect(caught instanceof BatchLoadError ? caught.cause : undefined).toBeInstanceOf(Error);
    });

    it('should read the configured export from modules', async () => {
      const requested: string[] = [];
      const loadModule: ModuleLoader = async (modulePath) => {
        requested.push(modulePath);
        return { widgetBatch: widgets };
      };
      const source = await loadSourceBatch(
        { name: 'parts', module: 'lib/widgets.js', export: 'widgetBatch' },
        { baseDir: tempDir, loadModule }
      );
      expect(requested).toEqual([join(tempDir, 'lib', 'widgets.js')]);
      expect(source.name).toBe('parts');
      expect(source.declarations).toBe(widgets.declarations);
    });

    it('should reject exports that are not batches', async () => {
      const loadModule: ModuleLoader = async () => ({ batch: { name: 'x' } });
      await expect(
        loadSourceBatch({ name: 'bad', module: 'bad.js' }, { baseDir: tempDir, loadModule })
      ).rejects.toThrow("Export 'batch' of module 'bad.js' is not a batch");
    });

    it('should reject entries naming no source', async () => {
      await expect(loadSourceBatch({ name: 'empty' })).rejects.toThrow(
        "Batch 'empty' must set exactly one of 'catalog' and 'module'"
      );
    });
  });

  describe('runGeneration', () => {
    it('should write declaration and schema files', async () => {
      const { logger, events } = captureLogger();
      const report = await runGeneration(config(), { baseDir: tempDir, logger });

      expect(report.succeeded).toBe(1);
      expect(report.failed).toBe(0);
      expect(await readFile(join(tempDir, 'out', 'tickets.ts'), 'utf-8')).toBe(
        EXPECTED_TICKETS_TS
      );
      const schema: unknown = JSON.parse(
        await readFile(join(tempDir, 'out', 'tickets.schema.json'), 'utf-8')
      );
      expect(schema).toMatchObject({ $id: 'urn:schema-typegen:tickets', title: 'tickets' });
      expect(events).toEqual(['batch_loaded', 'file_written', 'file_written', 'batch_generated']);
    });

    it('should write only declarations when json_schema is off', async () => {
      const base = config();
      const report = await runGeneration(
        { ...base, output: { ...base.output, json_schema: false } },
        { baseDir: tempDir, logger: captureLogger().logger }
      );
      const outcome = report.outcomes[0];
      expect(outcome?.status === 'generated' ? outcome.files : undefined).toEqual({
        typescript: join(tempDir, 'out', 'tickets.ts'),
      });
    });

    it('should keep going after a failed batch', async () => {
      const { logger, events } = captureLogger();
      const report = await runGeneration(
        config({
          batches: [
            { name: 'broken', catalog: 'schemas/missing.toml' },
            { name: 'tickets', catalog: 'schemas/tickets.toml' },
          ],
        }),
        { baseDir: tempDir, logger }
      );

      expect(report.outcomes.map((outcome) => [outcome.name, outcome.status])).toEqual([
        ['broken', 'failed'],
        ['tickets', 'generated'],
      ]);
      expect(report.failed).toBe(1);
      expect(events[0]).toBe('batch_failed');
    });

    it('should log unresolved references as warnings', async () => {
      const { logger, events } = captureLogger();
      const loadModule: ModuleLoader = async () => ({
        batch: {
          name: 'orphans',
          declarations: [
            {
              kind: 'Model',
              name: 'Holder',
              fields: [
                { name: 'widget', type: { kind: 'Annotation', annotation: 'Widget' }, required: true },
              ],
            },
          ],
        },
      });
      const report = await runGeneration(
        config({ batches: [{ name: 'orphans', module: 'orphans.js' }] }),
        { baseDir: tempDir, logger, loadModule }
      );

      const outcome = report.outcomes[0];
      expect(outcome?.status === 'generated' ? outcome.generated.warnings : undefined).toEqual([
        {
          kind: 'unresolved_reference',
          location: 'Holder.widget',
          reason: "'Widget' is not declared in this batch",
        },
      ]);
      expect(events).toContain('type_warning');
    });
  });

  describe('checkGeneration', () => {
    it('should report missing files before generation', async () => {
      const report = await checkGeneration(config(), {
        baseDir: tempDir,
        logger: captureLogger().logger,
      });
      expect(report.upToDate).toBe(false);
      expect(report.drift).toEqual([
        { batch: 'tickets', file: join(tempDir, 'out', 'tickets.ts'), reason: 'missing' },
        {
          batch: 'tickets',
          file: join(tempDir, 'out', 'tickets.schema.json'),
          reason: 'missing',
        },
      ]);
    });

    it('should report up to date after generation and changed after edits', async () => {
      const deps = { baseDir: tempDir, logger: captureLogger().logger };
      await runGeneration(config(), deps);
      expect((await checkGeneration(config(), deps)).upToDate).toBe(true);

      await writeFile(join(tempDir, 'out', 'tickets.ts'), '// edited\n', 'utf-8');
      const report = await checkGeneration(config(), deps);
      expect(report.drift).toEqual([
        { batch: 'tickets', file: join(tempDir, 'out', 'tickets.ts'), reason: 'changed' },
      ]);
    });

    it('should count failed batches as out of date', async () => {
      const report = await checkGeneration(
        config({ batches: [{ name: 'broken', catalog: 'nope.toml' }] }),
        { baseDir: tempDir, logger: captureLogger().logger }
      );
      expect(report.upToDate).toBe(false);
      expect(report.failures.map((failure) => failure.name)).toEqual(['broken']);
    });
  });
});
