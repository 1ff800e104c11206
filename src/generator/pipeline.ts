/**
 * Batch orchestration: load each configured batch, generate its outputs and
 * write them.
 *
 * Batches are independent. A batch that cannot be loaded, generated or
 * written is reported as failed and the remaining batches still run.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { resolveBatch } from '../batch/resolver.js';
import type { SourceBatch } from '../batch/types.js';
import { isSourceBatch } from '../catalog/define.js';
import { parseCatalog } from '../catalog/parser.js';
import { DEFAULT_BATCH_EXPORT } from '../config/defaults.js';
import type { BatchSourceConfig, Config, OutputConfig } from '../config/types.js';
import {
  emitBatch,
  type EmitWarning,
  type EmitterOptions,
} from '../emitter/declaration-emitter.js';
import {
  emitJsonSchemaDocument,
  serializeJsonSchemaDocument,
  type JsonSchemaDocument,
} from '../json-schema/emitter.js';
import { Logger } from '../utils/logger.js';
import { resolveWithin, safeExists, safeMkdir, safeReadFile, safeWriteFile } from '../utils/safe-fs.js';

/**
 * Error thrown when a configured batch cannot be loaded.
 */
export class BatchLoadError extends Error {
  /** Name of the batch that failed to load. */
  public readonly batchName: string;
  /** The original error, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new BatchLoadError.
   *
   * @param message - Descriptive error message.
   * @param batchName - The batch that failed.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, batchName: string, cause?: Error) {
    super(message);
    this.name = 'BatchLoadError';
    this.batchName = batchName;
    this.cause = cause;
  }
}

/**
 * Options for {@link generateBatch}.
 */
export interface GenerateOptions extends EmitterOptions {
  /** Whether to build the JSON Schema document. Default: true. */
  readonly jsonSchema?: boolean;
}

/**
 * In-memory outputs of one batch.
 */
export interface GeneratedBatch {
  readonly name: string;
  /** The declaration file text. */
  readonly typescript: string;
  /** The JSON Schema document, when enabled. */
  readonly jsonSchema?: JsonSchemaDocument;
  readonly enums: readonly string[];
  readonly interfaces: readonly string[];
  readonly warnings: readonly EmitWarning[];
}

/**
 * Generates the outputs of one batch without touching the file system.
 *
 * @param source - The source batch.
 * @param options - Emitter and JSON Schema options.
 * @returns The generated outputs.
 */
export function generateBatch(source: SourceBatch, options: GenerateOptions = {}): GeneratedBatch {
  const batch = resolveBatch(source);
  const result = emitBatch(batch, options);

  return {
    name: batch.name,
    typescript: result.code,
    ...(options.jsonSchema !== false ? { jsonSchema: emitJsonSchemaDocument(batch) } : {}),
    enums: result.enums,
    interfaces: result.interfaces,
    warnings: result.warnings,
  };
}

/**
 * Maps the output section of a configuration to generation options.
 */
export function generateOptionsFromConfig(output: OutputConfig): GenerateOptions {
  return {
    bannerSource: output.banner_source,
    regenerateCommand: output.regenerate_command,
    includeDescriptions: output.include_descriptions,
    jsonSchema: output.json_schema,
  };
}

/**
 * Loads a JavaScript module and returns its exports.
 */
export type ModuleLoader = (modulePath: string) => Promise<Record<string, unknown>>;

/**
 * Collaborators of a generation run. Every field is optional.
 */
export interface GenerationDeps {
  /** Directory that relative paths in the configuration resolve against. Default: cwd. */
  readonly baseDir?: string;
  /** Logger; by default one for the 'generator' component honoring `logging.debug`. */
  readonly logger?: Logger;
  /** Module loader for `module` batches; by default a dynamic `import()`. */
  readonly loadModule?: ModuleLoader;
}

const importModule: ModuleLoader = async (modulePath) => {
  const loaded: unknown = await import(pathToFileURL(modulePath).href);
  return typeof loaded === 'object' && loaded !== null ? { ...loaded } : {};
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function resolveLogger(config: Config, deps: GenerationDeps): Logger {
  return deps.logger ?? new Logger({ component: 'generator', debugMode: config.logging.debug });
}

/**
 * Loads the source batch a configuration entry points at.
 *
 * Catalog batches take the entry's name regardless of their `meta.name`.
 *
 * @param entry - The `[[batches]]` entry.
 * @param deps - Base directory and module loader.
 * @returns The source batch.
 * @throws BatchLoadError if the source is missing, unreadable or malformed.
 */
export async function loadSourceBatch(
  entry: BatchSourceConfig,
  deps: GenerationDeps = {}
): Promise<SourceBatch> {
  const baseDir = deps.baseDir ?? process.cwd();

  if (entry.catalog !== undefined && entry.module === undefined) {
    const catalogPath = path.resolve(baseDir, entry.catalog);
    try {
      const source = parseCatalog(await safeReadFile(catalogPath), { defaultName: entry.name });
      return { ...source, name: entry.name };
    } catch (error) {
      const cause = toError(error);
      throw new BatchLoadError(
        `Failed to load catalog '${entry.catalog}' for batch '${entry.name}': ${cause.message}`,
        entry.name,
        cause
      );
    }
  }

  if (entry.module !== undefined && entry.catalog === undefined) {
    const modulePath = path.resolve(baseDir, entry.module);
    const exportName = entry.export ?? DEFAULT_BATCH_EXPORT;
    const loadModule = deps.loadModule ?? importModule;

    let exports: Record<string, unknown>;
    try {
      exports = await loadModule(modulePath);
    } catch (error) {
      const cause = toError(error);
      throw new BatchLoadError(
        `Failed to import module '${entry.module}' for batch '${entry.name}': ${cause.message}`,
        entry.name,
        cause
      );
    }

    const exported = exports[exportName];
    if (!isSourceBatch(exported)) {
      throw new BatchLoadError(
        `Export '${exportName}' of module '${entry.module}' is not a batch`,
        entry.name
      );
    }
    return { ...exported, name: entry.name };
  }

  throw new BatchLoadError(
    `Batch '${entry.name}' must set exactly one of 'catalog' and 'module'`,
    entry.name
  );
}

/**
 * Files written for one batch.
 */
export interface BatchFiles {
  /** Absolute path of the declaration file. */
  readonly typescript: string;
  /** Absolute path of the schema document, when enabled. */
  readonly jsonSchema?: string;
}

/**
 * Outcome of one batch in a generation run.
 */
export type BatchOutcome =
  | {
      readonly status: 'generated';
      readonly name: string;
      readonly files: BatchFiles;
      readonly generated: GeneratedBatch;
    }
  | {
      readonly status: 'failed';
      readonly name: string;
      readonly error: Error;
    };

/**
 * Result of a generation run.
 */
export interface GenerationReport {
  /** One outcome per configured batch, in configuration order. */
  readonly outcomes: readonly BatchOutcome[];
  readonly succeeded: number;
  readonly failed: number;
}

function outputPaths(config: Config, batchName: string, baseDir: string): BatchFiles {
  const directory = path.resolve(baseDir, config.output.directory);
  return {
    typescript: resolveWithin(directory, `${batchName}.ts`),
    ...(config.output.json_schema
      ? { jsonSchema: resolveWithin(directory, `${batchName}.schema.json`) }
      : {}),
  };
}

function renderedFiles(files: BatchFiles, generated: GeneratedBatch): Array<[string, string]> {
  const rendered: Array<[string, string]> = [[files.typescript, generated.typescript]];
  if (files.jsonSchema !== undefined && generated.jsonSchema !== undefined) {
    rendered.push([files.jsonSchema, serializeJsonSchemaDocument(generated.jsonSchema)]);
  }
  return rendered;
}

async function loadAndGenerate(
  entry: BatchSourceConfig,
  config: Config,
  deps: GenerationDeps,
  logger: Logger
): Promise<GeneratedBatch> {
  const source = await loadSourceBatch(entry, deps);
  logger.debug('batch_loaded', {
    batch: entry.name,
    declarations: source.declarations.length,
  });

  const generated = generateBatch(source, generateOptionsFromConfig(config.output));
  for (const warning of generated.warnings) {
    logger.warn('type_warning', {
      batch: entry.name,
      kind: warning.kind,
      location: warning.location,
      reason: warning.reason,
    });
  }
  return generated;
}

/**
 * Generates every configured batch and writes its files.
 *
 * Writes `<directory>/<batch>.ts` and, unless disabled,
 * `<directory>/<batch>.schema.json`. The output directory is created when
 * missing.
 *
 * @param config - The configuration.
 * @param deps - Collaborators.
 * @returns Per-batch outcomes.
 */
export async function runGeneration(
  config: Config,
  deps: GenerationDeps = {}
): Promise<GenerationReport> {
  const logger = resolveLogger(config, deps);
  const baseDir = deps.baseDir ?? process.cwd();
  const outcomes: BatchOutcome[] = [];

  for (const entry of config.batches) {
    try {
      const generated = await loadAndGenerate(entry, config, deps, logger);
      const files = outputPaths(config, entry.name, baseDir);

      await safeMkdir(path.dirname(files.typescript));
      for (const [filePath, contents] of renderedFiles(files, generated)) {
        await safeWriteFile(filePath, contents);
        logger.info('file_written', { batch: entry.name, path: filePath });
      }

      logger.info('batch_generated', {
        batch: entry.name,
        enums: generated.enums.length,
        interfaces: generated.interfaces.length,
        warnings: generated.warnings.length,
      });
      outcomes.push({ status: 'generated', name: entry.name, files, generated });
    } catch (error) {
      const failure = toError(error);
      logger.error('batch_failed', { batch: entry.name, error: failure.message });
      outcomes.push({ status: 'failed', name: entry.name, error: failure });
    }
  }

  const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;
  return { outcomes, succeeded: outcomes.length - failed, failed };
}

/**
 * A generated file whose on-disk copy is out of date.
 */
export interface DriftEntry {
  readonly batch: string;
  /** Absolute path of the file. */
  readonly file: string;
  readonly reason: 'missing' | 'changed';
}

/**
 * Result of a drift check.
 */
export interface CheckReport {
  /** True when every file is present and current and no batch failed. */
  readonly upToDate: boolean;
  readonly drift: readonly DriftEntry[];
  /** Batches that could not be regenerated. */
  readonly failures: ReadonlyArray<{ readonly name: string; readonly error: Error }>;
}

/**
 * Regenerates every batch in memory and compares the result with disk.
 *
 * Nothing is written.
 *
 * @param config - The configuration.
 * @param deps - Collaborators.
 * @returns Missing and changed files, and batches that failed.
 */
export async function checkGeneration(
  config: Config,
  deps: GenerationDeps = {}
): Promise<CheckReport> {
  const logger = resolveLogger(config, deps);
  const baseDir = deps.baseDir ?? process.cwd();
  const drift: DriftEntry[] = [];
  const failures: Array<{ name: string; error: Error }> = [];

  for (const entry of config.batches) {
    try {
      const generated = await loadAndGenerate(entry, config, deps, logger);
      const files = outputPaths(config, entry.name, baseDir);

      for (const [filePath, contents] of renderedFiles(files, generated)) {
        if (!(await safeExists(filePath))) {
          drift.push({ batch: entry.name, file: filePath, reason: 'missing' });
        } else if ((await safeReadFile(filePath)) !== contents) {
          drift.push({ batch: entry.name, file: filePath, reason: 'changed' });
        }
      }
    } catch (error) {
      const failure = toError(error);
      logger.error('batch_failed', { batch: entry.name, error: failure.message });
      failures.push({ name: entry.name, error: failure });
    }
  }

  return { upToDate: drift.length === 0 && failures.length === 0, drift, failures };
}
