/**
 * Generation pipeline.
 *
 * @packageDocumentation
 */

export {
  BatchLoadError,
  checkGeneration,
  generateBatch,
  generateOptionsFromConfig,
  loadSourceBatch,
  runGeneration,
  type BatchFiles,
  type BatchOutcome,
  type CheckReport,
  type DriftEntry,
  type GenerateOptions,
  type GeneratedBatch,
  type GenerationDeps,
  type GenerationReport,
  type ModuleLoader,
} from './pipeline.js';
