/**
 * Declaration emitter module.
 *
 * @packageDocumentation
 */

export {
  DEFAULT_BANNER_SOURCE,
  DEFAULT_REGENERATE_COMMAND,
  emitBatch,
  emitEnumDeclaration,
  emitInterfaceDeclaration,
  formatDocComment,
  renderBanner,
} from './declaration-emitter.js';
export type {
  BatchEmitResult,
  EmitWarning,
  EmitWarningKind,
  EmitterOptions,
} from './declaration-emitter.js';
