/**
 * Declaration emitter: assembles enum and interface declarations for a batch.
 *
 * Output layout is a banner comment, then every enum block, then every
 * interface block, each followed by one blank line. Enum members and
 * interface fields keep their declared order.
 *
 * @packageDocumentation
 */

import { wireName, type Batch, type EnumDeclaration, type ModelDeclaration } from '../batch/types.js';
import type { KnownEnumNames } from '../descriptor/types.js';
import { collectReferences, mapType } from '../mapper/type-mapper.js';

/**
 * Options for declaration emission.
 */
export interface EmitterOptions {
  /** Project named in the banner. Default: 'schema-typegen'. */
  readonly bannerSource?: string;
  /** Command named in the banner. Default: 'npx schema-typegen generate'. */
  readonly regenerateCommand?: string;
  /** Whether enum and model descriptions are emitted as doc comments. Default: true. */
  readonly includeDescriptions?: boolean;
}

/**
 * Kinds of non-fatal findings reported while emitting.
 */
export type EmitWarningKind = 'unresolved_reference' | 'degraded_type';

/**
 * A non-fatal finding about one field.
 */
export interface EmitWarning {
  /** Warning category. */
  readonly kind: EmitWarningKind;
  /** `Model.field` the warning is about. */
  readonly location: string;
  /** Human-readable explanation. */
  readonly reason: string;
}

/**
 * Result of emitting one batch.
 */
export interface BatchEmitResult {
  /** Complete output text, ending with a newline. */
  readonly code: string;
  /** Each enum block, in input order. */
  readonly enums: readonly string[];
  /** Each interface block, in input order. */
  readonly interfaces: readonly string[];
  /** Findings that did not stop emission. */
  readonly warnings: readonly EmitWarning[];
}

export const DEFAULT_BANNER_SOURCE = 'schema-typegen';
export const DEFAULT_REGENERATE_COMMAND = 'npx schema-typegen generate';

const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Quotes a member or property name unless it is a plain identifier.
 */
function formatName(name: string): string {
  return IDENTIFIER_PATTERN.test(name) ? name : JSON.stringify(name);
}

/**
 * Renders text as a single-line doc comment.
 *
 * @param text - Comment text; line breaks are folded into spaces.
 * @param indent - Leading whitespace.
 * @returns The comment line.
 */
export function formatDocComment(text: string, indent = ''): string {
  const folded = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '')
    .join(' ')
    .replace(/\*\//g, '*\\/');
  return `${indent}/** ${folded} */`;
}

/**
 * Renders the banner that opens every generated file.
 *
 * @param options - Emitter options.
 * @returns Banner lines.
 */
export function renderBanner(options: EmitterOptions = {}): string[] {
  const source = options.bannerSource ?? DEFAULT_BANNER_SOURCE;
  const command = options.regenerateCommand ?? DEFAULT_REGENERATE_COMMAND;
  return [
    '/**',
    ` * Auto-generated TypeScript types from ${source}`,
    ` * DO NOT EDIT - regenerate with: ${command}`,
    ' */',
  ];
}

/**
 * Emits one enum declaration.
 *
 * Each member is written as `NAME = "value",` using the member's value, never
 * its name, as a string literal.
 *
 * @param declaration - The enum.
 * @param options - Emitter options.
 * @returns The enum block without a trailing newline.
 */
export function emitEnumDeclaration(
  declaration: EnumDeclaration,
  options: EmitterOptions = {}
): string {
  const lines: string[] = [];

  if (options.includeDescriptions !== false && declaration.description !== undefined) {
    lines.push(formatDocComment(declaration.description));
  }

  lines.push(`export enum ${declaration.name} {`);
  for (const member of declaration.members) {
    lines.push(`  ${formatName(member.name)} = ${JSON.stringify(String(member.value))},`);
  }
  lines.push('}');

  return lines.join('\n');
}

/**
 * Emits one interface declaration.
 *
 * @param declaration - The model.
 * @param knownEnumNames - Enum registry of the batch the model belongs to.
 * @param options - Emitter options.
 * @returns The interface block without a trailing newline.
 */
export function emitInterfaceDeclaration(
  declaration: ModelDeclaration,
  knownEnumNames: KnownEnumNames,
  options: EmitterOptions = {}
): string {
  const lines: string[] = [];

  if (options.includeDescriptions !== false && declaration.description !== undefined) {
    lines.push(formatDocComment(declaration.description));
  }

  lines.push(`export interface ${declaration.name} {`);
  for (const field of declaration.fields) {
    const tsType = mapType(field.type, knownEnumNames);
    const optionalMarker = field.required ? '' : '?';

    if (field.description !== undefined && field.description.trim() !== '') {
      lines.push(formatDocComment(field.description, '  '));
    }
    lines.push(`  ${formatName(wireName(field))}${optionalMarker}: ${tsType};`);
  }
  lines.push('}');

  return lines.join('\n');
}

/**
 * Collects warnings for the fields of one model.
 */
function collectModelWarnings(
  declaration: ModelDeclaration,
  declaredNames: ReadonlySet<string>,
  knownEnumNames: KnownEnumNames
): EmitWarning[] {
  const warnings: EmitWarning[] = [];

  for (const field of declaration.fields) {
    const location = `${declaration.name}.${field.name}`;

    if (field.degraded) {
      warnings.push({
        kind: 'degraded_type',
        location,
        reason: 'Type shape not recognized; emitted as any',
      });
    }

    for (const ref of collectReferences(field.type, knownEnumNames)) {
      if (!declaredNames.has(ref.name)) {
        warnings.push({
          kind: 'unresolved_reference',
          location,
          reason: `'${ref.name}' is not declared in this batch`,
        });
      }
    }
  }

  return warnings;
}

/**
 * Emits the complete declaration file for a batch.
 *
 * The output is a pure function of the batch and the options.
 *
 * @param batch - The resolved batch.
 * @param options - Emitter options.
 * @returns Generated code, the individual blocks and any warnings.
 *
 * @example
 * ```typescript
 * const result = emitBatch(resolveBatch(parseCatalog(toml)));
 * await fs.writeFile('widgets.ts', result.code);
 * ```
 */
export function emitBatch(batch: Batch, options: EmitterOptions = {}): BatchEmitResult {
  const declaredNames = new Set(batch.declarations.map((declaration) => declaration.name));
  const enums: string[] = [];
  const interfaces: string[] = [];
  const warnings: EmitWarning[] = [];

  for (const declaration of batch.declarations) {
    if (declaration.kind === 'Enum') {
      enums.push(emitEnumDeclaration(declaration, options));
    }
  }

  for (const declaration of batch.declarations) {
    if (declaration.kind === 'Model') {
      interfaces.push(emitInterfaceDeclaration(declaration, batch.knownEnumNames, options));
      warnings.push(...collectModelWarnings(declaration, declaredNames, batch.knownEnumNames));
    }
  }

  const lines = [...renderBanner(options), ''];
  for (const block of [...enums, ...interfaces]) {
    lines.push(block, '');
  }

  return {
    code: lines.join('\n'),
    enums,
    interfaces,
    warnings,
  };
}
