/**
 * Compiles emitted declarations to check that they are valid TypeScript.
 *
 * @packageDocumentation
 */

import { Project, ts, type Diagnostic } from 'ts-morph';

/**
 * One compiler diagnostic.
 */
export interface VerificationDiagnostic {
  /** TypeScript error code, e.g. 2304. */
  readonly code: number;
  /** 1-based line in the emitted code, when known. */
  readonly line?: number;
  readonly message: string;
}

/**
 * Result of compiling one emitted file.
 */
export interface VerificationResult {
  /** True when the compiler reported no errors. */
  readonly valid: boolean;
  readonly diagnostics: readonly VerificationDiagnostic[];
  /** Declared enum names, in source order. */
  readonly enums: readonly string[];
  /** Declared interface names, in source order. */
  readonly interfaces: readonly string[];
}

const VERIFY_FILE_NAME = '__typegen_verify__.ts';

/**
 * Shared in-memory project; each call replaces the single source file.
 */
const VERIFY_PROJECT = new Project({
  useInMemoryFileSystem: true,
  compilerOptions: {
    strict: true,
    noEmit: true,
    target: ts.ScriptTarget.ES2022,
    module: ts.ModuleKind.ESNext,
  },
});

function flattenMessage(diagnostic: Diagnostic): string {
  const messageText = diagnostic.getMessageText();
  // getMessageText() returns string | DiagnosticMessageChain
  if (typeof messageText === 'string') {
    return messageText;
  }
  return messageText.getMessageText();
}

function toVerificationDiagnostic(diagnostic: Diagnostic): VerificationDiagnostic {
  const line = diagnostic.getLineNumber();
  return {
    code: diagnostic.getCode(),
    ...(line !== undefined ? { line } : {}),
    message: flattenMessage(diagnostic),
  };
}

/**
 * Compiles emitted declarations in isolation.
 *
 * @param code - A complete emitted file.
 * @returns Error diagnostics and the declared names.
 *
 * @example
 * ```typescript
 * const { valid, diagnostics } = verifyDeclarations(emitBatch(batch).code);
 * ```
 */
export function verifyDeclarations(code: string): VerificationResult {
  const sourceFile = VERIFY_PROJECT.createSourceFile(VERIFY_FILE_NAME, code, { overwrite: true });

  try {
    const diagnostics = sourceFile
      .getPreEmitDiagnostics()
      .filter((diagnostic) => diagnostic.getCategory() === ts.DiagnosticCategory.Error)
      .map(toVerificationDiagnostic);

    return {
      valid: diagnostics.length === 0,
      diagnostics,
      enums: sourceFile.getEnums().map((declaration) => declaration.getName()),
      interfaces: sourceFile.getInterfaces().map((declaration) => declaration.getName()),
    };
  } finally {
    VERIFY_PROJECT.removeSourceFile(sourceFile);
  }
}
