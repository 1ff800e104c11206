/**
 * Safe file system utilities with path validation.
 *
 * All paths are resolved to absolute paths and validated before any file
 * system operation is attempted.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Resolves a file name inside a directory, rejecting names that would leave it.
 *
 * @param directory - The containing directory.
 * @param fileName - A file name relative to `directory`.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the result is outside `directory`.
 */
export function resolveWithin(directory: string, fileName: string): string {
  const root = validatePath(directory);
  const resolved = validatePath(path.join(root, fileName));
  const relative = path.relative(root, resolved);

  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PathValidationError(`Path escapes '${directory}'`, fileName);
  }
  return resolved;
}

/**
 * Safely reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read (e.g., file not found, permission denied).
 */
export async function safeReadFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Safely writes a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be written (e.g., permission denied, directory does not exist).
 */
export async function safeWriteFile(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.writeFile(validatedPath, data, 'utf-8');
}

/**
 * Safely checks if a file or directory exists after validating the path.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  const validatedPath = validatePath(filePath);
  try {
    await fs.access(validatedPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Safely creates a directory and its parents after validating the path.
 *
 * @param dirPath - The directory to create.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the directory cannot be created.
 */
export async function safeMkdir(dirPath: string): Promise<void> {
  const validatedPath = validatePath(dirPath);
  await fs.mkdir(validatedPath, { recursive: true });
}
