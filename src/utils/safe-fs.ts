/**
 * Synchronous file system helpers with path validation.
 *
 * Every helper resolves its path to an absolute one through
 * {@link validatePath} before touching the file system, so relative paths are
 * read against the process working directory and empty or NUL-containing
 * paths are rejected up front.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
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

  return path.resolve(filePath);
}

function isMissingPathError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

/**
 * Resolves a path to its absolute, symlink-free form if it exists.
 *
 * @param filePath - The path to resolve.
 * @returns The real path, or `undefined` when nothing exists at `filePath`.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} For failures other than a missing path (e.g. permission denied).
 */
export function resolveExistingPath(filePath: string): string | undefined {
  const validatedPath = validatePath(filePath);
  try {
    return fs.realpathSync(validatedPath);
  } catch (error) {
    if (isMissingPathError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Checks whether a path names an existing directory.
 *
 * @param filePath - The path to check.
 * @returns True for an existing directory, false otherwise.
 * @throws {PathValidationError} If the path is invalid.
 */
export function isDirectorySync(filePath: string): boolean {
  const validatedPath = validatePath(filePath);
  return fs.statSync(validatedPath, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read (e.g. file not found, is a directory).
 */
export function safeReadFileSync(filePath: string): string {
  const validatedPath = validatePath(filePath);
  return fs.readFileSync(validatedPath, 'utf-8');
}

/**
 * Writes a UTF-8 text file after validating the path, truncating any
 * existing content.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be written (e.g. permission denied, directory does not exist).
 */
export function safeWriteFileSync(filePath: string, data: string): void {
  const validatedPath = validatePath(filePath);
  fs.writeFileSync(validatedPath, data, 'utf-8');
}

/**
 * Appends UTF-8 text to a file after validating the path, creating the file
 * if needed.
 *
 * @param filePath - The path to the file to append to.
 * @param data - The text to append.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be appended to.
 */
export function safeAppendFileSync(filePath: string, data: string): void {
  const validatedPath = validatePath(filePath);
  fs.appendFileSync(validatedPath, data, 'utf-8');
}
