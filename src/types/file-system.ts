/**
 * FileSystem interface
 * Abstracts the file operations a run performs (workflow, schemas, prompts,
 * artifacts) so the loop can be exercised against memory in tests
 */

import { Result } from './result';

/**
 * Options for writing files
 */
export interface WriteOptions {
  /** Create parent directories if they don't exist */
  createParents?: boolean;
}

/**
 * Error types for filesystem operations
 */
export type FileSystemErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'ALREADY_EXISTS'
  | 'NOT_A_FILE'
  | 'NOT_A_DIRECTORY'
  | 'IO_ERROR';

/**
 * Filesystem operation error
 */
export interface FileSystemError {
  code: FileSystemErrorCode;
  message: string;
  path: string;
  cause?: Error;
}

/**
 * Interface for filesystem operations
 * Implementations can be real (Node.js fs) or in-memory (for testing)
 */
export interface FileSystem {
  readFile(path: string): Promise<Result<string, FileSystemError>>;

  writeFile(
    path: string,
    content: string,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>>;

  exists(path: string): Promise<boolean>;

  /**
   * Create a directory (and optionally parents)
   * Creating a directory that already exists succeeds when `recursive` is set.
   */
  mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>>;

  copy(src: string, dest: string): Promise<Result<void, FileSystemError>>;

  resolve(...paths: string[]): string;
  join(...paths: string[]): string;
  relative(from: string, to: string): string;
}

/**
 * Create a FileSystemError
 */
export function createFileSystemError(
  code: FileSystemErrorCode,
  path: string,
  message?: string,
  cause?: Error
): FileSystemError {
  const defaultMessages: Record<FileSystemErrorCode, string> = {
    NOT_FOUND: `Path not found: ${path}`,
    PERMISSION_DENIED: `Permission denied: ${path}`,
    ALREADY_EXISTS: `Path already exists: ${path}`,
    NOT_A_FILE: `Not a file: ${path}`,
    NOT_A_DIRECTORY: `Not a directory: ${path}`,
    IO_ERROR: `IO error: ${path}`,
  };

  return {
    code,
    path,
    message: message ?? defaultMessages[code],
    cause,
  };
}
