/**
 * In-memory FileSystem implementation
 * For testing - maintains virtual filesystem in memory
 */

import { resolve, join, dirname, isAbsolute, relative, sep } from 'path';
import { FileSystem, WriteOptions, FileSystemError, createFileSystemError } from '../types/file-system';
import { Result, ok, err } from '../types/result';

type VirtualEntry = { type: 'file'; content: string } | { type: 'directory' };

/**
 * In-memory implementation of FileSystem for testing
 */
export class MemoryFileSystem implements FileSystem {
  private entries: Map<string, VirtualEntry> = new Map();
  private readonly basePath: string;

  constructor(basePath: string = '/') {
    this.basePath = resolve(basePath);
    this.entries.set(this.basePath, { type: 'directory' });
  }

  private normalizePath(path: string): string {
    return resolve(isAbsolute(path) ? path : join(this.basePath, path));
  }

  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    const entry = this.entries.get(this.normalizePath(path));
    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    if (entry.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }
    return ok(entry.content);
  }

  async writeFile(
    path: string,
    content: string,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>> {
    const normalizedPath = this.normalizePath(path);
    const parentDir = dirname(normalizedPath);

    const parentEntry = this.entries.get(parentDir);
    if (!parentEntry) {
      if (!options?.createParents) {
        return err(createFileSystemError('NOT_FOUND', parentDir, 'Parent directory does not exist'));
      }
      const mkdirResult = await this.mkdir(parentDir, true);
      if (!mkdirResult.ok) {
        return mkdirResult;
      }
    } else if (parentEntry.type !== 'directory') {
      return err(createFileSystemError('NOT_A_DIRECTORY', parentDir));
    }

    if (this.entries.get(normalizedPath)?.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }

    this.entries.set(normalizedPath, { type: 'file', content });
    return ok(undefined);
  }

  async exists(path: string): Promise<boolean> {
    return this.entries.has(this.normalizePath(path));
  }

  async mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>> {
    const normalizedPath = this.normalizePath(path);

    const existingEntry = this.entries.get(normalizedPath);
    if (existingEntry) {
      if (existingEntry.type === 'directory') {
        return ok(undefined);
      }
      return err(createFileSystemError('NOT_A_DIRECTORY', path));
    }

    const parentDir = dirname(normalizedPath);
    if (parentDir !== normalizedPath) {
      const parentEntry = this.entries.get(parentDir);
      if (!parentEntry) {
        if (!recursive) {
          return err(createFileSystemError('NOT_FOUND', parentDir, 'Parent directory does not exist'));
        }
        const mkdirResult = await this.mkdir(parentDir, true);
        if (!mkdirResult.ok) {
          return mkdirResult;
        }
      } else if (parentEntry.type !== 'directory') {
        return err(createFileSystemError('NOT_A_DIRECTORY', parentDir));
      }
    }

    this.entries.set(normalizedPath, { type: 'directory' });
    return ok(undefined);
  }

  async copy(src: string, dest: string): Promise<Result<void, FileSystemError>> {
    const readResult = await this.readFile(src);
    if (!readResult.ok) {
      return readResult;
    }
    return this.writeFile(dest, readResult.value, { createParents: true });
  }

  resolve(...paths: string[]): string {
    return resolve(this.basePath, ...paths);
  }

  join(...paths: string[]): string {
    return join(...paths);
  }

  relative(from: string, to: string): string {
    return relative(from, to);
  }

  /**
   * Paths of every file, sorted (for assertions)
   */
  listFiles(): string[] {
    return Array.from(this.entries.entries())
      .filter(([, entry]) => entry.type === 'file')
      .map(([path]) => path)
      .sort();
  }

  /**
   * Files directly or indirectly under a directory, relative to it
   */
  listFilesUnder(directory: string): string[] {
    const prefix = this.normalizePath(directory) + sep;
    return this.listFiles()
      .filter((path) => path.startsWith(prefix))
      .map((path) => path.slice(prefix.length));
  }
}

/**
 * Create an in-memory filesystem for testing
 */
export function createMemoryFileSystem(basePath?: string): MemoryFileSystem {
  return new MemoryFileSystem(basePath);
}
