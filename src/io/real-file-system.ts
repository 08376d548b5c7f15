/**
 * Real FileSystem implementation
 * Uses Node.js fs with atomic writes for run artifacts
 */

import {
  readFile as fsReadFile,
  writeFile as fsWriteFile,
  mkdir as fsMkdir,
  copyFile as fsCopyFile,
  rename as fsRename,
  unlink as fsUnlink,
  existsSync,
} from 'fs';
import { promisify } from 'util';
import { resolve, join, dirname, relative } from 'path';
import { randomBytes } from 'crypto';
import {
  FileSystem,
  WriteOptions,
  FileSystemError,
  FileSystemErrorCode,
  createFileSystemError,
} from '../types/file-system';
import { Result, ok, err } from '../types/result';

// Promisified versions
const readFileAsync = promisify(fsReadFile);
const writeFileAsync = promisify(fsWriteFile);
const mkdirAsync = promisify(fsMkdir);
const copyFileAsync = promisify(fsCopyFile);
const renameAsync = promisify(fsRename);
const unlinkAsync = promisify(fsUnlink);

const ERRNO_CODES: Record<string, FileSystemErrorCode> = {
  ENOENT: 'NOT_FOUND',
  EACCES: 'PERMISSION_DENIED',
  EPERM: 'PERMISSION_DENIED',
  EEXIST: 'ALREADY_EXISTS',
  EISDIR: 'NOT_A_FILE',
  ENOTDIR: 'NOT_A_DIRECTORY',
};

/**
 * Map a thrown fs error onto a FileSystemError
 */
function toFileSystemError(path: string, error: unknown): FileSystemError {
  const cause = error instanceof Error ? error : new Error(String(error));
  const errno = 'code' in cause && typeof cause.code === 'string' ? cause.code : undefined;
  const code = (errno !== undefined ? ERRNO_CODES[errno] : undefined) ?? 'IO_ERROR';
  return createFileSystemError(code, path, code === 'IO_ERROR' ? cause.message : undefined, cause);
}

/**
 * Real implementation of FileSystem using Node.js fs
 */
export class RealFileSystem implements FileSystem {
  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    try {
      const content = await readFileAsync(resolve(path), { encoding: 'utf-8' });
      return ok(content);
    } catch (error) {
      return err(toFileSystemError(path, error));
    }
  }

  async writeFile(
    path: string,
    content: string,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>> {
    const target = resolve(path);

    try {
      if (options?.createParents) {
        await mkdirAsync(dirname(target), { recursive: true });
      }

      // Write beside the target, then rename over it
      const tempPath = `${target}.${randomBytes(8).toString('hex')}.tmp`;
      await writeFileAsync(tempPath, content, { encoding: 'utf-8' });
      try {
        await renameAsync(tempPath, target);
      } catch (error) {
        await unlinkAsync(tempPath).catch(() => undefined);
        throw error;
      }
      return ok(undefined);
    } catch (error) {
      return err(toFileSystemError(path, error));
    }
  }

  async exists(path: string): Promise<boolean> {
    return existsSync(resolve(path));
  }

  async mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>> {
    try {
      await mkdirAsync(resolve(path), { recursive: recursive ?? false });
      return ok(undefined);
    } catch (error) {
      return err(toFileSystemError(path, error));
    }
  }

  async copy(src: string, dest: string): Promise<Result<void, FileSystemError>> {
    try {
      await mkdirAsync(dirname(resolve(dest)), { recursive: true });
      await copyFileAsync(resolve(src), resolve(dest));
      return ok(undefined);
    } catch (error) {
      return err(toFileSystemError(src, error));
    }
  }

  resolve(...paths: string[]): string {
    return resolve(...paths);
  }

  join(...paths: string[]): string {
    return join(...paths);
  }

  relative(from: string, to: string): string {
    return relative(from, to);
  }
}

/**
 * Create a filesystem backed by the real disk
 */
export function createRealFileSystem(): FileSystem {
  return new RealFileSystem();
}
