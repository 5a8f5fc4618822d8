/**
 * Local disk implementation of FileStore
 */

import { createReadStream, createWriteStream, type Dirent } from 'node:fs';
import { mkdir, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, posix, resolve, sep } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { isNotFoundError } from './errors.js';
import type { FileStore, OpenReadOptions } from './types.js';

/** Default read chunk size when the caller does not pass one */
const DEFAULT_CHUNK_SIZE = 8192;

/**
 * FileStore backed by node:fs
 */
export class LocalFileStore implements FileStore {
  readonly name = 'local';

  /**
   * Absolute path with the platform separator replaced by `/`. Backslashes
   * are only rewritten where they are the separator.
   */
  resolve(path: string): string {
    const absolute = resolve(path);
    return sep === '/' ? absolute : absolute.split(sep).join('/');
  }

  openRead(path: string, options: OpenReadOptions = {}): AsyncIterable<Uint8Array> {
    return createReadStream(path, {
      highWaterMark: options.chunkSize ?? DEFAULT_CHUNK_SIZE,
    });
  }

  async readFile(path: string): Promise<Uint8Array> {
    return readFile(path);
  }

  async writeFile(path: string, data: string | Uint8Array): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data);
  }

  async writeStream(path: string, chunks: AsyncIterable<Uint8Array>): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await pipeline(chunks, createWriteStream(path));
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (err) {
      if (isNotFoundError(err)) return false;
      throw err;
    }
  }

  async isFile(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isFile();
    } catch (err) {
      if (isNotFoundError(err)) return false;
      throw err;
    }
  }

  async isDirectory(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory();
    } catch (err) {
      if (isNotFoundError(err)) return false;
      throw err;
    }
  }

  async remove(path: string): Promise<void> {
    await rm(path);
  }

  async makeDirs(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }

  async listFiles(directory: string): Promise<string[]> {
    const files: string[] = [];
    await this.walk(this.resolve(directory), files);
    return files.sort();
  }

  /**
   * Recursively collect files. Symlinked files are followed, symlinked
   * directories are not. Paths are returned as found on disk; only manifest
   * keys are normalized.
   */
  private async walk(dirPath: string, files: string[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dirPath, { withFileTypes: true });
    } catch (err) {
      if (isNotFoundError(err)) return;
      throw err;
    }

    for (const entry of entries) {
      const entryPath = posix.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        await this.walk(entryPath, files);
      } else if (entry.isFile()) {
        files.push(entryPath);
      } else if (entry.isSymbolicLink() && (await this.isFile(entryPath))) {
        files.push(entryPath);
      }
    }
  }
}
