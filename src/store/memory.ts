/**
 * In-memory FileStore
 *
 * Behaves like an object store: files live under flat absolute keys and
 * directories exist implicitly as key prefixes (or explicitly after makeDirs).
 */

import { posix } from 'node:path';
import { normalizePath } from '../core/paths.js';
import { notFoundError } from './errors.js';
import type { FileStore, OpenReadOptions } from './types.js';

const DEFAULT_CHUNK_SIZE = 8192;

export class MemoryFileStore implements FileStore {
  readonly name = 'memory';

  private readonly files = new Map<string, Uint8Array>();
  private readonly dirs = new Set<string>(['/']);

  /**
   * Create a store pre-populated with text files
   */
  static from(files: Record<string, string>): MemoryFileStore {
    const store = new MemoryFileStore();
    for (const [path, content] of Object.entries(files)) {
      store.put(path, Buffer.from(content, 'utf-8'));
    }
    return store;
  }

  resolve(path: string): string {
    const normalized = normalizePath(path);
    const absolute = posix.normalize(normalized.startsWith('/') ? normalized : `/${normalized}`);
    return absolute.length > 1 ? absolute.replace(/\/+$/, '') : absolute;
  }

  async *openRead(path: string, options: OpenReadOptions = {}): AsyncIterable<Uint8Array> {
    const data = this.get(path);
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    for (let offset = 0; offset < data.length; offset += chunkSize) {
      yield data.subarray(offset, offset + chunkSize);
    }
  }

  async readFile(path: string): Promise<Uint8Array> {
    return Uint8Array.from(this.get(path));
  }

  async writeFile(path: string, data: string | Uint8Array): Promise<void> {
    this.put(path, typeof data === 'string' ? Buffer.from(data, 'utf-8') : Uint8Array.from(data));
  }

  async writeStream(path: string, chunks: AsyncIterable<Uint8Array>): Promise<void> {
    const parts: Uint8Array[] = [];
    for await (const chunk of chunks) {
      parts.push(chunk);
    }
    this.put(path, Buffer.concat(parts));
  }

  async exists(path: string): Promise<boolean> {
    return (await this.isFile(path)) || (await this.isDirectory(path));
  }

  async isFile(path: string): Promise<boolean> {
    return this.files.has(this.resolve(path));
  }

  async isDirectory(path: string): Promise<boolean> {
    const key = this.resolve(path);
    if (this.dirs.has(key)) return true;
    const prefix = `${key}/`;
    for (const filePath of this.files.keys()) {
      if (filePath.startsWith(prefix)) return true;
    }
    return false;
  }

  async remove(path: string): Promise<void> {
    if (!this.files.delete(this.resolve(path))) {
      throw notFoundError(path);
    }
  }

  async makeDirs(path: string): Promise<void> {
    let current = this.resolve(path);
    while (!this.dirs.has(current)) {
      this.dirs.add(current);
      current = posix.dirname(current);
    }
  }

  async listFiles(directory: string): Promise<string[]> {
    const key = this.resolve(directory);
    const prefix = key === '/' ? '/' : `${key}/`;
    return [...this.files.keys()].filter((filePath) => filePath.startsWith(prefix)).sort();
  }

  private get(path: string): Uint8Array {
    const data = this.files.get(this.resolve(path));
    if (!data) {
      throw notFoundError(path);
    }
    return data;
  }

  private put(path: string, data: Uint8Array): void {
    const key = this.resolve(path);
    this.files.set(key, data);
    let parent = posix.dirname(key);
    while (!this.dirs.has(parent)) {
      this.dirs.add(parent);
      parent = posix.dirname(parent);
    }
  }
}
