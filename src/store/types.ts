/**
 * Storage abstraction used by the manifest core
 *
 * Paths are plain strings with forward slashes. A store may be a local disk or
 * a flat key space such as an object store; the core never touches node:fs
 * directly.
 */

/**
 * Options for opening a path as a byte stream
 */
export interface OpenReadOptions {
  /** Size of each yielded chunk in bytes */
  chunkSize?: number;
}

/**
 * Path-addressable byte-stream store
 */
export interface FileStore {
  /** Short name for log output ("local", "memory", ...) */
  readonly name: string;

  /** Make a path absolute and normalize it to forward slashes */
  resolve(path: string): string;

  /** Open a file for reading as a sequence of chunks */
  openRead(path: string, options?: OpenReadOptions): AsyncIterable<Uint8Array>;

  /** Read a whole file */
  readFile(path: string): Promise<Uint8Array>;

  /** Write a whole file, creating parent directories on demand */
  writeFile(path: string, data: string | Uint8Array): Promise<void>;

  /** Write a file from a chunk stream, creating parent directories on demand */
  writeStream(path: string, chunks: AsyncIterable<Uint8Array>): Promise<void>;

  exists(path: string): Promise<boolean>;
  isFile(path: string): Promise<boolean>;
  isDirectory(path: string): Promise<boolean>;

  /** Delete a file */
  remove(path: string): Promise<void>;

  /** Create a directory and its parents; no-op when it exists */
  makeDirs(path: string): Promise<void>;

  /** List every file below a directory, recursively, sorted */
  listFiles(directory: string): Promise<string[]>;
}
