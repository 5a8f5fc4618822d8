/**
 * Streaming content digests
 *
 * Knows nothing about manifests or paths beyond opening one through a store:
 * bytes in, lowercase hex digest out.
 */

import { createHash, getHashes, type Hash } from 'node:crypto';
import { UnsupportedAlgorithmError } from './errors.js';
import type { FileStore } from '../store/types.js';

export interface HashFileOptions {
  /** Digest algorithm name */
  algorithm: string;
  /** Bytes per read */
  chunkSize: number;
}

/**
 * Check whether the platform can compute a digest by this name (case-insensitive)
 */
export function isSupportedAlgorithm(algorithm: string): boolean {
  const wanted = algorithm.toLowerCase();
  return getHashes().some((name) => name.toLowerCase() === wanted);
}

/**
 * Create an incremental digest
 *
 * @throws UnsupportedAlgorithmError for unknown names
 */
export function createDigest(algorithm: string): Hash {
  if (!isSupportedAlgorithm(algorithm)) {
    throw new UnsupportedAlgorithmError(algorithm);
  }
  return createHash(algorithm.toLowerCase());
}

/**
 * Digest a chunk stream, consuming it to the end
 */
export async function hashStream(
  chunks: AsyncIterable<Uint8Array>,
  algorithm: string
): Promise<string> {
  const digest = createDigest(algorithm);
  for await (const chunk of chunks) {
    digest.update(chunk);
  }
  return digest.digest('hex');
}

/**
 * Digest a file read from a store in `chunkSize` pieces
 */
export async function hashFile(
  store: FileStore,
  path: string,
  options: HashFileOptions
): Promise<string> {
  // Fail on the algorithm before opening the file
  if (!isSupportedAlgorithm(options.algorithm)) {
    throw new UnsupportedAlgorithmError(options.algorithm);
  }
  return hashStream(store.openRead(path, { chunkSize: options.chunkSize }), options.algorithm);
}
