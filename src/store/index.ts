/**
 * Store module exports
 */

export type { FileStore, OpenReadOptions } from './types.js';
export { LocalFileStore } from './local.js';
export { isNotFoundError, notFoundError } from './errors.js';
export { MemoryFileStore } from './memory.js';
