/**
 * Command exports
 */

export { generateCommand, type GenerateCommandOptions, type GenerateCommandData } from './generate.js';
export { changedCommand, type ChangedCommandOptions } from './changed.js';
export { refreshCommand, type RefreshCommandOptions, type RefreshCommandData } from './refresh.js';
export { syncCommand, type SyncCommandOptions, type SyncCommandData } from './sync.js';
export { compareCommand, type CompareCommandOptions } from './compare.js';
export { patchCommand, type PatchCommandOptions } from './patch.js';
export { pzipCommand, type PzipCommandOptions } from './pzip.js';
export { commandFailure } from './result.js';
