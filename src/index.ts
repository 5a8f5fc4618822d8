/**
 * manifestly library entry point
 *
 * The CLI lives in cli.ts; everything here can be used programmatically.
 */

import { VERSION } from './version.js';

export * from './core/index.js';
export * from './store/index.js';
export * from './config/index.js';
export { Logger, createLogger, logger, type LogLevel, type LogEntry, type LoggerConfig } from './utils/logger.js';

/**
 * Get the library version
 */
export function getVersion(): string {
  return VERSION;
}
