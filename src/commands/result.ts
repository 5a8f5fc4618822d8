/**
 * Helpers shared by command handlers
 */

import { ManifestlyError } from '../core/errors.js';
import type { CommandResult } from '../types.js';

/**
 * Turn a thrown error into a failed command result
 */
export function commandFailure(err: unknown): CommandResult<never> {
  if (err instanceof ManifestlyError) {
    return {
      success: false,
      message: err.message,
      errors: err.suggestion ? [err.suggestion] : undefined,
    };
  }
  return {
    success: false,
    message: err instanceof Error ? err.message : String(err),
  };
}
