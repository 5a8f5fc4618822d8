/**
 * Error types for manifest generation, sync and export
 *
 * Every error carries a machine-readable code and an optional suggestion that
 * the CLI prints below the message.
 */

// =============================================================================
// Error Codes
// =============================================================================

export type ManifestlyErrorCode =
  | 'UNSUPPORTED_ALGORITHM'
  | 'INVALID_SETTINGS'
  | 'PATH_OUTSIDE_ROOT'
  | 'ARCHIVE_ASSEMBLY_FAILED'
  | 'SYNC_WRITE_FAILED';

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base class for all errors raised by manifestly
 */
export class ManifestlyError extends Error {
  constructor(
    message: string,
    public readonly code: ManifestlyErrorCode,
    public readonly suggestion?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ManifestlyError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

// =============================================================================
// Specific Errors
// =============================================================================

/**
 * Raised when a digest algorithm name is not available on this platform
 */
export class UnsupportedAlgorithmError extends ManifestlyError {
  constructor(public readonly algorithm: string) {
    super(
      `Unsupported hash algorithm: ${algorithm}`,
      'UNSUPPORTED_ALGORITHM',
      'Use an algorithm listed by crypto.getHashes(), e.g. sha256, sha512 or md5'
    );
    this.name = 'UnsupportedAlgorithmError';
  }
}

/**
 * Raised when a resolved setting has an unusable value
 */
export class SettingsError extends ManifestlyError {
  constructor(
    public readonly setting: string,
    public readonly value: unknown,
    reason: string
  ) {
    super(
      `Invalid value for ${setting}: ${String(value)} (${reason})`,
      'INVALID_SETTINGS',
      `Check the ${setting} flag, environment variable or settings file`
    );
    this.name = 'SettingsError';
  }
}

/**
 * Raised when a walked file does not live under the manifest root
 */
export class PathOutsideRootError extends ManifestlyError {
  constructor(
    public readonly path: string,
    public readonly root: string
  ) {
    super(
      `File ${path} is not inside root ${root}`,
      'PATH_OUTSIDE_ROOT',
      'Pass a root directory that contains the scanned directory'
    );
    this.name = 'PathOutsideRootError';
  }
}

/**
 * Raised when a file listed in a diff cannot be read while building a patch archive
 */
export class ArchiveAssemblyError extends ManifestlyError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(
      `Cannot add ${path} to patch archive: ${cause instanceof Error ? cause.message : String(cause)}`,
      'ARCHIVE_ASSEMBLY_FAILED',
      'Refresh the source manifest so it matches the files on disk, then retry',
      { cause }
    );
    this.name = 'ArchiveAssemblyError';
  }
}

/**
 * Raised when the sync target cannot be written
 */
export class SyncWriteError extends ManifestlyError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(
      `Cannot write ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'SYNC_WRITE_FAILED',
      'Check that the target directory exists and is writable',
      { cause }
    );
    this.name = 'SyncWriteError';
  }
}
