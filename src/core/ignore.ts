/**
 * Ignore patterns for manifest generation
 *
 * Patterns come from a per-directory ignore file (one glob per line). Unlike
 * .gitignore, a pattern is matched against every segment of the relative path
 * on its own: `build` excludes `build/out.txt`, `src/build/x.txt` and a file
 * named `build`, but not `buildings/x.txt`.
 */

import { Minimatch, type MinimatchOptions } from 'minimatch';
import { normalizePath } from './paths.js';
import { isNotFoundError } from '../store/errors.js';
import type { ManifestlySettings } from '../config/settings.js';
import type { FileStore } from '../store/types.js';

/**
 * Segment matching rules: `*` and `?` match dot files, no braces or extglobs,
 * `#` and `!` have no special meaning.
 */
const MATCH_OPTIONS: MinimatchOptions = {
  dot: true,
  nobrace: true,
  noext: true,
  nocomment: true,
  nonegate: true,
};

interface CompiledPattern {
  pattern: string;
  matcher: Minimatch;
}

export class ManifestIgnore {
  private readonly compiled: CompiledPattern[] = [];

  constructor(patterns: Iterable<string> = []) {
    for (const pattern of patterns) {
      this.addIgnorePattern(pattern);
    }
  }

  /**
   * Load patterns from an ignore file. The manifest and ignore filenames from
   * settings are always included; a missing file yields only those.
   */
  static async load(
    store: FileStore,
    ignoreFile: string,
    settings: Pick<ManifestlySettings, 'manifestName' | 'ignoreName'>
  ): Promise<ManifestIgnore> {
    const ignore = new ManifestIgnore([settings.manifestName, settings.ignoreName]);

    let content: string;
    try {
      content = Buffer.from(await store.readFile(ignoreFile)).toString('utf-8');
    } catch (err) {
      if (isNotFoundError(err)) return ignore;
      throw err;
    }

    for (const line of parseIgnoreFile(content)) {
      ignore.addIgnorePattern(line);
    }
    return ignore;
  }

  /**
   * Patterns in the order they were added
   */
  get patterns(): string[] {
    return this.compiled.map((entry) => entry.pattern);
  }

  /**
   * Add a pattern unless it is already present
   */
  addIgnorePattern(name: string): void {
    const pattern = normalizePath(name);
    if (this.compiled.some((entry) => entry.pattern === pattern)) {
      return;
    }
    this.compiled.push({
      pattern,
      matcher: new Minimatch(pattern.replace(/^\/+|\/+$/g, ''), MATCH_OPTIONS),
    });
  }

  /**
   * Check whether any segment of a relative path matches any pattern
   */
  shouldIgnore(relativePath: string): boolean {
    const segments = normalizePath(relativePath).split('/');
    return this.compiled.some(({ matcher }) =>
      segments.some((segment) => matcher.match(segment))
    );
  }
}

/**
 * Split ignore file content into patterns, skipping blank lines and `#` comments
 */
export function parseIgnoreFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '' && !line.startsWith('#'));
}
