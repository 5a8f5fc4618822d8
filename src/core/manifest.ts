/**
 * Content-addressed directory manifests
 *
 * A Manifest maps paths relative to a root directory to content digests. It is
 * persisted as a JSON object at its location, which does not have to be inside
 * the root it tracks.
 *
 * Loading never fails on bad data: a missing, empty or malformed file yields
 * an empty manifest, and `loadStatus` records which case applied.
 */

import { DEFAULT_SETTINGS, type ManifestlySettings } from '../config/settings.js';
import { isNotFoundError } from '../store/errors.js';
import { LocalFileStore } from '../store/local.js';
import type { FileStore } from '../store/types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { diffManifests, emptyDiff, setEntry, type EntrySource } from './differ.js';
import { UnsupportedAlgorithmError } from './errors.js';
import { hashFile, isSupportedAlgorithm } from './hasher.js';
import { ManifestIgnore } from './ignore.js';
import { baseName, joinPath, resolveManifestRoot, toRelativeKey } from './paths.js';
import type { DiffResult, LoadStatus, ManifestEntries } from './types.js';

// =============================================================================
// Options
// =============================================================================

/**
 * Collaborators shared by every manifest operation
 */
export interface ManifestContext {
  /** Resolved settings (defaults when omitted) */
  settings?: ManifestlySettings;
  /** Store holding both the manifest file and the tracked tree */
  store?: FileStore;
  /** Logger for diagnostics */
  logger?: Logger;
}

export interface ManifestOpenOptions extends ManifestContext {
  /** Directory the manifest tracks (defaults to the manifest file's directory) */
  root?: string;
  /** Ignore rules (defaults to the root's ignore file) */
  ignore?: ManifestIgnore;
  /** Digest algorithm used by refresh/changed (defaults to settings.hashAlgorithm) */
  algorithm?: string;
}

export interface GenerateOptions extends ManifestContext {
  /** Where to write the generated manifest */
  output?: string;
  /** Directory keys are relative to (defaults to the scanned directory) */
  rootPath?: string;
  /** Digest algorithm (defaults to settings.hashAlgorithm) */
  algorithm?: string;
  /** Ignore rules (defaults to the scanned directory's ignore file) */
  ignore?: ManifestIgnore;
}

/**
 * A Manifest or the location of one
 */
export type ManifestInput = Manifest | string;

interface ManifestInit {
  location: string;
  root: string;
  explicitRoot: boolean;
  entries: ManifestEntries;
  ignore: ManifestIgnore | null;
  algorithm: string;
  settings: ManifestlySettings;
  store: FileStore;
  logger: Logger;
}

// =============================================================================
// Serialization helpers
// =============================================================================

/**
 * Copy entries with keys in sorted order
 */
export function sortEntries(entries: Readonly<ManifestEntries>): ManifestEntries {
  const sorted: ManifestEntries = {};
  for (const key of Object.keys(entries).sort()) {
    setEntry(sorted, key, entries[key]);
  }
  return sorted;
}

/**
 * Serialize entries as the manifest file format (sorted keys, 2-space indent)
 */
export function serializeEntries(entries: Readonly<ManifestEntries>): string {
  return JSON.stringify(sortEntries(entries), null, 2);
}

/**
 * Check that a parsed value is an object of string digests
 */
export function isManifestEntries(value: unknown): value is ManifestEntries {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every((digest) => typeof digest === 'string');
}

/**
 * Default manifest location inside a directory
 */
export function defaultManifestLocation(
  directory: string,
  settings: Pick<ManifestlySettings, 'manifestName'> = DEFAULT_SETTINGS
): string {
  return joinPath(directory, settings.manifestName);
}

/**
 * Default ignore file location inside a directory
 */
export function defaultIgnoreLocation(
  directory: string,
  settings: Pick<ManifestlySettings, 'ignoreName'> = DEFAULT_SETTINGS
): string {
  return joinPath(directory, settings.ignoreName);
}

// =============================================================================
// Manifest
// =============================================================================

export class Manifest implements EntrySource {
  private _entries: ManifestEntries;
  private _location: string;
  private _root: string;
  private _loadStatus: LoadStatus | null = null;
  private ignore: ManifestIgnore | null;
  private readonly explicitRoot: boolean;

  readonly algorithm: string;
  readonly settings: ManifestlySettings;
  readonly store: FileStore;
  readonly logger: Logger;

  private constructor(init: ManifestInit) {
    this._location = init.location;
    this._root = init.root;
    this.explicitRoot = init.explicitRoot;
    this._entries = init.entries;
    this.ignore = init.ignore;
    this.algorithm = init.algorithm;
    this.settings = init.settings;
    this.store = init.store;
    this.logger = init.logger;
  }

  /**
   * Open the manifest stored at `location` and load it.
   *
   * `location` may also be a directory, in which case the manifest is
   * `<location>/<manifestName>` and the directory becomes the root.
   */
  static async open(location: string, options: ManifestOpenOptions = {}): Promise<Manifest> {
    const settings = options.settings ?? DEFAULT_SETTINGS;
    const store = options.store ?? new LocalFileStore();
    const resolvedLocation = store.resolve(location);

    const manifest = new Manifest({
      location: resolvedLocation,
      root: options.root ? store.resolve(options.root) : resolveManifestRoot(resolvedLocation),
      explicitRoot: options.root !== undefined,
      entries: {},
      ignore: options.ignore ?? null,
      algorithm: options.algorithm ?? settings.hashAlgorithm,
      settings,
      store,
      logger: options.logger ?? defaultLogger,
    });
    await manifest.load();
    return manifest;
  }

  /**
   * Walk `directory`, hash every file that is not ignored and build a manifest.
   * With `output`, the manifest is written there before it is returned.
   */
  static async generate(directory: string, options: GenerateOptions = {}): Promise<Manifest> {
    const settings = options.settings ?? DEFAULT_SETTINGS;
    const store = options.store ?? new LocalFileStore();
    const log = options.logger ?? defaultLogger;
    const algorithm = options.algorithm ?? settings.hashAlgorithm;

    if (!isSupportedAlgorithm(algorithm)) {
      throw new UnsupportedAlgorithmError(algorithm);
    }

    const scanDir = store.resolve(directory);
    const root = options.rootPath ? store.resolve(options.rootPath) : scanDir;
    const output = options.output ? store.resolve(options.output) : undefined;

    const ignore =
      options.ignore ?? (await ManifestIgnore.load(store, defaultIgnoreLocation(scanDir, settings), settings));
    ignore.addIgnorePattern(settings.manifestName);
    if (output) {
      ignore.addIgnorePattern(baseName(output));
    }

    log.debug('Generating manifest', { directory: scanDir, root, algorithm, store: store.name });

    const entries: ManifestEntries = {};
    for (const file of await store.listFiles(scanDir)) {
      const key = toRelativeKey(root, file);
      if (ignore.shouldIgnore(key)) {
        log.debug(`Ignoring ${key}`);
        continue;
      }
      setEntry(entries, key, await hashFile(store, file, { algorithm, chunkSize: settings.chunkSize }));
    }

    const sorted = sortEntries(entries);
    if (output) {
      await store.writeFile(output, serializeEntries(sorted));
      log.debug(`Manifest written to ${output}`, { entries: Object.keys(sorted).length });
    }

    return new Manifest({
      location: output ?? defaultManifestLocation(scanDir, settings),
      root,
      explicitRoot: true,
      entries: sorted,
      ignore,
      algorithm,
      settings,
      store,
      logger: log,
    });
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  /** Where the manifest is persisted */
  get location(): string {
    return this._location;
  }

  /** Directory the manifest tracks */
  get root(): string {
    return this._root;
  }

  /** Outcome of the last load(), or null if never loaded */
  get loadStatus(): LoadStatus | null {
    return this._loadStatus;
  }

  /** A copy of the path → digest mapping */
  get entries(): Readonly<ManifestEntries> {
    return { ...this._entries };
  }

  get size(): number {
    return Object.keys(this._entries).length;
  }

  has(path: string): boolean {
    return Object.hasOwn(this._entries, path);
  }

  get(path: string): string | undefined {
    return this.has(path) ? this._entries[path] : undefined;
  }

  keys(): string[] {
    return Object.keys(this._entries);
  }

  values(): string[] {
    return Object.values(this._entries);
  }

  /**
   * Manifests are equal when their mappings are; root and location do not count
   */
  equals(other: unknown): boolean {
    if (!(other instanceof Manifest)) {
      return false;
    }
    const mine = this.keys();
    if (mine.length !== other.size) {
      return false;
    }
    return mine.every((key) => other.get(key) === this._entries[key]);
  }

  toJSON(): ManifestEntries {
    return sortEntries(this._entries);
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  /**
   * Read the manifest from its location, replacing the in-memory mapping
   */
  async load(): Promise<LoadStatus> {
    if (await this.store.isDirectory(this._location)) {
      if (!this.explicitRoot) {
        this._root = this._location;
      }
      this._location = defaultManifestLocation(this._location, this.settings);
      return this.load();
    }

    let content: string;
    try {
      content = Buffer.from(await this.store.readFile(this._location)).toString('utf-8');
    } catch (err) {
      if (!isNotFoundError(err)) throw err;
      this._entries = {};
      await this.save();
      this.logger.debug(`Created empty manifest at ${this._location}`);
      return this.setLoadStatus('created');
    }

    if (content.trim() === '') {
      this._entries = {};
      return this.setLoadStatus('empty');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      this.logger.warn(`Manifest at ${this._location} is not valid JSON; treating it as empty`, {
        reason: err instanceof Error ? err.message : String(err),
      });
      this._entries = {};
      return this.setLoadStatus('malformed');
    }

    if (!isManifestEntries(parsed)) {
      this.logger.warn(`Manifest at ${this._location} is not a path → digest object; treating it as empty`);
      this._entries = {};
      return this.setLoadStatus('malformed');
    }

    this._entries = { ...parsed };
    return this.setLoadStatus('loaded');
  }

  /**
   * Write the manifest to its location, creating parent directories
   */
  async save(): Promise<void> {
    await this.store.writeFile(this._location, serializeEntries(this._entries));
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  /**
   * Regenerate the whole manifest from the root and persist it
   */
  async refresh(): Promise<void> {
    const regenerated = await Manifest.generate(this._root, {
      output: this._location,
      rootPath: this._root,
      ignore: await this.ignoreRules(),
      algorithm: this.algorithm,
      settings: this.settings,
      store: this.store,
      logger: this.logger,
    });
    this._entries = { ...regenerated.entries };
  }

  /**
   * Compare the persisted manifest with the live tree under the root.
   *
   * Digests in `added` and `changed` are the live ones, digests in `removed`
   * are the recorded ones. Reloads the manifest first.
   */
  async changed(): Promise<DiffResult> {
    await this.load();
    const ignore = await this.ignoreRules();
    const hashOptions = { algorithm: this.algorithm, chunkSize: this.settings.chunkSize };
    const result = emptyDiff();

    // Live files by key; keys are normalized, the paths are as found on disk
    const live = new Map<string, string>();
    for (const file of await this.store.listFiles(this._root)) {
      live.set(toRelativeKey(this._root, file), file);
    }

    for (const [key, digest] of Object.entries(this._entries)) {
      const filePath = live.get(key);
      if (filePath === undefined) {
        setEntry(result.removed, key, digest);
        continue;
      }
      const current = await hashFile(this.store, filePath, hashOptions);
      if (current !== digest) {
        setEntry(result.changed, key, current);
      }
    }

    for (const [key, filePath] of live) {
      if (ignore.shouldIgnore(key) || this.has(key)) {
        continue;
      }
      setEntry(result.added, key, await hashFile(this.store, filePath, hashOptions));
    }

    return result;
  }

  /**
   * Diff this manifest (as source) against a target manifest
   */
  diff(target: EntrySource): DiffResult {
    return diffManifests(this, target);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * Ignore rules for this manifest, loaded once from the root's ignore file.
   * The manifest's own filename is always excluded.
   */
  private async ignoreRules(): Promise<ManifestIgnore> {
    if (!this.ignore) {
      this.ignore = await ManifestIgnore.load(
        this.store,
        defaultIgnoreLocation(this._root, this.settings),
        this.settings
      );
    }
    this.ignore.addIgnorePattern(baseName(this._location));
    return this.ignore;
  }

  private setLoadStatus(status: LoadStatus): LoadStatus {
    this._loadStatus = status;
    return status;
  }
}

// =============================================================================
// Input resolution
// =============================================================================

/**
 * Turn a Manifest or a manifest location into a Manifest
 */
export async function resolveManifest(
  input: ManifestInput,
  options: ManifestOpenOptions = {}
): Promise<Manifest> {
  if (input instanceof Manifest) {
    return input;
  }
  return Manifest.open(input, options);
}
