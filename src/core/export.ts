/**
 * Patch artifacts: a JSON diff document, or a zip holding the changed files
 * together with the diff.
 */

import JSZip from 'jszip';
import { LocalFileStore } from '../store/local.js';
import type { FileStore } from '../store/types.js';
import { diffManifests } from './differ.js';
import { ArchiveAssemblyError } from './errors.js';
import { resolveManifest, type ManifestInput, type ManifestOpenOptions } from './manifest.js';
import { joinPath } from './paths.js';
import type { DiffResult } from './types.js';

/**
 * Archive member holding the diff document
 */
export const DIFF_MEMBER_NAME = '.manifestly.diff';

export type ExportOptions = Pick<ManifestOpenOptions, 'settings' | 'store' | 'logger'>;

/**
 * Serialize a diff the way patch files store it
 */
export function serializeDiff(diff: DiffResult): string {
  return JSON.stringify(diff, null, 2);
}

/**
 * Write the source → target diff as a JSON document
 */
export async function writePatch(
  sourceInput: ManifestInput,
  targetInput: ManifestInput,
  output: string,
  options: ExportOptions = {}
): Promise<DiffResult> {
  const source = await resolveManifest(sourceInput, options);
  const target = await resolveManifest(targetInput, options);
  const diff = diffManifests(source, target);

  const store: FileStore = options.store ?? new LocalFileStore();
  await store.writeFile(store.resolve(output), serializeDiff(diff));
  return diff;
}

/**
 * Write a zip holding every added and changed source file under its manifest
 * key, plus the diff as `.manifestly.diff`.
 *
 * @throws ArchiveAssemblyError when a listed source file cannot be read; no
 *   archive is written in that case
 */
export async function writePatchArchive(
  sourceInput: ManifestInput,
  targetInput: ManifestInput,
  output: string,
  options: ExportOptions = {}
): Promise<DiffResult> {
  const source = await resolveManifest(sourceInput, options);
  const target = await resolveManifest(targetInput, options);
  const diff = diffManifests(source, target);

  const zip = new JSZip();
  for (const path of [...Object.keys(diff.added), ...Object.keys(diff.changed)]) {
    let data: Uint8Array;
    try {
      data = await source.store.readFile(joinPath(source.root, path));
    } catch (err) {
      throw new ArchiveAssemblyError(path, err);
    }
    zip.file(path, data);
  }
  zip.file(DIFF_MEMBER_NAME, serializeDiff(diff));

  const archive = await zip.generateAsync({
    type: 'uint8array',
    compression: 'DEFLATE',
  });

  const store: FileStore = options.store ?? new LocalFileStore();
  await store.writeFile(store.resolve(output), archive);
  return diff;
}
