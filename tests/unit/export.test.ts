/**
 * Tests for JSON patches and zip patch archives
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import JSZip from 'jszip';
import { writePatch, writePatchArchive, serializeDiff, DIFF_MEMBER_NAME } from '../../src/core/export.js';
import { ArchiveAssemblyError } from '../../src/core/errors.js';
import { Manifest } from '../../src/core/manifest.js';
import { MemoryFileStore } from '../../src/store/memory.js';
import {
  createTempDir,
  cleanupTempDir,
  writeTree,
  readText,
  sha256,
  createSilentLogger,
} from '../helpers/fs.js';

const logger = createSilentLogger();

describe('patch export', () => {
  let sourceDir: string;
  let targetDir: string;
  let outDir: string;
  let sourceManifest: string;
  let targetManifest: string;

  beforeEach(async () => {
    sourceDir = createTempDir();
    targetDir = createTempDir();
    outDir = createTempDir();
    sourceManifest = join(sourceDir, '.manifestly.json');
    targetManifest = join(targetDir, '.manifestly.json');

    writeTree(sourceDir, { 'a.txt': 'hi', 'sub/b.txt': 'new b', 'same.txt': 'same' });
    writeTree(targetDir, { 'sub/b.txt': 'old b', 'same.txt': 'same', 'gone.txt': 'gone' });
    await Manifest.generate(sourceDir, { output: sourceManifest, logger });
    await Manifest.generate(targetDir, { output: targetManifest, logger });
  });

  afterEach(() => {
    cleanupTempDir(sourceDir);
    cleanupTempDir(targetDir);
    cleanupTempDir(outDir);
  });

  describe('writePatch', () => {
    it('should write the diff as indented JSON and return it', async () => {
      const output = join(outDir, 'patch.json');

      const diff = await writePatch(sourceManifest, targetManifest, output, { logger });

      expect(diff).toEqual({
        added: { 'a.txt': sha256('hi') },
        removed: { 'gone.txt': sha256('gone') },
        changed: { 'sub/b.txt': sha256('new b') },
      });
      expect(readText(output)).toBe(serializeDiff(diff));
      expect(JSON.parse(readText(output))).toEqual(diff);
    });

    it('should write an empty diff for identical manifests', async () => {
      const output = join(outDir, 'patch.json');

      await writePatch(sourceManifest, sourceManifest, output, { logger });

      expect(readText(output)).toBe(
        '{\n  "added": {},\n  "removed": {},\n  "changed": {}\n}'
      );
    });
  });

  describe('writePatchArchive', () => {
    it('should hold every added and changed file plus the diff', async () => {
      const output = join(outDir, 'patch.zip');

      const diff = await writePatchArchive(sourceManifest, targetManifest, output, { logger });
      const zip = await JSZip.loadAsync(readFileSync(output));

      const members = Object.values(zip.files)
        .filter((entry) => !entry.dir)
        .map((entry) => entry.name)
        .sort();
      expect(members).toEqual([DIFF_MEMBER_NAME, 'a.txt', 'sub/b.txt']);
      expect(await zip.file('a.txt')?.async('string')).toBe('hi');
      expect(await zip.file('sub/b.txt')?.async('string')).toBe('new b');
      expect(await zip.file(DIFF_MEMBER_NAME)?.async('string')).toBe(serializeDiff(diff));
    });

    it('should fail and write nothing when a listed file is missing', async () => {
      rmSync(join(sourceDir, 'a.txt'));
      const output = join(outDir, 'patch.zip');

      await expect(
        writePatchArchive(sourceManifest, targetManifest, output, { logger })
      ).rejects.toBeInstanceOf(ArchiveAssemblyError);
      expect(existsSync(output)).toBe(false);
    });

    it('should name the missing file in the error', async () => {
      rmSync(join(sourceDir, 'sub', 'b.txt'));

      await expect(
        writePatchArchive(sourceManifest, targetManifest, join(outDir, 'patch.zip'), { logger })
      ).rejects.toMatchObject({ code: 'ARCHIVE_ASSEMBLY_FAILED', path: 'sub/b.txt' });
    });
  });
});

describe('patch export with the in-memory store', () => {
  it('should write the archive through the store', async () => {
    const store = MemoryFileStore.from({ '/src/a.txt': 'hi' });
    const source = await Manifest.generate('/src', { store, logger });
    const target = await Manifest.open('/dst/.manifestly.json', { store, logger });

    await writePatchArchive(source, target, '/out/patch.zip', { store, logger });
    const zip = await JSZip.loadAsync(await store.readFile('/out/patch.zip'));

    expect(await zip.file('a.txt')?.async('string')).toBe('hi');
  });
});
