/**
 * Tests for command handlers
 *
 * Commands run against the in-memory store with JSON output, so they print
 * nothing and only their CommandResult is checked.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import chalk from 'chalk';
import JSZip from 'jszip';
import {
  generateCommand,
  changedCommand,
  refreshCommand,
  syncCommand,
  compareCommand,
  patchCommand,
  pzipCommand,
  commandFailure,
} from '../../src/commands/index.js';
import { DEFAULT_SETTINGS } from '../../src/config/settings.js';
import { ManifestlyError } from '../../src/core/errors.js';
import { MemoryFileStore } from '../../src/store/memory.js';
import type { CommandContext, OutputFormat } from '../../src/types.js';
import { createSilentLogger, sha256 } from '../helpers/fs.js';

function createContext(store: MemoryFileStore, outputFormat: OutputFormat = 'json'): CommandContext {
  return {
    options: { json: outputFormat === 'json', verbose: false },
    outputFormat,
    settings: { ...DEFAULT_SETTINGS },
    store,
    logger: createSilentLogger(),
  };
}

async function readText(store: MemoryFileStore, path: string): Promise<string> {
  return Buffer.from(await store.readFile(path)).toString('utf-8');
}

describe('generateCommand', () => {
  it('should write the manifest next to the directory by default', async () => {
    const store = MemoryFileStore.from({ '/proj/a.txt': 'hi' });

    const result = await generateCommand(createContext(store), { directory: '/proj' });

    expect(result).toEqual({
      success: true,
      message: 'Manifest saved to /proj/.manifestly.json',
      data: { location: '/proj/.manifestly.json', root: '/proj', algorithm: 'sha256', files: 1 },
    });
    expect(JSON.parse(await readText(store, '/proj/.manifestly.json'))).toEqual({
      'a.txt': sha256('hi'),
    });
  });

  it('should honour --output-file and --hash-algorithm', async () => {
    const store = MemoryFileStore.from({ '/proj/a.txt': 'hi' });

    const result = await generateCommand(createContext(store), {
      directory: '/proj',
      outputFile: '/manifests/proj.json',
      hashAlgorithm: 'md5',
    });

    expect(result.message).toBe('Manifest saved to /manifests/proj.json');
    expect(await readText(store, '/manifests/proj.json')).toBe(
      '{\n  "a.txt": "49f68a5c8493ec2c0bf489821c21fc3b"\n}'
    );
  });

  it('should fail with the error message and suggestion', async () => {
    const store = MemoryFileStore.from({ '/proj/a.txt': 'hi' });

    const result = await generateCommand(createContext(store), {
      directory: '/proj',
      hashAlgorithm: 'rot13',
    });

    expect(result.success).toBe(false);
    expect(result.message).toBe('Unsupported hash algorithm: rot13');
    expect(result.errors).toEqual([
      'Use an algorithm listed by crypto.getHashes(), e.g. sha256, sha512 or md5',
    ]);
  });

  it('should print the saved location in human mode', async () => {
    const store = MemoryFileStore.from({ '/proj/a.txt': 'hi' });
    const level = chalk.level;
    chalk.level = 0;
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    try {
      await generateCommand(createContext(store, 'human'), { directory: '/proj' });

      expect(logSpy).toHaveBeenCalledWith('✓', 'Manifest saved to /proj/.manifestly.json');
    } finally {
      logSpy.mockRestore();
      chalk.level = level;
    }
  });
});

describe('changedCommand / refreshCommand', () => {
  let store: MemoryFileStore;

  beforeEach(async () => {
    store = MemoryFileStore.from({ '/proj/a.txt': 'hi' });
    await generateCommand(createContext(store), { directory: '/proj' });
  });

  it('should report an untouched tree', async () => {
    const result = await changedCommand(createContext(store), { manifest: '/proj/.manifestly.json' });

    expect(result.message).toBe('No files have changed');
    expect(result.data).toEqual({ added: {}, removed: {}, changed: {} });
  });

  it('should list changed files', async () => {
    await store.writeFile('/proj/a.txt', 'edited');
    await store.writeFile('/proj/b.txt', 'bye');

    const result = await changedCommand(createContext(store), { manifest: '/proj/.manifestly.json' });

    expect(result.message).toBe('Changed files:');
    expect(result.data).toEqual({
      added: { 'b.txt': sha256('bye') },
      removed: {},
      changed: { 'a.txt': sha256('edited') },
    });
  });

  it('should refresh the manifest', async () => {
    await store.writeFile('/proj/b.txt', 'bye');

    const result = await refreshCommand(createContext(store), { manifest: '/proj/.manifestly.json' });

    expect(result).toEqual({
      success: true,
      message: 'Manifest refreshed',
      data: { location: '/proj/.manifestly.json', root: '/proj', files: 2 },
    });
  });

  it('should check a separate root', async () => {
    await store.writeFile('/elsewhere/a.txt', 'hi');

    const result = await changedCommand(createContext(store), {
      manifest: '/proj/.manifestly.json',
      root: '/elsewhere',
    });

    expect(result.message).toBe('No files have changed');
  });
});

describe('syncCommand', () => {
  let store: MemoryFileStore;

  beforeEach(async () => {
    store = MemoryFileStore.from({
      '/src/a.txt': 'hi',
      '/dst/old.txt': 'old',
    });
    await generateCommand(createContext(store), { directory: '/src' });
    await generateCommand(createContext(store), { directory: '/dst' });
  });

  it('should plan without changing anything on a dry run', async () => {
    const result = await syncCommand(createContext(store), {
      source: '/src/.manifestly.json',
      target: '/dst/.manifestly.json',
      dryRun: true,
    });

    expect(result.message).toBe('Dry run completed for /src to /dst');
    expect(result.data?.actions.map((action) => `${action.type} ${action.path}`)).toEqual([
      'copy a.txt',
      'delete old.txt',
    ]);
    expect(await store.listFiles('/dst')).toEqual(['/dst/.manifestly.json', '/dst/old.txt']);
  });

  it('should sync the target', async () => {
    const result = await syncCommand(createContext(store), {
      source: '/src/.manifestly.json',
      target: '/dst/.manifestly.json',
    });

    expect(result.success).toBe(true);
    expect(result.message).toBe('Synced /src with /dst');
    expect(await store.listFiles('/dst')).toEqual(['/dst/.manifestly.json', '/dst/a.txt']);
  });

  it('should refresh the source manifest first when asked', async () => {
    await store.writeFile('/src/late.txt', 'late');

    await syncCommand(createContext(store), {
      source: '/src/.manifestly.json',
      target: '/dst/.manifestly.json',
      refresh: true,
    });

    expect(await store.isFile('/dst/late.txt')).toBe(true);
  });

  it('should use explicit source and target directories', async () => {
    await store.writeFile('/manifests/src.json', JSON.stringify({ 'a.txt': sha256('hi') }));
    await store.writeFile('/manifests/dst.json', '{}');

    const result = await syncCommand(createContext(store), {
      source: '/manifests/src.json',
      target: '/manifests/dst.json',
      sourceDirectory: '/src',
      targetDirectory: '/copy',
    });

    expect(result.message).toBe('Synced /src with /copy');
    expect(await readText(store, '/copy/a.txt')).toBe('hi');
  });
});

describe('compareCommand / patchCommand / pzipCommand', () => {
  let store: MemoryFileStore;

  beforeEach(async () => {
    store = MemoryFileStore.from({
      '/v1/a.txt': 'one',
      '/v2/a.txt': 'two',
      '/v2/b.txt': 'b',
    });
    await generateCommand(createContext(store), { directory: '/v1' });
    await generateCommand(createContext(store), { directory: '/v2' });
  });

  it('should compare two manifests', async () => {
    const result = await compareCommand(createContext(store), {
      source: '/v2/.manifestly.json',
      target: '/v1/.manifestly.json',
    });

    expect(result.message).toBe('Manifests differ');
    expect(result.data).toEqual({
      added: { 'b.txt': sha256('b') },
      removed: {},
      changed: { 'a.txt': sha256('two') },
    });
  });

  it('should report identical manifests', async () => {
    const result = await compareCommand(createContext(store), {
      source: '/v1/.manifestly.json',
      target: '/v1/.manifestly.json',
    });

    expect(result.message).toBe('Manifests are identical');
  });

  it('should write a patch file', async () => {
    const result = await patchCommand(createContext(store), {
      source: '/v2/.manifestly.json',
      target: '/v1/.manifestly.json',
      output: '/out/patch.json',
    });

    expect(result.message).toBe('Patch saved to /out/patch.json');
    expect(JSON.parse(await readText(store, '/out/patch.json'))).toEqual(result.data);
  });

  it('should write a zip file', async () => {
    const result = await pzipCommand(createContext(store), {
      source: '/v2/.manifestly.json',
      target: '/v1/.manifestly.json',
      output: '/out/patch.zip',
    });

    const zip = await JSZip.loadAsync(await store.readFile('/out/patch.zip'));
    expect(result.message).toBe('Zip file saved to /out/patch.zip');
    expect(await zip.file('b.txt')?.async('string')).toBe('b');
  });

  it('should fail when a changed file is gone', async () => {
    await store.remove('/v2/b.txt');

    const result = await pzipCommand(createContext(store), {
      source: '/v2/.manifestly.json',
      target: '/v1/.manifestly.json',
      output: '/out/patch.zip',
    });

    expect(result.success).toBe(false);
    expect(result.message).toContain('Cannot add b.txt to patch archive');
    expect(await store.exists('/out/patch.zip')).toBe(false);
  });
});

describe('commandFailure', () => {
  it('should keep plain error messages', () => {
    expect(commandFailure(new Error('boom'))).toEqual({ success: false, message: 'boom' });
    expect(commandFailure('text')).toEqual({ success: false, message: 'text' });
  });

  it('should carry the suggestion of manifest errors', () => {
    const err = new ManifestlyError('bad', 'INVALID_SETTINGS', 'fix it');

    expect(commandFailure(err)).toEqual({ success: false, message: 'bad', errors: ['fix it'] });
  });
});
