/**
 * Tests for streaming digests
 */

import { describe, it, expect } from 'vitest';
import { hashFile, hashStream, isSupportedAlgorithm, createDigest } from '../../src/core/hasher.js';
import { UnsupportedAlgorithmError } from '../../src/core/errors.js';
import { MemoryFileStore } from '../../src/store/memory.js';

async function* chunksOf(...parts: string[]): AsyncIterable<Uint8Array> {
  for (const part of parts) {
    yield Buffer.from(part, 'utf-8');
  }
}

describe('hashStream', () => {
  it('should return the lowercase hex sha256 digest', async () => {
    const digest = await hashStream(chunksOf('hi'), 'sha256');

    expect(digest).toBe('8f434346648f6b96df89dda901c5176b10a6d83961dd3c1ac88b59b2dc327aa4');
  });

  it('should hash the empty stream', async () => {
    const digest = await hashStream(chunksOf(), 'sha256');

    expect(digest).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('should not depend on how the content is split', async () => {
    const whole = await hashStream(chunksOf('hello world'), 'sha256');
    const split = await hashStream(chunksOf('hel', 'lo w', 'orld'), 'sha256');

    expect(split).toBe(whole);
  });

  it('should honour other algorithms', async () => {
    expect(await hashStream(chunksOf('hi'), 'md5')).toBe('49f68a5c8493ec2c0bf489821c21fc3b');
  });

  it('should accept algorithm names in any case', async () => {
    expect(await hashStream(chunksOf('hi'), 'SHA256')).toBe(
      '8f434346648f6b96df89dda901c5176b10a6d83961dd3c1ac88b59b2dc327aa4'
    );
  });

  it('should reject unknown algorithms', async () => {
    await expect(hashStream(chunksOf('hi'), 'not-a-hash')).rejects.toBeInstanceOf(
      UnsupportedAlgorithmError
    );
  });
});

describe('hashFile', () => {
  it('should give the same digest for every chunk size', async () => {
    const store = MemoryFileStore.from({ '/data/a.txt': 'x'.repeat(20000) });

    const small = await hashFile(store, '/data/a.txt', { algorithm: 'sha256', chunkSize: 7 });
    const large = await hashFile(store, '/data/a.txt', { algorithm: 'sha256', chunkSize: 8192 });

    expect(small).toBe(large);
  });

  it('should fail on the algorithm before touching the file', async () => {
    const store = new MemoryFileStore();

    await expect(
      hashFile(store, '/missing.txt', { algorithm: 'nope', chunkSize: 8192 })
    ).rejects.toMatchObject({ code: 'UNSUPPORTED_ALGORITHM', algorithm: 'nope' });
  });
});

describe('isSupportedAlgorithm / createDigest', () => {
  it('should know the common algorithms', () => {
    expect(isSupportedAlgorithm('sha256')).toBe(true);
    expect(isSupportedAlgorithm('sha512')).toBe(true);
    expect(isSupportedAlgorithm('md5')).toBe(true);
    expect(isSupportedAlgorithm('rot13')).toBe(false);
  });

  it('should throw for unknown algorithms', () => {
    expect(() => createDigest('rot13')).toThrow('Unsupported hash algorithm: rot13');
  });
});
