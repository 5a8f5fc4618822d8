/**
 * Tests for path helpers
 */

import { describe, it, expect } from 'vitest';
import {
  normalizePath,
  joinPath,
  parentPath,
  baseName,
  toRelativeKey,
  resolveManifestRoot,
} from '../../src/core/paths.js';
import { PathOutsideRootError } from '../../src/core/errors.js';

describe('normalizePath', () => {
  it('should convert backslashes to forward slashes', () => {
    expect(normalizePath('a\\b\\c.txt')).toBe('a/b/c.txt');
  });

  it('should leave forward slashes alone', () => {
    expect(normalizePath('/srv/data/x.txt')).toBe('/srv/data/x.txt');
  });
});

describe('joinPath / parentPath / baseName', () => {
  it('should join with forward slashes', () => {
    expect(joinPath('/srv/data', 'sub', 'x.txt')).toBe('/srv/data/sub/x.txt');
    expect(joinPath('C:\\data', 'x.txt')).toBe('C:/data/x.txt');
  });

  it('should return the parent directory', () => {
    expect(parentPath('/srv/data/.manifestly.json')).toBe('/srv/data');
  });

  it('should return the last segment', () => {
    expect(baseName('/srv/data/custom.json')).toBe('custom.json');
  });
});

describe('toRelativeKey', () => {
  it('should strip the root and the separator', () => {
    expect(toRelativeKey('/srv/data', '/srv/data/sub/x.txt')).toBe('sub/x.txt');
  });

  it('should accept a root with a trailing slash', () => {
    expect(toRelativeKey('/srv/data/', '/srv/data/x.txt')).toBe('x.txt');
  });

  it('should produce forward-slash keys from backslash paths', () => {
    expect(toRelativeKey('C:\\data', 'C:\\data\\sub\\x.txt')).toBe('sub/x.txt');
  });

  it('should reject files outside the root', () => {
    expect(() => toRelativeKey('/srv/data', '/srv/other/x.txt')).toThrow(PathOutsideRootError);
  });

  it('should not treat a sibling with a common prefix as inside the root', () => {
    expect(() => toRelativeKey('/srv/data', '/srv/database/x.txt')).toThrow(PathOutsideRootError);
  });
});

describe('resolveManifestRoot', () => {
  it('should be the directory holding the manifest', () => {
    expect(resolveManifestRoot('/srv/data/.manifestly.json')).toBe('/srv/data');
  });
});
