/**
 * Error helpers shared by store implementations
 */

/**
 * Check whether an fs-style error means "nothing at this path"
 */
export function isNotFoundError(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    (err.code === 'ENOENT' || err.code === 'ENOTDIR')
  );
}

/**
 * Build an ENOENT error the way node:fs reports one
 */
export function notFoundError(path: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, '${path}'`), {
    code: 'ENOENT',
  });
}
