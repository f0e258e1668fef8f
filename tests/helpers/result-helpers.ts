/**
 * Test Helpers for Result Types
 *
 * Unwrap neverthrow Results in tests, throwing descriptive errors on the
 * unexpected branch.
 */

import type { Result } from 'neverthrow';

/**
 * Unwrap Ok value from Result, throw if Err.
 *
 * @example
 * const stats = expectOk(await measureTree(fs, root, '.xml.gz'), 'measuring tree');
 * expect(stats.documentCount).toBe(2);
 */
export function expectOk<T, E>(result: Result<T, E>, context: string): T {
  if (result.isErr()) {
    const errorJson = JSON.stringify(result.error, null, 2);
    throw new Error(`Expected Ok in ${context}, but got Err:\n${errorJson}`);
  }
  return result.value;
}

/**
 * Unwrap Err value from Result, throw if Ok.
 *
 * @example
 * const error = expectErr(await readManifest(options), 'reading empty manifest');
 * expect(error._tag).toBe('MalformedManifest');
 */
export function expectErr<T, E>(result: Result<T, E>, context: string): E {
  if (result.isOk()) {
    const valueJson = JSON.stringify(result.value, null, 2);
    throw new Error(`Expected Err in ${context}, but got Ok:\n${valueJson}`);
  }
  return result.error;
}
