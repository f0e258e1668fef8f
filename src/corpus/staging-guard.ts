import type { ResultAsync } from 'neverthrow';
import { okAsync, errAsync } from 'neverthrow';
import type { CorpusFileSystemPort, FsEntry } from '../ports/corpus-fs.port.js';
import type { CorpusLayout } from '../config/filter-config.js';
import { PREVIOUS_TREE_NAME } from '../config/filter-config.js';
import { Err } from '../errors/factories.js';
import type { IOError, StaleStagingError } from '../errors/corpus-error.js';

/**
 * Claim the staging root for a new run.
 *
 * An absent root is created; an empty directory is reused. Anything else is
 * left over from an earlier run and must be cleaned up by the operator, so the
 * run is refused with StaleStaging. A file in place of the directory is an IO error.
 */
export function claimStagingRoot(
  fs: CorpusFileSystemPort,
  layout: CorpusLayout
): ResultAsync<void, StaleStagingError | IOError> {
  const { stagingRoot } = layout;

  return fs
    .readdir(stagingRoot)
    .orElse((e) => {
      if (e.code === 'FS_NOT_FOUND') return fs.mkdirp(stagingRoot).map((): readonly FsEntry[] => []);
      return errAsync(e);
    })
    .mapErr((e) => Err.io('staging', e))
    .andThen((entries) => {
      if (entries.length === 0) return okAsync(undefined);
      const interrupted = entries.some((e) => e.name === PREVIOUS_TREE_NAME);
      return errAsync(Err.staleStaging(stagingRoot, interrupted));
    });
}
