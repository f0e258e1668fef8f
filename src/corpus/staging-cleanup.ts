import type { ResultAsync } from 'neverthrow';
import { okAsync, errAsync } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { CorpusFileSystemPort, FsError } from '../ports/corpus-fs.port.js';
import type { CorpusLayout } from '../config/filter-config.js';
import { Err } from '../errors/factories.js';
import type { IOError, PromotionError } from '../errors/corpus-error.js';

export type CleanupOutcome =
  | { readonly kind: 'nothing_to_clean'; readonly stagingRoot: string }
  | { readonly kind: 'removed'; readonly stagingRoot: string; readonly restoredOriginal: boolean };

function exists(fs: CorpusFileSystemPort, target: string): ResultAsync<boolean, FsError> {
  return fs
    .stat(target)
    .map(() => true)
    .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(false) : errAsync(e)));
}

/**
 * Operator-initiated removal of a stale staging root.
 *
 * When a swap was interrupted after the original tree was moved aside (corpus
 * root missing, `xml.previous` present), the original is renamed back first.
 * If the corpus root exists, whatever `xml.previous` holds is superseded and
 * goes with the staging root.
 */
export function cleanStagingRoot(
  fs: CorpusFileSystemPort,
  layout: CorpusLayout,
  logger: Logger
): ResultAsync<CleanupOutcome, IOError | PromotionError> {
  const { stagingRoot, corpusRoot, previousCorpusRoot } = layout;

  return exists(fs, stagingRoot)
    .mapErr((e) => Err.io('cleanup', e))
    .andThen((present) => {
      if (!present) return okAsync<CleanupOutcome, never>({ kind: 'nothing_to_clean', stagingRoot });

      return exists(fs, corpusRoot)
        .andThen((corpusPresent) => (corpusPresent ? okAsync(false) : exists(fs, previousCorpusRoot)))
        .mapErr((e): IOError | PromotionError => Err.io('cleanup', e))
        .andThen((restore) => {
          if (!restore) return okAsync(false);
          return fs
            .rename(previousCorpusRoot, corpusRoot)
            .map(() => {
              logger.warn({ from: previousCorpusRoot, to: corpusRoot }, 'Restored original tree from interrupted promotion');
              return true;
            })
            .mapErr((e) =>
              Err.promotion(
                'restore_previous',
                'inconsistent',
                `Could not restore the original tree: ${e.message}`,
                `Rename ${previousCorpusRoot} to ${corpusRoot} by hand`
              )
            );
        })
        .andThen((restoredOriginal) =>
          fs
            .removeTree(stagingRoot)
            .mapErr((e) => Err.io('cleanup', e))
            .map((): CleanupOutcome => {
              logger.info({ stagingRoot }, 'Staging root removed');
              return { kind: 'removed', stagingRoot, restoredOriginal };
            })
        );
    });
}
