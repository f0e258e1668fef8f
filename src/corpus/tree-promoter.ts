/**
 * Promotion: swap the staged tree in for the original corpus root.
 *
 *   1. verify   every language has at least one staged document
 *   2. detach   rename <base>/xml           -> <staging>/xml.previous
 *   3. attach   rename <staging>/xml        -> <base>/xml
 *   4. discard  remove <staging> (and the previous tree with it)
 *
 * Each of steps 2 and 3 is one rename(2), atomic within a filesystem. Between
 * them the corpus root is briefly absent while both trees are intact on disk.
 * A failed attach is rolled back by renaming the previous tree back.
 *
 * The staging root must share a filesystem with the corpus root. Otherwise
 * step 2 fails with EXDEV and nothing has changed.
 *
 * Nothing here is retried: a failed promotion is reported and left for the operator.
 */

import type { ResultAsync } from 'neverthrow';
import { okAsync, errAsync } from 'neverthrow';
import path from 'path';
import type { Logger } from '../core/logging/index.js';
import type { CorpusFileSystemPort } from '../ports/corpus-fs.port.js';
import type { CorpusLayout } from '../config/filter-config.js';
import { Err } from '../errors/factories.js';
import type { PromotionError } from '../errors/corpus-error.js';
import { containsDocument } from './tree-reporter.js';

export interface PromoteOptions {
  readonly layout: CorpusLayout;
  readonly languages: readonly string[];
  readonly documentExtension: string;
  readonly logger: Logger;
}

export interface PromotionSummary {
  /** Set when the swap succeeded but the staging root could not be removed. */
  readonly leftover?: string;
}

export function promoteStagedTree(fs: CorpusFileSystemPort, options: PromoteOptions): ResultAsync<PromotionSummary, PromotionError> {
  const { layout, logger } = options;
  const { corpusRoot, stagedCorpusRoot, previousCorpusRoot, stagingRoot } = layout;

  return verifyStagedTree(fs, options)
    .andThen(() =>
      fs.rename(corpusRoot, previousCorpusRoot).mapErr((e) =>
        Err.promotion(
          'detach_original',
          'untouched',
          `Could not move the original tree aside: ${e.message}`,
          e.code === 'FS_CROSS_DEVICE'
            ? `Place the staging directory on the same filesystem as ${corpusRoot}`
            : `The original tree is still at ${corpusRoot}; the filtered tree is at ${stagedCorpusRoot}`
        )
      )
    )
    .andThen(() => {
      logger.info({ from: corpusRoot, to: previousCorpusRoot }, 'Original tree detached');
      return fs.rename(stagedCorpusRoot, corpusRoot).orElse((attachError) => {
        logger.error({ err: attachError }, 'Attaching the staged tree failed; rolling back');
        return fs
          .rename(previousCorpusRoot, corpusRoot)
          .mapErr((rollbackError) =>
            Err.promotion(
              'rollback',
              'inconsistent',
              `Could not move the filtered tree into place (${attachError.message}) and could not restore the original (${rollbackError.message})`,
              `Rename ${previousCorpusRoot} or ${stagedCorpusRoot} to ${corpusRoot} by hand`
            )
          )
          .andThen(() =>
            errAsync(
              Err.promotion(
                'attach_staged',
                'untouched',
                `Could not move the filtered tree into place: ${attachError.message}`,
                `Original tree restored at ${corpusRoot}; the filtered tree is still at ${stagedCorpusRoot}`
              )
            )
          );
      });
    })
    .andThen(() => {
      logger.info({ corpusRoot }, 'Filtered tree promoted');
      return fs
        .removeTree(stagingRoot)
        .map((): PromotionSummary => ({}))
        .orElse((e) => {
          logger.warn({ stagingRoot, err: e }, 'Promoted, but the staging root could not be removed');
          return okAsync<PromotionSummary, never>({ leftover: stagingRoot });
        });
    });
}

function verifyStagedTree(fs: CorpusFileSystemPort, options: PromoteOptions): ResultAsync<void, PromotionError> {
  const { layout, languages, documentExtension } = options;

  let chain: ResultAsync<void, PromotionError> = okAsync(undefined);
  for (const language of languages) {
    const root = path.join(layout.stagedCorpusRoot, language);
    chain = chain.andThen(() =>
      containsDocument(fs, root, documentExtension)
        .mapErr((e) =>
          Err.promotion('verify', 'untouched', `Could not verify the staged tree: ${e.message}`, 'Nothing was changed on disk')
        )
        .andThen((found) =>
          found
            ? okAsync(undefined)
            : errAsync(
                Err.promotion(
                  'verify',
                  'untouched',
                  `Staged tree has no ${language} documents: ${root}`,
                  'Nothing was changed on disk; check the manifest'
                )
              )
        )
    );
  }
  return chain;
}
