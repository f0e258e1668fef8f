import path from 'path';
import type { ResultAsync } from 'neverthrow';
import { okAsync, errAsync } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { CorpusFileSystemPort, TreeReadPort } from '../ports/corpus-fs.port.js';
import { Err } from '../errors/factories.js';
import type { CopyError } from '../errors/corpus-error.js';
import type { DocumentPath } from './document-path.js';

export interface VerifiedSources {
  /** Distinct paths, first-seen order, with their sizes in bytes. */
  readonly files: ReadonlyMap<DocumentPath, number>;
}

export interface CopySummary {
  readonly copied: number;
  readonly bytes: number;
}

export interface CopySelectedOptions {
  readonly sourceRoot: string;
  readonly stagingRoot: string;
  readonly paths: readonly DocumentPath[];
  readonly logger: Logger;
}

function toAbsolute(root: string, documentPath: DocumentPath): string {
  return path.join(root, ...documentPath.split('/'));
}

/**
 * Check that every referenced path is a regular file under `sourceRoot`, before
 * anything is copied. Duplicates are coalesced.
 *
 * Fails with MissingSourceFile naming the first missing path and the total
 * count of missing ones.
 */
export function verifySources(
  fs: TreeReadPort,
  sourceRoot: string,
  paths: readonly DocumentPath[]
): ResultAsync<VerifiedSources, CopyError> {
  const files = new Map<DocumentPath, number>();
  const missing: DocumentPath[] = [];

  let chain: ResultAsync<void, CopyError> = okAsync(undefined);

  for (const documentPath of new Set(paths)) {
    chain = chain.andThen(() =>
      fs
        .stat(toAbsolute(sourceRoot, documentPath))
        .map((stat) => {
          if (stat.kind === 'file') files.set(documentPath, stat.sizeBytes);
          else missing.push(documentPath);
        })
        .orElse((e) => {
          if (e.code === 'FS_NOT_FOUND') {
            missing.push(documentPath);
            return okAsync(undefined);
          }
          return errAsync(Err.io('copy', e));
        })
    );
  }

  return chain.andThen(() => {
    const [first] = missing;
    if (first !== undefined) {
      return errAsync(Err.missingSourceFile(first, toAbsolute(sourceRoot, first), missing.length));
    }
    return okAsync({ files });
  });
}

/**
 * Copy the referenced files from `sourceRoot` into `stagingRoot`, keeping their
 * relative layout. Parent directories are created on first use.
 *
 * The source tree is never modified. Copy-once per distinct path; a rerun over a
 * partially populated staging root overwrites what is there.
 */
export function copySelected(fs: CorpusFileSystemPort, options: CopySelectedOptions): ResultAsync<CopySummary, CopyError> {
  const { sourceRoot, stagingRoot, logger } = options;

  return verifySources(fs, sourceRoot, options.paths).andThen(({ files }) => {
    const createdDirs = new Set<string>();
    let copied = 0;
    let bytes = 0;

    let chain: ResultAsync<void, CopyError> = okAsync(undefined);

    for (const [documentPath, size] of files) {
      const from = toAbsolute(sourceRoot, documentPath);
      const to = toAbsolute(stagingRoot, documentPath);
      const parent = path.dirname(to);

      chain = chain
        .andThen(() => {
          if (createdDirs.has(parent)) return okAsync(undefined);
          return fs
            .mkdirp(parent)
            .map(() => {
              createdDirs.add(parent);
            })
            .mapErr((e) => Err.io('copy', e));
        })
        .andThen(() => fs.copyFile(from, to).mapErr((e) => Err.io('copy', e)))
        .map(() => {
          copied += 1;
          bytes += size;
          logger.debug({ path: documentPath }, 'Staged document');
        });
    }

    return chain.map(() => {
      logger.info({ copied, bytes, stagingRoot }, 'Documents staged');
      return { copied, bytes };
    });
  });
}
