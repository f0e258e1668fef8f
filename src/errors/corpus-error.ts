/**
 * Error taxonomy for a filter run.
 *
 * Errors are data: every fallible operation returns a neverthrow Result whose
 * error side is one of these variants. `_tag` discriminates, `message` is the
 * one-line human summary.
 */

import type { FsErrorCode } from '../ports/corpus-fs.port.js';

/** Pipeline stage in which an error surfaced. */
export type FilterStage = 'config' | 'staging' | 'manifest' | 'copy' | 'report' | 'promote' | 'cleanup';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export interface ConfigInvalidError {
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}

export interface MalformedManifestError {
  readonly _tag: 'MalformedManifest';
  readonly manifestPath: string;
  /** 1-based; absent when the problem concerns the manifest as a whole. */
  readonly lineNumber?: number;
  readonly line?: string;
  readonly reason: string;
  readonly message: string;
}

export interface MissingSourceFileError {
  readonly _tag: 'MissingSourceFile';
  /** First missing path, relative to the corpus root. */
  readonly path: string;
  readonly absolutePath: string;
  readonly missingCount: number;
  readonly message: string;
}

export interface IOError {
  readonly _tag: 'IO';
  readonly stage: FilterStage;
  readonly path: string;
  readonly fsCode: FsErrorCode;
  readonly message: string;
}

export type PromotionStep = 'verify' | 'detach_original' | 'attach_staged' | 'rollback' | 'restore_previous';

/**
 * - untouched: the corpus root still holds the original tree
 * - inconsistent: neither tree is at the corpus root; manual recovery needed
 */
export type CorpusState = 'untouched' | 'inconsistent';

export interface PromotionError {
  readonly _tag: 'Promotion';
  readonly step: PromotionStep;
  readonly corpusState: CorpusState;
  readonly recoveryHint: string;
  readonly message: string;
}

export interface StaleStagingError {
  readonly _tag: 'StaleStaging';
  readonly stagingRoot: string;
  /** Staging root holds a detached original tree from an interrupted swap. */
  readonly interruptedPromotion: boolean;
  readonly message: string;
}

export type ManifestError = MalformedManifestError | IOError;
export type CopyError = MissingSourceFileError | IOError;

export type FilterError =
  | MalformedManifestError
  | MissingSourceFileError
  | IOError
  | PromotionError
  | StaleStagingError;

export type CorpusFilterError = FilterError | ConfigInvalidError;
