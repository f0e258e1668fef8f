import type { FsError } from '../ports/corpus-fs.port.js';
import type {
  ConfigInvalidError,
  ConfigIssue,
  CorpusFilterError,
  CorpusState,
  FilterStage,
  IOError,
  MalformedManifestError,
  MissingSourceFileError,
  PromotionError,
  PromotionStep,
  StaleStagingError,
} from './corpus-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  malformedManifest: (
    manifestPath: string,
    reason: string,
    at?: { readonly lineNumber: number; readonly line: string }
  ): MalformedManifestError => ({
    _tag: 'MalformedManifest',
    manifestPath,
    lineNumber: at?.lineNumber,
    line: at?.line,
    reason,
    message: at ? `Malformed manifest line ${at.lineNumber}: ${reason}` : `Malformed manifest: ${reason}`,
  }),

  missingSourceFile: (path: string, absolutePath: string, missingCount: number): MissingSourceFileError => ({
    _tag: 'MissingSourceFile',
    path,
    absolutePath,
    missingCount,
    message:
      missingCount > 1
        ? `Referenced file missing from corpus: ${path} (and ${missingCount - 1} more)`
        : `Referenced file missing from corpus: ${path}`,
  }),

  io: (stage: FilterStage, cause: FsError): IOError => ({
    _tag: 'IO',
    stage,
    path: cause.path,
    fsCode: cause.code,
    message: cause.message,
  }),

  promotion: (step: PromotionStep, corpusState: CorpusState, message: string, recoveryHint: string): PromotionError => ({
    _tag: 'Promotion',
    step,
    corpusState,
    recoveryHint,
    message,
  }),

  staleStaging: (stagingRoot: string, interruptedPromotion: boolean): StaleStagingError => ({
    _tag: 'StaleStaging',
    stagingRoot,
    interruptedPromotion,
    message: interruptedPromotion
      ? `Staging root holds an interrupted promotion: ${stagingRoot}`
      : `Staging root left over from a previous run: ${stagingRoot}`,
  }),
} as const satisfies Record<string, (...args: never[]) => CorpusFilterError>;
