export type {
  ConfigInvalidError,
  ConfigIssue,
  CopyError,
  CorpusFilterError,
  CorpusState,
  FilterError,
  FilterStage,
  IOError,
  MalformedManifestError,
  ManifestError,
  MissingSourceFileError,
  PromotionError,
  PromotionStep,
  StaleStagingError,
} from './corpus-error.js';
export { Err } from './factories.js';
export { formatCorpusError, stageOf, suggestionsFor } from './formatter.js';
