import type { CorpusFilterError, FilterStage } from './corpus-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function stageOf(error: CorpusFilterError): FilterStage {
  switch (error._tag) {
    case 'ConfigInvalid':
      return 'config';
    case 'StaleStaging':
      return 'staging';
    case 'MalformedManifest':
      return 'manifest';
    case 'MissingSourceFile':
      return 'copy';
    case 'IO':
      return error.stage;
    case 'Promotion':
      return 'promote';
    default:
      return assertNever(error);
  }
}

export function formatCorpusError(error: CorpusFilterError): string {
  const head = `[${stageOf(error)}] ${error.message}`;

  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${head}\n\n${issues}`;
    }

    case 'MalformedManifest':
      return error.line !== undefined ? `${head}\n  in ${error.manifestPath}\n  > ${error.line}` : `${head}\n  in ${error.manifestPath}`;

    case 'MissingSourceFile':
      return `${head}\n  expected at ${error.absolutePath}`;

    case 'IO':
      return `${head} (${error.fsCode})`;

    case 'Promotion':
      return `${head}\n  step: ${error.step}\n  corpus: ${error.corpusState}\n  recovery: ${error.recoveryHint}`;

    case 'StaleStaging':
      return head;

    default:
      return assertNever(error);
  }
}

/** Operator-facing next steps for an aborted run. */
export function suggestionsFor(error: CorpusFilterError): readonly string[] {
  switch (error._tag) {
    case 'ConfigInvalid':
      return ['Check the CORPUS_FILTER_* environment variables and command-line options'];
    case 'MalformedManifest':
      return ['Confirm the manifest is an alignment file with fromDoc/toDoc attributes', 'Nothing was changed on disk'];
    case 'MissingSourceFile':
      return ['The manifest and the corpus tree do not match; re-extract the corpus or use the matching manifest', 'Nothing was changed on disk'];
    case 'IO':
      return ['Check permissions and free space under the base directory'];
    case 'Promotion':
      return error.corpusState === 'inconsistent'
        ? ['Do NOT rerun the filter until the corpus root is restored', error.recoveryHint]
        : [error.recoveryHint];
    case 'StaleStaging':
      return error.interruptedPromotion
        ? ['Run "corpus-filter clean-staging" to restore the original tree and remove the staging root']
        : ['Inspect the staging root, then run "corpus-filter clean-staging" to remove it'];
    default:
      return assertNever(error);
  }
}
