import type { CliResult } from './types/cli-result.js';
import { failure, misuse } from './types/cli-result.js';
import type { CorpusFilterError } from '../errors/corpus-error.js';
import { formatCorpusError, suggestionsFor } from '../errors/formatter.js';

/** Map a run error to a failed CliResult with the matching exit code. */
export function errorResult(error: CorpusFilterError): CliResult {
  const [headline = error.message, ...details] = formatCorpusError(error).split('\n').filter((l) => l.trim() !== '');

  if (error._tag === 'ConfigInvalid') {
    return misuse(headline, details.map((d) => d.trim()), suggestionsFor(error));
  }

  return failure(headline, {
    exitCode: error._tag === 'Promotion' ? { kind: 'promotion_failed' } : { kind: 'aborted' },
    details: details.map((d) => d.trim()),
    suggestions: suggestionsFor(error),
  });
}
