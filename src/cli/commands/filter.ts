/**
 * Filter Command
 *
 * Runs the filter pipeline and renders its outcome.
 * Pure function with dependency injection.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/index.js';
import { success } from '../types/index.js';
import type { FilterOutcome } from '../../corpus/filter-pipeline.js';
import type { FilterError } from '../../errors/corpus-error.js';
import { errorResult } from '../error-result.js';
import { manifestLine, reportLines } from '../report-lines.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface FilterCommandDeps {
  readonly runFilter: () => ResultAsync<FilterOutcome, FilterError>;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeFilterCommand(deps: FilterCommandDeps): Promise<CliResult> {
  const result = await deps.runFilter();

  if (result.isErr()) {
    return errorResult(result.error);
  }

  const outcome = result.value;
  return success({
    message: `Corpus filtered: kept ${outcome.copy.copied} documents`,
    details: [manifestLine(outcome.manifest, outcome.report), ...reportLines(outcome.report)],
    warnings: outcome.warnings.length > 0 ? outcome.warnings : undefined,
  });
}
