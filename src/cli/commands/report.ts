/**
 * Report Command
 *
 * Dry run: what the filter would keep, without touching the disk.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/index.js';
import { success } from '../types/index.js';
import type { ProjectionOutcome } from '../../corpus/filter-pipeline.js';
import type { FilterError } from '../../errors/corpus-error.js';
import { errorResult } from '../error-result.js';
import { manifestLine, reportLines } from '../report-lines.js';

export interface ReportCommandDeps {
  readonly projectFilter: () => ResultAsync<ProjectionOutcome, FilterError>;
}

export async function executeReportCommand(deps: ReportCommandDeps): Promise<CliResult> {
  const result = await deps.projectFilter();

  if (result.isErr()) {
    return errorResult(result.error);
  }

  const outcome = result.value;
  return success({
    message: 'Dry run: every referenced document is present',
    details: [manifestLine(outcome.manifest, outcome.report), ...reportLines(outcome.report, 'projected')],
    warnings: outcome.warnings.length > 0 ? outcome.warnings : undefined,
    suggestions: ['Run "corpus-filter filter" to apply'],
  });
}
