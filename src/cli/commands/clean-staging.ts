/**
 * Clean-Staging Command
 *
 * Explicit operator cleanup of a staging root left behind by an aborted or
 * interrupted run.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/index.js';
import { success } from '../types/index.js';
import type { CleanupOutcome } from '../../corpus/staging-cleanup.js';
import type { IOError, PromotionError } from '../../errors/corpus-error.js';
import { assertNever } from '../../runtime/assert-never.js';
import { errorResult } from '../error-result.js';

export interface CleanStagingCommandDeps {
  readonly cleanStaging: () => ResultAsync<CleanupOutcome, IOError | PromotionError>;
}

export async function executeCleanStagingCommand(deps: CleanStagingCommandDeps): Promise<CliResult> {
  const result = await deps.cleanStaging();

  if (result.isErr()) {
    return errorResult(result.error);
  }

  const outcome = result.value;
  switch (outcome.kind) {
    case 'nothing_to_clean':
      return success({ message: `No staging root at ${outcome.stagingRoot}` });

    case 'removed':
      return success({
        message: `Removed staging root ${outcome.stagingRoot}`,
        details: outcome.restoredOriginal ? ['Original tree restored from an interrupted promotion'] : undefined,
      });

    default:
      return assertNever(outcome);
  }
}
