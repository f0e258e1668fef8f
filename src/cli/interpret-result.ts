/**
 * The only place a CliResult becomes console output and a process exit.
 */

import type { CliResult } from './types/cli-result.js';
import { toNumericExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

export function interpretCliResult(result: CliResult, terminator: ProcessTerminator): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      // Let the process end on its own so pending stderr log writes finish.
      return;

    case 'failure':
      terminator.terminate({ kind: 'failure', status: toNumericExitCode(result.exitCode) });
  }
}
