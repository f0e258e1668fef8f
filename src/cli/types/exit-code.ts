/**
 * Typed exit codes for CLI commands.
 *
 * 0 success, 1 aborted before anything destructive happened, 2 bad usage,
 * 3 promotion failed: the corpus root needs an operator's attention.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'aborted' }
  | { kind: 'misuse' }
  | { kind: 'promotion_failed' };

export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'aborted':
      return 1;
    case 'misuse':
      return 2;
    case 'promotion_failed':
      return 3;
  }
}
