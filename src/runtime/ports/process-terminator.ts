/**
 * Process exit status as seen by the terminator.
 * `status` is the numeric exit code handed to the OS.
 */
export type ExitStatus =
  | { readonly kind: 'success' }
  | { readonly kind: 'failure'; readonly status: number };

/**
 * Port for terminating the current process.
 * Only composition roots may use it.
 */
export interface ProcessTerminator {
  terminate(status: ExitStatus): never;
}
