import type { ExitStatus, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: throws instead of exiting, so an accidental termination fails the test
 * rather than killing the runner.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(exit: ExitStatus): never {
    const suffix = exit.kind === 'failure' ? `:${exit.status}` : '';
    throw new Error(`[ProcessTerminator] terminate(${exit.kind}${suffix})`);
  }
}
