import type { ExitStatus, ProcessTerminator } from '../ports/process-terminator.js';
import { assertNever } from '../assert-never.js';

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(exit: ExitStatus): never {
    switch (exit.kind) {
      case 'success':
        process.exit(0);
      case 'failure':
        process.exit(exit.status);
      default:
        return assertNever(exit);
    }
  }
}
