import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: records the requested exit instead of leaving the process.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    throw new TerminationRequested(code);
  }
}

export class TerminationRequested extends Error {
  constructor(readonly code: ExitCode) {
    super(`[ProcessTerminator] terminate(${code.kind})`);
    this.name = 'TerminationRequested';
  }
}
