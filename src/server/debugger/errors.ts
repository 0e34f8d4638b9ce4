export class DebuggerNotRunningError extends Error {
  constructor(message = 'GDB is not running') {
    super(message);
    this.name = 'DebuggerNotRunningError';
  }
}

export class DebuggerTimeoutError extends Error {
  constructor(
    readonly command: string,
    readonly waitedMs: number
  ) {
    super(`Timed out after ${waitedMs}ms waiting to run "${command}"`);
    this.name = 'DebuggerTimeoutError';
  }
}

export class DebuggerCancelledError extends Error {
  constructor(readonly command: string) {
    super(`Cancelled while waiting to run "${command}"`);
    this.name = 'DebuggerCancelledError';
  }
}

export class DebuggerStartError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DebuggerStartError';
  }
}
