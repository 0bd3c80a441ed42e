/** An external executable could not be started or exited non-zero. */
export class ExternalToolFailure extends Error {
  constructor(
    message: string,
    public readonly tool: string,
    public readonly args: readonly string[],
    /** null when the process never started (e.g. missing executable). */
    public readonly exitCode: number | null,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ExternalToolFailure';
  }
}

/** Bad command-line input. The CLI reports it and exits 1. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
