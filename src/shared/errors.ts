export enum RunnerErrorCode {
  DIRECTIVE_FILE_UNREADABLE = 'DIRECTIVE_FILE_UNREADABLE',
  INVALID_DELAY = 'INVALID_DELAY',
  LAUNCH_FAILED = 'LAUNCH_FAILED',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export class RunnerError extends Error {
  readonly code: RunnerErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: RunnerErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'RunnerError';
    this.code = code;
    this.context = context;
  }

  /** Same code and message, with `extra` merged over the existing context. */
  withContext(extra: Record<string, unknown>): RunnerError {
    return new RunnerError(this.code, this.message, { ...this.context, ...extra });
  }
}

export function causeOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
