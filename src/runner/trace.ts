/** Destination for human-readable trace lines. Not a stable format. */
export interface TraceSink {
  emit(line: string): void;
}

export const stdoutSink: TraceSink = {
  emit(line: string): void {
    process.stdout.write(line + '\n');
  },
};

export const silentSink: TraceSink = {
  emit(): void {},
};

export function formatArgv(argv: readonly string[]): string {
  return JSON.stringify(argv);
}
