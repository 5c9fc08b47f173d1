/** How the `@<seconds>` suffix is treated when building argument vectors. */
export type DelaySuffixMode = 'literal' | 'strip';

/** A non-empty line of a directive file. */
export interface DirectiveLine {
  /** 1-based position in the file. */
  readonly lineNumber: number;
  readonly text: string;
}

export interface ParsedDirective {
  readonly lineNumber: number;
  readonly raw: string;
  /**
   * Program and arguments. For a piped line, the stage left of the first `|`.
   * Empty only in `strip` mode when nothing precedes the `@`.
   */
  readonly commandTokens: string[];
  /** Seconds to sleep after dispatch; present iff the line contains `@`. */
  readonly delaySeconds?: number;
  /** Stage right of the first `|`; present iff that `|` is not the first character. */
  readonly pipedCommandTokens?: string[];
}
