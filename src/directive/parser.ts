import { RunnerError, RunnerErrorCode } from '../shared/errors.js';
import type { DelaySuffixMode, DirectiveLine, ParsedDirective } from './types.js';

const DELAY_MARKER = '@';
const PIPE_MARKER = '|';

// Decimal float with optional sign and exponent. Hex, binary and "Infinity" are not delays.
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Split file text into non-empty lines, keeping their 1-based line numbers. */
export function splitDirectiveLines(text: string): DirectiveLine[] {
  const lines: DirectiveLine[] = [];
  text.split('\n').forEach((rawLine, index) => {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line) {
      lines.push({ lineNumber: index + 1, text: line });
    }
  });
  return lines;
}

/** Split on single spaces. Consecutive spaces yield empty tokens; there is no quoting. */
export function tokenize(segment: string): string[] {
  return segment.split(' ');
}

export function parseDelay(value: string, lineNumber?: number): number {
  const trimmed = value.trim();
  if (!FLOAT_PATTERN.test(trimmed)) {
    throw new RunnerError(RunnerErrorCode.INVALID_DELAY, `Invalid delay value "${value}"`, {
      lineNumber,
      value,
    });
  }
  const seconds = Number(trimmed);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new RunnerError(RunnerErrorCode.INVALID_DELAY, `Delay out of range: ${value}`, {
      lineNumber,
      value,
    });
  }
  return seconds;
}

/** Drop everything from the first `@` onwards, along with the whitespace before it. */
export function stripDelaySuffix(text: string): string {
  const at = text.indexOf(DELAY_MARKER);
  return at === -1 ? text : text.slice(0, at).trimEnd();
}

export function parseDirective(line: DirectiveLine, mode: DelaySuffixMode = 'literal'): ParsedDirective {
  const [, delayText] = line.text.split(DELAY_MARKER);
  const delaySeconds = delayText === undefined ? undefined : parseDelay(delayText, line.lineNumber);

  const body = mode === 'strip' ? stripDelaySuffix(line.text) : line.text;
  const base = { lineNumber: line.lineNumber, raw: line.text, delaySeconds };

  const pipeIndex = body.indexOf(PIPE_MARKER);
  if (pipeIndex < 1) {
    return { ...base, commandTokens: body ? tokenize(body) : [] };
  }

  return {
    ...base,
    commandTokens: tokenize(body.slice(0, pipeIndex).trim()),
    pipedCommandTokens: tokenize(body.slice(pipeIndex + 1).trim()),
  };
}
