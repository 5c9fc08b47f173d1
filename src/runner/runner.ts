import fs from 'fs/promises';
import { parseDirective, splitDirectiveLines } from '../directive/parser.js';
import type { DelaySuffixMode, DirectiveLine, ParsedDirective } from '../directive/types.js';
import { RunnerError, RunnerErrorCode, causeOf } from '../shared/errors.js';
import type { Launcher } from '../shared/exec.js';
import { logger } from '../shared/logger.js';
import type { DetachedRegistry } from './registry.js';
import { formatArgv, stdoutSink } from './trace.js';
import type { TraceSink } from './trace.js';

export interface RunnerOptions {
  launcher: Launcher;
  sink?: TraceSink;
  registry?: DetachedRegistry;
  delaySuffix?: DelaySuffixMode;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunSummary {
  lines: number;
  detached: number;
  piped: number;
  sleptSeconds: number;
}

/** Largest delay a single Node timer accepts; longer ones are clamped to 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

export async function sleepFor(ms: number): Promise<void> {
  let remaining = ms;
  do {
    const chunk = Math.min(remaining, MAX_TIMER_MS);
    await new Promise<void>((resolve) => setTimeout(resolve, chunk));
    remaining -= chunk;
  } while (remaining > 0);
}

export async function readDirectiveFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new RunnerError(
      RunnerErrorCode.DIRECTIVE_FILE_UNREADABLE,
      `Cannot read directive file: ${filePath}`,
      { path: filePath, cause: causeOf(err) },
    );
  }
}

/**
 * Runs directives strictly in file order. Any error aborts the rest of the
 * batch; children already launched are left running.
 */
export class DirectiveRunner {
  private readonly launcher: Launcher;
  private readonly sink: TraceSink;
  private readonly registry?: DetachedRegistry;
  private readonly delaySuffix: DelaySuffixMode;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RunnerOptions) {
    this.launcher = options.launcher;
    this.sink = options.sink ?? stdoutSink;
    this.registry = options.registry;
    this.delaySuffix = options.delaySuffix ?? 'literal';
    this.sleep = options.sleep ?? sleepFor;
  }

  async runFile(filePath: string): Promise<RunSummary> {
    this.sink.emit(`[parsing start] ${filePath}`);
    const text = await readDirectiveFile(filePath);
    return this.runText(text);
  }

  async runText(text: string): Promise<RunSummary> {
    const summary: RunSummary = { lines: 0, detached: 0, piped: 0, sleptSeconds: 0 };
    for (const line of splitDirectiveLines(text)) {
      await this.runLine(line, summary);
    }
    logger.debug(summary, 'directive batch finished');
    return summary;
  }

  private async runLine(line: DirectiveLine, summary: RunSummary): Promise<void> {
    this.sink.emit(`[parsing command] [ ${line.text} ]`);
    const directive = parseDirective(line, this.delaySuffix);
    summary.lines++;

    try {
      await this.dispatch(directive, summary);
    } catch (err) {
      if (err instanceof RunnerError) {
        throw err.withContext({ lineNumber: line.lineNumber });
      }
      throw err;
    }

    if (directive.delaySeconds !== undefined) {
      this.sink.emit(`[parsing waiting] [ ${directive.delaySeconds} ]`);
      await this.sleep(directive.delaySeconds * 1000);
      summary.sleptSeconds += directive.delaySeconds;
    }
  }

  private async dispatch(directive: ParsedDirective, summary: RunSummary): Promise<void> {
    if (directive.pipedCommandTokens) {
      this.sink.emit(
        `[EXC] ${formatArgv(directive.commandTokens)} | ${formatArgv(directive.pipedCommandTokens)}`,
      );
      await this.launcher.launchAndAwaitPipe(directive.commandTokens, directive.pipedCommandTokens);
      summary.piped++;
      return;
    }

    // strip mode: a line like "@5" is a bare delay
    if (directive.commandTokens.length === 0) return;

    this.sink.emit(`[EXC] ${formatArgv(directive.commandTokens)}`);
    const handle = await this.launcher.launchDetached(directive.commandTokens);
    this.registry?.track(handle);
    summary.detached++;
  }
}
