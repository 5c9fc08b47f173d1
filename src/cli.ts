import { loadConfig } from './config/loader.js';
import { RunnerError } from './shared/errors.js';
import { ExecaLauncher } from './shared/exec.js';
import type { Launcher } from './shared/exec.js';
import { logger, setLogLevel } from './shared/logger.js';
import { DetachedRegistry } from './runner/registry.js';
import { DirectiveRunner } from './runner/runner.js';
import { silentSink, stdoutSink } from './runner/trace.js';
import type { TraceSink } from './runner/trace.js';

export const USAGE = 'usage : directive-runner <directive-file>';

export interface CliArgs {
  file?: string;
  configPath?: string;
  help: boolean;
}

export interface CliDeps {
  /** Receives the usage line and trace output. */
  out?: TraceSink;
  /** Replaces the execa launcher, which is otherwise built with `holdDetached: waitForDetached`. */
  launcher?: Launcher;
  sleep?: (ms: number) => Promise<void>;
}

/** Only the first positional argument counts; the rest are ignored. */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { help: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--config') {
      args.configPath = argv[++i];
    } else if (arg !== undefined && args.file === undefined) {
      args.file = arg;
    }
  }
  return args;
}

export async function main(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? stdoutSink;
  const args = parseArgs(argv);
  if (args.help || args.file === undefined) {
    out.emit(USAGE);
    return 0;
  }

  try {
    const { config, configPath, fromFile } = await loadConfig(args.configPath);
    setLogLevel(config.logLevel);
    logger.debug({ configPath, fromFile, config }, 'configuration loaded');

    const registry = new DetachedRegistry();
    const runner = new DirectiveRunner({
      launcher: deps.launcher ?? new ExecaLauncher({ holdDetached: config.waitForDetached }),
      sink: config.trace ? out : silentSink,
      registry,
      delaySuffix: config.delaySuffix,
      sleep: deps.sleep,
    });

    const summary = await runner.runFile(args.file);
    if (config.waitForDetached) {
      const exits = await registry.waitAll();
      logger.info({ exits: exits.length, ...summary }, 'all detached processes exited');
    }
    return 0;
  } catch (err) {
    if (err instanceof RunnerError) {
      logger.error({ code: err.code, context: err.context }, `${err.code}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
