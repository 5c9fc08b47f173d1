export { parseDelay, parseDirective, splitDirectiveLines, stripDelaySuffix, tokenize } from './directive/parser.js';
export type { DelaySuffixMode, DirectiveLine, ParsedDirective } from './directive/types.js';
export { DirectiveRunner, MAX_TIMER_MS, readDirectiveFile, sleepFor } from './runner/runner.js';
export type { RunnerOptions, RunSummary } from './runner/runner.js';
export { DetachedRegistry } from './runner/registry.js';
export type { DetachedExit } from './runner/registry.js';
export { formatArgv, silentSink, stdoutSink } from './runner/trace.js';
export type { TraceSink } from './runner/trace.js';
export { ExecaLauncher } from './shared/exec.js';
export type { DetachedHandle, ExecaLauncherOptions, ExitStatus, Launcher } from './shared/exec.js';
export { RunnerError, RunnerErrorCode } from './shared/errors.js';
export { loadConfig, parseConfig, RunnerConfigSchema } from './config/loader.js';
export type { ConfigResult, RunnerConfig } from './config/loader.js';
export { main } from './cli.js';
