import execa from 'execa';
import type { ExecaChildProcess } from 'execa';
import { RunnerError, RunnerErrorCode, causeOf } from './errors.js';
import { logger } from './logger.js';

export interface ExitStatus {
  exitCode: number;
  signal?: string;
}

export interface DetachedHandle {
  readonly argv: readonly string[];
  readonly pid?: number;
  /** Settles when the child exits. Never rejects. */
  readonly exited: Promise<ExitStatus>;
}

export interface Launcher {
  /** Start a process and return as soon as it has spawned. */
  launchDetached(argv: readonly string[]): Promise<DetachedHandle>;
  /** Feed `left`'s stdout into `right`'s stdin and wait for `right` to exit. Output is discarded. */
  launchAndAwaitPipe(left: readonly string[], right: readonly string[]): Promise<ExitStatus>;
}

export interface ExecaLauncherOptions {
  /**
   * Keep the event loop alive until detached children exit. When false the
   * children are unref'd and outlive the runner.
   */
  holdDetached?: boolean;
}

function splitArgv(argv: readonly string[]): [string, string[]] {
  const [command = '', ...args] = argv;
  return [command, args];
}

/**
 * Resolves on the child's `spawn` event; rejects with LAUNCH_FAILED on `error`
 * or when execa could not create the process at all.
 */
function whenSpawned(child: ExecaChildProcess, argv: readonly string[]): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const fail = (err: unknown): void => {
      reject(
        new RunnerError(RunnerErrorCode.LAUNCH_FAILED, `Command failed to spawn: ${argv[0] ?? ''}`, {
          argv: [...argv],
          cause: causeOf(err),
        }),
      );
    };
    child.once('spawn', () => resolve());
    child.once('error', fail);
    void child.catch(fail);
  });
}

// A signal-killed child reports a null exit code.
function toExitStatus(result: { exitCode: number | null; signal?: string }): ExitStatus {
  return {
    exitCode: result.exitCode ?? (result.signal ? 128 : 0),
    signal: result.signal,
  };
}

export class ExecaLauncher implements Launcher {
  private readonly holdDetached: boolean;

  constructor(options: ExecaLauncherOptions = {}) {
    this.holdDetached = options.holdDetached ?? false;
  }

  async launchDetached(argv: readonly string[]): Promise<DetachedHandle> {
    const [command, args] = splitArgv(argv);
    const child = execa(command, args, {
      stdio: 'inherit',
      reject: false,
      // execa would otherwise kill the child when this process exits.
      cleanup: false,
    });
    await whenSpawned(child, argv);
    if (!this.holdDetached) {
      child.unref();
    }
    logger.debug({ argv, pid: child.pid }, 'detached process spawned');
    return { argv, pid: child.pid, exited: child.then(toExitStatus) };
  }

  async launchAndAwaitPipe(left: readonly string[], right: readonly string[]): Promise<ExitStatus> {
    const [leftCommand, leftArgs] = splitArgv(left);
    const [rightCommand, rightArgs] = splitArgv(right);

    // buffer: false so the parent never reads from the pipe the right stage consumes.
    const producer = execa(leftCommand, leftArgs, {
      stdin: 'inherit',
      stdout: 'pipe',
      stderr: 'inherit',
      buffer: false,
      reject: false,
    });
    await whenSpawned(producer, left);

    const pipe = producer.stdout;
    if (!pipe) {
      throw new RunnerError(RunnerErrorCode.LAUNCH_FAILED, `No stdout pipe for ${leftCommand}`, {
        argv: [...left],
      });
    }

    const consumer = execa(rightCommand, rightArgs, {
      stdin: pipe,
      stdout: 'ignore',
      stderr: 'inherit',
      buffer: false,
      reject: false,
    });
    try {
      await whenSpawned(consumer, right);
    } finally {
      // The consumer holds its own copy of the read end. If it never spawned,
      // closing ours lets the producer die of SIGPIPE.
      pipe.destroy();
    }

    const result = await consumer;
    logger.debug({ left, right, exitCode: result.exitCode }, 'piped process finished');
    return toExitStatus(result);
  }
}
