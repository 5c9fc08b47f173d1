import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { DirectiveRunner, MAX_TIMER_MS, readDirectiveFile, sleepFor } from '../../../src/runner/runner.js';
import { DetachedRegistry } from '../../../src/runner/registry.js';
import { RunnerError, RunnerErrorCode } from '../../../src/shared/errors.js';
import type { ExitStatus } from '../../../src/shared/exec.js';
import { CapturingSink, FakeLauncher, flushPromises } from './fakes.js';

const SAMPLE = ['echo "HELLO"', 'echo "HELLO" @10', 'ping google.com -t 256', 'echo "WORLD" | cat', ''].join('\n');

function setup(delaySuffix: 'literal' | 'strip' = 'literal') {
  const launcher = new FakeLauncher();
  const sink = new CapturingSink();
  const registry = new DetachedRegistry();
  const runner = new DirectiveRunner({ launcher, sink, registry, delaySuffix, sleep: launcher.sleep });
  return { launcher, sink, registry, runner };
}

describe('DirectiveRunner.runText', () => {
  it('runs the sample directives in order, sleeping after the delayed line', async () => {
    const { launcher, runner } = setup();
    const summary = await runner.runText(SAMPLE);

    expect(launcher.events).toEqual([
      { detached: ['echo', '"HELLO"'] },
      { detached: ['echo', '"HELLO"', '@10'] },
      { sleep: 10000 },
      { detached: ['ping', 'google.com', '-t', '256'] },
      { pipe: [['echo', '"WORLD"'], ['cat']] },
    ]);
    expect(summary).toEqual({ lines: 4, detached: 3, piped: 1, sleptSeconds: 10 });
  });

  it('emits trace lines for every parse, execution and wait', async () => {
    const { sink, runner } = setup();
    await runner.runText('echo "HELLO" @10\necho "WORLD" | cat');

    expect(sink.lines).toEqual([
      '[parsing command] [ echo "HELLO" @10 ]',
      '[EXC] ["echo","\\"HELLO\\"","@10"]',
      '[parsing waiting] [ 10 ]',
      '[parsing command] [ echo "WORLD" | cat ]',
      '[EXC] ["echo","\\"WORLD\\""] | ["cat"]',
    ]);
  });

  it('launches nothing for blank lines', async () => {
    const { launcher, runner } = setup();
    const summary = await runner.runText('echo a\n\n\r\necho b\n');

    expect(launcher.events).toEqual([{ detached: ['echo', 'a'] }, { detached: ['echo', 'b'] }]);
    expect(summary.lines).toBe(2);
  });

  it('treats a line starting with | as a single command', async () => {
    const { launcher, runner } = setup();
    await runner.runText('| cat');
    expect(launcher.events).toEqual([{ detached: ['|', 'cat'] }]);
  });

  it('strips the delay suffix from the argv in strip mode', async () => {
    const { launcher, runner } = setup('strip');
    await runner.runText('echo "HELLO" @10');
    expect(launcher.events).toEqual([{ detached: ['echo', '"HELLO"'] }, { sleep: 10000 }]);
  });

  it('only sleeps for a bare delay in strip mode', async () => {
    const { launcher, sink, runner } = setup('strip');
    const summary = await runner.runText('@1.5');

    expect(launcher.events).toEqual([{ sleep: 1500 }]);
    expect(sink.lines).toEqual(['[parsing command] [ @1.5 ]', '[parsing waiting] [ 1.5 ]']);
    expect(summary).toEqual({ lines: 1, detached: 0, piped: 0, sleptSeconds: 1.5 });
  });

  it('blocks on a piped line until the second stage exits', async () => {
    const { launcher, runner } = setup();
    let finishPipe: (status: ExitStatus) => void = () => {};
    launcher.pipeResult = new Promise((resolve) => {
      finishPipe = resolve;
    });

    const run = runner.runText('echo a | cat\necho b');
    await flushPromises();
    expect(launcher.events).toEqual([{ pipe: [['echo', 'a'], ['cat']] }]);

    finishPipe({ exitCode: 0 });
    await run;
    expect(launcher.events).toEqual([{ pipe: [['echo', 'a'], ['cat']] }, { detached: ['echo', 'b'] }]);
  });

  it('tracks detached launches in the registry', async () => {
    const { registry, runner } = setup();
    await runner.runText('echo a\necho b | cat\necho c');

    const exits = await registry.waitAll();
    expect(exits).toEqual([
      { argv: ['echo', 'a'], pid: 100, exitCode: 0 },
      { argv: ['echo', 'c'], pid: 101, exitCode: 0 },
    ]);
  });

  it('aborts the batch on a launch failure and reports the line number', async () => {
    const { launcher, runner } = setup();
    launcher.failOn = (argv) =>
      argv[0] === 'missing'
        ? new RunnerError(RunnerErrorCode.LAUNCH_FAILED, 'Command failed to spawn: missing', { argv: [...argv] })
        : undefined;

    await expect(runner.runText('echo a\nmissing x\necho b')).rejects.toMatchObject({
      code: RunnerErrorCode.LAUNCH_FAILED,
      context: { argv: ['missing', 'x'], lineNumber: 2 },
    });
    expect(launcher.events).toEqual([{ detached: ['echo', 'a'] }]);
  });

  it('aborts the batch on an invalid delay', async () => {
    const { launcher, runner } = setup();

    await expect(runner.runText('echo a\necho b @soon\necho c')).rejects.toMatchObject({
      code: RunnerErrorCode.INVALID_DELAY,
      context: { lineNumber: 2, value: 'soon' },
    });
    expect(launcher.events).toEqual([{ detached: ['echo', 'a'] }]);
  });

  it('does not rewrap errors that are not RunnerErrors', async () => {
    const { launcher, runner } = setup();
    const boom = new TypeError('boom');
    launcher.failOn = () => boom;

    await expect(runner.runText('echo a')).rejects.toBe(boom);
  });
});

describe('DirectiveRunner.runFile', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'directive-runner-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
  });

  it('reads and runs a directive file', async () => {
    const file = path.join(tmpDir, 'commands.txt');
    await fs.writeFile(file, 'echo "HELLO"\necho "WORLD" | cat\n', 'utf-8');
    const { launcher, sink, runner } = setup();

    await runner.runFile(file);

    expect(sink.lines[0]).toBe(`[parsing start] ${file}`);
    expect(launcher.events).toEqual([
      { detached: ['echo', '"HELLO"'] },
      { pipe: [['echo', '"WORLD"'], ['cat']] },
    ]);
  });

  it('runs nothing for an empty file', async () => {
    const file = path.join(tmpDir, 'empty.txt');
    await fs.writeFile(file, '', 'utf-8');
    const { launcher, sink, runner } = setup();

    const summary = await runner.runFile(file);

    expect(summary).toEqual({ lines: 0, detached: 0, piped: 0, sleptSeconds: 0 });
    expect(launcher.events).toEqual([]);
    expect(sink.lines).toEqual([`[parsing start] ${file}`]);
  });

  it('fails before running anything when the file is missing', async () => {
    const file = path.join(tmpDir, 'nope.txt');
    const { launcher, runner } = setup();

    await expect(runner.runFile(file)).rejects.toMatchObject({
      code: RunnerErrorCode.DIRECTIVE_FILE_UNREADABLE,
      context: { path: file },
    });
    expect(launcher.events).toEqual([]);
  });
});

describe('readDirectiveFile', () => {
  it('wraps the underlying error message as the cause', async () => {
    const missing = path.join(os.tmpdir(), 'directive-runner-does-not-exist', 'x.txt');
    await expect(readDirectiveFile(missing)).rejects.toThrow(RunnerError);
    await expect(readDirectiveFile(missing)).rejects.toMatchObject({
      context: { cause: expect.stringContaining('ENOENT') },
    });
  });
});

describe('sleepFor', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('waits the full duration of a delay longer than one timer allows', async () => {
    let done = false;
    const sleeping = sleepFor(MAX_TIMER_MS + 1000).then(() => {
      done = true;
    });

    await jest.advanceTimersByTimeAsync(MAX_TIMER_MS);
    expect(done).toBe(false);

    await jest.advanceTimersByTimeAsync(1000);
    await sleeping;
    expect(done).toBe(true);
  });

  it('is the runner default, so a long @ delay is not cut short', async () => {
    const launcher = new FakeLauncher();
    const runner = new DirectiveRunner({ launcher, sink: new CapturingSink() });

    let finished = false;
    // 2147484 s is 353 ms past the single-timer limit.
    const run = runner.runText('echo a @2147484').then((summary) => {
      finished = true;
      return summary;
    });
    while (jest.getTimerCount() === 0) {
      await Promise.resolve();
    }

    await jest.advanceTimersByTimeAsync(MAX_TIMER_MS);
    expect(launcher.events).toEqual([{ detached: ['echo', 'a', '@2147484'] }]);
    expect(finished).toBe(false);

    await jest.advanceTimersByTimeAsync(353);
    await expect(run).resolves.toEqual({ lines: 1, detached: 1, piped: 0, sleptSeconds: 2147484 });
    expect(finished).toBe(true);
  });
});
