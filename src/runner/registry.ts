import type { DetachedHandle, ExitStatus } from '../shared/exec.js';
import { logger } from '../shared/logger.js';

export interface DetachedExit extends ExitStatus {
  argv: readonly string[];
  pid?: number;
}

/**
 * Keeps track of detached children so a caller can join them. Nothing here
 * blocks the runner; joining happens only through waitAll().
 */
export class DetachedRegistry {
  private readonly pending = new Set<Promise<DetachedExit>>();
  private readonly finished: DetachedExit[] = [];

  track(handle: DetachedHandle): void {
    const settled: Promise<DetachedExit> = handle.exited.then((status) => {
      const exit: DetachedExit = { argv: handle.argv, pid: handle.pid, ...status };
      this.pending.delete(settled);
      this.finished.push(exit);
      logger.debug(exit, 'detached process exited');
      return exit;
    });
    this.pending.add(settled);
  }

  get outstanding(): number {
    return this.pending.size;
  }

  get exits(): readonly DetachedExit[] {
    return this.finished;
  }

  /** Resolves once every tracked child, including ones tracked while waiting, has exited. */
  async waitAll(): Promise<DetachedExit[]> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
    return [...this.finished];
  }
}
