/**
 * Fixed-interval polling loop
 */

import { errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("loop");

export class IntervalLoop {
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;

  constructor(
    readonly name: string,
    private readonly intervalMs: number,
    private readonly tick: () => Promise<void> | void,
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(runImmediately = true): void {
    if (this.timer) {
      log.warn(`${this.name} loop is already running`);
      return;
    }

    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);

    if (runImmediately) {
      void this.runOnce();
    }
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Run one tick now. Never rejects; a tick still in progress is not overlapped.
   */
  async runOnce(): Promise<void> {
    if (this.ticking) {
      log.debug(`${this.name} tick still in progress, skipping`);
      return;
    }

    this.ticking = true;
    try {
      await this.tick();
    } catch (error) {
      log.error(`${this.name} tick failed: ${errorMessage(error)}`);
    } finally {
      this.ticking = false;
    }
  }
}
