// src/loop/timer.ts
import type { Descriptor, DescriptorTable } from "./multiplexer.js";

// Largest delay setTimeout honours; longer ones fire after 1 ms.
export const MAX_TIMER_DELAY = 2_147_483_647;

/**
 * Rearmable one-shot deadline. When it fires, the timer descriptor becomes
 * input-ready; `read()` consumes the expiration.
 */
export class TimerSignal {
  readonly fd: Descriptor;
  private timer: NodeJS.Timeout | undefined;
  private expirations = 0;

  constructor(private readonly descriptors: DescriptorTable) {
    this.fd = descriptors.allocate();
  }

  /**
   * Replaces any pending deadline. Delays past MAX_TIMER_DELAY fire early,
   * at MAX_TIMER_DELAY; the owner rearms for whatever is left.
   */
  arm(ms: number): void {
    if (Number.isNaN(ms) || ms < 0) {
      throw new Error(`timer delay must be >= 0 (got ${ms})`);
    }
    this.cancel();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.expirations += 1;
      this.descriptors.notify(this.fd, { input: true, output: false });
    }, Math.min(ms, MAX_TIMER_DELAY));
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  read(): number {
    const n = this.expirations;
    this.expirations = 0;
    return n;
  }

  get armed(): boolean {
    return this.timer !== undefined;
  }
}
