// src/loop/driver.ts
import { setImmediate as yieldToIo } from "node:timers/promises";

/** What a driver needs from the thing it steps. */
export interface Steppable {
  processOneReadyEvent(): boolean;
  whenReady(signal?: AbortSignal): Promise<void>;
}

export interface LoopDriverOptions {
  /** Events handled before yielding back to Node's own I/O. Default: 64 */
  maxBatch?: number;
}

/**
 * Embeds a stepped client in the Node event loop: handle ready events
 * until none remain, then wait for the next one.
 */
export class LoopDriver {
  private readonly maxBatch: number;
  private abort: AbortController | undefined;
  private running: Promise<void> | undefined;
  private failure: unknown;

  constructor(private readonly target: Steppable, opts: LoopDriverOptions = {}) {
    const maxBatch = opts.maxBatch ?? 64;
    if (!Number.isInteger(maxBatch) || maxBatch <= 0) {
      throw new Error(`maxBatch must be an integer > 0 (got ${maxBatch})`);
    }
    this.maxBatch = maxBatch;
  }

  get isRunning(): boolean {
    return this.running !== undefined;
  }

  start(): void {
    if (this.running) return;
    const abort = new AbortController();
    this.abort = abort;
    this.failure = undefined;
    this.running = this.loop(abort.signal).catch((err: unknown) => {
      this.failure = err;
    });
  }

  /** Stops the loop; rethrows whatever made it fail, if anything. */
  async stop(): Promise<void> {
    const running = this.running;
    if (!running) return;

    this.abort?.abort();
    await running;
    this.running = undefined;
    this.abort = undefined;

    if (this.failure !== undefined) {
      const err = this.failure;
      this.failure = undefined;
      throw err;
    }
  }

  private async loop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let handled = 0;
      while (handled < this.maxBatch && this.target.processOneReadyEvent()) handled += 1;

      if (handled === this.maxBatch) {
        await yieldToIo();
        continue;
      }

      try {
        await this.target.whenReady(signal);
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }
    }
  }
}
