// src/loop/wakeup.ts
import type { Descriptor, DescriptorTable } from "./multiplexer.js";

/**
 * Wakes the loop when new work may exist.
 *
 * Signals raised before the loop gets around to draining them collapse into
 * a single input-readiness event on the wakeup descriptor.
 */
export class WakeupSignal {
  readonly fd: Descriptor;
  private count = 0;

  constructor(private readonly descriptors: DescriptorTable) {
    this.fd = descriptors.allocate();
  }

  signal(): void {
    this.count += 1;
    if (this.count === 1) {
      this.descriptors.notify(this.fd, { input: true, output: false });
    }
  }

  /** Consume pending signals; false when there were none. */
  tryRead(): boolean {
    if (this.count === 0) return false;
    this.count = 0;
    return true;
  }

  /** Returns how many signals were coalesced into this wake. */
  drain(): number {
    const n = this.count;
    while (this.tryRead());
    return n;
  }

  get pending(): boolean {
    return this.count > 0;
  }
}
