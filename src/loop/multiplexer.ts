// src/loop/multiplexer.ts
import { EventEmitter, once } from "node:events";

export type Descriptor = number;

export interface Readiness {
  input: boolean;
  output: boolean;
}

export type Interest = Readiness;

export interface ReadyEvent extends Readiness {
  fd: Descriptor;
}

export type ReadyHandler = (event: ReadyEvent) => void;

/** The part of the multiplexer a descriptor owner needs. */
export interface DescriptorTable {
  allocate(): Descriptor;
  notify(fd: Descriptor, readiness: Readiness): void;
}

interface Registration {
  interest: Interest;
  handler: ReadyHandler;
}

/**
 * Process-local readiness multiplexer.
 *
 * Descriptors are numbers handed out by `allocate()`. Whoever owns a
 * descriptor reports readiness through `notify()`; the embedder steps the
 * multiplexer with `processOneReadyEvent()`, which hands one event to the
 * handler registered for that descriptor.
 *
 * Pending readiness is level-like: it coalesces per descriptor and stays
 * pending until the registered interest covers it.
 */
export class Multiplexer extends EventEmitter implements DescriptorTable {
  private nextFd = 0;
  readonly fd: Descriptor;

  private readonly handlers = new Map<Descriptor, Registration>();
  // insertion-ordered: delivery follows notification order
  private readonly pending = new Map<Descriptor, Readiness>();

  constructor() {
    super();
    this.fd = this.allocate();
  }

  allocate(): Descriptor {
    return this.nextFd++;
  }

  register(fd: Descriptor, interest: Interest, handler: ReadyHandler): void {
    if (this.handlers.has(fd)) {
      throw new Error(`descriptor ${fd} is already registered`);
    }
    this.handlers.set(fd, { interest: { ...interest }, handler });
    this.announceIfReady();
  }

  modify(fd: Descriptor, interest: Interest): void {
    const reg = this.handlers.get(fd);
    if (!reg) throw new Error(`descriptor ${fd} is not registered`);
    reg.interest = { ...interest };
    this.announceIfReady();
  }

  /** Returns false when the descriptor was not registered. */
  unregister(fd: Descriptor): boolean {
    this.pending.delete(fd);
    return this.handlers.delete(fd);
  }

  isRegistered(fd: Descriptor): boolean {
    return this.handlers.has(fd);
  }

  notify(fd: Descriptor, readiness: Readiness): void {
    if (!this.handlers.has(fd)) return;

    const prev = this.pending.get(fd);
    if (prev) {
      prev.input ||= readiness.input;
      prev.output ||= readiness.output;
    } else {
      this.pending.set(fd, { input: readiness.input, output: readiness.output });
    }
    this.announceIfReady();
  }

  fdToWaitOn(): Descriptor {
    return this.fd;
  }

  hasReadyEvent(): boolean {
    return this.nextDeliverable() !== undefined;
  }

  /**
   * Deliver exactly one ready event. Returns false when nothing was deliverable.
   */
  processOneReadyEvent(): boolean {
    const next = this.nextDeliverable();
    if (!next) return false;

    const { fd, reg, ready } = next;
    const input = ready.input && reg.interest.input;
    const output = ready.output && reg.interest.output;

    // Keep whatever the current interest did not cover.
    ready.input = ready.input && !input;
    ready.output = ready.output && !output;
    if (!ready.input && !ready.output) this.pending.delete(fd);

    reg.handler({ fd, input, output });
    return true;
  }

  /**
   * Resolves once an event can be delivered. Rejects with an AbortError if
   * `signal` aborts first.
   */
  async whenReady(signal?: AbortSignal): Promise<void> {
    if (this.hasReadyEvent()) return;
    await once(this, "ready", signal ? { signal } : {});
  }

  private nextDeliverable(): { fd: Descriptor; reg: Registration; ready: Readiness } | undefined {
    for (const [fd, ready] of this.pending) {
      const reg = this.handlers.get(fd);
      if (!reg) continue;
      if ((ready.input && reg.interest.input) || (ready.output && reg.interest.output)) {
        return { fd, reg, ready };
      }
    }
    return undefined;
  }

  private announceIfReady(): void {
    if (this.listenerCount("ready") > 0 && this.hasReadyEvent()) {
      this.emit("ready");
    }
  }
}
