// src/queue.ts
import type { HttpRequest } from "./types.js";

/**
 * FIFO of submitted requests that are not bound to a connection yet.
 * A request leaves the queue at most once and never re-enters it.
 */
export class RequestQueue {
  private items: HttpRequest[] = [];

  push(request: HttpRequest): number {
    this.items.push(request);
    return this.items.length;
  }

  /** Remove up to `n` requests from the head, oldest first. */
  popUpTo(n: number): HttpRequest[] {
    if (n <= 0) return [];
    return this.items.splice(0, Math.min(n, this.items.length));
  }

  drainAll(): HttpRequest[] {
    const out = this.items;
    this.items = [];
    return out;
  }

  get size(): number {
    return this.items.length;
  }
}
