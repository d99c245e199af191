// src/pool.ts
import { InvariantViolationError } from "./errors.js";

export interface PooledConnection {
  readonly slot: number;
  /** Drop per-request state so the slot can be bound again. */
  clear(): void;
}

/**
 * Fixed-capacity connection arena with an index free list.
 *
 * - Slots are created once, at construction, and recycled forever.
 * - The free and bound index sets are disjoint; every acquire/release checks it.
 * - The most recently released slot is the next one handed out.
 */
export class ConnectionPool<C extends PooledConnection> {
  private readonly slots: readonly C[];
  private readonly free: number[] = [];
  private readonly bound = new Set<number>();

  constructor(capacity: number, factory: (slot: number) => C) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`capacity must be an integer > 0 (got ${capacity})`);
    }

    const slots: C[] = [];
    for (let i = 0; i < capacity; i++) {
      const conn = factory(i);
      if (conn.slot !== i) throw new Error(`factory returned slot ${conn.slot} for index ${i}`);
      slots.push(conn);
    }
    this.slots = slots;

    // Stack: slot 0 on top.
    for (let i = capacity - 1; i >= 0; i--) this.free.push(i);
  }

  /**
   * A free connection, or undefined when every slot is bound.
   * Check `freeCount` first instead of relying on this to signal exhaustion.
   */
  acquire(): C | undefined {
    const slot = this.free.pop();
    if (slot === undefined) return undefined;

    if (this.bound.has(slot)) {
      throw new InvariantViolationError(`slot ${slot} is both free and bound`);
    }
    this.bound.add(slot);
    return this.slots[slot];
  }

  release(conn: C): void {
    const { slot } = conn;
    if (this.slots[slot] !== conn) {
      throw new InvariantViolationError(`connection for slot ${slot} does not belong to this pool`);
    }
    if (!this.bound.has(slot)) {
      throw new InvariantViolationError(`release() of slot ${slot} which is not bound`);
    }

    conn.clear();
    this.bound.delete(slot);
    this.free.push(slot);
  }

  at(slot: number): C | undefined {
    return this.slots[slot];
  }

  boundConnections(): C[] {
    return [...this.bound].map((slot) => this.slots[slot]);
  }

  get capacity(): number {
    return this.slots.length;
  }

  get freeCount(): number {
    return this.free.length;
  }

  get boundCount(): number {
    return this.bound.size;
  }

  snapshot(): { capacity: number; bound: number; free: number } {
    return { capacity: this.capacity, bound: this.boundCount, free: this.freeCount };
  }
}
