import type { Identifier } from "../scan/scan.types";

export type PopResult = { done: true } | { done: false; value: Identifier };

/**
 * Pending identifiers shared by all workers of a run, handed out from a cursor over an
 * inclusive range so memory stays constant whatever the range size.
 *
 * Pops are synchronous, so an identifier handed to one worker is never seen by another.
 * `taskDone` only feeds the in-flight count; nothing is ever re-delivered.
 */
export class WorkQueue {
  private next: Identifier;
  private outstanding = 0;

  private constructor(start: Identifier, private readonly end: Identifier) {
    this.next = start;
  }

  static fromRange(start: Identifier, end: Identifier): WorkQueue {
    if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end) || start < 1 || end < start) {
      throw new Error(`Invalid identifier range [${start}..${end}]`);
    }
    return new WorkQueue(start, end);
  }

  get size(): number {
    return Math.max(0, this.end - this.next + 1);
  }

  get inFlight(): number {
    return this.outstanding;
  }

  tryPop(): PopResult {
    if (this.next > this.end) return { done: true };

    const value = this.next;
    this.next += 1;
    this.outstanding += 1;
    return { done: false, value };
  }

  taskDone(): void {
    if (this.outstanding === 0) {
      throw new Error("taskDone() called more times than items were popped");
    }
    this.outstanding -= 1;
  }

  /** Drops every pending identifier without handing it out; returns how many were dropped. */
  drain(): number {
    const dropped = this.size;
    this.next = this.end + 1;
    return dropped;
  }
}
