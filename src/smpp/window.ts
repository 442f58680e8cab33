import { DuplicateSequenceError } from './errors.js';

/**
 * Outstanding requests keyed by sequence number.
 * An entry is removed exactly once: by resolve() or by drainAll().
 */
export class PendingWindow<T> {
  private readonly entries = new Map<number, T>();

  get size(): number {
    return this.entries.size;
  }

  has(seq: number): boolean {
    return this.entries.has(seq);
  }

  register(seq: number, requester: T): void {
    if (this.entries.has(seq)) {
      throw new DuplicateSequenceError(seq);
    }
    this.entries.set(seq, requester);
  }

  /** Returns undefined for unknown, expired or already-resolved numbers. */
  resolve(seq: number): T | undefined {
    const requester = this.entries.get(seq);
    if (requester === undefined) return undefined;
    this.entries.delete(seq);
    return requester;
  }

  /** Empty the window, returning requesters in registration order. */
  drainAll(): T[] {
    const requesters = [...this.entries.values()];
    this.entries.clear();
    return requesters;
  }
}
