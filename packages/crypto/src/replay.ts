/**
 * Replay protection: sliding-window message id deduplication.
 *
 * A message id that has been accepted once is rejected until it falls
 * out of the window. The window is bounded; the oldest ids go first.
 *
 * @module replay
 */

const DEFAULT_WINDOW_SIZE = 5_000;

export class ReplayGuard {
  private seen: Set<string>;
  private order: string[];
  private readonly maxSize: number;

  constructor(windowSize: number = DEFAULT_WINDOW_SIZE) {
    if (windowSize < 1) {
      throw new RangeError("Replay window must hold at least one id");
    }
    this.seen = new Set();
    this.order = [];
    this.maxSize = windowSize;
  }

  /**
   * Records the id and returns true, or returns false if it was already seen.
   */
  accept(messageId: string): boolean {
    if (this.seen.has(messageId)) {
      return false;
    }

    this.seen.add(messageId);
    this.order.push(messageId);

    while (this.order.length > this.maxSize) {
      const oldest = this.order.shift();
      if (oldest === undefined) break;
      this.seen.delete(oldest);
    }

    return true;
  }

  hasSeen(messageId: string): boolean {
    return this.seen.has(messageId);
  }

  get size(): number {
    return this.seen.size;
  }

  clear(): void {
    this.seen.clear();
    this.order = [];
  }

  /** Ids in acceptance order, oldest first. */
  export(): { seen: string[]; maxSize: number } {
    return { seen: [...this.order], maxSize: this.maxSize };
  }

  static import(data: { seen: string[]; maxSize: number }): ReplayGuard {
    const guard = new ReplayGuard(data.maxSize);
    for (const id of data.seen) {
      guard.accept(id);
    }
    return guard;
  }
}
