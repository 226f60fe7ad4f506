export const SEEN_SET_CAPACITY = 100;

/**
 * Message IDs the bot has already handled, in insertion order.
 * Once the set grows past its capacity the oldest insertions are dropped.
 */
export class SeenMessageSet {
  private ids: Set<string> = new Set();

  constructor(private readonly capacity: number = SEEN_SET_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Seen-set capacity must be a positive integer, got ${capacity}`);
    }
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  /**
   * Mark a message as handled. Re-adding a known ID keeps its original position.
   */
  add(id: string): void {
    this.ids.add(id);
    this.trim();
  }

  addAll(ids: Iterable<string>): void {
    for (const id of ids) {
      this.add(id);
    }
  }

  get size(): number {
    return this.ids.size;
  }

  /**
   * IDs from oldest to newest insertion
   */
  toArray(): string[] {
    return [...this.ids];
  }

  private trim(): void {
    while (this.ids.size > this.capacity) {
      const oldest = this.ids.values().next();
      if (oldest.done) return;
      this.ids.delete(oldest.value);
    }
  }
}
