/** Newest-first list of recent batches; the oldest entry falls off past capacity. */
export class HistoryRing<T> {
  private entries: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`HistoryRing capacity must be a positive integer, got ${capacity}`);
    }
  }

  pushFront(entry: T): void {
    this.entries.unshift(entry);
    if (this.entries.length > this.capacity) {
      this.entries.length = this.capacity;
    }
  }

  list(): T[] {
    return [...this.entries];
  }

  size(): number {
    return this.entries.length;
  }
}
