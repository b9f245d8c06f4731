/**
 * Bounded set of item keys already delivered to a session. Eviction follows
 * first-seen order: re-adding or looking up a key does not refresh it.
 */
export class SeenCache {
  private keys = new Set<string>();

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`SeenCache capacity must be a positive integer, got ${capacity}`);
    }
  }

  contains(key: string): boolean {
    return this.keys.has(key);
  }

  /** Returns true when the key was not present before. */
  add(key: string): boolean {
    if (this.keys.has(key)) return false;
    this.keys.add(key);
    while (this.keys.size > this.capacity) {
      const oldest = this.keys.values().next();
      if (oldest.done) break;
      this.keys.delete(oldest.value);
    }
    return true;
  }

  clear(): void {
    this.keys.clear();
  }

  size(): number {
    return this.keys.size;
  }
}
