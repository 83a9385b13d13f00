/** FIFO with a fixed capacity; pushing onto a full queue evicts the oldest entry. */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private droppedCount = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  /** Returns the evicted entry, if any. */
  public push(item: T): T | undefined {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.droppedCount++;
      return this.items.shift();
    }
    return undefined;
  }

  public shift(): T | undefined {
    return this.items.shift();
  }

  public clear(): void {
    this.items.length = 0;
  }
}
