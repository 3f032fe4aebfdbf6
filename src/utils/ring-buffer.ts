/**
 * Fixed-capacity circular buffer with a byte budget.
 *
 * Slots live in one preallocated arena addressed by head/count cursors, so
 * pushes and shifts never allocate. Each item carries a byte size; the ring
 * tracks the resident total against `capacityBytes`. Callers decide what
 * happens on overflow: {@link fits} lets them wait, {@link evictFor} drops
 * from the head until the newcomer fits.
 */
export class RingBuffer<T> {
  private slots: (T | undefined)[];
  private sizes: Float64Array;
  private head = 0; // oldest item
  private count = 0;
  private resident = 0;

  constructor(
    readonly capacityBytes: number,
    readonly slotCapacity: number,
    private readonly sizeOf: (item: T) => number,
  ) {
    if (!Number.isInteger(capacityBytes) || capacityBytes < 1) {
      throw new RangeError("RingBuffer byte capacity must be a positive integer");
    }
    if (!Number.isInteger(slotCapacity) || slotCapacity < 1) {
      throw new RangeError("RingBuffer slot capacity must be a positive integer");
    }
    this.slots = new Array<T | undefined>(slotCapacity);
    this.sizes = new Float64Array(slotCapacity);
  }

  get size(): number {
    return this.count;
  }

  /** Resident bytes. Never exceeds `capacityBytes`. */
  get bytes(): number {
    return this.resident;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  /** Whether `item` can be pushed without evicting anything. */
  fits(item: T): boolean {
    return this.count < this.slotCapacity && this.resident + this.sizeOf(item) <= this.capacityBytes;
  }

  /** Whether `item` could ever fit, even in an empty ring. */
  canEverFit(item: T): boolean {
    return this.sizeOf(item) <= this.capacityBytes;
  }

  /**
   * Drop oldest items until `item` fits. Returns the evicted items, oldest
   * first. Throws if the item is larger than the whole budget.
   */
  evictFor(item: T): T[] {
    if (!this.canEverFit(item)) {
      throw new RangeError(
        `Item of ${this.sizeOf(item)} bytes exceeds ring capacity of ${this.capacityBytes} bytes`,
      );
    }
    const evicted: T[] = [];
    while (!this.fits(item)) {
      const oldest = this.shift();
      if (oldest === undefined) break;
      evicted.push(oldest);
    }
    return evicted;
  }

  /** Append at the tail. The caller guarantees the item fits. */
  push(item: T): void {
    if (!this.fits(item)) {
      throw new RangeError("RingBuffer push would exceed capacity; evict or wait first");
    }
    const tail = (this.head + this.count) % this.slotCapacity;
    const size = this.sizeOf(item);
    this.slots[tail] = item;
    this.sizes[tail] = size;
    this.count++;
    this.resident += size;
  }

  /** Remove and return the oldest item. */
  shift(): T | undefined {
    if (this.count === 0) return undefined;
    const item = this.slots[this.head];
    this.resident -= this.sizes[this.head] ?? 0;
    this.slots[this.head] = undefined;
    this.sizes[this.head] = 0;
    this.head = (this.head + 1) % this.slotCapacity;
    this.count--;
    return item;
  }

  /** Oldest item without removing it. */
  peek(): T | undefined {
    return this.count === 0 ? undefined : this.slots[this.head];
  }

  /** Return items in insertion order (oldest first). */
  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.slotCapacity];
      if (item !== undefined) result.push(item);
    }
    return result;
  }

  /** Remove the `n` oldest items. Returns how many were removed. */
  discard(n: number): number {
    let removed = 0;
    while (removed < n && this.shift() !== undefined) removed++;
    return removed;
  }

  clear(): number {
    const dropped = this.count;
    this.slots = new Array<T | undefined>(this.slotCapacity);
    this.sizes = new Float64Array(this.slotCapacity);
    this.head = 0;
    this.count = 0;
    this.resident = 0;
    return dropped;
  }
}
