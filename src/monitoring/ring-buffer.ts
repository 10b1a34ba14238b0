/**
 * Fixed-capacity FIFO. Pushing into a full buffer evicts the oldest item.
 */
export class RingBuffer<T> {
  private readonly items: Array<T | undefined>
  private head = 0
  private count = 0

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`)
    }
    this.items = new Array<T | undefined>(capacity)
  }

  push(item: T): void {
    const tail = (this.head + this.count) % this.capacity
    this.items[tail] = item
    if (this.count < this.capacity) {
      this.count++
    } else {
      this.head = (this.head + 1) % this.capacity
    }
  }

  /** Items oldest first */
  toArray(): T[] {
    const out: T[] = []
    for (let i = 0; i < this.count; i++) {
      const item = this.items[(this.head + i) % this.capacity]
      if (item !== undefined) out.push(item)
    }
    return out
  }

  clear(): void {
    this.items.fill(undefined)
    this.head = 0
    this.count = 0
  }

  get size(): number {
    return this.count
  }
}
