// simulator/road/RoadVehicleQueue.ts
// Road-local vehicle order: front = lead vehicle (closest to the road end), back = newest arrival.
// Ring buffer so head removal and tail append are both O(1).

const INITIAL_CAPACITY = 16;

export class RoadVehicleQueue<T> implements Iterable<T> {
  private slots: (T | undefined)[];
  private head = 0;
  private count = 0;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.slots = new Array<T | undefined>(Math.max(1, initialCapacity));
  }

  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  /** Append at the back (newest vehicle on the road) */
  push(item: T): void {
    if (this.count === this.slots.length) {
      this.grow();
    }
    this.slots[(this.head + this.count) % this.slots.length] = item;
    this.count++;
  }

  /** Remove and return the lead vehicle */
  shift(): T | undefined {
    if (this.count === 0) return undefined;

    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.slots.length;
    this.count--;
    if (this.count === 0) this.head = 0;
    return item;
  }

  /** Lead vehicle without removing it */
  peek(): T | undefined {
    return this.count === 0 ? undefined : this.slots[this.head];
  }

  /** Newest vehicle (back of the queue) */
  last(): T | undefined {
    return this.count === 0 ? undefined : this.slots[(this.head + this.count - 1) % this.slots.length];
  }

  /** Vehicle at queue position (0 = lead), undefined when out of range */
  at(position: number): T | undefined {
    if (position < 0 || position >= this.count) return undefined;
    return this.slots[(this.head + position) % this.slots.length];
  }

  toArray(): T[] {
    return [...this];
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.slots.length];
      if (item !== undefined) yield item;
    }
  }

  private grow(): void {
    const next = new Array<T | undefined>(this.slots.length * 2);
    for (let i = 0; i < this.count; i++) {
      next[i] = this.slots[(this.head + i) % this.slots.length];
    }
    this.slots = next;
    this.head = 0;
  }
}
