/**
 * Fixed-capacity storage for the arguments a Value has accepted.
 *
 * Slots are filled front to back; `length` counts the filled prefix.
 */

interface Slot<T> {
  readonly item: T;
}

export class SlotArena<T> {
  private readonly slots: Array<Slot<T> | undefined>;
  private filled = 0;

  constructor(readonly capacity: number) {
    this.slots = new Array<Slot<T> | undefined>(capacity).fill(undefined);
  }

  get length(): number {
    return this.filled;
  }

  /** The slot at `index`, or undefined when it has not been written. */
  at(index: number): Slot<T> | undefined {
    return index < this.filled ? this.slots[index] : undefined;
  }

  /** Overwrite a filled slot or append at `length`. */
  put(index: number, item: T): void {
    if (index < 0 || index > this.filled || index >= this.capacity) {
      throw new RangeError(`Slot ${index} is outside 0..${Math.min(this.filled, this.capacity - 1)}`);
    }
    this.slots[index] = { item };
    if (index === this.filled) this.filled++;
  }

  /** Copy of the filled slots. */
  toArray(): T[] {
    const out: T[] = [];
    for (const slot of this.slots.slice(0, this.filled)) {
      if (slot) out.push(slot.item);
    }
    return out;
  }
}
