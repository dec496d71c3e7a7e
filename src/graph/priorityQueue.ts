export interface QueueEntry<K> {
  readonly key: K;
  readonly priority: number;
}

interface Slot<K> {
  key: K;
  priority: number;
}

/**
 * Orders priorities ascending. Negative priorities (the `-1` "no distance
 * yet" sentinel) rank after every non-negative one.
 */
export function comparePriorities(left: number, right: number): number {
  const leftUnknown = left < 0;
  const rightUnknown = right < 0;
  if (leftUnknown || rightUnknown) {
    return Number(leftUnknown) - Number(rightUnknown);
  }
  return left - right;
}

/**
 * Binary min-heap over `(key, priority)` pairs. A key→slot index keeps
 * {@link update} logarithmic, which is what Dijkstra's decrease-key step
 * relies on.
 */
export class DecreaseKeyQueue<K> {
  private readonly data: Slot<K>[] = [];
  private readonly slots = new Map<K, number>();

  get size(): number {
    return this.data.length;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  has(key: K): boolean {
    return this.slots.has(key);
  }

  priorityOf(key: K): number | undefined {
    const index = this.slots.get(key);
    return index === undefined ? undefined : this.data[index].priority;
  }

  push(key: K, priority: number): void {
    if (this.slots.has(key)) {
      throw new Error(`key ${String(key)} is already queued`);
    }
    this.data.push({ key, priority });
    this.slots.set(key, this.data.length - 1);
    this.bubbleUp(this.data.length - 1);
  }

  peek(): QueueEntry<K> | undefined {
    const head = this.data[0];
    return head ? { key: head.key, priority: head.priority } : undefined;
  }

  popMinimum(): QueueEntry<K> | undefined {
    const min = this.data[0];
    if (!min) {
      return undefined;
    }
    const last = this.data.pop();
    this.slots.delete(min.key);
    if (last && last !== min) {
      this.data[0] = last;
      this.slots.set(last.key, 0);
      this.bubbleDown(0);
    }
    return { key: min.key, priority: min.priority };
  }

  /**
   * Changes the priority of a queued key and restores heap order. Returns
   * `false` when the key is not (or no longer) queued.
   */
  update(key: K, priority: number): boolean {
    const index = this.slots.get(key);
    if (index === undefined) {
      return false;
    }
    const slot = this.data[index];
    const previous = slot.priority;
    slot.priority = priority;
    if (comparePriorities(priority, previous) < 0) {
      this.bubbleUp(index);
    } else {
      this.bubbleDown(index);
    }
    return true;
  }

  private less(left: number, right: number): boolean {
    return comparePriorities(this.data[left].priority, this.data[right].priority) < 0;
  }

  private swap(left: number, right: number): void {
    const slot = this.data[left];
    this.data[left] = this.data[right];
    this.data[right] = slot;
    this.slots.set(this.data[left].key, left);
    this.slots.set(this.data[right].key, right);
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (!this.less(index, parent)) {
        break;
      }
      this.swap(parent, index);
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.data.length;
    while (true) {
      let smallest = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && this.less(left, smallest)) {
        smallest = left;
      }
      if (right < length && this.less(right, smallest)) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }
      this.swap(index, smallest);
      index = smallest;
    }
  }
}
