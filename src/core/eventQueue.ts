export type SimulationEvent =
  | { readonly kind: 'growth-rate'; readonly time: number; readonly task: number; readonly rate: number }
  | { readonly kind: 'failure'; readonly time: number; readonly agents?: readonly number[]; readonly count?: number }
  | { readonly kind: 'tick'; readonly time: number }
  | { readonly kind: 'revision'; readonly time: number; readonly agentId: number };

/**
 * Same-instant ordering: environment changes first, then failures, then the
 * resource tick, then agent revisions (lower agent index first).
 */
export const EVENT_RANK: Readonly<Record<SimulationEvent['kind'], number>> = {
  'growth-rate': 0,
  failure: 1,
  tick: 2,
  revision: 3
};

interface QueueEntry {
  readonly event: SimulationEvent;
  readonly sequence: number;
}

function agentIndex(event: SimulationEvent): number {
  return event.kind === 'revision' ? event.agentId : -1;
}

function precedes(a: QueueEntry, b: QueueEntry): boolean {
  if (a.event.time !== b.event.time) {
    return a.event.time < b.event.time;
  }
  const rankA = EVENT_RANK[a.event.kind];
  const rankB = EVENT_RANK[b.event.kind];
  if (rankA !== rankB) {
    return rankA < rankB;
  }
  const agentA = agentIndex(a.event);
  const agentB = agentIndex(b.event);
  if (agentA !== agentB) {
    return agentA < agentB;
  }
  return a.sequence < b.sequence;
}

/** Binary min-heap of pending events under the ordering above. */
export class EventQueue {
  private readonly heap: QueueEntry[] = [];
  private sequence = 0;

  get size(): number {
    return this.heap.length;
  }

  push(event: SimulationEvent): void {
    if (!Number.isFinite(event.time)) {
      throw new RangeError(`Event time must be finite (received ${event.time})`);
    }
    this.heap.push({ event, sequence: this.sequence });
    this.sequence += 1;
    this.siftUp(this.heap.length - 1);
  }

  peek(): SimulationEvent | undefined {
    return this.heap[0]?.event;
  }

  pop(): SimulationEvent | undefined {
    const top = this.heap[0];
    if (!top) {
      return undefined;
    }
    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top.event;
  }

  clear(): void {
    this.heap.length = 0;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!precedes(this.heap[child], this.heap[parent])) {
        break;
      }
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    const length = this.heap.length;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;
      if (left < length && precedes(this.heap[left], this.heap[smallest])) {
        smallest = left;
      }
      if (right < length && precedes(this.heap[right], this.heap[smallest])) {
        smallest = right;
      }
      if (smallest === parent) {
        return;
      }
      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.heap[a];
    this.heap[a] = this.heap[b];
    this.heap[b] = tmp;
  }
}
