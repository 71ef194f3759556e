export interface DueEntry {
  agentId: string;
  dueAt: number;
  token: number;
}

/**
 * Min-heap of due times. Rescheduling or cancelling an agent bumps its token;
 * entries carrying an older token are skipped when they surface.
 */
export class DueQueue {
  private readonly heap: DueEntry[] = [];
  private readonly live = new Map<string, number>();
  private nextToken = 1;

  get size(): number {
    return this.live.size;
  }

  has(agentId: string): boolean {
    return this.live.has(agentId);
  }

  dueAt(agentId: string): number | undefined {
    const token = this.live.get(agentId);
    if (token === undefined) return undefined;
    return this.heap.find((entry) => entry.token === token)?.dueAt;
  }

  schedule(agentId: string, dueAt: number): void {
    const token = this.nextToken++;
    this.live.set(agentId, token);
    this.push({ agentId, dueAt, token });
  }

  cancel(agentId: string): boolean {
    return this.live.delete(agentId);
  }

  /** Removes and returns every live entry due at or before `now`, earliest first. */
  popDue(now: number): DueEntry[] {
    const due: DueEntry[] = [];
    for (;;) {
      const top = this.heap[0];
      if (!top || top.dueAt > now) break;
      this.pop();
      if (this.live.get(top.agentId) !== top.token) continue;
      this.live.delete(top.agentId);
      due.push(top);
    }
    this.compact();
    return due;
  }

  private compact(): void {
    const stale = this.heap.filter((entry) => this.live.get(entry.agentId) !== entry.token).length;
    if (stale === 0 || stale * 2 < this.heap.length) return;
    const kept = this.heap.filter((entry) => this.live.get(entry.agentId) === entry.token);
    this.heap.length = 0;
    for (const entry of kept) this.push(entry);
  }

  private push(entry: DueEntry): void {
    this.heap.push(entry);
    let index = this.heap.length - 1;
    while (index > 0) {
      const parent = (index - 1) >> 1;
      if (!this.before(index, parent)) break;
      this.swap(index, parent);
      index = parent;
    }
  }

  private pop(): void {
    const last = this.heap.pop();
    if (!last || this.heap.length === 0) return;
    this.heap[0] = last;
    let index = 0;
    for (;;) {
      const left = index * 2 + 1;
      const right = left + 1;
      let smallest = index;
      if (left < this.heap.length && this.before(left, smallest)) smallest = left;
      if (right < this.heap.length && this.before(right, smallest)) smallest = right;
      if (smallest === index) return;
      this.swap(index, smallest);
      index = smallest;
    }
  }

  private before(a: number, b: number): boolean {
    const left = this.heap[a];
    const right = this.heap[b];
    if (!left || !right) return false;
    return left.dueAt === right.dueAt ? left.token < right.token : left.dueAt < right.dueAt;
  }

  private swap(a: number, b: number): void {
    const left = this.heap[a];
    const right = this.heap[b];
    if (!left || !right) return;
    this.heap[a] = right;
    this.heap[b] = left;
  }
}
