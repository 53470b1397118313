import { OutOfBoundsError } from "@flowview/interface";
import type { Flow, FlowId } from "@flowview/interface";

import type { IndexedAccess, LengthOf } from "./lookup.js";
import { compareOrderValues } from "./order.js";
import type { OrderValue } from "./order.js";

type IndexEntry = {
  flow: Flow;
  value: OrderValue;
  seq: number;
};

export type SortPosition = {
  value: OrderValue;
  seq: number;
};

function comparePositions(a: SortPosition, b: SortPosition): number {
  const byValue = compareOrderValues(a.value, b.value);
  if (byValue !== 0) return byValue;
  return a.seq === b.seq ? 0 : a.seq < b.seq ? -1 : 1;
}

/**
 * Ascending list of flows ordered by `(value, seq)`.
 *
 * The key is read once when a flow is added and remembered with the entry, so a flow
 * can always be found and removed even after its live key has drifted.
 */
export class SortedIndex implements LengthOf, IndexedAccess<Flow>, Iterable<Flow> {
  private readonly entries: IndexEntry[] = [];
  private readonly byId = new Map<FlowId, IndexEntry>();

  constructor(private readonly positionOf: (flow: Flow) => SortPosition) {}

  get length(): number {
    return this.entries.length;
  }

  has(flow: Flow): boolean {
    return this.byId.has(flow.id);
  }

  /** Adding a flow that is already indexed is a no-op. */
  add(flow: Flow): void {
    if (this.byId.has(flow.id)) return;
    const pos = this.positionOf(flow);
    const entry: IndexEntry = { flow, value: pos.value, seq: pos.seq };
    this.entries.splice(this.bisectRight(pos), 0, entry);
    this.byId.set(flow.id, entry);
  }

  remove(flow: Flow): boolean {
    const idx = this.indexOf(flow);
    if (idx === -1) return false;
    this.entries.splice(idx, 1);
    this.byId.delete(flow.id);
    return true;
  }

  at(index: number): Flow {
    const n = this.entries.length;
    if (!Number.isInteger(index) || index < -n || index >= n) throw new OutOfBoundsError(index, n);
    const entry = this.entries[index < 0 ? n + index : index];
    if (!entry) throw new OutOfBoundsError(index, n);
    return entry.flow;
  }

  /** Ascending position of `flow`, or -1 when it is not indexed. */
  indexOf(flow: Flow): number {
    const entry = this.byId.get(flow.id);
    if (!entry) return -1;
    const idx = this.bisectLeft(entry);
    return this.entries[idx]?.flow.id === flow.id ? idx : -1;
  }

  /** The key `flow` was indexed under, if it is indexed. */
  positionFor(flow: Flow): SortPosition | undefined {
    const entry = this.byId.get(flow.id);
    return entry ? { value: entry.value, seq: entry.seq } : undefined;
  }

  /** Number of entries ordered at or before `pos`. */
  bisectRight(pos: SortPosition): number {
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const entry = this.entries[mid];
      if (entry && comparePositions(pos, entry) < 0) hi = mid;
      else lo = mid + 1;
    }
    return lo;
  }

  bisectLeft(pos: SortPosition): number {
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const entry = this.entries[mid];
      if (entry && comparePositions(entry, pos) < 0) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  clear(): void {
    this.entries.length = 0;
    this.byId.clear();
  }

  *[Symbol.iterator](): Iterator<Flow> {
    for (const entry of this.entries) yield entry.flow;
  }
}
