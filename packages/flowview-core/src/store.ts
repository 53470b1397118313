import type { Flow, FlowId } from "@flowview/interface";

import type { KeyedLookup, LengthOf } from "./lookup.js";

/**
 * Authoritative, insertion-ordered collection of every known flow.
 *
 * Each flow gets a sequence number on first insertion; the sorted index uses it to
 * break ties between equal order values.
 */
export class Store implements KeyedLookup<FlowId, Flow>, LengthOf {
  private readonly flows = new Map<FlowId, Flow>();
  private readonly seqs = new Map<FlowId, number>();
  private nextSeq = 0;

  /** Returns false (and changes nothing) when the id is already present. */
  put(flow: Flow): boolean {
    if (this.flows.has(flow.id)) return false;
    this.flows.set(flow.id, flow);
    this.seqs.set(flow.id, this.nextSeq++);
    return true;
  }

  get(id: FlowId): Flow | undefined {
    return this.flows.get(id);
  }

  has(id: FlowId): boolean {
    return this.flows.has(id);
  }

  contains(flow: Flow): boolean {
    return this.flows.has(flow.id);
  }

  delete(id: FlowId): boolean {
    this.seqs.delete(id);
    return this.flows.delete(id);
  }

  seqOf(id: FlowId): number | undefined {
    return this.seqs.get(id);
  }

  all(): Flow[] {
    return Array.from(this.flows.values());
  }

  values(): IterableIterator<Flow> {
    return this.flows.values();
  }

  clear(): void {
    this.flows.clear();
    this.seqs.clear();
  }

  get length(): number {
    return this.flows.size;
  }
}
