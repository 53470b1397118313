import { UnknownIdAccessError } from "@flowview/interface";
import type { Flow, FlowId } from "@flowview/interface";

import type { KeyedLookup, LengthOf } from "./lookup.js";
import type { OrderKeyId, OrderValue } from "./order.js";
import type { ViewSignals } from "./signals.js";

type SettingsEntry = {
  values: Map<string, string>;
  order: Map<OrderKeyId, OrderValue>;
};

/**
 * Per-flow metadata whose lifetime is bound to store membership.
 *
 * Entries are created lazily, only for flows currently in the store, and dropped on
 * `storeRemove` / `storeRefresh`. Order-key caches live in the same entry so they
 * expire together with the string settings.
 */
export class Settings implements KeyedLookup<Flow, Map<string, string>>, LengthOf, Iterable<FlowId> {
  private readonly entries = new Map<FlowId, SettingsEntry>();

  constructor(
    private readonly store: KeyedLookup<FlowId, Flow>,
    signals: Pick<ViewSignals, "storeRemove" | "storeRefresh">
  ) {
    signals.storeRemove.connect((flow) => this.entries.delete(flow.id));
    signals.storeRefresh.connect(() => this.prune());
  }

  get(flow: Flow): Map<string, string> {
    return this.entry(flow).values;
  }

  has(flow: Flow): boolean {
    return this.entries.has(flow.id);
  }

  orderSlots(flow: Flow): Map<OrderKeyId, OrderValue> {
    return this.entry(flow).order;
  }

  get length(): number {
    return this.entries.size;
  }

  [Symbol.iterator](): Iterator<FlowId> {
    return this.entries.keys();
  }

  private entry(flow: Flow): SettingsEntry {
    if (!this.store.has(flow.id)) throw new UnknownIdAccessError(flow.id);
    let entry = this.entries.get(flow.id);
    if (!entry) {
      entry = { values: new Map(), order: new Map() };
      this.entries.set(flow.id, entry);
    }
    return entry;
  }

  private prune(): void {
    for (const id of Array.from(this.entries.keys())) {
      if (!this.store.has(id)) this.entries.delete(id);
    }
  }
}
