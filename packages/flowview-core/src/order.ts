import type { Flow } from "@flowview/interface";

import type { Signal } from "./signals.js";

export type OrderValue = number | string;
export type OrderKeyId = string;

/** Total order over order values. NaN sorts before every other number. */
export function compareOrderValues(a: OrderValue, b: OrderValue): number {
  if (typeof a === "number" && typeof b === "number") {
    const aNaN = Number.isNaN(a);
    const bNaN = Number.isNaN(b);
    if (aNaN || bNaN) return aNaN === bNaN ? 0 : aNaN ? -1 : 1;
    return a === b ? 0 : a < b ? -1 : 1;
  }
  const sa = String(a);
  const sb = String(b);
  return sa === sb ? 0 : sa < sb ? -1 : 1;
}

/**
 * What an order key needs from the view that owns it.
 */
export interface OrderKeyHost {
  hasFlow(flow: Flow): boolean;
  /** Per-flow cache slots, keyed by `OrderKey.id`. Only valid for stored flows. */
  orderSlots(flow: Flow): Map<OrderKeyId, OrderValue>;
  /** Take `flow` out of the sorted index, run `update`, and put it back. */
  reposition(flow: Flow, update: () => void): void;
  readonly viewRefresh: Signal<[]>;
}

let nextOrderKeySerial = 0;

/**
 * Named, cache-aware sort key.
 *
 * The sorted index assumes a flow's key never changes while it is indexed, but keys
 * like "size" grow as a transfer progresses. Values are therefore cached per flow and
 * only replaced through `refresh`, which repositions the flow when the value moved.
 */
export abstract class OrderKey<V extends OrderValue = OrderValue> {
  readonly id: OrderKeyId;

  constructor(
    readonly name: string,
    readonly host: OrderKeyHost
  ) {
    nextOrderKeySerial += 1;
    this.id = `order:${nextOrderKeySerial}:${name}`;
  }

  abstract generate(flow: Flow): V;

  value(flow: Flow): OrderValue {
    if (!this.host.hasFlow(flow)) return this.generate(flow);
    const slots = this.host.orderSlots(flow);
    const cached = slots.get(this.id);
    if (cached !== undefined) return cached;
    const val = this.generate(flow);
    slots.set(this.id, val);
    return val;
  }

  cached(flow: Flow): OrderValue | undefined {
    if (!this.host.hasFlow(flow)) return undefined;
    return this.host.orderSlots(flow).get(this.id);
  }

  /** Recompute and store the value without touching the index. */
  prime(flow: Flow): OrderValue {
    const val = this.generate(flow);
    if (this.host.hasFlow(flow)) this.host.orderSlots(flow).set(this.id, val);
    return val;
  }

  /**
   * Re-derive the value for an indexed flow and reposition it if it changed.
   * Returns true when the flow moved.
   */
  refresh(flow: Flow): boolean {
    const slots = this.host.orderSlots(flow);
    const old = slots.get(this.id);
    const next = this.generate(flow);
    if (old === next) return false;
    this.host.reposition(flow, () => slots.set(this.id, next));
    this.host.viewRefresh.send();
    return true;
  }
}

export class RequestStartOrder extends OrderKey<number> {
  constructor(host: OrderKeyHost) {
    super("time", host);
  }

  generate(flow: Flow): number {
    const start = flow.request.timestampStart;
    return start !== null && Number.isFinite(start) ? start : 0;
  }
}

export class RequestMethodOrder extends OrderKey<string> {
  constructor(host: OrderKeyHost) {
    super("method", host);
  }

  generate(flow: Flow): string {
    return flow.request.method;
  }
}

export class RequestUrlOrder extends OrderKey<string> {
  constructor(host: OrderKeyHost) {
    super("url", host);
  }

  generate(flow: Flow): string {
    return flow.request.url;
  }
}

export class SizeOrder extends OrderKey<number> {
  constructor(host: OrderKeyHost) {
    super("size", host);
  }

  generate(flow: Flow): number {
    let size = 0;
    if (flow.request.rawContent) size += flow.request.rawContent.byteLength;
    if (flow.response?.rawContent) size += flow.response.rawContent.byteLength;
    return size;
  }
}

export const ORDER_NAMES = ["time", "method", "url", "size"] as const;
export type OrderName = (typeof ORDER_NAMES)[number];

export const ORDER_ALIASES: ReadonlyMap<string, OrderName> = new Map<string, OrderName>([
  ["t", "time"],
  ["m", "method"],
  ["u", "url"],
  ["z", "size"],
]);

export type OrderTable = Readonly<Record<OrderName, OrderKey>>;

export function createOrderTable(host: OrderKeyHost): OrderTable {
  return {
    time: new RequestStartOrder(host),
    method: new RequestMethodOrder(host),
    url: new RequestUrlOrder(host),
    size: new SizeOrder(host),
  };
}

export function isOrderName(name: string): name is OrderName {
  return (ORDER_NAMES as readonly string[]).includes(name);
}

/** Full order name for `name` or its one-letter alias; null when unknown. */
export function resolveOrderName(name: string): OrderName | null {
  const clean = name.trim();
  if (isOrderName(clean)) return clean;
  return ORDER_ALIASES.get(clean) ?? null;
}
