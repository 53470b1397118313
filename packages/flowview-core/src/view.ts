import {
  InvalidFilterExpressionError,
  OutOfBoundsError,
  ReentrantMutationError,
  UnknownOrderNameError,
  matchAll,
} from "@flowview/interface";
import type { FilterParser, Flow, FlowId, FlowPredicate } from "@flowview/interface";

import { Focus } from "./focus.js";
import type { FocusableView } from "./focus.js";
import type { IndexedAccess, LengthOf } from "./lookup.js";
import { ORDER_NAMES, createOrderTable, resolveOrderName } from "./order.js";
import type { OrderKey, OrderKeyHost, OrderKeyId, OrderTable, OrderValue } from "./order.js";
import { Settings } from "./settings.js";
import { createViewSignals } from "./signals.js";
import type { ViewSignals } from "./signals.js";
import { SortedIndex } from "./sorted-index.js";
import type { SortPosition } from "./sorted-index.js";
import { Store } from "./store.js";

export type ViewOptions = {
  /** Parser for textual filters and selectors. Without one, only `@` selectors resolve. */
  filterParser?: FilterParser;
  filter?: FlowPredicate | null;
  order?: string;
  orderReversed?: boolean;
  focusFollow?: boolean;
  signals?: ViewSignals;
};

/**
 * Options that may change at run time. `filter` is an expression for the
 * view's parser; `null` or an empty string shows everything.
 */
export type ViewConfig = {
  filter?: string | null;
  order?: string;
  orderReversed?: boolean;
  focusFollow?: boolean;
};

export const FLOW_SELECTORS = ["@all", "@focus", "@shown", "@hidden", "@marked", "@unmarked"] as const;

/**
 * Live, filtered and sorted projection over a store of flows.
 *
 * Flows enter through `add`/`update`/`remove`; the view keeps its sorted index, the
 * focus cursor and per-flow settings consistent and emits `signals` once each change
 * is complete. All mutation must happen on one logical sequence, and signal handlers
 * must not call back into the view's mutating operations.
 */
export class View implements LengthOf, IndexedAccess<Flow>, Iterable<Flow>, FocusableView {
  readonly signals: ViewSignals;
  readonly settings: Settings;
  readonly focus: Focus;
  readonly orders: OrderTable;

  focusFollow: boolean;

  private readonly store = new Store();
  private readonly filterParser: FilterParser | undefined;
  private filterPredicate: FlowPredicate = matchAll;
  private marksOnly = false;
  private activeOrder: OrderKey;
  private reversed: boolean;
  private index: SortedIndex;
  private activeMutation: string | null = null;

  constructor(opts: ViewOptions = {}) {
    this.signals = opts.signals ?? createViewSignals();
    this.filterParser = opts.filterParser;
    this.focusFollow = opts.focusFollow ?? false;
    this.reversed = opts.orderReversed ?? false;
    if (opts.filter) this.filterPredicate = opts.filter;

    this.orders = createOrderTable(this.orderHost());
    this.activeOrder = this.orders.time;
    if (opts.order !== undefined) this.activeOrder = this.lookupOrder(opts.order);
    this.index = this.createIndex(this.activeOrder);

    this.focus = new Focus(this);
    this.settings = new Settings(this.store, this.signals);
  }

  // -- reading -------------------------------------------------------------

  get length(): number {
    return this.index.length;
  }

  get filter(): FlowPredicate {
    return this.filterPredicate;
  }

  get showMarked(): boolean {
    return this.marksOnly;
  }

  get orderKey(): OrderKey {
    return this.activeOrder;
  }

  get orderReversed(): boolean {
    return this.reversed;
  }

  storeCount(): number {
    return this.store.length;
  }

  getById(id: FlowId): Flow | undefined {
    return this.store.get(id);
  }

  inbounds(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.index.length;
  }

  /**
   * Flow at a displayed offset. 0 is the first displayed flow, -1 the last,
   * whichever direction the view is ordered in.
   */
  at(offset: number): Flow {
    const n = this.index.length;
    if (!Number.isInteger(offset) || offset < -n || offset >= n) throw new OutOfBoundsError(offset, n);
    const displayed = offset < 0 ? n + offset : offset;
    return this.index.at(this.toIndexPosition(displayed));
  }

  /** Displayed offset of `flow`, or -1 when it is not shown. */
  indexOf(flow: Flow): number {
    const idx = this.index.indexOf(flow);
    if (idx === -1) return -1;
    return this.toIndexPosition(idx);
  }

  contains(flow: Flow): boolean {
    return this.index.has(flow);
  }

  /**
   * Displayed position `flow` would be inserted at under the active order: the
   * number of shown flows displayed before it.
   */
  bisect(flow: Flow): number {
    const pos = this.index.positionFor(flow) ?? this.sortPosition(this.activeOrder, flow);
    const after = this.index.bisectRight(pos);
    return this.reversed ? this.index.length - after : after;
  }

  *[Symbol.iterator](): Iterator<Flow> {
    for (let i = 0; i < this.index.length; i += 1) yield this.at(i);
  }

  /** Displayed flows, in display order. */
  shown(): Flow[] {
    return Array.from(this);
  }

  orderOptions(): string[] {
    return [...ORDER_NAMES].sort();
  }

  /**
   * Resolve a flow-list selector: one of `FLOW_SELECTORS`, or a filter expression
   * evaluated over every stored flow. Results follow store order except `@shown`.
   */
  resolve(selector: string): Flow[] {
    switch (selector) {
      case "@all":
        return this.store.all();
      case "@focus":
        return this.focus.flow ? [this.focus.flow] : [];
      case "@shown":
        return this.shown();
      case "@hidden":
        return this.store.all().filter((f) => !this.index.has(f));
      case "@marked":
        return this.store.all().filter((f) => f.marked);
      case "@unmarked":
        return this.store.all().filter((f) => !f.marked);
      default: {
        const predicate = this.parseFilter(selector);
        return this.store.all().filter((f) => predicate(f));
      }
    }
  }

  // -- store mutation ----------------------------------------------------------

  /** Add flows to the store. Flows whose id is already stored are ignored. */
  add(flows: Iterable<Flow>): void {
    this.mutate("add", () => {
      for (const flow of flows) {
        if (!this.store.put(flow)) continue;
        if (this.passes(flow)) this.show(flow);
      }
    });
  }

  /** Re-evaluate flows that changed. Flows not in the store are ignored. */
  update(flows: Iterable<Flow>): void {
    this.mutate("update", () => {
      for (const flow of flows) {
        if (!this.store.contains(flow)) continue;
        if (this.passes(flow)) {
          if (!this.index.has(flow)) {
            this.show(flow);
          } else {
            this.activeOrder.refresh(flow);
            this.signals.viewUpdate.send(flow);
          }
        } else {
          this.hide(flow);
        }
      }
    });
  }

  /** Remove flows from the view and the store, killing live ones first. */
  remove(flows: Iterable<Flow>): void {
    this.mutate("remove", () => {
      for (const flow of flows) {
        if (!this.store.contains(flow)) continue;
        if (flow.killable) flow.kill();
        this.hide(flow);
        this.store.delete(flow.id);
        this.signals.storeRemove.send(flow);
      }
    });
  }

  clear(): void {
    this.mutate("clear", () => {
      this.store.clear();
      this.index.clear();
      this.signals.viewRefresh.send();
      this.signals.storeRefresh.send();
    });
  }

  clearNotMarked(): void {
    this.mutate("clearNotMarked", () => {
      for (const flow of this.store.all()) {
        if (!flow.marked) this.store.delete(flow.id);
      }
      this.refilter();
      this.signals.storeRefresh.send();
    });
  }

  // -- presentation ----------------------------------------------------------

  setFilter(filter: FlowPredicate | null): void {
    this.mutate("setFilter", () => {
      this.filterPredicate = filter ?? matchAll;
      this.refilter();
    });
  }

  /** Parse and apply a filter expression. Leaves the view untouched when it does not parse. */
  setFilterExpression(expression: string | null): void {
    const predicate = expression ? this.parseFilter(expression) : null;
    this.setFilter(predicate);
  }

  toggleShowMarked(): void {
    this.mutate("toggleShowMarked", () => {
      this.marksOnly = !this.marksOnly;
      this.refilter();
    });
  }

  setOrder(order: OrderKey): void {
    if (!Object.values(this.orders).includes(order)) throw new UnknownOrderNameError(order.name);
    this.mutate("setOrder", () => {
      const members = Array.from(this.index);
      this.activeOrder = order;
      this.index = this.createIndex(order);
      for (const flow of members) {
        order.prime(flow);
        this.index.add(flow);
      }
      this.signals.viewRefresh.send();
    });
  }

  setOrderByName(name: string): void {
    this.setOrder(this.lookupOrder(name));
  }

  setReversed(reversed: boolean): void {
    this.mutate("setReversed", () => {
      this.reversed = reversed;
      this.signals.viewRefresh.send();
    });
  }

  /** Apply run-time options; validates everything before changing anything. */
  configure(config: ViewConfig): void {
    const order = config.order !== undefined ? this.lookupOrder(config.order) : undefined;
    const filter = config.filter !== undefined ? (config.filter ? this.parseFilter(config.filter) : null) : undefined;

    if (filter !== undefined) this.setFilter(filter);
    if (order !== undefined && order !== this.activeOrder) this.setOrder(order);
    if (config.orderReversed !== undefined) this.setReversed(config.orderReversed);
    if (config.focusFollow !== undefined) this.focusFollow = config.focusFollow;
  }

  // -- interception lifecycle hooks ---------------------------------------------

  request(flow: Flow): void {
    this.add([flow]);
  }

  response(flow: Flow): void {
    this.update([flow]);
  }

  error(flow: Flow): void {
    this.update([flow]);
  }

  intercept(flow: Flow): void {
    this.update([flow]);
  }

  resume(flow: Flow): void {
    this.update([flow]);
  }

  kill(flow: Flow): void {
    this.update([flow]);
  }

  // -- internals -----------------------------------------------------------------

  private mutate(operation: string, run: () => void): void {
    if (this.activeMutation !== null) throw new ReentrantMutationError(operation, this.activeMutation);
    this.activeMutation = operation;
    try {
      run();
    } finally {
      this.activeMutation = null;
    }
  }

  private passes(flow: Flow): boolean {
    if (this.marksOnly && !flow.marked) return false;
    return this.filterPredicate(flow);
  }

  private show(flow: Flow): void {
    this.activeOrder.prime(flow);
    this.index.add(flow);
    if (this.focusFollow) this.focus.setFlow(flow);
    this.signals.viewAdd.send(flow);
  }

  private hide(flow: Flow): void {
    const idx = this.indexOf(flow);
    if (idx === -1) return;
    this.index.remove(flow);
    this.signals.viewRemove.send(flow, idx);
  }

  private refilter(): void {
    this.index.clear();
    for (const flow of this.store.values()) {
      if (!this.passes(flow)) continue;
      this.activeOrder.prime(flow);
      this.index.add(flow);
    }
    this.signals.viewRefresh.send();
  }

  private toIndexPosition(idx: number): number {
    return this.reversed ? this.index.length - idx - 1 : idx;
  }

  private sortPosition(order: OrderKey, flow: Flow): SortPosition {
    return {
      value: order.value(flow),
      seq: this.store.seqOf(flow.id) ?? Number.POSITIVE_INFINITY,
    };
  }

  private createIndex(order: OrderKey): SortedIndex {
    return new SortedIndex((flow) => this.sortPosition(order, flow));
  }

  private lookupOrder(name: string): OrderKey {
    const resolved = resolveOrderName(name);
    if (!resolved) throw new UnknownOrderNameError(name);
    return this.orders[resolved];
  }

  private parseFilter(expression: string): FlowPredicate {
    const predicate = this.filterParser?.parse(expression) ?? null;
    if (!predicate) throw new InvalidFilterExpressionError(expression);
    return predicate;
  }

  private orderHost(): OrderKeyHost {
    return {
      hasFlow: (flow) => this.store.contains(flow),
      orderSlots: (flow): Map<OrderKeyId, OrderValue> => this.settings.orderSlots(flow),
      reposition: (flow, update) => {
        this.index.remove(flow);
        update();
        this.index.add(flow);
      },
      viewRefresh: this.signals.viewRefresh,
    };
  }
}
