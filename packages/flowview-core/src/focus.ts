import { FocusNotInViewError, OutOfBoundsError, sameFlow } from "@flowview/interface";
import type { Flow } from "@flowview/interface";

import type { IndexedAccess, LengthOf } from "./lookup.js";
import { Signal } from "./signals.js";
import type { ViewSignals } from "./signals.js";

/**
 * The parts of a View a Focus reads.
 */
export interface FocusableView extends LengthOf, IndexedAccess<Flow> {
  contains(flow: Flow): boolean;
  indexOf(flow: Flow): number;
  /** Displayed position `flow` would occupy if it were (re)inserted. */
  bisect(flow: Flow): number;
  readonly signals: Pick<ViewSignals, "viewAdd" | "viewRemove" | "viewRefresh">;
}

/**
 * Single cursor over a View. It is always either empty or a current view member.
 */
export class Focus {
  readonly change = new Signal<[flow: Flow | null]>();
  private current: Flow | null = null;

  constructor(private readonly view: FocusableView) {
    if (view.length > 0) this.current = view.at(0);
    view.signals.viewAdd.connect((flow) => this.onViewAdd(flow));
    view.signals.viewRemove.connect((flow) => this.onViewRemove(flow));
    view.signals.viewRefresh.connect(() => this.onViewRefresh());
  }

  get flow(): Flow | null {
    return this.current;
  }

  setFlow(flow: Flow | null): void {
    if (flow !== null && !this.view.contains(flow)) throw new FocusNotInViewError(flow.id);
    this.current = flow;
    this.change.send(flow);
  }

  /** Displayed index of the focused flow, or null when nothing is focused. */
  get index(): number | null {
    if (!this.current) return null;
    return this.view.indexOf(this.current);
  }

  setIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index > this.view.length - 1) {
      throw new OutOfBoundsError(index, this.view.length);
    }
    this.setFlow(this.view.at(index));
  }

  private nearest(flow: Flow): number {
    return Math.min(this.view.bisect(flow), this.view.length - 1);
  }

  private onViewRemove(flow: Flow): void {
    if (this.view.length === 0) {
      this.setFlow(null);
    } else if (sameFlow(flow, this.current)) {
      this.setFlow(this.view.at(this.nearest(flow)));
    }
  }

  private onViewRefresh(): void {
    if (this.view.length === 0) {
      if (this.current !== null) this.setFlow(null);
    } else if (this.current === null) {
      this.setFlow(this.view.at(0));
    } else if (!this.view.contains(this.current)) {
      this.setFlow(this.view.at(this.nearest(this.current)));
    }
  }

  private onViewAdd(flow: Flow): void {
    if (this.current === null) this.setFlow(flow);
  }
}
