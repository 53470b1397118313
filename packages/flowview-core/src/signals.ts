import type { Flow } from "@flowview/interface";

export type Unsubscribe = () => void;

export type SignalHandler<Args extends unknown[]> = (...args: Args) => void;

/**
 * Synchronous in-process signal. Handlers run on the sender's call stack, in the
 * order they were connected, after the sender has finished updating its state.
 */
export class Signal<Args extends unknown[] = []> {
  private readonly handlers: SignalHandler<Args>[] = [];

  connect(handler: SignalHandler<Args>): Unsubscribe {
    this.handlers.push(handler);
    return () => {
      const idx = this.handlers.indexOf(handler);
      if (idx !== -1) this.handlers.splice(idx, 1);
    };
  }

  send(...args: Args): void {
    // Snapshot so a handler that disconnects itself does not skip its neighbour.
    for (const handler of this.handlers.slice()) handler(...args);
  }

  get receivers(): number {
    return this.handlers.length;
  }
}

/**
 * Signals emitted by a View.
 *
 * `view*` signals only fire for changes visible in the view: updating a flow that is in
 * the store but filtered out emits nothing. `store*` signals track the underlying store;
 * removing a visible flow fires `viewRemove` first and then `storeRemove`.
 */
export type ViewSignals = {
  viewAdd: Signal<[flow: Flow]>;
  /** `index` is the displayed position the flow occupied before removal. */
  viewRemove: Signal<[flow: Flow, index: number]>;
  viewUpdate: Signal<[flow: Flow]>;
  viewRefresh: Signal<[]>;
  storeRemove: Signal<[flow: Flow]>;
  storeRefresh: Signal<[]>;
};

export function createViewSignals(): ViewSignals {
  return {
    viewAdd: new Signal(),
    viewRemove: new Signal(),
    viewUpdate: new Signal(),
    viewRefresh: new Signal(),
    storeRemove: new Signal(),
    storeRefresh: new Signal(),
  };
}
