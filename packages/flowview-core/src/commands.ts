import { CommandArgumentError, CommandUnavailableError, UnknownCommandError } from "@flowview/interface";
import type { Flow, FlowFactory, FlowReader } from "@flowview/interface";

import { createViewLogger } from "./logger.js";
import type { ViewLogger } from "./logger.js";
import type { View } from "./view.js";

export type CommandValue = null | number | string | readonly string[] | readonly Flow[];

export type ViewCommandsOptions = {
  reader?: FlowReader;
  factory?: FlowFactory;
  /**
   * Called once per settings command with every flow it touched. Defaults to
   * re-evaluating those flows in the view.
   */
  onUpdated?: (flows: Flow[]) => void;
  log?: ViewLogger;
};

export const VIEW_COMMAND_NAMES = [
  "view.focus.next",
  "view.focus.prev",
  "view.order.options",
  "view.marked.toggle",
  "view.getval",
  "view.setval",
  "view.setval.toggle",
  "view.load",
  "view.go",
  "view.duplicate",
  "view.remove",
  "view.resolve",
  "view.create",
] as const;

export type ViewCommandName = (typeof VIEW_COMMAND_NAMES)[number];

function isViewCommandName(name: string): name is ViewCommandName {
  return (VIEW_COMMAND_NAMES as readonly string[]).includes(name);
}

function expectArgs(command: string, args: readonly string[], count: number): void {
  if (args.length !== count) {
    throw new CommandArgumentError(command, `expected ${count} argument(s), got ${args.length}`);
  }
}

function parseInteger(command: string, raw: string): number {
  const clean = raw.trim();
  if (!/^[+-]?\d+$/.test(clean)) throw new CommandArgumentError(command, `not an integer: ${raw}`);
  return Number(clean);
}

/**
 * Command surface over one View. Methods take resolved flows; `dispatch` takes the
 * textual form, where flow arguments are selectors passed through `View.resolve`.
 * Filter-expression selectors only resolve when the view was built with a
 * `filterParser`.
 */
export class ViewCommands {
  private readonly reader: FlowReader | undefined;
  private readonly factory: FlowFactory | undefined;
  private readonly onUpdated: (flows: Flow[]) => void;
  private readonly log: ViewLogger;

  constructor(
    readonly view: View,
    opts: ViewCommandsOptions = {}
  ) {
    this.reader = opts.reader;
    this.factory = opts.factory;
    this.onUpdated = opts.onUpdated ?? ((flows) => view.update(flows));
    this.log = opts.log ?? createViewLogger();
  }

  focusNext(): void {
    const idx = (this.view.focus.index ?? -1) + 1;
    if (this.view.inbounds(idx)) this.view.focus.setFlow(this.view.at(idx));
  }

  focusPrev(): void {
    const current = this.view.focus.index;
    if (current === null) return;
    const idx = current - 1;
    if (this.view.inbounds(idx)) this.view.focus.setFlow(this.view.at(idx));
  }

  orderOptions(): string[] {
    return this.view.orderOptions();
  }

  toggleMarked(): void {
    this.view.toggleShowMarked();
  }

  getValue(flow: Flow, key: string, fallback: string): string {
    return this.view.settings.get(flow).get(key) ?? fallback;
  }

  setValue(flows: readonly Flow[], key: string, value: string): void {
    const updated: Flow[] = [];
    for (const flow of flows) {
      this.view.settings.get(flow).set(key, value);
      updated.push(flow);
    }
    this.onUpdated(updated);
  }

  /** Flip `key` between the strings "true" and "false"; missing counts as "false". */
  setValueToggle(flows: readonly Flow[], key: string): void {
    const updated: Flow[] = [];
    for (const flow of flows) {
      const values = this.view.settings.get(flow);
      const current = values.get(key) ?? "false";
      values.set(key, current === "true" ? "false" : "true");
      updated.push(flow);
    }
    this.onUpdated(updated);
  }

  /**
   * Add every flow read from `path`. Each is copied first so loading the same source
   * twice yields distinct flows. Resolves to the number of flows read.
   */
  async load(path: string): Promise<number> {
    if (!this.reader) throw new CommandUnavailableError("view.load", "flow reader");
    let count = 0;
    for await (const flow of this.reader.stream(path)) {
      this.view.add([flow.copy()]);
      count += 1;
    }
    this.log.debug(`Loaded ${count} flows from ${path}`);
    return count;
  }

  /**
   * Focus a displayed offset. Negative offsets count from the end; out-of-range
   * offsets are clamped. Does nothing on an empty view.
   */
  go(offset: number): void {
    const n = this.view.length;
    if (n === 0) return;
    let dst = offset < 0 ? n + offset : offset;
    if (dst < 0) dst = 0;
    if (dst > n - 1) dst = n - 1;
    this.view.focus.setFlow(this.view.at(dst));
  }

  /** Add copies of `flows` and focus the first copy if it is shown. */
  duplicate(flows: readonly Flow[]): Flow[] {
    const dups = flows.map((f) => f.copy());
    const first = dups[0];
    if (!first) return dups;
    this.view.add(dups);
    if (this.view.contains(first)) this.view.focus.setFlow(first);
    this.log.alert(`Duplicated ${dups.length} flows`);
    return dups;
  }

  remove(flows: readonly Flow[]): void {
    this.view.remove(flows);
  }

  resolve(selector: string): Flow[] {
    return this.view.resolve(selector);
  }

  create(method: string, url: string): Flow {
    if (!this.factory) throw new CommandUnavailableError("view.create", "flow factory");
    const flow = this.factory.create(method.toUpperCase(), url);
    this.view.add([flow]);
    return flow;
  }

  async dispatch(name: string, args: readonly string[] = []): Promise<CommandValue> {
    if (!isViewCommandName(name)) throw new UnknownCommandError(name);
    switch (name) {
      case "view.focus.next":
        expectArgs(name, args, 0);
        this.focusNext();
        return null;
      case "view.focus.prev":
        expectArgs(name, args, 0);
        this.focusPrev();
        return null;
      case "view.order.options":
        expectArgs(name, args, 0);
        return this.orderOptions();
      case "view.marked.toggle":
        expectArgs(name, args, 0);
        this.toggleMarked();
        return null;
      case "view.getval": {
        expectArgs(name, args, 3);
        const [selector = "", key = "", fallback = ""] = args;
        return this.getValue(this.singleFlow(name, selector), key, fallback);
      }
      case "view.setval": {
        expectArgs(name, args, 3);
        const [selector = "", key = "", value = ""] = args;
        this.setValue(this.resolve(selector), key, value);
        return null;
      }
      case "view.setval.toggle": {
        expectArgs(name, args, 2);
        const [selector = "", key = ""] = args;
        this.setValueToggle(this.resolve(selector), key);
        return null;
      }
      case "view.load": {
        expectArgs(name, args, 1);
        const [path = ""] = args;
        return this.load(path);
      }
      case "view.go": {
        expectArgs(name, args, 1);
        const [offset = ""] = args;
        this.go(parseInteger(name, offset));
        return null;
      }
      case "view.duplicate": {
        expectArgs(name, args, 1);
        const [selector = ""] = args;
        return this.duplicate(this.resolve(selector));
      }
      case "view.remove": {
        expectArgs(name, args, 1);
        const [selector = ""] = args;
        this.remove(this.resolve(selector));
        return null;
      }
      case "view.resolve": {
        expectArgs(name, args, 1);
        const [selector = ""] = args;
        return this.resolve(selector);
      }
      case "view.create": {
        expectArgs(name, args, 2);
        const [method = "", url = ""] = args;
        return [this.create(method, url)];
      }
    }
  }

  private singleFlow(command: string, selector: string): Flow {
    const flows = this.resolve(selector);
    const [flow] = flows;
    if (!flow || flows.length !== 1) {
      throw new CommandArgumentError(command, `${selector} must resolve to exactly one flow, got ${flows.length}`);
    }
    return flow;
  }
}
