import { newFlowId } from "@flowview/interface";
import type { FilterParser, Flow, FlowPredicate, FlowRequest, FlowResponse } from "@flowview/interface";

import type { View } from "../src/view.js";

let nextStart = 1;

export class TestFlow implements Flow {
  readonly id: string;
  marked: boolean;
  killable: boolean;
  request: FlowRequest;
  response: FlowResponse | null;
  kills = 0;

  constructor(init: {
    id: string;
    marked?: boolean;
    killable?: boolean;
    request: FlowRequest;
    response?: FlowResponse | null;
  }) {
    this.id = init.id;
    this.marked = init.marked ?? false;
    this.killable = init.killable ?? false;
    this.request = init.request;
    this.response = init.response ?? null;
  }

  kill(): void {
    this.kills += 1;
    this.killable = false;
  }

  copy(): TestFlow {
    return new TestFlow({
      id: newFlowId(),
      marked: this.marked,
      request: { ...this.request },
      response: this.response ? { ...this.response } : null,
    });
  }
}

export function makeFlow(
  opts: {
    id?: string;
    method?: string;
    url?: string;
    start?: number | null;
    reqSize?: number;
    respSize?: number;
    marked?: boolean;
    killable?: boolean;
  } = {}
): TestFlow {
  const start = opts.start === undefined ? nextStart++ : opts.start;
  return new TestFlow({
    id: opts.id ?? newFlowId(),
    marked: opts.marked,
    killable: opts.killable,
    request: {
      method: opts.method ?? "GET",
      url: opts.url ?? "http://example.com/",
      timestampStart: start,
      rawContent: opts.reqSize === undefined ? null : new Uint8Array(opts.reqSize),
    },
    response:
      opts.respSize === undefined ? null : { statusCode: 200, rawContent: new Uint8Array(opts.respSize) },
  });
}

/**
 * Tiny stand-in for the real filter language: `.`, `~marked`, `~m METHOD`, `~u TEXT`.
 */
export const testFilterParser: FilterParser = {
  parse(text: string): FlowPredicate | null {
    const clean = text.trim();
    if (clean === ".") return () => true;
    if (clean === "~marked") return (f) => f.marked;
    const method = /^~m\s+(\S+)$/.exec(clean);
    if (method?.[1]) {
      const want = method[1].toUpperCase();
      return (f) => f.request.method.toUpperCase() === want;
    }
    const url = /^~u\s+(\S+)$/.exec(clean);
    if (url?.[1]) {
      const needle = url[1];
      return (f) => f.request.url.includes(needle);
    }
    return null;
  },
};

/** Records every view/store signal as a short string, e.g. `add:a` or `remove:b@1`. */
export function recordSignals(view: View): string[] {
  const events: string[] = [];
  view.signals.viewAdd.connect((f) => events.push(`add:${f.id}`));
  view.signals.viewRemove.connect((f, idx) => events.push(`remove:${f.id}@${idx}`));
  view.signals.viewUpdate.connect((f) => events.push(`update:${f.id}`));
  view.signals.viewRefresh.connect(() => events.push("refresh"));
  view.signals.storeRemove.connect((f) => events.push(`store-remove:${f.id}`));
  view.signals.storeRefresh.connect(() => events.push("store-refresh"));
  return events;
}

export function ids(flows: Iterable<Flow>): string[] {
  return Array.from(flows, (f) => f.id);
}
