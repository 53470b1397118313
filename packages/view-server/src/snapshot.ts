import { newFlowId, normalizeFlowId } from "@flowview/interface";
import type { Flow, FlowFactory, FlowRequest, FlowResponse } from "@flowview/interface";

/**
 * Plain-data form of a flow, as carried on the wire and in flow dumps.
 * Absent fields are `null`; CBOR has no `undefined`.
 */
export type FlowSnapshot = {
  id: string;
  marked: boolean;
  killable: boolean;
  request: FlowRequest;
  response: FlowResponse | null;
};

export type SnapshotFlowOptions = {
  onKill?: (flow: SnapshotFlow) => void;
};

function copyBytes(bytes: Uint8Array | null): Uint8Array | null {
  return bytes ? bytes.slice() : null;
}

/**
 * Flow whose state is pushed in by a remote producer. `kill` is forwarded to
 * `onKill` so the producer can abort the real exchange.
 */
export class SnapshotFlow implements Flow {
  readonly id: string;
  marked: boolean;
  killable: boolean;
  request: FlowRequest;
  response: FlowResponse | null;
  private readonly onKill: ((flow: SnapshotFlow) => void) | undefined;

  constructor(snapshot: FlowSnapshot, opts: SnapshotFlowOptions = {}) {
    this.id = snapshot.id;
    this.marked = snapshot.marked;
    this.killable = snapshot.killable;
    this.request = snapshot.request;
    this.response = snapshot.response;
    this.onKill = opts.onKill;
  }

  /** Overwrite mutable state from a newer snapshot of the same flow. */
  apply(snapshot: FlowSnapshot): void {
    if (snapshot.id !== this.id) throw new Error(`snapshot ${snapshot.id} does not belong to flow ${this.id}`);
    this.marked = snapshot.marked;
    this.killable = snapshot.killable;
    this.request = snapshot.request;
    this.response = snapshot.response;
  }

  kill(): void {
    if (!this.killable) return;
    this.killable = false;
    this.onKill?.(this);
  }

  copy(): SnapshotFlow {
    return new SnapshotFlow({ ...toSnapshot(this), id: newFlowId(), killable: false });
  }
}

export function toSnapshot(flow: Flow): FlowSnapshot {
  return {
    id: flow.id,
    marked: flow.marked,
    killable: flow.killable,
    request: {
      method: flow.request.method,
      url: flow.request.url,
      timestampStart: flow.request.timestampStart,
      rawContent: copyBytes(flow.request.rawContent),
    },
    response: flow.response
      ? { statusCode: flow.response.statusCode, rawContent: copyBytes(flow.response.rawContent) }
      : null,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function expectString(value: unknown, field: string): string {
  if (typeof value !== "string") throw new Error(`${field} must be a string`);
  return value;
}

function expectBoolean(value: unknown, field: string): boolean {
  if (typeof value !== "boolean") throw new Error(`${field} must be a boolean`);
  return value;
}

function optionalNumber(value: unknown, field: string): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value !== "number" || !Number.isFinite(value)) throw new Error(`${field} must be a finite number`);
  return value;
}

function optionalBytes(value: unknown, field: string): Uint8Array | null {
  if (value === null || value === undefined) return null;
  if (!(value instanceof Uint8Array)) throw new Error(`${field} must be bytes`);
  return value;
}

/**
 * Validate untrusted decoded data as a snapshot. Missing optional fields become
 * `null`; `marked` and `killable` default to false.
 */
export function parseSnapshot(value: unknown): FlowSnapshot {
  if (!isRecord(value)) throw new Error("flow must be a map");
  const request = value.request;
  if (!isRecord(request)) throw new Error("flow.request must be a map");
  const response = value.response;
  if (response !== null && response !== undefined && !isRecord(response)) {
    throw new Error("flow.response must be a map or null");
  }

  let statusCode = 0;
  if (response) {
    const code = optionalNumber(response.statusCode, "flow.response.statusCode");
    if (code === null) throw new Error("flow.response.statusCode is required");
    statusCode = code;
  }

  return {
    id: normalizeFlowId(expectString(value.id, "flow.id")),
    marked: value.marked === undefined ? false : expectBoolean(value.marked, "flow.marked"),
    killable: value.killable === undefined ? false : expectBoolean(value.killable, "flow.killable"),
    request: {
      method: expectString(request.method, "flow.request.method"),
      url: expectString(request.url, "flow.request.url"),
      timestampStart: optionalNumber(request.timestampStart, "flow.request.timestampStart"),
      rawContent: optionalBytes(request.rawContent, "flow.request.rawContent"),
    },
    response: response
      ? { statusCode, rawContent: optionalBytes(response.rawContent, "flow.response.rawContent") }
      : null,
  };
}

/**
 * Builds synthetic flows for `view.create`: a request with no body, stamped now,
 * and no response yet.
 */
export function createSnapshotFlowFactory(opts: { nowMs?: () => number } = {}): FlowFactory {
  const nowMs = opts.nowMs ?? (() => Date.now());
  return {
    create: (method, url) =>
      new SnapshotFlow({
        id: newFlowId(),
        marked: false,
        killable: false,
        request: { method, url, timestampStart: nowMs() / 1000, rawContent: null },
        response: null,
      }),
  };
}
