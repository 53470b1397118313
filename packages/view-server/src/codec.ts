import { decode, encode } from "cborg";

import { parseSnapshot } from "./snapshot.js";
import type { FlowSnapshot } from "./snapshot.js";
import type { WireCodec } from "./transport.js";

export type FlowEventOp = "add" | "update" | "remove";

export const FLOW_EVENT_OPS: readonly FlowEventOp[] = ["add", "update", "remove"];

export type ViewClientMessage =
  | { t: "flow"; op: FlowEventOp; flow: FlowSnapshot }
  | { t: "command"; id: string; name: string; args: string[] };

export type ViewSignalName =
  | "view-add"
  | "view-remove"
  | "view-update"
  | "view-refresh"
  | "store-remove"
  | "store-refresh";

export const VIEW_SIGNAL_NAMES: readonly ViewSignalName[] = [
  "view-add",
  "view-remove",
  "view-update",
  "view-refresh",
  "store-remove",
  "store-refresh",
];

export type CommandResultValue = null | number | string | string[] | FlowSnapshot[];

export type CommandFailure = { code: string; message: string };

export type ViewServerMessage =
  | { t: "signal"; signal: ViewSignalName; flowId: string | null; index: number | null }
  | { t: "focus"; flowId: string | null }
  | { t: "kill"; flowId: string }
  | { t: "result"; id: string; ok: true; value: CommandResultValue }
  | { t: "result"; id: string; ok: false; error: CommandFailure };

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isFlowEventOp(value: unknown): value is FlowEventOp {
  return FLOW_EVENT_OPS.some((op) => op === value);
}

function isViewSignalName(value: unknown): value is ViewSignalName {
  return VIEW_SIGNAL_NAMES.some((name) => name === value);
}

function expectString(value: unknown, field: string): string {
  if (typeof value !== "string") throw new Error(`${field} must be a string`);
  return value;
}

function nullableString(value: unknown, field: string): string | null {
  return value === null ? null : expectString(value, field);
}

function nullableIndex(value: unknown, field: string): number | null {
  if (value === null) return null;
  if (typeof value !== "number" || !Number.isInteger(value)) throw new Error(`${field} must be an integer`);
  return value;
}

function decodeMap(bytes: Uint8Array): Record<string, unknown> {
  const value: unknown = decode(bytes);
  if (!isRecord(value)) throw new Error("message must be a map");
  return value;
}

export function parseClientMessage(value: Record<string, unknown>): ViewClientMessage {
  switch (value.t) {
    case "flow": {
      if (!isFlowEventOp(value.op)) throw new Error(`unknown flow op: ${String(value.op)}`);
      return { t: "flow", op: value.op, flow: parseSnapshot(value.flow) };
    }
    case "command": {
      const rawArgs = value.args ?? [];
      if (!Array.isArray(rawArgs)) throw new Error("command.args must be an array");
      const args: string[] = [];
      for (const arg of rawArgs) args.push(expectString(arg, "command.args[]"));
      return {
        t: "command",
        id: expectString(value.id, "command.id"),
        name: expectString(value.name, "command.name"),
        args,
      };
    }
    default:
      throw new Error(`unknown client message type: ${String(value.t)}`);
  }
}

function parseResultValue(value: unknown): CommandResultValue {
  if (value === null || typeof value === "number" || typeof value === "string") return value;
  if (!Array.isArray(value)) throw new Error("result.value has an unsupported type");
  const items: unknown[] = value;
  const strings: string[] = [];
  const flows: FlowSnapshot[] = [];
  for (const item of items) {
    if (typeof item === "string") strings.push(item);
    else flows.push(parseSnapshot(item));
  }
  if (strings.length > 0 && flows.length > 0) throw new Error("result.value mixes strings and flows");
  return flows.length > 0 ? flows : strings;
}

export function parseServerMessage(value: Record<string, unknown>): ViewServerMessage {
  switch (value.t) {
    case "signal": {
      if (!isViewSignalName(value.signal)) throw new Error(`unknown signal: ${String(value.signal)}`);
      return {
        t: "signal",
        signal: value.signal,
        flowId: nullableString(value.flowId, "signal.flowId"),
        index: nullableIndex(value.index, "signal.index"),
      };
    }
    case "focus":
      return { t: "focus", flowId: nullableString(value.flowId, "focus.flowId") };
    case "kill":
      return { t: "kill", flowId: expectString(value.flowId, "kill.flowId") };
    case "result": {
      const id = expectString(value.id, "result.id");
      if (value.ok === true) return { t: "result", id, ok: true, value: parseResultValue(value.value) };
      const error = value.error;
      if (value.ok !== false || !isRecord(error)) throw new Error("result must carry a value or an error");
      return {
        t: "result",
        id,
        ok: false,
        error: {
          code: expectString(error.code, "result.error.code"),
          message: expectString(error.message, "result.error.message"),
        },
      };
    }
    default:
      throw new Error(`unknown server message type: ${String(value.t)}`);
  }
}

export const clientMessageCodec: WireCodec<ViewClientMessage, Uint8Array> = {
  encode: (message) => encode(message),
  decode: (wire) => parseClientMessage(decodeMap(wire)),
};

export const serverMessageCodec: WireCodec<ViewServerMessage, Uint8Array> = {
  encode: (message) => encode(message),
  decode: (wire) => parseServerMessage(decodeMap(wire)),
};
