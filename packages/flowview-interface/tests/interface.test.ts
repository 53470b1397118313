import { expect, test } from "vitest";

import {
  FlowDumpError,
  OutOfBoundsError,
  UnknownOrderNameError,
  isFlowViewError,
  isUuidFlowId,
  newFlowId,
  normalizeFlowId,
  sameFlow,
} from "../src/index.js";
import type { Flow } from "../src/index.js";

function stub(id: string): Flow {
  const flow: Flow = {
    id,
    marked: false,
    killable: false,
    request: { method: "GET", url: "http://example.test/", timestampStart: null, rawContent: null },
    response: null,
    kill: () => {},
    copy: () => flow,
  };
  return flow;
}

test("new flow ids are distinct uuids", () => {
  const a = newFlowId();
  const b = newFlowId();
  expect(isUuidFlowId(a)).toBe(true);
  expect(a).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  expect(a).not.toBe(b);
});

test("normalizeFlowId", () => {
  expect(normalizeFlowId("  ABC  ")).toBe("ABC");
  expect(normalizeFlowId("3F2504E0-4F89-41D3-9A0C-0305E82C3301")).toBe("3f2504e0-4f89-41d3-9a0c-0305e82c3301");
  expect(() => normalizeFlowId("   ")).toThrow("flow id must not be empty");
});

test("sameFlow compares ids", () => {
  expect(sameFlow(stub("a"), stub("a"))).toBe(true);
  expect(sameFlow(stub("a"), stub("b"))).toBe(false);
  expect(sameFlow(stub("a"), null)).toBe(false);
});

test("errors carry a code and keep their class", () => {
  const err = new OutOfBoundsError(5, 2);
  expect(err).toBeInstanceOf(Error);
  expect(err.name).toBe("OutOfBoundsError");
  expect(err.code).toBe("out_of_bounds");
  expect(err.message).toBe("index 5 out of view bounds (length 2)");
  expect(isFlowViewError(err)).toBe(true);
  expect(isFlowViewError(new Error("plain"))).toBe(false);

  expect(new UnknownOrderNameError("speed").message).toBe("Unknown flow order: speed");

  const cause = new Error("EACCES");
  const dump = new FlowDumpError("/data/flows.cbor", "cannot read file", { cause });
  expect(dump.message).toBe("/data/flows.cbor: cannot read file");
  expect(dump.cause).toBe(cause);
});
