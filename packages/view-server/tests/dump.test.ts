import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { encode } from "cborg";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { FlowDumpError } from "@flowview/interface";
import { View, ViewCommands, silentLogger } from "@flowview/core";

import { createFlowDumpReader, readFlowDump } from "../src/dump.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "flowview-dump-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function writeDump(name: string, value: unknown): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, encode(value));
  return file;
}

function entry(id: string, start: number) {
  return {
    id,
    marked: false,
    killable: false,
    request: { method: "GET", url: `http://example.test/${id}`, timestampStart: start, rawContent: null },
    response: { statusCode: 200, rawContent: new Uint8Array([1, 2, 3]) },
  };
}

describe("readFlowDump", () => {
  test("yields every stored flow in file order", async () => {
    const file = await writeDump("flows.cbor", [entry("b", 2), entry("a", 1)]);
    const ids: string[] = [];
    for await (const flow of readFlowDump(file)) ids.push(flow.id);
    expect(ids).toEqual(["b", "a"]);
  });

  test("stops at the first malformed entry", async () => {
    const file = await writeDump("partial.cbor", [entry("a", 1), { id: "b", request: "nope" }]);
    const ids: string[] = [];
    const read = async () => {
      for await (const flow of readFlowDump(file)) ids.push(flow.id);
    };
    await expect(read()).rejects.toThrow(`${file}: entry 1: flow.request must be a map`);
    expect(ids).toEqual(["a"]);
  });

  test("rejects documents that are not a list of flows", async () => {
    const file = await writeDump("map.cbor", { flows: [] });
    const iterator = readFlowDump(file);
    await expect(iterator.next()).rejects.toThrow(`${file}: expected an array of flows`);
  });

  test("reports unreadable files as dump errors", async () => {
    const file = path.join(dir, "missing.cbor");
    const iterator = readFlowDump(file);
    await expect(iterator.next()).rejects.toBeInstanceOf(FlowDumpError);
  });
});

describe("view.load", () => {
  test("adds copies of the dumped flows", async () => {
    const file = await writeDump("flows.cbor", [entry("b", 2), entry("a", 1)]);
    const view = new View();
    const commands = new ViewCommands(view, { reader: createFlowDumpReader(), log: silentLogger });

    await expect(commands.dispatch("view.load", [file])).resolves.toBe(2);
    expect(view.length).toBe(2);
    expect(view.shown().map((f) => f.request.url)).toEqual(["http://example.test/a", "http://example.test/b"]);
    expect(view.getById("a")).toBeUndefined();
  });
});
