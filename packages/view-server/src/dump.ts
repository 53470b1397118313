import { readFile } from "node:fs/promises";

import { decode } from "cborg";

import { FlowDumpError } from "@flowview/interface";
import type { FlowReader } from "@flowview/interface";

import { SnapshotFlow, parseSnapshot } from "./snapshot.js";
import type { SnapshotFlowOptions } from "./snapshot.js";

/**
 * Stream the flows stored in a dump file: a single CBOR array of flow snapshots.
 * Entries are validated one at a time, so flows before a malformed entry are
 * still yielded.
 */
export async function* readFlowDump(path: string, opts: SnapshotFlowOptions = {}): AsyncGenerator<SnapshotFlow> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (err) {
    throw new FlowDumpError(path, `cannot read file: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }

  let decoded: unknown;
  try {
    decoded = decode(bytes);
  } catch (err) {
    throw new FlowDumpError(path, "not a CBOR document", { cause: err });
  }
  if (!Array.isArray(decoded)) throw new FlowDumpError(path, "expected an array of flows");

  const entries: unknown[] = decoded;
  for (const [i, entry] of entries.entries()) {
    let flow: SnapshotFlow;
    try {
      flow = new SnapshotFlow(parseSnapshot(entry), opts);
    } catch (err) {
      throw new FlowDumpError(path, `entry ${i}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
    yield flow;
  }
}

export function createFlowDumpReader(opts: SnapshotFlowOptions = {}): FlowReader {
  return { stream: (path) => readFlowDump(path, opts) };
}
