import { randomUUID } from "node:crypto";

import type { FlowId } from "./index.js";

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

export function newFlowId(): FlowId {
  return randomUUID();
}

export function isUuidFlowId(id: string): boolean {
  return UUID_RE.test(id);
}

/**
 * Canonical form of a flow id received from outside the process.
 *
 * UUIDs are lower-cased; any other non-empty token is accepted as-is so producers
 * with their own id schemes keep working.
 */
export function normalizeFlowId(raw: string): FlowId {
  const clean = raw.trim();
  if (clean.length === 0) throw new Error("flow id must not be empty");
  const lower = clean.toLowerCase();
  return isUuidFlowId(lower) ? lower : clean;
}
