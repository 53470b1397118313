export type FlowId = string;

export type FlowRequest = {
  method: string;
  url: string;
  /** Seconds since the epoch at which the first request byte was seen. */
  timestampStart: number | null;
  rawContent: Uint8Array | null;
};

export type FlowResponse = {
  statusCode: number;
  rawContent: Uint8Array | null;
};

/**
 * One intercepted exchange as the view layer sees it.
 *
 * Records are produced and mutated by the interception engine; the view only reads
 * the fields below. Two records are the same record iff their `id`s are equal.
 */
export interface Flow {
  readonly id: FlowId;
  marked: boolean;
  readonly killable: boolean;
  request: FlowRequest;
  response: FlowResponse | null;
  /** Abort the underlying exchange. Only meaningful while `killable` is true. */
  kill(): void;
  /** Copy of this record bearing a fresh id. */
  copy(): Flow;
}

export type FlowPredicate = (flow: Flow) => boolean;

export interface FilterParser {
  /** Returns `null` when `text` is not a valid expression. */
  parse(text: string): FlowPredicate | null;
}

export interface FlowReader {
  stream(path: string): AsyncIterable<Flow>;
}

export interface FlowFactory {
  create(method: string, url: string): Flow;
}

export const matchAll: FlowPredicate = () => true;

export function sameFlow(a: Flow | null | undefined, b: Flow | null | undefined): boolean {
  if (!a || !b) return false;
  return a.id === b.id;
}

export * from "./errors.js";
export * from "./ids.js";
