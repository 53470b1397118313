export {
  SnapshotFlow,
  createSnapshotFlowFactory,
  parseSnapshot,
  toSnapshot,
} from "./snapshot.js";
export type { FlowSnapshot, SnapshotFlowOptions } from "./snapshot.js";
export {
  FLOW_EVENT_OPS,
  VIEW_SIGNAL_NAMES,
  clientMessageCodec,
  parseClientMessage,
  parseServerMessage,
  serverMessageCodec,
} from "./codec.js";
export type {
  CommandFailure,
  CommandResultValue,
  FlowEventOp,
  ViewClientMessage,
  ViewServerMessage,
  ViewSignalName,
} from "./codec.js";
export { createFlowDumpReader, readFlowDump } from "./dump.js";
export { ViewHub, toCommandFailure, toCommandResultValue } from "./hub.js";
export type { ViewHubOptions, ViewHubTransport } from "./hub.js";
export { startViewServer } from "./server.js";
export type { ViewServerHandle, ViewServerOptions } from "./server.js";
export { parseBooleanFlag, parseServerConfig } from "./config.js";
export type { Env, ServerConfig } from "./config.js";
export { createInMemoryDuplex, createWebSocketTransport, wrapDuplexTransportWithCodecs } from "./transport.js";
export type { DuplexTransport, MessageTransport, Unsubscribe, WireCodec } from "./transport.js";
