export { View, FLOW_SELECTORS } from "./view.js";
export type { ViewConfig, ViewOptions } from "./view.js";
export { Focus } from "./focus.js";
export type { FocusableView } from "./focus.js";
export { Settings } from "./settings.js";
export { Store } from "./store.js";
export { SortedIndex } from "./sorted-index.js";
export type { SortPosition } from "./sorted-index.js";
export {
  OrderKey,
  RequestStartOrder,
  RequestMethodOrder,
  RequestUrlOrder,
  SizeOrder,
  ORDER_NAMES,
  ORDER_ALIASES,
  compareOrderValues,
  createOrderTable,
  isOrderName,
  resolveOrderName,
} from "./order.js";
export type { OrderKeyHost, OrderKeyId, OrderName, OrderTable, OrderValue } from "./order.js";
export { Signal, createViewSignals } from "./signals.js";
export type { SignalHandler, Unsubscribe, ViewSignals } from "./signals.js";
export type { IndexedAccess, KeyedLookup, LengthOf } from "./lookup.js";
export { ViewCommands, VIEW_COMMAND_NAMES } from "./commands.js";
export type { CommandValue, ViewCommandName, ViewCommandsOptions } from "./commands.js";
export { createViewLogger, silentLogger } from "./logger.js";
export type { ViewLogger } from "./logger.js";
