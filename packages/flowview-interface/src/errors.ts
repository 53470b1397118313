export type FlowViewErrorCode =
  | "invalid_filter_expression"
  | "unknown_order_name"
  | "out_of_bounds"
  | "focus_not_in_view"
  | "unknown_id_access"
  | "reentrant_mutation"
  | "unknown_command"
  | "command_argument"
  | "command_unavailable"
  | "flow_dump";

/**
 * Base class for every caller-input error raised by the view layer.
 *
 * None of these are retried; they report a rejected request and leave state untouched.
 */
export class FlowViewError extends Error {
  readonly code: FlowViewErrorCode;

  constructor(code: FlowViewErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FlowViewError";
    this.code = code;
  }
}

export class InvalidFilterExpressionError extends FlowViewError {
  constructor(readonly expression: string) {
    super("invalid_filter_expression", `Invalid flow filter: ${expression}`);
    this.name = "InvalidFilterExpressionError";
  }
}

export class UnknownOrderNameError extends FlowViewError {
  constructor(readonly orderName: string) {
    super("unknown_order_name", `Unknown flow order: ${orderName}`);
    this.name = "UnknownOrderNameError";
  }
}

export class OutOfBoundsError extends FlowViewError {
  constructor(
    readonly index: number,
    readonly length: number
  ) {
    super("out_of_bounds", `index ${index} out of view bounds (length ${length})`);
    this.name = "OutOfBoundsError";
  }
}

export class FocusNotInViewError extends FlowViewError {
  constructor(readonly flowId: string) {
    super("focus_not_in_view", `Attempt to set focus to flow not in view: ${flowId}`);
    this.name = "FocusNotInViewError";
  }
}

export class UnknownIdAccessError extends FlowViewError {
  constructor(readonly flowId: string) {
    super("unknown_id_access", `flow is not in the store: ${flowId}`);
    this.name = "UnknownIdAccessError";
  }
}

export class ReentrantMutationError extends FlowViewError {
  constructor(
    readonly operation: string,
    readonly active: string
  ) {
    super("reentrant_mutation", `view.${operation} called from a signal handler while view.${active} is running`);
    this.name = "ReentrantMutationError";
  }
}

export class UnknownCommandError extends FlowViewError {
  constructor(readonly command: string) {
    super("unknown_command", `Unknown command: ${command}`);
    this.name = "UnknownCommandError";
  }
}

export class CommandArgumentError extends FlowViewError {
  constructor(
    readonly command: string,
    message: string
  ) {
    super("command_argument", `${command}: ${message}`);
    this.name = "CommandArgumentError";
  }
}

export class CommandUnavailableError extends FlowViewError {
  constructor(
    readonly command: string,
    collaborator: string
  ) {
    super("command_unavailable", `${command}: no ${collaborator} configured`);
    this.name = "CommandUnavailableError";
  }
}

export class FlowDumpError extends FlowViewError {
  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("flow_dump", `${path}: ${message}`, options);
    this.name = "FlowDumpError";
  }
}

export function isFlowViewError(err: unknown): err is FlowViewError {
  return err instanceof FlowViewError;
}
