import { Command, InvalidArgumentError } from "commander";

import { resolveOrderName } from "@flowview/core";
import type { OrderName } from "@flowview/core";

export type ServerConfig = {
  host: string;
  port: number;
  maxPayloadBytes: number;
  order: OrderName;
  orderReversed: boolean;
  focusFollow: boolean;
  load: string | null;
  debug: boolean;
};

export type Env = Record<string, string | undefined>;

const TRUE_WORDS = new Set(["1", "true", "yes", "on"]);
const FALSE_WORDS = new Set(["0", "false", "no", "off", ""]);

export function parseBooleanFlag(name: string, raw: string): boolean {
  const clean = raw.trim().toLowerCase();
  if (TRUE_WORDS.has(clean)) return true;
  if (FALSE_WORDS.has(clean)) return false;
  throw new Error(`invalid ${name}: ${raw}`);
}

function parsePort(name: string, raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) throw new Error(`invalid ${name}: ${raw}`);
  return port;
}

function parsePositive(name: string, raw: string): number {
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) throw new Error(`invalid ${name}: ${raw}`);
  return n;
}

function parseOrder(name: string, raw: string): OrderName {
  const order = resolveOrderName(raw);
  if (!order) throw new Error(`invalid ${name}: ${raw}`);
  return order;
}

function asArgumentError<T>(parse: (raw: string) => T): (raw: string) => T {
  return (raw) => {
    try {
      return parse(raw);
    } catch (err) {
      throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
    }
  };
}

/** Read server settings from the environment, then let command-line flags override them. */
export function parseServerConfig(
  opts: {
    argv?: string[];
    env?: Env;
    writeErr?: (text: string) => void;
  } = {}
): ServerConfig {
  const argv = opts.argv ?? process.argv.slice(2);
  const env = opts.env ?? process.env;

  const fromEnv: ServerConfig = {
    host: env.HOST ?? "0.0.0.0",
    port: parsePort("PORT", env.PORT ?? "8790"),
    maxPayloadBytes: parsePositive("FLOWVIEW_MAX_PAYLOAD_BYTES", env.FLOWVIEW_MAX_PAYLOAD_BYTES ?? String(10 * 1024 * 1024)),
    order: parseOrder("FLOWVIEW_ORDER", env.FLOWVIEW_ORDER ?? "time"),
    orderReversed: parseBooleanFlag("FLOWVIEW_ORDER_REVERSED", env.FLOWVIEW_ORDER_REVERSED ?? ""),
    focusFollow: parseBooleanFlag("FLOWVIEW_FOCUS_FOLLOW", env.FLOWVIEW_FOCUS_FOLLOW ?? ""),
    load: env.FLOWVIEW_LOAD ? env.FLOWVIEW_LOAD : null,
    debug: parseBooleanFlag("FLOWVIEW_DEBUG", env.FLOWVIEW_DEBUG ?? ""),
  };

  const program = new Command()
    .name("flowview-server")
    .description("Serve a live, filtered and ordered view of intercepted flows over WebSocket.")
    .exitOverride()
    .option("--host <host>", "interface to listen on")
    .option("--port <port>", "port to listen on (0 picks a free one)", asArgumentError((raw) => parsePort("--port", raw)))
    .option(
      "--max-payload-bytes <n>",
      "largest accepted WebSocket message",
      asArgumentError((raw) => parsePositive("--max-payload-bytes", raw))
    )
    .option("--order <name>", "initial order (time, method, url, size)", asArgumentError((raw) => parseOrder("--order", raw)))
    .option("--reversed", "display the order reversed")
    .option("--focus-follow", "move focus to every newly shown flow")
    .option("--load <path>", "flow dump to load at startup")
    .option("--debug", "log debug lines");
  if (opts.writeErr) program.configureOutput({ writeErr: opts.writeErr });

  program.parse(argv, { from: "user" });

  const parsed = program.opts<{
    host?: string;
    port?: number;
    maxPayloadBytes?: number;
    order?: OrderName;
    reversed?: boolean;
    focusFollow?: boolean;
    load?: string;
    debug?: boolean;
  }>();

  return {
    host: parsed.host ?? fromEnv.host,
    port: parsed.port ?? fromEnv.port,
    maxPayloadBytes: parsed.maxPayloadBytes ?? fromEnv.maxPayloadBytes,
    order: parsed.order ?? fromEnv.order,
    orderReversed: parsed.reversed ?? fromEnv.orderReversed,
    focusFollow: parsed.focusFollow ?? fromEnv.focusFollow,
    load: parsed.load && parsed.load.length > 0 ? parsed.load : fromEnv.load,
    debug: parsed.debug ?? fromEnv.debug,
  };
}
