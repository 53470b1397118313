import { CommanderError } from "commander";

import { View, ViewCommands, createViewLogger } from "@flowview/core";

import { parseServerConfig } from "./config.js";
import { createFlowDumpReader } from "./dump.js";
import { ViewHub } from "./hub.js";
import { startViewServer } from "./server.js";
import { createSnapshotFlowFactory } from "./snapshot.js";

// No filter language ships with the server, so the view has no `filterParser`:
// commands over the wire take `@` selectors (`@all`, `@focus`, `@shown`, ...) only.
async function main() {
  const config = parseServerConfig();
  const log = createViewLogger({ debug: config.debug });

  const view = new View({
    order: config.order,
    orderReversed: config.orderReversed,
    focusFollow: config.focusFollow,
  });
  const commands = new ViewCommands(view, {
    reader: createFlowDumpReader(),
    factory: createSnapshotFlowFactory(),
    log,
  });
  const hub = new ViewHub(view, { commands, log });

  if (config.load) {
    const count = await commands.load(config.load);
    log.info(`Loaded ${count} flows from ${config.load}`);
  }

  const handle = await startViewServer({
    hub,
    host: config.host,
    port: config.port,
    maxPayloadBytes: config.maxPayloadBytes,
  });
  console.log(`flowview server listening on http://${handle.host}:${handle.port}`);
  console.log(`- health: http://${handle.host}:${handle.port}/health`);
  console.log(`- ws: ws://${handle.host}:${handle.port}/view`);
}

main().catch((err) => {
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode;
    return;
  }
  console.error(err);
  process.exitCode = 1;
});
