import http from "node:http";

import { WebSocketServer } from "ws";

import { clientMessageCodec, serverMessageCodec } from "./codec.js";
import type { ViewHub } from "./hub.js";
import { createWebSocketTransport, wrapDuplexTransportWithCodecs } from "./transport.js";

export type ViewServerOptions = {
  hub: ViewHub;
  host?: string;
  port?: number;
  path?: string;
  healthPath?: string;
  maxPayloadBytes?: number;
};

export type ViewServerHandle = {
  host: string;
  port: number;
  close: () => Promise<void>;
};

export async function startViewServer(opts: ViewServerOptions): Promise<ViewServerHandle> {
  const host = opts.host ?? "0.0.0.0";
  const port = Number(opts.port ?? 8790);
  const viewPath = opts.path ?? "/view";
  const healthPath = opts.healthPath ?? "/health";
  const maxPayloadBytes = Number(opts.maxPayloadBytes ?? 10 * 1024 * 1024);

  if (!Number.isFinite(port) || port < 0) throw new Error(`invalid port: ${opts.port}`);
  if (!viewPath.startsWith("/")) throw new Error(`path must start with "/": ${viewPath}`);
  if (!healthPath.startsWith("/")) throw new Error(`healthPath must start with "/": ${healthPath}`);
  if (!Number.isFinite(maxPayloadBytes) || maxPayloadBytes <= 0) {
    throw new Error(`invalid maxPayloadBytes: ${opts.maxPayloadBytes}`);
  }

  const server = http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    if (url.pathname === healthPath) {
      res.writeHead(200, { "content-type": "text/plain" });
      res.end("ok");
      return;
    }

    res.writeHead(404, { "content-type": "text/plain" });
    res.end("not found");
  });

  const wss = new WebSocketServer({ noServer: true, maxPayload: maxPayloadBytes });

  server.on("upgrade", (req, socket, head) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    if (url.pathname !== viewPath) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  });

  wss.on("connection", (ws) => {
    const transport = wrapDuplexTransportWithCodecs(
      createWebSocketTransport(ws),
      clientMessageCodec,
      serverMessageCodec,
      { onDecodeError: (err) => console.error("dropping undecodable message", { err: String(err) }) }
    );
    const detach = opts.hub.attach(transport);

    let cleaned = false;
    const cleanup = () => {
      if (cleaned) return;
      cleaned = true;
      detach();
    };

    ws.once("close", cleanup);
    ws.once("error", (err) => {
      console.error("websocket error", { err: err.message });
      cleanup();
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, resolve);
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address ? address.port : port;

  const close = async (): Promise<void> => {
    for (const ws of wss.clients) ws.close();
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    await new Promise<void>((resolve) => server.close(() => resolve()));
  };

  return { host, port: actualPort, close };
}
