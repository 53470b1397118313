import http from "node:http";

import { test, expect } from "vitest";
import WebSocket from "ws";

import { View, silentLogger } from "@flowview/core";

import { clientMessageCodec, serverMessageCodec } from "../src/codec.js";
import type { ViewServerMessage } from "../src/codec.js";
import { ViewHub } from "../src/hub.js";
import { startViewServer } from "../src/server.js";

type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
};

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  const timeout = deferred<never>();
  const timer = setTimeout(() => timeout.reject(new Error(`timeout after ${ms}ms: ${label}`)), ms);
  try {
    return await Promise.race([promise, timeout.promise]);
  } finally {
    clearTimeout(timer);
  }
}

async function httpGet(url: string): Promise<{ status: number; body: string }> {
  return new Promise((resolve, reject) => {
    const req = http.get(url, (res) => {
      const chunks: Buffer[] = [];
      res.on("data", (chunk: Buffer) => chunks.push(chunk));
      res.on("end", () => {
        resolve({
          status: res.statusCode ?? 0,
          body: Buffer.concat(chunks).toString("utf8"),
        });
      });
    });
    req.once("error", reject);
  });
}

function toBytes(data: WebSocket.RawData): Uint8Array {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return Buffer.concat(data);
}

type Client = {
  ws: WebSocket;
  waitFor: (label: string, match: (msg: ViewServerMessage) => boolean) => Promise<ViewServerMessage>;
};

async function connectClient(url: string): Promise<Client> {
  const ws = new WebSocket(url);
  const received: ViewServerMessage[] = [];
  const waiters = new Set<() => void>();
  ws.on("message", (data: WebSocket.RawData) => {
    received.push(serverMessageCodec.decode(toBytes(data)));
    for (const wake of [...waiters]) wake();
  });

  await withTimeout(
    new Promise<void>((resolve, reject) => {
      ws.once("open", () => resolve());
      ws.once("error", reject);
    }),
    5_000,
    "websocket open"
  );

  const waitFor = (label: string, match: (msg: ViewServerMessage) => boolean) => {
    const found = deferred<ViewServerMessage>();
    const check = () => {
      const hit = received.find(match);
      if (!hit) return;
      waiters.delete(check);
      found.resolve(hit);
    };
    waiters.add(check);
    check();
    return withTimeout(found.promise, 5_000, label);
  };

  return { ws, waitFor };
}

async function startServer() {
  const view = new View();
  const hub = new ViewHub(view, { log: silentLogger });
  const server = await startViewServer({ hub, host: "127.0.0.1", port: 0 });
  return { view, hub, server, base: `${server.host}:${server.port}` };
}

test("health endpoint returns ok", async () => {
  const { server, base } = await startServer();
  try {
    const health = await httpGet(`http://${base}/health`);
    expect(health.status).toBe(200);
    expect(health.body).toBe("ok");

    const notFound = await httpGet(`http://${base}/not-found`);
    expect(notFound.status).toBe(404);
    expect(notFound.body).toBe("not found");
  } finally {
    await server.close();
  }
});

test("upgrades outside the view path are refused", async () => {
  const { hub, server, base } = await startServer();
  try {
    const ws = new WebSocket(`ws://${base}/elsewhere`);
    const failed = await withTimeout(
      new Promise<boolean>((resolve) => {
        ws.once("open", () => resolve(false));
        ws.once("error", () => resolve(true));
      }),
      5_000,
      "refused upgrade"
    );
    expect(failed).toBe(true);
    expect(hub.connectionCount).toBe(0);
  } finally {
    await server.close();
  }
});

test("flows pushed over a websocket reach the view and come back as signals", async () => {
  const { view, hub, server, base } = await startServer();
  let closed = false;
  try {
    const client = await connectClient(`ws://${base}/view`);
    await client.waitFor("initial focus", (msg) => msg.t === "focus");
    expect(hub.connectionCount).toBe(1);

    client.ws.send(
      clientMessageCodec.encode({
        t: "flow",
        op: "add",
        flow: {
          id: "f1",
          marked: false,
          killable: true,
          request: { method: "GET", url: "http://example.test/", timestampStart: 1, rawContent: null },
          response: null,
        },
      })
    );

    const added = await client.waitFor("view-add", (msg) => msg.t === "signal" && msg.signal === "view-add");
    expect(added).toEqual({ t: "signal", signal: "view-add", flowId: "f1", index: 0 });
    expect(view.shown().map((f) => f.id)).toEqual(["f1"]);

    await withTimeout(server.close(), 5_000, "server close");
    closed = true;
  } finally {
    if (!closed) await server.close();
  }
});
