import type WebSocket from "ws";

export type Unsubscribe = () => void;

/** Message channel whose inbound and outbound message types may differ. */
export interface MessageTransport<In, Out> {
  send(msg: Out): Promise<void>;
  onMessage(handler: (msg: In) => void): Unsubscribe;
}

export type DuplexTransport<M> = MessageTransport<M, M>;

export type WireCodec<Message, Wire> = {
  encode(message: Message): Wire;
  decode(wire: Wire): Message;
};

/**
 * Wire frames that fail to decode are dropped and reported to `onDecodeError`;
 * they never reach message handlers.
 */
export function wrapDuplexTransportWithCodecs<Wire, In, Out>(
  transport: DuplexTransport<Wire>,
  inbound: WireCodec<In, Wire>,
  outbound: WireCodec<Out, Wire>,
  opts: { onDecodeError?: (err: unknown) => void } = {}
): MessageTransport<In, Out> {
  return {
    send: async (msg) => transport.send(outbound.encode(msg)),
    onMessage: (handler) =>
      transport.onMessage((wire) => {
        let msg: In;
        try {
          msg = inbound.decode(wire);
        } catch (err) {
          opts.onDecodeError?.(err);
          return;
        }
        handler(msg);
      }),
  };
}

export function createInMemoryDuplex<M>(): [DuplexTransport<M>, DuplexTransport<M>] {
  const aHandlers = new Set<(msg: M) => void>();
  const bHandlers = new Set<(msg: M) => void>();

  const a: DuplexTransport<M> = {
    async send(msg) {
      queueMicrotask(() => {
        for (const h of bHandlers) h(msg);
      });
    },
    onMessage(handler) {
      aHandlers.add(handler);
      return () => aHandlers.delete(handler);
    },
  };

  const b: DuplexTransport<M> = {
    async send(msg) {
      queueMicrotask(() => {
        for (const h of aHandlers) h(msg);
      });
    },
    onMessage(handler) {
      bHandlers.add(handler);
      return () => bHandlers.delete(handler);
    },
  };

  return [a, b];
}

function toUint8Array(data: WebSocket.RawData): Uint8Array {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return Buffer.concat(data);
}

export function createWebSocketTransport(ws: WebSocket): DuplexTransport<Uint8Array> {
  return {
    send: (bytes) =>
      new Promise<void>((resolve, reject) => {
        try {
          ws.send(bytes, { binary: true }, (err) => (err ? reject(err) : resolve()));
        } catch (err) {
          reject(err instanceof Error ? err : new Error(String(err)));
        }
      }),
    onMessage: (handler) => {
      const onMessage = (data: WebSocket.RawData) => handler(toUint8Array(data));
      ws.on("message", onMessage);
      return () => ws.off("message", onMessage);
    },
  };
}
