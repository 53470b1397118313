import { isFlowViewError } from "@flowview/interface";
import type { Flow, FlowId } from "@flowview/interface";
import { ViewCommands, createViewLogger } from "@flowview/core";
import type { CommandValue, Unsubscribe, View, ViewLogger } from "@flowview/core";

import type {
  CommandFailure,
  CommandResultValue,
  FlowEventOp,
  ViewClientMessage,
  ViewServerMessage,
  ViewSignalName,
} from "./codec.js";
import { SnapshotFlow, toSnapshot } from "./snapshot.js";
import type { FlowSnapshot } from "./snapshot.js";
import type { MessageTransport } from "./transport.js";

export type ViewHubTransport = MessageTransport<ViewClientMessage, ViewServerMessage>;

export type ViewHubOptions = {
  commands?: ViewCommands;
  log?: ViewLogger;
};

type Connection = {
  readonly id: number;
  readonly transport: ViewHubTransport;
};

export function toCommandResultValue(value: CommandValue): CommandResultValue {
  if (value === null || typeof value === "number" || typeof value === "string") return value;
  const strings: string[] = [];
  const flows: FlowSnapshot[] = [];
  for (const item of value) {
    if (typeof item === "string") strings.push(item);
    else flows.push(toSnapshot(item));
  }
  return flows.length > 0 ? flows : strings;
}

export function toCommandFailure(err: unknown): CommandFailure {
  if (isFlowViewError(err)) return { code: err.code, message: err.message };
  return { code: "internal", message: err instanceof Error ? err.message : String(err) };
}

/**
 * Fans one View out to any number of connections.
 *
 * Producers push flow snapshots in; every connection receives the view's signals and
 * focus changes and may run view commands. A flow killed through the view is
 * reported back to the connection that produced it.
 *
 * Focus re-anchors inside the view's own signal handlers, which run before the hub's,
 * so a `focus` message precedes the `view-add` or `view-remove` signal that caused it.
 * Textual selectors in commands need the view to have a `filterParser`; without one
 * only the `@` selectors resolve and anything else fails with
 * `invalid_filter_expression`.
 */
export class ViewHub {
  readonly commands: ViewCommands;
  private readonly log: ViewLogger;
  private readonly connections = new Map<number, Connection>();
  private readonly owners = new Map<FlowId, Connection>();
  private readonly subscriptions: Unsubscribe[];
  private nextConnectionId = 1;

  constructor(
    readonly view: View,
    opts: ViewHubOptions = {}
  ) {
    this.log = opts.log ?? createViewLogger();
    this.commands = opts.commands ?? new ViewCommands(view, { log: this.log });

    const { signals } = view;
    this.subscriptions = [
      signals.viewAdd.connect((flow) => this.broadcastSignal("view-add", flow, view.indexOf(flow))),
      signals.viewUpdate.connect((flow) => this.broadcastSignal("view-update", flow, view.indexOf(flow))),
      signals.viewRemove.connect((flow, index) => this.broadcastSignal("view-remove", flow, index)),
      signals.viewRefresh.connect(() => this.broadcastSignal("view-refresh", null, null)),
      signals.storeRemove.connect((flow) => {
        this.owners.delete(flow.id);
        this.broadcastSignal("store-remove", flow, null);
      }),
      signals.storeRefresh.connect(() => {
        for (const id of [...this.owners.keys()]) {
          if (!view.getById(id)) this.owners.delete(id);
        }
        this.broadcastSignal("store-refresh", null, null);
      }),
      view.focus.change.connect((flow) => this.broadcast({ t: "focus", flowId: flow ? flow.id : null })),
    ];
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  /** Start serving a connection. The returned function detaches it again. */
  attach(transport: ViewHubTransport): () => void {
    const conn: Connection = { id: this.nextConnectionId++, transport };
    this.connections.set(conn.id, conn);
    const unsubscribe = transport.onMessage((msg) => this.handleMessage(conn, msg));
    this.log.debug(`connection ${conn.id} attached`);

    const focused = this.view.focus.flow;
    this.send(conn, { t: "focus", flowId: focused ? focused.id : null });

    return () => {
      unsubscribe();
      this.connections.delete(conn.id);
      for (const [id, owner] of [...this.owners]) {
        if (owner === conn) this.owners.delete(id);
      }
      this.log.debug(`connection ${conn.id} detached`);
    };
  }

  /** Stop relaying view events. Attached connections stay attached but go quiet. */
  close(): void {
    for (const unsubscribe of this.subscriptions.splice(0)) unsubscribe();
  }

  private handleMessage(conn: Connection, msg: ViewClientMessage): void {
    if (msg.t === "command") {
      this.runCommand(conn, msg.id, msg.name, msg.args).catch((err: unknown) => {
        this.log.error("failed to reply to command", { connection: conn.id, command: msg.name, err: String(err) });
      });
      return;
    }
    try {
      this.ingest(conn, msg.op, msg.flow);
    } catch (err) {
      this.log.error("failed to apply flow event", {
        connection: conn.id,
        op: msg.op,
        flowId: msg.flow.id,
        err: String(err),
      });
    }
  }

  private ingest(conn: Connection, op: FlowEventOp, snapshot: FlowSnapshot): void {
    const existing = this.view.getById(snapshot.id);
    switch (op) {
      case "add": {
        if (existing) {
          this.log.debug(`ignoring duplicate add for flow ${snapshot.id}`);
          return;
        }
        const flow = new SnapshotFlow(snapshot, { onKill: (killed) => this.forwardKill(killed) });
        this.owners.set(flow.id, conn);
        this.view.add([flow]);
        return;
      }
      case "update": {
        if (!(existing instanceof SnapshotFlow)) {
          this.log.debug(`ignoring update for unknown flow ${snapshot.id}`);
          return;
        }
        existing.apply(snapshot);
        this.view.update([existing]);
        return;
      }
      case "remove": {
        if (existing) this.view.remove([existing]);
        return;
      }
    }
  }

  private async runCommand(conn: Connection, id: string, name: string, args: string[]): Promise<void> {
    let reply: ViewServerMessage;
    try {
      const value = await this.commands.dispatch(name, args);
      reply = { t: "result", id, ok: true, value: toCommandResultValue(value) };
    } catch (err) {
      if (!isFlowViewError(err)) this.log.error("command failed", { connection: conn.id, command: name, err: String(err) });
      reply = { t: "result", id, ok: false, error: toCommandFailure(err) };
    }
    await conn.transport.send(reply);
  }

  private forwardKill(flow: Flow): void {
    const owner = this.owners.get(flow.id);
    if (!owner || !this.connections.has(owner.id)) {
      this.log.debug(`no producer to notify of kill for flow ${flow.id}`);
      return;
    }
    this.send(owner, { t: "kill", flowId: flow.id });
  }

  private broadcastSignal(signal: ViewSignalName, flow: Flow | null, index: number | null): void {
    this.broadcast({ t: "signal", signal, flowId: flow ? flow.id : null, index });
  }

  private broadcast(msg: ViewServerMessage): void {
    for (const conn of this.connections.values()) this.send(conn, msg);
  }

  private send(conn: Connection, msg: ViewServerMessage): void {
    conn.transport.send(msg).catch((err: unknown) => {
      this.log.error("failed to send message", { connection: conn.id, type: msg.t, err: String(err) });
    });
  }
}
