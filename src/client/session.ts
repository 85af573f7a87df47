import { COMMAND_TIMEOUT_MS } from "../config.js";
import { PaneConnection } from "../connection/connection.js";
import { defaultLogger, type Logger } from "../logger.js";
import { clientRequestCodec, type ClientRequest } from "../protocol/client-request.js";
import type { TabId } from "../protocol/ids.js";
import type { RenderState } from "../protocol/render-state.js";
import { serverResponseCodec, type ServerResponse } from "../protocol/server-response.js";
import type { ClientListEntry, KeyCode, PluginSegment, SystemStats } from "../protocol/types.js";
import { Channel } from "./channel.js";

export type ConnectionState =
  | { status: "disconnected" }
  | { status: "connecting" }
  | { status: "connected"; clientId: number }
  | { status: "error"; message: string };

export type SessionEvent =
  | { type: "session_ended" }
  | { type: "all_workspaces_closed" }
  | { type: "kicked"; clientId: number };

/** Everything the presentation layer reads. Replaced whole, never mutated. */
export type ClientSnapshot = {
  connectionState: ConnectionState;
  renderState: RenderState | null;
  systemStats: SystemStats | null;
  pluginSegments: PluginSegment[][];
  clientList: ClientListEntry[];
};

export type SnapshotListener = (snapshot: Readonly<ClientSnapshot>, previous: Readonly<ClientSnapshot>) => void;

export type CommandResult = Omit<Extract<ServerResponse, { type: "command_output" }>, "type">;

export type ClientErrorKind = "not_connected" | "connect_cancelled" | "command_timeout";

export class ClientError extends Error {
  readonly kind: ClientErrorKind;

  constructor(kind: ClientErrorKind, message: string) {
    super(message);
    this.name = "ClientError";
    this.kind = kind;
  }
}

export type PaneClientOptions = {
  /** Overrides `PANE_SOCKET` and the per-user default. */
  socketPath?: string;
  logger?: Logger;
  commandTimeoutMs?: number;
};

type Inbound =
  | { type: "message"; message: ServerResponse }
  | { type: "closed" }
  | { type: "failed"; error: unknown };

type PendingCommand = {
  resolve: (result: CommandResult) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
  // A timed-out entry stays queued so its late reply is not handed to the next caller.
  settled: boolean;
};

const INITIAL_SNAPSHOT: Readonly<ClientSnapshot> = Object.freeze<ClientSnapshot>({
  connectionState: { status: "disconnected" },
  renderState: null,
  systemStats: null,
  pluginSegments: [],
  clientList: [],
});

/** Timed-out `runCommand` slots kept waiting for a late reply. */
export const MAX_ABANDONED_COMMANDS = 64;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Session with the daemon: owns one connection, keeps the latest server
 * state, and forwards requests.
 *
 * Inbound frames are read by a receive loop and queued on a channel; a
 * separate dispatch loop drains it in order and is the only writer of the
 * cached snapshot.
 */
export class PaneClient {
  /** Pane output and full-screen dumps, in arrival order. */
  onPaneOutput: ((tabId: TabId, data: Uint8Array) => void) | null = null;
  onSessionEvent: ((event: SessionEvent) => void) | null = null;

  private readonly socketPath: string | undefined;
  private readonly logger: Logger;
  private readonly commandTimeoutMs: number;

  private snapshot: Readonly<ClientSnapshot> = INITIAL_SNAPSHOT;
  private listeners = new Set<SnapshotListener>();
  private connection: PaneConnection | null = null;
  private abort: AbortController | null = null;
  private epoch = 0;
  private pendingCommands: PendingCommand[] = [];
  private notifications: Array<{ next: Readonly<ClientSnapshot>; previous: Readonly<ClientSnapshot> }> = [];
  private notifying = false;

  constructor(opts: PaneClientOptions = {}) {
    this.socketPath = opts.socketPath;
    this.logger = opts.logger ?? defaultLogger();
    this.commandTimeoutMs = opts.commandTimeoutMs ?? COMMAND_TIMEOUT_MS;
  }

  get state(): Readonly<ClientSnapshot> {
    return this.snapshot;
  }

  get connectionState(): ConnectionState {
    return this.snapshot.connectionState;
  }

  get renderState(): RenderState | null {
    return this.snapshot.renderState;
  }

  get systemStats(): SystemStats | null {
    return this.snapshot.systemStats;
  }

  get pluginSegments(): PluginSegment[][] {
    return this.snapshot.pluginSegments;
  }

  get clientList(): ClientListEntry[] {
    return this.snapshot.clientList;
  }

  get isConnected(): boolean {
    return this.connection !== null;
  }

  /** `runCommand` calls still holding a reply slot, including timed-out ones. */
  get pendingCommandCount(): number {
    return this.pendingCommands.length;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async connect(path?: string): Promise<void> {
    if (this.connection || this.abort) this.disconnect();
    const epoch = ++this.epoch;
    const socketPath = path ?? this.socketPath;
    // Nothing cached from an earlier daemon session survives a new connect.
    this.update({
      connectionState: { status: "connecting" },
      renderState: null,
      systemStats: null,
      pluginSegments: [],
      clientList: [],
    });

    let conn: PaneConnection | null = null;
    try {
      conn = await PaneConnection.connect(socketPath, { logger: this.logger });
      if (epoch !== this.epoch) throw new ClientError("connect_cancelled", "disconnected while connecting");
      this.connection = conn;
      await conn.send<ClientRequest>({ type: "attach" }, clientRequestCodec);
      if (epoch !== this.epoch) throw new ClientError("connect_cancelled", "disconnected while connecting");

      const abort = new AbortController();
      this.abort = abort;
      const inbox = new Channel<Inbound>();
      void this.receiveLoop(conn, abort.signal, inbox);
      void this.dispatchLoop(inbox, abort.signal);
      this.logger.info({ socketPath: socketPath ?? null }, "connected, attach sent");
    } catch (err) {
      conn?.disconnect();
      if (epoch !== this.epoch) {
        throw err instanceof ClientError ? err : new ClientError("connect_cancelled", "disconnected while connecting");
      }
      this.connection = null;
      this.logger.warn({ err: errorMessage(err), socketPath: socketPath ?? null }, "connect failed");
      this.update({ connectionState: { status: "error", message: errorMessage(err) } });
      throw err;
    }
  }

  /** Drops the connection and all cached server state. Never waits on the loops. */
  disconnect(): void {
    this.epoch++;
    const hadConnection = this.connection !== null;
    this.release();
    this.update({
      connectionState: { status: "disconnected" },
      renderState: null,
      systemStats: null,
      pluginSegments: [],
      clientList: [],
    });
    if (hadConnection) this.logger.info("disconnected");
  }

  private release(): void {
    this.abort?.abort();
    this.abort = null;
    const conn = this.connection;
    this.connection = null;
    conn?.disconnect();
    const pending = this.pendingCommands;
    this.pendingCommands = [];
    for (const p of pending) {
      clearTimeout(p.timer);
      if (!p.settled) p.reject(new ClientError("not_connected", "disconnected before the command completed"));
    }
  }

  // -------------------------------------------------------------------------
  // Sending
  // -------------------------------------------------------------------------

  async send(request: ClientRequest): Promise<void> {
    const conn = this.connection;
    if (!conn) throw new ClientError("not_connected", "not connected");
    await conn.send(request, clientRequestCodec);
  }

  detach(): Promise<void> {
    return this.send({ type: "detach" });
  }

  resize(width: number, height: number): Promise<void> {
    return this.send({ type: "resize", width, height });
  }

  sendKey(code: KeyCode, modifiers = 0): Promise<void> {
    return this.send({ type: "key", event: { code, modifiers } });
  }

  mouseDown(x: number, y: number): Promise<void> {
    return this.send({ type: "mouse_down", x, y });
  }

  mouseDrag(x: number, y: number): Promise<void> {
    return this.send({ type: "mouse_drag", x, y });
  }

  mouseMove(x: number, y: number): Promise<void> {
    return this.send({ type: "mouse_move", x, y });
  }

  mouseUp(): Promise<void> {
    return this.send({ type: "mouse_up" });
  }

  scroll(up: boolean): Promise<void> {
    return this.send({ type: "mouse_scroll", up });
  }

  command(command: string): Promise<void> {
    return this.send({ type: "command", command });
  }

  kickClient(clientId: number): Promise<void> {
    return this.send({ type: "kick_client", clientId });
  }

  setActiveWorkspace(index: number): Promise<void> {
    return this.send({ type: "set_active_workspace", index });
  }

  /**
   * Sends `CommandSync` and resolves with the daemon's `CommandOutput`.
   * Replies are matched to calls in the order the calls were made.
   */
  runCommand(command: string, timeoutMs = this.commandTimeoutMs): Promise<CommandResult> {
    const conn = this.connection;
    if (!conn) return Promise.reject(new ClientError("not_connected", "not connected"));

    return new Promise<CommandResult>((resolve, reject) => {
      const entry: PendingCommand = {
        resolve,
        reject,
        settled: false,
        timer: setTimeout(() => {
          entry.settled = true;
          reject(new ClientError("command_timeout", `command timed out after ${timeoutMs}ms: ${command}`));
          this.pruneAbandonedCommands();
        }, timeoutMs),
      };
      this.pendingCommands.push(entry);
      conn.send<ClientRequest>({ type: "command_sync", command }, clientRequestCodec).catch((err: unknown) => {
        clearTimeout(entry.timer);
        this.pendingCommands = this.pendingCommands.filter((p) => p !== entry);
        if (entry.settled) return;
        entry.settled = true;
        reject(err instanceof Error ? err : new Error(String(err)));
      });
    });
  }

  // -------------------------------------------------------------------------
  // Inbound
  // -------------------------------------------------------------------------

  private async receiveLoop(conn: PaneConnection, signal: AbortSignal, inbox: Channel<Inbound>): Promise<void> {
    try {
      while (!signal.aborted) {
        const message = await conn.receive(serverResponseCodec);
        // A read that lands after cancellation is dropped.
        if (signal.aborted) break;
        if (message === null) {
          inbox.push({ type: "closed" });
          break;
        }
        inbox.push({ type: "message", message });
      }
    } catch (error) {
      if (!signal.aborted) inbox.push({ type: "failed", error });
    } finally {
      inbox.close();
    }
  }

  private async dispatchLoop(inbox: Channel<Inbound>, signal: AbortSignal): Promise<void> {
    for await (const item of inbox) {
      if (signal.aborted) break;
      if (item.type === "closed") {
        this.logger.info("daemon closed the connection");
        this.release();
        this.update({ connectionState: { status: "disconnected" } });
        break;
      }
      if (item.type === "failed") {
        const message = errorMessage(item.error);
        this.logger.warn({ err: message }, "receive loop failed");
        this.release();
        this.update({ connectionState: { status: "error", message } });
        break;
      }
      this.handleResponse(item.message);
    }
  }

  private handleResponse(res: ServerResponse): void {
    this.logger.trace({ type: res.type }, "dispatch");
    switch (res.type) {
      case "attached":
        this.logger.info({ clientId: res.clientId }, "attached");
        this.update({ connectionState: { status: "connected", clientId: res.clientId } });
        return;
      case "pane_output":
      case "full_screen_dump": {
        const { paneId, data } = res;
        this.invoke("onPaneOutput", () => this.onPaneOutput?.(paneId, data));
        return;
      }
      case "pane_exited":
        // A layout snapshot follows.
        return;
      case "layout_changed":
        this.update({ renderState: res.renderState });
        return;
      case "stats_update":
        this.update({ systemStats: res.stats });
        return;
      case "plugin_segments":
        this.update({ pluginSegments: res.segments });
        return;
      case "client_list_changed":
        this.update({ clientList: res.clients });
        return;
      case "kicked": {
        const event: SessionEvent = { type: "kicked", clientId: res.clientId };
        this.logger.warn({ clientId: res.clientId }, "kicked by another client");
        this.invoke("onSessionEvent", () => this.onSessionEvent?.(event));
        this.disconnect();
        return;
      }
      case "error":
        this.logger.warn({ err: res.message }, "daemon reported an error");
        this.update({ connectionState: { status: "error", message: res.message } });
        return;
      case "session_ended":
      case "all_workspaces_closed": {
        // Not terminal: the daemon closes the socket itself when it is done.
        const event: SessionEvent = { type: res.type };
        this.invoke("onSessionEvent", () => this.onSessionEvent?.(event));
        return;
      }
      case "command_output":
        this.settleCommand(res);
        return;
    }
  }

  /** Keeps at most {@link MAX_ABANDONED_COMMANDS} timed-out slots, dropping the oldest. */
  private pruneAbandonedCommands(): void {
    let abandoned = this.pendingCommands.filter((p) => p.settled).length;
    if (abandoned <= MAX_ABANDONED_COMMANDS) return;
    this.pendingCommands = this.pendingCommands.filter((p) => {
      if (!p.settled || abandoned <= MAX_ABANDONED_COMMANDS) return true;
      abandoned--;
      return false;
    });
    this.logger.debug({ kept: MAX_ABANDONED_COMMANDS }, "dropped abandoned command slots");
  }

  private settleCommand(res: Extract<ServerResponse, { type: "command_output" }>): void {
    const entry = this.pendingCommands.shift();
    if (!entry) {
      this.logger.debug({ success: res.success }, "command output with no pending call");
      return;
    }
    clearTimeout(entry.timer);
    if (entry.settled) {
      this.logger.debug("dropped late command output");
      return;
    }
    entry.settled = true;
    entry.resolve({ output: res.output, paneId: res.paneId, windowId: res.windowId, success: res.success });
  }

  private invoke(name: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.logger.error({ err: errorMessage(err), callback: name }, "callback threw");
    }
  }

  private update(patch: Partial<ClientSnapshot>): void {
    const previous = this.snapshot;
    const next = Object.freeze<ClientSnapshot>({ ...previous, ...patch });
    this.snapshot = next;
    this.notifications.push({ next, previous });
    // An update made from inside a listener is queued behind the one being
    // delivered, so every listener sees snapshots in the order they were made.
    if (this.notifying) return;
    this.notifying = true;
    try {
      for (let n = this.notifications.shift(); n; n = this.notifications.shift()) {
        for (const listener of [...this.listeners]) {
          try {
            listener(n.next, n.previous);
          } catch (err) {
            this.logger.error({ err: errorMessage(err) }, "snapshot listener threw");
          }
        }
      }
    } finally {
      this.notifying = false;
    }
  }
}
