import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ClientError, MAX_ABANDONED_COMMANDS, PaneClient, type SessionEvent } from "../src/client/session.js";
import { createLogger } from "../src/logger.js";
import { parseTabId, parseWindowId } from "../src/protocol/ids.js";
import type { ClientRequest } from "../src/protocol/client-request.js";
import type { RenderState } from "../src/protocol/render-state.js";
import { FakeDaemon, waitForState, type DaemonPeer } from "./helpers/fake-daemon.js";

const logger = createLogger({ level: "silent" });

const TAB = parseTabId("c0ffee00-0000-4000-8000-000000000001");
const WIN = parseWindowId("c0ffee00-0000-4000-8000-0000000000a1");

const RENDER_STATE: RenderState = {
  workspaces: [
    {
      name: "main",
      layout: { type: "leaf", windowId: WIN },
      groups: [
        {
          id: WIN,
          tabs: [{ id: TAB, kind: "shell", title: "zsh", exited: false, foregroundProcess: null, cwd: "/home/dev" }],
          activeTab: 0,
        },
      ],
      activeGroup: WIN,
      syncPanes: false,
      foldedWindows: new Set(),
      zoomedWindow: null,
      floatingWindows: [],
    },
  ],
  activeWorkspace: 0,
};

describe("PaneClient", () => {
  let daemon: FakeDaemon;
  let client: PaneClient;

  beforeEach(async () => {
    daemon = await FakeDaemon.start();
    client = new PaneClient({ socketPath: daemon.socketPath, logger, commandTimeoutMs: 1000 });
  });

  afterEach(async () => {
    client.disconnect();
    await daemon.stop();
  });

  async function attach(clientId = 7): Promise<DaemonPeer> {
    await client.connect();
    const peer = await daemon.nextPeer();
    expect(await peer.nextRequest()).toEqual({ type: "attach" });
    peer.send({ type: "attached", clientId });
    await waitForState(client, (s) => s.connectionState.status === "connected");
    return peer;
  }

  it("starts disconnected with empty caches", () => {
    expect(client.connectionState).toEqual({ status: "disconnected" });
    expect(client.renderState).toBeNull();
    expect(client.systemStats).toBeNull();
    expect(client.pluginSegments).toEqual([]);
    expect(client.clientList).toEqual([]);
  });

  it("attaches, applies a layout and reports the session ending", async () => {
    const statuses: string[] = [];
    let layouts = 0;
    client.subscribe((s, prev) => {
      if (s.connectionState !== prev.connectionState) statuses.push(s.connectionState.status);
      if (s.renderState !== prev.renderState) layouts++;
    });
    const events: SessionEvent[] = [];
    client.onSessionEvent = (e) => events.push(e);

    const peer = await attach(7);
    expect(client.connectionState).toEqual({ status: "connected", clientId: 7 });

    peer.send({ type: "layout_changed", renderState: RENDER_STATE });
    const snap = await waitForState(client, (s) => s.renderState !== null);
    expect(snap.renderState).toEqual(RENDER_STATE);

    peer.send({ type: "session_ended" });
    await vi.waitFor(() => expect(events).toEqual([{ type: "session_ended" }]));
    expect(client.connectionState).toEqual({ status: "connected", clientId: 7 });
    expect(statuses).toEqual(["connecting", "connected"]);
    expect(layouts).toBe(1);
  });

  it("delivers snapshots made inside a listener after the current one", async () => {
    client.subscribe((s) => {
      if (s.connectionState.status === "error") client.disconnect();
    });
    const statuses: string[] = [];
    client.subscribe((s, prev) => {
      if (s.connectionState !== prev.connectionState) statuses.push(s.connectionState.status);
    });

    const peer = await attach();
    peer.send({ type: "error", message: "boom" });
    await waitForState(client, (s) => s.connectionState.status === "disconnected");

    expect(statuses).toEqual(["connecting", "connected", "error", "disconnected"]);
    expect(statuses[statuses.length - 1]).toBe(client.connectionState.status);
  });

  it("forwards pane output and full-screen dumps in order", async () => {
    const peer = await attach();
    const chunks: Array<[string, number[]]> = [];
    client.onPaneOutput = (tabId, data) => chunks.push([tabId, [...data]]);

    peer.send({ type: "pane_output", paneId: TAB, data: Uint8Array.from([104, 105]) });
    peer.send({ type: "full_screen_dump", paneId: TAB, data: Uint8Array.from([27, 99]) });
    await vi.waitFor(() => expect(chunks).toHaveLength(2));
    expect(chunks).toEqual([
      [TAB, [104, 105]],
      [TAB, [27, 99]],
    ]);
  });

  it("replaces stats, segments and the client list", async () => {
    const peer = await attach();
    peer.send({ type: "stats_update", stats: { cpuPercent: 5, memoryPercent: 30, loadAvg1: 0.5, diskUsagePercent: 70 } });
    peer.send({ type: "plugin_segments", segments: [[{ text: "git:main", style: "dim" }]] });
    peer.send({ type: "client_list_changed", clients: [{ id: 7, width: 120, height: 40, activeWorkspace: 0 }] });

    const snap = await waitForState(client, (s) => s.clientList.length === 1);
    expect(snap.systemStats).toEqual({ cpuPercent: 5, memoryPercent: 30, loadAvg1: 0.5, diskUsagePercent: 70 });
    expect(snap.pluginSegments).toEqual([[{ text: "git:main", style: "dim" }]]);
    expect(snap.clientList).toEqual([{ id: 7, width: 120, height: 40, activeWorkspace: 0 }]);
  });

  it("ignores pane exits until the next layout", async () => {
    const peer = await attach();
    peer.send({ type: "layout_changed", renderState: RENDER_STATE });
    await waitForState(client, (s) => s.renderState !== null);
    const before = client.state;
    peer.send({ type: "pane_exited", paneId: TAB });
    peer.send({ type: "all_workspaces_closed" });
    const events: SessionEvent[] = [];
    client.onSessionEvent = (e) => events.push(e);
    await vi.waitFor(() => expect(events).toEqual([{ type: "all_workspaces_closed" }]));
    expect(client.state).toBe(before);
  });

  it("moves to the error state on a daemon error and keeps dispatching", async () => {
    const peer = await attach();
    peer.send({ type: "error", message: "no such workspace" });
    await waitForState(client, (s) => s.connectionState.status === "error");
    expect(client.connectionState).toEqual({ status: "error", message: "no such workspace" });

    peer.send({ type: "stats_update", stats: { cpuPercent: 1, memoryPercent: 2, loadAvg1: 3, diskUsagePercent: 4 } });
    const snap = await waitForState(client, (s) => s.systemStats !== null);
    expect(snap.systemStats?.loadAvg1).toBe(3);
  });

  it("reports a kick and then disconnects", async () => {
    const peer = await attach();
    peer.send({ type: "layout_changed", renderState: RENDER_STATE });
    await waitForState(client, (s) => s.renderState !== null);

    const events: SessionEvent[] = [];
    let stateAtKick = "";
    client.onSessionEvent = (e) => {
      events.push(e);
      stateAtKick = client.connectionState.status;
    };
    peer.send({ type: "kicked", clientId: 7 });
    await waitForState(client, (s) => s.connectionState.status === "disconnected");

    expect(events).toEqual([{ type: "kicked", clientId: 7 }]);
    expect(stateAtKick).toBe("connected");
    expect(client.renderState).toBeNull();
    expect(client.isConnected).toBe(false);
  });

  it("goes to disconnected when the daemon closes the stream", async () => {
    const peer = await attach();
    peer.send({ type: "layout_changed", renderState: RENDER_STATE });
    await waitForState(client, (s) => s.renderState !== null);
    peer.end();
    const snap = await waitForState(client, (s) => s.connectionState.status === "disconnected");
    expect(snap.renderState).toEqual(RENDER_STATE);
    await expect(client.detach()).rejects.toMatchObject({ kind: "not_connected" });
  });

  it("goes to the error state on an undecodable frame", async () => {
    const peer = await attach();
    peer.sendRaw(Uint8Array.from([0, 0, 0, 2, 0x7b, 0x7d]));
    const snap = await waitForState(client, (s) => s.connectionState.status === "error");
    expect(snap.connectionState).toEqual({ status: "error", message: "$: expected exactly one ServerResponse tag, got none" });
    expect(client.isConnected).toBe(false);
  });

  it("sends input through the convenience helpers", async () => {
    const peer = await attach();
    await client.resize(100, 30);
    await client.sendKey({ type: "char", char: "q" }, 2);
    await client.mouseDown(1, 2);
    await client.mouseDrag(3, 4);
    await client.mouseMove(5, 6);
    await client.mouseUp();
    await client.scroll(true);
    await client.command("new-window");
    await client.kickClient(3);
    await client.setActiveWorkspace(1);
    await client.detach();

    const seen: ClientRequest[] = [];
    for (let i = 0; i < 11; i++) seen.push(await peer.nextRequest());
    expect(seen).toEqual([
      { type: "resize", width: 100, height: 30 },
      { type: "key", event: { code: { type: "char", char: "q" }, modifiers: 2 } },
      { type: "mouse_down", x: 1, y: 2 },
      { type: "mouse_drag", x: 3, y: 4 },
      { type: "mouse_move", x: 5, y: 6 },
      { type: "mouse_up" },
      { type: "mouse_scroll", up: true },
      { type: "command", command: "new-window" },
      { type: "kick_client", clientId: 3 },
      { type: "set_active_workspace", index: 1 },
      { type: "detach" },
    ]);
  });

  it("matches command output to calls in order", async () => {
    const peer = await attach();
    const first = client.runCommand("list-windows");
    const second = client.runCommand("bogus");
    expect(await peer.nextRequest()).toEqual({ type: "command_sync", command: "list-windows" });
    expect(await peer.nextRequest()).toEqual({ type: "command_sync", command: "bogus" });

    peer.send({ type: "command_output", output: "1 window", paneId: null, windowId: 0, success: true });
    peer.send({ type: "command_output", output: "unknown command", paneId: null, windowId: null, success: false });

    expect(await first).toEqual({ output: "1 window", paneId: null, windowId: 0, success: true });
    expect(await second).toEqual({ output: "unknown command", paneId: null, windowId: null, success: false });
  });

  it("times out a command the daemon never answers", async () => {
    const peer = await attach();
    const pending = client.runCommand("sleep", 50);
    expect(await peer.nextRequest()).toEqual({ type: "command_sync", command: "sleep" });
    await expect(pending).rejects.toMatchObject({ name: "ClientError", kind: "command_timeout" });
  });

  it("drops a late reply instead of handing it to the next call", async () => {
    const peer = await attach();
    const slow = client.runCommand("slow", 30);
    await expect(slow).rejects.toMatchObject({ kind: "command_timeout" });

    const next = client.runCommand("fast");
    expect(await peer.nextRequest()).toEqual({ type: "command_sync", command: "slow" });
    expect(await peer.nextRequest()).toEqual({ type: "command_sync", command: "fast" });
    peer.send({ type: "command_output", output: "late", paneId: null, windowId: null, success: true });
    peer.send({ type: "command_output", output: "on time", paneId: null, windowId: null, success: true });
    expect(await next).toMatchObject({ output: "on time" });
  });

  it("caps the number of timed-out commands waiting for a reply", async () => {
    await attach();
    const calls = Array.from({ length: MAX_ABANDONED_COMMANDS + 6 }, (_, i) => client.runCommand(`sleep ${i}`, 10));
    const results = await Promise.allSettled(calls);
    expect(results.every((r) => r.status === "rejected")).toBe(true);
    expect(client.pendingCommandCount).toBe(MAX_ABANDONED_COMMANDS);
  });

  it("rejects pending commands on disconnect", async () => {
    await attach();
    const pending = client.runCommand("wait-for-it");
    client.disconnect();
    await expect(pending).rejects.toMatchObject({ kind: "not_connected" });
  });

  it("refuses to send without a connection", async () => {
    await expect(client.command("noop")).rejects.toBeInstanceOf(ClientError);
    await expect(client.runCommand("noop")).rejects.toMatchObject({ kind: "not_connected" });
  });

  it("clears cached state on disconnect", async () => {
    const peer = await attach();
    peer.send({ type: "layout_changed", renderState: RENDER_STATE });
    peer.send({ type: "client_list_changed", clients: [{ id: 7, width: 80, height: 24, activeWorkspace: 0 }] });
    await waitForState(client, (s) => s.clientList.length === 1);

    client.disconnect();
    expect(client.state).toEqual({
      connectionState: { status: "disconnected" },
      renderState: null,
      systemStats: null,
      pluginSegments: [],
      clientList: [],
    });
  });

  it("drops state from the previous session when connecting again", async () => {
    const peer = await attach();
    peer.send({ type: "layout_changed", renderState: RENDER_STATE });
    peer.send({ type: "client_list_changed", clients: [{ id: 7, width: 80, height: 24, activeWorkspace: 0 }] });
    await waitForState(client, (s) => s.clientList.length === 1);
    peer.end();
    await waitForState(client, (s) => s.connectionState.status === "disconnected");
    expect(client.renderState).toEqual(RENDER_STATE);

    const reconnecting = client.connect();
    expect(client.state).toEqual({
      connectionState: { status: "connecting" },
      renderState: null,
      systemStats: null,
      pluginSegments: [],
      clientList: [],
    });
    await reconnecting;
  });

  it("cancels a connect that is still in flight", async () => {
    const connecting = client.connect();
    expect(client.connectionState).toEqual({ status: "connecting" });
    client.disconnect();
    await expect(connecting).rejects.toMatchObject({ name: "ClientError", kind: "connect_cancelled" });
    expect(client.connectionState).toEqual({ status: "disconnected" });
    expect(client.isConnected).toBe(false);
  });

  it("replaces an existing connection on reconnect", async () => {
    const first = await attach(1);
    await client.connect();
    const second = await daemon.nextPeer();
    expect(await second.nextRequest()).toEqual({ type: "attach" });
    second.send({ type: "attached", clientId: 2 });
    await waitForState(client, (s) => s.connectionState.status === "connected");
    expect(client.connectionState).toEqual({ status: "connected", clientId: 2 });
    await expect(first.nextRequest()).rejects.toThrow("client closed");
  });

  it("keeps dispatching when a listener throws", async () => {
    const peer = await attach();
    const unsubscribe = client.subscribe(() => {
      throw new Error("listener bug");
    });
    peer.send({ type: "plugin_segments", segments: [] });
    peer.send({ type: "error", message: "after" });
    await waitForState(client, (s) => s.connectionState.status === "error");
    unsubscribe();
  });

  it("records a failed connect as an error", async () => {
    const broken = new PaneClient({ socketPath: `${daemon.socketPath}.missing`, logger });
    await expect(broken.connect()).rejects.toMatchObject({ name: "ConnectionError", kind: "connect_failed" });
    expect(broken.connectionState.status).toBe("error");
  });
});
