import {
  arrayOf,
  checkInteger,
  expectRecord,
  optionalField,
  readBool,
  readInt,
  readString,
  readU16,
  requiredField,
  type Decoder,
  type JsonValue,
} from "./decode.js";
import { readTabId, readWindowId, type TabId, type WindowId } from "./ids.js";
import { decodeLayoutNode, encodeLayoutNode, type LayoutNode } from "./layout.js";
import { decodeTabKind, encodeTabKind, type TabKind } from "./types.js";

export type TabSnapshot = {
  id: TabId;
  kind: TabKind;
  title: string;
  exited: boolean;
  foregroundProcess: string | null;
  cwd: string;
};

/** A window ("group" on the wire): a stack of tabs, one of them active. */
export type WindowSnapshot = {
  id: WindowId;
  tabs: TabSnapshot[];
  activeTab: number;
};

export type FloatingWindowSnapshot = {
  id: WindowId;
  x: number;
  y: number;
  width: number;
  height: number;
};

export type WorkspaceSnapshot = {
  name: string;
  layout: LayoutNode;
  groups: WindowSnapshot[];
  activeGroup: WindowId;
  syncPanes: boolean;
  foldedWindows: ReadonlySet<WindowId>;
  zoomedWindow: WindowId | null;
  floatingWindows: FloatingWindowSnapshot[];
};

export type RenderState = {
  workspaces: WorkspaceSnapshot[];
  activeWorkspace: number;
};

export const decodeTabSnapshot: Decoder<TabSnapshot> = (value, path) => {
  const rec = expectRecord(value, path);
  return {
    id: requiredField(rec, "id", path, readTabId),
    kind: requiredField(rec, "kind", path, decodeTabKind),
    title: requiredField(rec, "title", path, readString),
    exited: requiredField(rec, "exited", path, readBool),
    foregroundProcess: optionalField<string | null>(rec, "foreground_process", path, readString, null),
    cwd: requiredField(rec, "cwd", path, readString),
  };
};

export const decodeWindowSnapshot: Decoder<WindowSnapshot> = (value, path) => {
  const rec = expectRecord(value, path);
  return {
    id: requiredField(rec, "id", path, readWindowId),
    tabs: requiredField(rec, "tabs", path, arrayOf(decodeTabSnapshot)),
    activeTab: requiredField(rec, "active_tab", path, readInt),
  };
};

export const decodeFloatingWindowSnapshot: Decoder<FloatingWindowSnapshot> = (value, path) => {
  const rec = expectRecord(value, path);
  return {
    id: requiredField(rec, "id", path, readWindowId),
    x: requiredField(rec, "x", path, readU16),
    y: requiredField(rec, "y", path, readU16),
    width: requiredField(rec, "width", path, readU16),
    height: requiredField(rec, "height", path, readU16),
  };
};

const readWindowIdSet: Decoder<ReadonlySet<WindowId>> = (value, path) => new Set(arrayOf(readWindowId)(value, path));

export const decodeWorkspaceSnapshot: Decoder<WorkspaceSnapshot> = (value, path) => {
  const rec = expectRecord(value, path);
  return {
    name: requiredField(rec, "name", path, readString),
    layout: requiredField(rec, "layout", path, decodeLayoutNode),
    groups: requiredField(rec, "groups", path, arrayOf(decodeWindowSnapshot)),
    activeGroup: requiredField(rec, "active_group", path, readWindowId),
    syncPanes: requiredField(rec, "sync_panes", path, readBool),
    foldedWindows: optionalField<ReadonlySet<WindowId>>(rec, "folded_windows", path, readWindowIdSet, new Set()),
    zoomedWindow: optionalField<WindowId | null>(rec, "zoomed_window", path, readWindowId, null),
    floatingWindows: requiredField(rec, "floating_windows", path, arrayOf(decodeFloatingWindowSnapshot)),
  };
};

export const decodeRenderState: Decoder<RenderState> = (value, path) => {
  const rec = expectRecord(value, path);
  return {
    workspaces: requiredField(rec, "workspaces", path, arrayOf(decodeWorkspaceSnapshot)),
    activeWorkspace: requiredField(rec, "active_workspace", path, readInt),
  };
};

export function encodeTabSnapshot(tab: TabSnapshot): JsonValue {
  return {
    id: tab.id,
    kind: encodeTabKind(tab.kind),
    title: tab.title,
    exited: tab.exited,
    foreground_process: tab.foregroundProcess,
    cwd: tab.cwd,
  };
}

export function encodeWindowSnapshot(group: WindowSnapshot, path = "$"): JsonValue {
  return {
    id: group.id,
    tabs: group.tabs.map(encodeTabSnapshot),
    active_tab: checkInteger(group.activeTab, `${path}.active_tab`, readInt),
  };
}

export function encodeFloatingWindowSnapshot(win: FloatingWindowSnapshot, path = "$"): JsonValue {
  return {
    id: win.id,
    x: checkInteger(win.x, `${path}.x`, readU16),
    y: checkInteger(win.y, `${path}.y`, readU16),
    width: checkInteger(win.width, `${path}.width`, readU16),
    height: checkInteger(win.height, `${path}.height`, readU16),
  };
}

export function encodeWorkspaceSnapshot(ws: WorkspaceSnapshot, path = "$"): JsonValue {
  return {
    name: ws.name,
    layout: encodeLayoutNode(ws.layout, `${path}.layout`),
    groups: ws.groups.map((g, i) => encodeWindowSnapshot(g, `${path}.groups[${i}]`)),
    active_group: ws.activeGroup,
    sync_panes: ws.syncPanes,
    folded_windows: [...ws.foldedWindows],
    zoomed_window: ws.zoomedWindow,
    floating_windows: ws.floatingWindows.map((w, i) => encodeFloatingWindowSnapshot(w, `${path}.floating_windows[${i}]`)),
  };
}

export function encodeRenderState(state: RenderState, path = "$"): JsonValue {
  return {
    workspaces: state.workspaces.map((ws, i) => encodeWorkspaceSnapshot(ws, `${path}.workspaces[${i}]`)),
    active_workspace: checkInteger(state.activeWorkspace, `${path}.active_workspace`, readInt),
  };
}
