import {
  SchemaDecodeError,
  arrayOf,
  checkInteger,
  expectRecord,
  optionalField,
  readBool,
  readBytes,
  readString,
  readU32,
  readU64,
  requiredField,
  type Decoder,
  type JsonValue,
} from "./decode.js";
import type { MessageCodec } from "../framing.js";
import { readTabId, type TabId } from "./ids.js";
import { decodeRenderState, encodeRenderState, type RenderState } from "./render-state.js";
import { readVariant, tagged, unitVariant } from "./tagged.js";
import {
  decodeClientListEntry,
  decodePluginSegment,
  decodeSystemStats,
  encodeClientListEntry,
  encodePluginSegment,
  encodeSystemStats,
  type ClientListEntry,
  type PluginSegment,
  type SystemStats,
} from "./types.js";

/** Daemon → client. */
export type ServerResponse =
  | { type: "attached"; clientId: number }
  | { type: "pane_output"; paneId: TabId; data: Uint8Array }
  | { type: "pane_exited"; paneId: TabId }
  | { type: "layout_changed"; renderState: RenderState }
  | { type: "stats_update"; stats: SystemStats }
  | { type: "plugin_segments"; segments: PluginSegment[][] }
  | { type: "session_ended" }
  | { type: "all_workspaces_closed" }
  | { type: "full_screen_dump"; paneId: TabId; data: Uint8Array }
  | { type: "client_list_changed"; clients: ClientListEntry[] }
  | { type: "kicked"; clientId: number }
  | { type: "error"; message: string }
  | {
      type: "command_output";
      output: string;
      paneId: number | null;
      windowId: number | null;
      success: boolean;
    };

export type ServerResponseType = ServerResponse["type"];

const RESPONSE_TAGS = {
  attached: "Attached",
  pane_output: "PaneOutput",
  pane_exited: "PaneExited",
  layout_changed: "LayoutChanged",
  stats_update: "StatsUpdate",
  plugin_segments: "PluginSegments",
  session_ended: "SessionEnded",
  all_workspaces_closed: "AllWorkspacesClosed",
  full_screen_dump: "FullScreenDump",
  client_list_changed: "ClientListChanged",
  kicked: "Kicked",
  error: "Error",
  command_output: "CommandOutput",
} as const satisfies Record<ServerResponseType, string>;

const UNIT_TAGS: ReadonlySet<string> = new Set([RESPONSE_TAGS.session_ended, RESPONSE_TAGS.all_workspaces_closed]);
const PAYLOAD_TAGS: ReadonlySet<string> = new Set(
  Object.values(RESPONSE_TAGS).filter((tag) => !UNIT_TAGS.has(tag)),
);

function encodePaneBytes(paneId: TabId, data: Uint8Array): JsonValue {
  return { pane_id: paneId, data: Array.from(data) };
}

function encodeNullableU32(value: number | null, path: string): JsonValue {
  return value === null ? null : checkInteger(value, path, readU32);
}

export function encodeServerResponse(res: ServerResponse): JsonValue {
  const tag = RESPONSE_TAGS[res.type];
  const path = `$.${tag}`;
  switch (res.type) {
    case "attached":
      return tagged(tag, { client_id: checkInteger(res.clientId, `${path}.client_id`, readU64) });
    case "pane_output":
    case "full_screen_dump":
      return tagged(tag, encodePaneBytes(res.paneId, res.data));
    case "pane_exited":
      return tagged(tag, { pane_id: res.paneId });
    case "layout_changed":
      return tagged(tag, { render_state: encodeRenderState(res.renderState, `${path}.render_state`) });
    case "stats_update":
      return tagged(tag, encodeSystemStats(res.stats, path));
    case "plugin_segments":
      return tagged(tag, res.segments.map((row) => row.map(encodePluginSegment)));
    case "session_ended":
    case "all_workspaces_closed":
      return unitVariant(tag);
    case "client_list_changed":
      return tagged(tag, res.clients.map((c, i) => encodeClientListEntry(c, `${path}[${i}]`)));
    case "kicked":
      return tagged(tag, checkInteger(res.clientId, path, readU64));
    case "error":
      return tagged(tag, res.message);
    case "command_output":
      return tagged(tag, {
        output: res.output,
        pane_id: encodeNullableU32(res.paneId, `${path}.pane_id`),
        window_id: encodeNullableU32(res.windowId, `${path}.window_id`),
        success: res.success,
      });
  }
}

function decodePaneBytes(payload: unknown, path: string): { paneId: TabId; data: Uint8Array } {
  const rec = expectRecord(payload, path);
  return {
    paneId: requiredField(rec, "pane_id", path, readTabId),
    data: requiredField(rec, "data", path, readBytes),
  };
}

export const decodeServerResponse: Decoder<ServerResponse> = (value, path) => {
  const v = readVariant(value, path, UNIT_TAGS, PAYLOAD_TAGS, "ServerResponse");
  const p = `${path}.${v.tag}`;
  switch (v.tag) {
    case "SessionEnded":
      return { type: "session_ended" };
    case "AllWorkspacesClosed":
      return { type: "all_workspaces_closed" };
    case "Attached": {
      const rec = expectRecord(v.payload, p);
      return { type: "attached", clientId: requiredField(rec, "client_id", p, readU64) };
    }
    case "PaneOutput":
      return { type: "pane_output", ...decodePaneBytes(v.payload, p) };
    case "FullScreenDump":
      return { type: "full_screen_dump", ...decodePaneBytes(v.payload, p) };
    case "PaneExited": {
      const rec = expectRecord(v.payload, p);
      return { type: "pane_exited", paneId: requiredField(rec, "pane_id", p, readTabId) };
    }
    case "LayoutChanged": {
      const rec = expectRecord(v.payload, p);
      return { type: "layout_changed", renderState: requiredField(rec, "render_state", p, decodeRenderState) };
    }
    case "StatsUpdate":
      return { type: "stats_update", stats: decodeSystemStats(v.payload, p) };
    case "PluginSegments":
      return { type: "plugin_segments", segments: arrayOf(arrayOf(decodePluginSegment))(v.payload, p) };
    case "ClientListChanged":
      return { type: "client_list_changed", clients: arrayOf(decodeClientListEntry)(v.payload, p) };
    case "Kicked":
      return { type: "kicked", clientId: readU64(v.payload, p) };
    case "Error":
      return { type: "error", message: readString(v.payload, p) };
    case "CommandOutput": {
      const rec = expectRecord(v.payload, p);
      return {
        type: "command_output",
        output: requiredField(rec, "output", p, readString),
        paneId: optionalField<number | null>(rec, "pane_id", p, readU32, null),
        windowId: optionalField<number | null>(rec, "window_id", p, readU32, null),
        success: requiredField(rec, "success", p, readBool),
      };
    }
    default:
      throw new SchemaDecodeError("unknown_variant", path, `unknown ServerResponse variant "${v.tag}"`);
  }
};

export const serverResponseCodec: MessageCodec<ServerResponse> = {
  encode: encodeServerResponse,
  decode: (json) => decodeServerResponse(json, "$"),
};
