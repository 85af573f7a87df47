import {
  SchemaDecodeError,
  checkInteger,
  expectRecord,
  readBool,
  readInt,
  readString,
  readU16,
  readU64,
  requiredField,
  type Decoder,
  type JsonValue,
} from "./decode.js";
import type { MessageCodec } from "../framing.js";
import { readVariant, tagged, unitVariant } from "./tagged.js";
import { decodeKeyEvent, encodeKeyEvent, type KeyEvent } from "./types.js";

/** Client → daemon. */
export type ClientRequest =
  | { type: "attach" }
  | { type: "detach" }
  | { type: "resize"; width: number; height: number }
  | { type: "key"; event: KeyEvent }
  | { type: "mouse_down"; x: number; y: number }
  | { type: "mouse_drag"; x: number; y: number }
  | { type: "mouse_move"; x: number; y: number }
  | { type: "mouse_up" }
  | { type: "mouse_scroll"; up: boolean }
  | { type: "command"; command: string }
  | { type: "command_sync"; command: string }
  | { type: "kick_client"; clientId: number }
  | { type: "set_active_workspace"; index: number };

export type ClientRequestType = ClientRequest["type"];

const REQUEST_TAGS = {
  attach: "Attach",
  detach: "Detach",
  resize: "Resize",
  key: "Key",
  mouse_down: "MouseDown",
  mouse_drag: "MouseDrag",
  mouse_move: "MouseMove",
  mouse_up: "MouseUp",
  mouse_scroll: "MouseScroll",
  command: "Command",
  command_sync: "CommandSync",
  kick_client: "KickClient",
  set_active_workspace: "SetActiveWorkspace",
} as const satisfies Record<ClientRequestType, string>;

const UNIT_TAGS: ReadonlySet<string> = new Set([REQUEST_TAGS.attach, REQUEST_TAGS.detach, REQUEST_TAGS.mouse_up]);
const PAYLOAD_TAGS: ReadonlySet<string> = new Set(
  Object.values(REQUEST_TAGS).filter((tag) => !UNIT_TAGS.has(tag)),
);

function encodePosition(x: number, y: number, path: string): JsonValue {
  return { x: checkInteger(x, `${path}.x`, readU16), y: checkInteger(y, `${path}.y`, readU16) };
}

export function encodeClientRequest(req: ClientRequest): JsonValue {
  const tag = REQUEST_TAGS[req.type];
  const path = `$.${tag}`;
  switch (req.type) {
    case "attach":
    case "detach":
    case "mouse_up":
      return unitVariant(tag);
    case "resize":
      return tagged(tag, {
        width: checkInteger(req.width, `${path}.width`, readU16),
        height: checkInteger(req.height, `${path}.height`, readU16),
      });
    case "key":
      return tagged(tag, encodeKeyEvent(req.event, path));
    case "mouse_down":
    case "mouse_drag":
    case "mouse_move":
      return tagged(tag, encodePosition(req.x, req.y, path));
    case "mouse_scroll":
      return tagged(tag, { up: req.up });
    case "command":
    case "command_sync":
      return tagged(tag, req.command);
    case "kick_client":
      return tagged(tag, checkInteger(req.clientId, path, readU64));
    case "set_active_workspace":
      return tagged(tag, checkInteger(req.index, path, readInt));
  }
}

function decodePosition(payload: unknown, path: string): { x: number; y: number } {
  const rec = expectRecord(payload, path);
  return { x: requiredField(rec, "x", path, readU16), y: requiredField(rec, "y", path, readU16) };
}

export const decodeClientRequest: Decoder<ClientRequest> = (value, path) => {
  const v = readVariant(value, path, UNIT_TAGS, PAYLOAD_TAGS, "ClientRequest");
  const p = `${path}.${v.tag}`;
  switch (v.tag) {
    case "Attach":
      return { type: "attach" };
    case "Detach":
      return { type: "detach" };
    case "MouseUp":
      return { type: "mouse_up" };
    case "Resize": {
      const rec = expectRecord(v.payload, p);
      return {
        type: "resize",
        width: requiredField(rec, "width", p, readU16),
        height: requiredField(rec, "height", p, readU16),
      };
    }
    case "Key":
      return { type: "key", event: decodeKeyEvent(v.payload, p) };
    case "MouseDown":
      return { type: "mouse_down", ...decodePosition(v.payload, p) };
    case "MouseDrag":
      return { type: "mouse_drag", ...decodePosition(v.payload, p) };
    case "MouseMove":
      return { type: "mouse_move", ...decodePosition(v.payload, p) };
    case "MouseScroll": {
      const rec = expectRecord(v.payload, p);
      return { type: "mouse_scroll", up: requiredField(rec, "up", p, readBool) };
    }
    case "Command":
      return { type: "command", command: readString(v.payload, p) };
    case "CommandSync":
      return { type: "command_sync", command: readString(v.payload, p) };
    case "KickClient":
      return { type: "kick_client", clientId: readU64(v.payload, p) };
    case "SetActiveWorkspace":
      return { type: "set_active_workspace", index: readInt(v.payload, p) };
    default:
      throw new SchemaDecodeError("unknown_variant", path, `unknown ClientRequest variant "${v.tag}"`);
  }
};

export const clientRequestCodec: MessageCodec<ClientRequest> = {
  encode: encodeClientRequest,
  decode: (json) => decodeClientRequest(json, "$"),
};
