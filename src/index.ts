export {
  COMMAND_TIMEOUT_MS,
  LOG_LEVEL,
  MAX_SOCKET_PATH_BYTES,
  defaultSocketPath,
  resolveSocketPath,
  socketPathFits,
} from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export {
  FrameDecoder,
  FramingError,
  LENGTH_PREFIX_BYTES,
  MAX_FRAME_SIZE,
  decodeLength,
  decodePayload,
  encodeFrame,
  type FramingErrorKind,
  type MessageCodec,
} from "./framing.js";
export {
  ConnectionError,
  PaneConnection,
  socketErrorKind,
  type ConnectionErrorKind,
  type ConnectionOptions,
} from "./connection/connection.js";
export {
  ClientError,
  MAX_ABANDONED_COMMANDS,
  PaneClient,
  type ClientErrorKind,
  type ClientSnapshot,
  type CommandResult,
  type ConnectionState,
  type PaneClientOptions,
  type SessionEvent,
  type SnapshotListener,
} from "./client/session.js";
export { SchemaDecodeError, type JsonValue, type SchemaDecodeErrorKind } from "./protocol/decode.js";
export {
  isTabId,
  isWindowId,
  newTabId,
  newWindowId,
  parseTabId,
  parseWindowId,
  type TabId,
  type WindowId,
} from "./protocol/ids.js";
export {
  DEFAULT_SEGMENT_STYLE,
  KeyModifiers,
  combineModifiers,
  hasModifier,
  tabKindLabel,
  type ClientListEntry,
  type KeyCode,
  type KeyEvent,
  type KeyModifier,
  type NamedKey,
  type PluginSegment,
  type SplitDirection,
  type SystemStats,
  type TabKind,
} from "./protocol/types.js";
export { decodeLayoutNode, encodeLayoutNode, leaf, split, type LayoutNode } from "./protocol/layout.js";
export {
  decodeRenderState,
  encodeRenderState,
  type FloatingWindowSnapshot,
  type RenderState,
  type TabSnapshot,
  type WindowSnapshot,
  type WorkspaceSnapshot,
} from "./protocol/render-state.js";
export {
  clientRequestCodec,
  decodeClientRequest,
  encodeClientRequest,
  type ClientRequest,
} from "./protocol/client-request.js";
export {
  decodeServerResponse,
  encodeServerResponse,
  serverResponseCodec,
  type ServerResponse,
} from "./protocol/server-response.js";
export { collectWindowIds, removedWindowIds, resolveLayout, type Rect, type ResolvedWindow } from "./layout/resolve.js";
