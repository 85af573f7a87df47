import {
  SchemaDecodeError,
  checkInteger,
  expectRecord,
  optionalField,
  readFloat,
  readInt,
  readString,
  readU16,
  readU64,
  readU8,
  requiredField,
  type Decoder,
  type JsonValue,
} from "./decode.js";
import { readVariant, tagged, unitVariant } from "./tagged.js";

// ---------------------------------------------------------------------------
// Key codes
// ---------------------------------------------------------------------------

export type NamedKey =
  | "backspace"
  | "enter"
  | "left"
  | "right"
  | "up"
  | "down"
  | "home"
  | "end"
  | "page_up"
  | "page_down"
  | "tab"
  | "back_tab"
  | "delete"
  | "insert"
  | "esc"
  | "null";

export type KeyCode =
  | { type: "char"; char: string }
  | { type: "function"; number: number }
  | { type: NamedKey };

const NAMED_KEY_TAGS: Record<NamedKey, string> = {
  backspace: "Backspace",
  enter: "Enter",
  left: "Left",
  right: "Right",
  up: "Up",
  down: "Down",
  home: "Home",
  end: "End",
  page_up: "PageUp",
  page_down: "PageDown",
  tab: "Tab",
  back_tab: "BackTab",
  delete: "Delete",
  insert: "Insert",
  esc: "Esc",
  null: "Null",
};

const NAMED_KEY_BY_TAG = new Map<string, NamedKey>(
  Object.entries(NAMED_KEY_TAGS).flatMap(([key, tag]) => (isNamedKey(key) ? [[tag, key] as const] : [])),
);
const NAMED_KEY_TAG_SET: ReadonlySet<string> = new Set(NAMED_KEY_BY_TAG.keys());
const KEY_CODE_PAYLOAD_TAGS: ReadonlySet<string> = new Set(["Char", "F"]);

function isNamedKey(value: string): value is NamedKey {
  return Object.hasOwn(NAMED_KEY_TAGS, value);
}

function isSingleCodePoint(value: string): boolean {
  return [...value].length === 1;
}

export function encodeKeyCode(code: KeyCode, path = "$"): JsonValue {
  switch (code.type) {
    case "char":
      if (!isSingleCodePoint(code.char)) {
        throw new SchemaDecodeError("out_of_range", `${path}.Char`, "expected exactly one character");
      }
      return tagged("Char", code.char);
    case "function":
      return tagged("F", checkInteger(code.number, `${path}.F`, readU8));
    default:
      return unitVariant(NAMED_KEY_TAGS[code.type]);
  }
}

export const decodeKeyCode: Decoder<KeyCode> = (value, path) => {
  const v = readVariant(value, path, NAMED_KEY_TAG_SET, KEY_CODE_PAYLOAD_TAGS, "KeyCode");
  if (v.unit) {
    const named = NAMED_KEY_BY_TAG.get(v.tag);
    if (!named) throw new SchemaDecodeError("unknown_variant", path, `unknown KeyCode variant "${v.tag}"`);
    return { type: named };
  }
  if (v.tag === "Char") {
    const char = readString(v.payload, `${path}.Char`);
    if (!isSingleCodePoint(char)) {
      throw new SchemaDecodeError("out_of_range", `${path}.Char`, "expected exactly one character");
    }
    return { type: "char", char };
  }
  return { type: "function", number: readU8(v.payload, `${path}.F`) };
};

// ---------------------------------------------------------------------------
// Key events and modifiers
// ---------------------------------------------------------------------------

/** Modifier bits, matching the daemon's terminal input library. */
export const KeyModifiers = {
  NONE: 0b0000_0000,
  SHIFT: 0b0000_0001,
  CONTROL: 0b0000_0010,
  ALT: 0b0000_0100,
} as const;

export type KeyModifier = Exclude<keyof typeof KeyModifiers, "NONE">;

export function combineModifiers(...mods: KeyModifier[]): number {
  return mods.reduce<number>((acc, m) => acc | KeyModifiers[m], KeyModifiers.NONE);
}

export function hasModifier(modifiers: number, mod: KeyModifier): boolean {
  return (modifiers & KeyModifiers[mod]) !== 0;
}

export type KeyEvent = {
  code: KeyCode;
  /** u8 bit field; see {@link KeyModifiers}. */
  modifiers: number;
};

export function encodeKeyEvent(event: KeyEvent, path = "$"): JsonValue {
  return {
    code: encodeKeyCode(event.code, `${path}.code`),
    modifiers: checkInteger(event.modifiers, `${path}.modifiers`, readU8),
  };
}

export const decodeKeyEvent: Decoder<KeyEvent> = (value, path) => {
  const rec = expectRecord(value, path);
  return {
    code: requiredField(rec, "code", path, decodeKeyCode),
    modifiers: requiredField(rec, "modifiers", path, readU8),
  };
};

// ---------------------------------------------------------------------------
// Small enums
// ---------------------------------------------------------------------------

export type TabKind = "shell" | "agent" | "nvim" | "dev_server";

const TAB_KIND_TAGS: Record<TabKind, string> = {
  shell: "Shell",
  agent: "Agent",
  nvim: "Nvim",
  dev_server: "DevServer",
};

const TAB_KIND_LABELS: Record<TabKind, string> = {
  shell: "shell",
  agent: "claude",
  nvim: "nvim",
  dev_server: "server",
};

export function tabKindLabel(kind: TabKind): string {
  return TAB_KIND_LABELS[kind];
}

export function encodeTabKind(kind: TabKind): JsonValue {
  return TAB_KIND_TAGS[kind];
}

export const decodeTabKind: Decoder<TabKind> = (value, path) => {
  switch (value) {
    case "Shell":
      return "shell";
    case "Agent":
      return "agent";
    case "Nvim":
      return "nvim";
    case "DevServer":
      return "dev_server";
    default:
      throw new SchemaDecodeError("unknown_variant", path, `unknown TabKind ${JSON.stringify(value)}`);
  }
};

export type SplitDirection = "horizontal" | "vertical";

export function encodeSplitDirection(direction: SplitDirection): JsonValue {
  return direction === "horizontal" ? "Horizontal" : "Vertical";
}

export const decodeSplitDirection: Decoder<SplitDirection> = (value, path) => {
  if (value === "Horizontal") return "horizontal";
  if (value === "Vertical") return "vertical";
  throw new SchemaDecodeError("unknown_variant", path, `unknown SplitDirection ${JSON.stringify(value)}`);
};

// ---------------------------------------------------------------------------
// Status-bar payloads
// ---------------------------------------------------------------------------

export const DEFAULT_SEGMENT_STYLE = "dim";

export type PluginSegment = { text: string; style: string };

export function encodePluginSegment(segment: PluginSegment): JsonValue {
  return { text: segment.text, style: segment.style };
}

export const decodePluginSegment: Decoder<PluginSegment> = (value, path) => {
  const rec = expectRecord(value, path);
  return {
    text: requiredField(rec, "text", path, readString),
    style: optionalField(rec, "style", path, readString, DEFAULT_SEGMENT_STYLE),
  };
};

export type ClientListEntry = {
  id: number;
  width: number;
  height: number;
  activeWorkspace: number;
};

export function encodeClientListEntry(entry: ClientListEntry, path = "$"): JsonValue {
  return {
    id: checkInteger(entry.id, `${path}.id`, readU64),
    width: checkInteger(entry.width, `${path}.width`, readU16),
    height: checkInteger(entry.height, `${path}.height`, readU16),
    active_workspace: checkInteger(entry.activeWorkspace, `${path}.active_workspace`, readInt),
  };
}

export const decodeClientListEntry: Decoder<ClientListEntry> = (value, path) => {
  const rec = expectRecord(value, path);
  return {
    id: requiredField(rec, "id", path, readU64),
    width: requiredField(rec, "width", path, readU16),
    height: requiredField(rec, "height", path, readU16),
    activeWorkspace: requiredField(rec, "active_workspace", path, readInt),
  };
};

export type SystemStats = {
  cpuPercent: number;
  memoryPercent: number;
  loadAvg1: number;
  diskUsagePercent: number;
};

export function encodeSystemStats(stats: SystemStats, path = "$"): JsonValue {
  return {
    cpu_percent: readFloat(stats.cpuPercent, `${path}.cpu_percent`),
    memory_percent: readFloat(stats.memoryPercent, `${path}.memory_percent`),
    load_avg_1: readFloat(stats.loadAvg1, `${path}.load_avg_1`),
    disk_usage_percent: readFloat(stats.diskUsagePercent, `${path}.disk_usage_percent`),
  };
}

export const decodeSystemStats: Decoder<SystemStats> = (value, path) => {
  const rec = expectRecord(value, path);
  return {
    cpuPercent: requiredField(rec, "cpu_percent", path, readFloat),
    memoryPercent: requiredField(rec, "memory_percent", path, readFloat),
    loadAvg1: requiredField(rec, "load_avg_1", path, readFloat),
    diskUsagePercent: requiredField(rec, "disk_usage_percent", path, readFloat),
  };
};
