import { randomUUID } from "node:crypto";
import { SchemaDecodeError, type Decoder } from "./decode.js";

declare const tabIdBrand: unique symbol;
declare const windowIdBrand: unique symbol;

/** Lowercase hyphenated UUID naming a tab (a pane on the wire). */
export type TabId = string & { readonly [tabIdBrand]: true };
/** Lowercase hyphenated UUID naming a window (a group on the wire). */
export type WindowId = string & { readonly [windowIdBrand]: true };

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

export function isTabId(value: string): value is TabId {
  return UUID_RE.test(value);
}

export function isWindowId(value: string): value is WindowId {
  return UUID_RE.test(value);
}

function invalid(path: string, value: unknown): SchemaDecodeError {
  const shown = typeof value === "string" ? `"${value}"` : String(value);
  return new SchemaDecodeError("invalid_identifier", path, `${shown} is not a UUID`);
}

export function parseTabId(value: unknown, path = "$"): TabId {
  if (typeof value !== "string") throw invalid(path, value);
  const normalized = value.toLowerCase();
  if (!isTabId(normalized)) throw invalid(path, value);
  return normalized;
}

export function parseWindowId(value: unknown, path = "$"): WindowId {
  if (typeof value !== "string") throw invalid(path, value);
  const normalized = value.toLowerCase();
  if (!isWindowId(normalized)) throw invalid(path, value);
  return normalized;
}

export const readTabId: Decoder<TabId> = (value, path) => parseTabId(value, path);
export const readWindowId: Decoder<WindowId> = (value, path) => parseWindowId(value, path);

export function newTabId(): TabId {
  return parseTabId(randomUUID());
}

export function newWindowId(): WindowId {
  return parseWindowId(randomUUID());
}
