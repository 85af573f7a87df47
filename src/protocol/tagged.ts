import { SchemaDecodeError, isRecord, type JsonValue } from "./decode.js";

/**
 * Externally tagged variant envelope.
 *
 * Unit variants travel as the bare tag (`"Attach"`), everything else as a
 * single-key object whose key is the tag (`{"Resize": {...}}`, `{"Kicked": 7}`).
 */
export type Variant = { tag: string; payload: unknown; unit: boolean };

export function unitVariant(tag: string): JsonValue {
  return tag;
}

export function tagged(tag: string, payload: JsonValue): JsonValue {
  return { [tag]: payload };
}

export function readVariant(
  value: unknown,
  path: string,
  unitTags: ReadonlySet<string>,
  payloadTags: ReadonlySet<string>,
  typeName: string,
): Variant {
  if (typeof value === "string") {
    if (unitTags.has(value)) return { tag: value, payload: null, unit: true };
    throw new SchemaDecodeError("unknown_variant", path, `unknown ${typeName} variant "${value}"`);
  }
  if (!isRecord(value)) {
    throw new SchemaDecodeError("unknown_variant", path, `expected ${typeName} string or object`);
  }
  const keys = Object.keys(value);
  if (keys.length !== 1) {
    throw new SchemaDecodeError(
      "unknown_variant",
      path,
      `expected exactly one ${typeName} tag, got ${keys.length === 0 ? "none" : keys.join(", ")}`,
    );
  }
  const tag = keys[0];
  const payload = value[tag];
  if (payloadTags.has(tag)) return { tag, payload, unit: false };
  // `{"Detach": null}` is an accepted spelling of a unit variant.
  if (unitTags.has(tag) && payload === null) return { tag, payload: null, unit: true };
  throw new SchemaDecodeError("unknown_variant", path, `unknown ${typeName} variant "${tag}"`);
}
