export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export type SchemaDecodeErrorKind =
  | "unknown_variant"
  | "out_of_range"
  | "invalid_identifier"
  | "invalid_type"
  | "missing_field"
  | "invalid_json"
  | "duplicate_identifier";

export class SchemaDecodeError extends Error {
  readonly kind: SchemaDecodeErrorKind;
  /** JSON path of the offending value, e.g. `$.Resize.width`. */
  readonly path: string;

  constructor(kind: SchemaDecodeErrorKind, path: string, detail: string) {
    super(`${path}: ${detail}`);
    this.name = "SchemaDecodeError";
    this.kind = kind;
    this.path = path;
  }
}

export type Decoder<T> = (value: unknown, path: string) => T;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) throw new SchemaDecodeError("invalid_type", path, `expected object, got ${describe(value)}`);
  return value;
}

export function field(record: Record<string, unknown>, key: string, path: string): unknown {
  if (!Object.hasOwn(record, key)) throw new SchemaDecodeError("missing_field", `${path}.${key}`, "missing field");
  return record[key];
}

/** Reads a field that may be absent or null, substituting `fallback`. */
export function optionalField<T>(
  record: Record<string, unknown>,
  key: string,
  path: string,
  decode: Decoder<T>,
  fallback: T,
): T {
  const value = record[key];
  if (value === undefined || value === null) return fallback;
  return decode(value, `${path}.${key}`);
}

export function requiredField<T>(record: Record<string, unknown>, key: string, path: string, decode: Decoder<T>): T {
  return decode(field(record, key, path), `${path}.${key}`);
}

export const readString: Decoder<string> = (value, path) => {
  if (typeof value !== "string") throw new SchemaDecodeError("invalid_type", path, `expected string, got ${describe(value)}`);
  return value;
};

export const readBool: Decoder<boolean> = (value, path) => {
  if (typeof value !== "boolean") throw new SchemaDecodeError("invalid_type", path, `expected boolean, got ${describe(value)}`);
  return value;
};

function readInteger(value: unknown, path: string, min: number, max: number, label: string): number {
  if (typeof value !== "number") throw new SchemaDecodeError("invalid_type", path, `expected ${label}, got ${describe(value)}`);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new SchemaDecodeError("out_of_range", path, `${value} is not a valid ${label}`);
  }
  return value;
}

export const U8_MAX = 0xff;
export const U16_MAX = 0xffff;
export const U32_MAX = 0xffff_ffff;

export const readU8: Decoder<number> = (value, path) => readInteger(value, path, 0, U8_MAX, "u8");
export const readU16: Decoder<number> = (value, path) => readInteger(value, path, 0, U16_MAX, "u16");
export const readU32: Decoder<number> = (value, path) => readInteger(value, path, 0, U32_MAX, "u32");
// u64 values beyond 2^53 cannot survive JSON.parse, so the safe range is the decodable range.
export const readU64: Decoder<number> = (value, path) => readInteger(value, path, 0, Number.MAX_SAFE_INTEGER, "u64");
export const readInt: Decoder<number> = (value, path) =>
  readInteger(value, path, Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER, "integer");

export const readFloat: Decoder<number> = (value, path) => {
  if (typeof value !== "number") throw new SchemaDecodeError("invalid_type", path, `expected number, got ${describe(value)}`);
  if (!Number.isFinite(value)) throw new SchemaDecodeError("out_of_range", path, `${value} is not finite`);
  return value;
};

export function readArray<T>(value: unknown, path: string, item: Decoder<T>): T[] {
  if (!Array.isArray(value)) throw new SchemaDecodeError("invalid_type", path, `expected array, got ${describe(value)}`);
  return value.map((v, i) => item(v, `${path}[${i}]`));
}

export function arrayOf<T>(item: Decoder<T>): Decoder<T[]> {
  return (value, path) => readArray(value, path, item);
}

export function readBytes(value: unknown, path: string): Uint8Array {
  return Uint8Array.from(readArray(value, path, readU8));
}

/** Range-checks a number before it goes on the wire. */
export function checkInteger(value: number, path: string, decode: Decoder<number>): number {
  return decode(value, path);
}
