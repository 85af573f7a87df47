import { SchemaDecodeError, type JsonValue } from "./protocol/decode.js";

/** Largest payload either side may put in one frame: 16 MiB. */
export const MAX_FRAME_SIZE = 16 * 1024 * 1024;
export const LENGTH_PREFIX_BYTES = 4;

export type MessageCodec<T> = {
  encode: (value: T) => JsonValue;
  decode: (json: unknown) => T;
};

export type FramingErrorKind = "frame_too_large" | "incomplete_length_prefix" | "connection_closed";

export class FramingError extends Error {
  readonly kind: FramingErrorKind;
  readonly size: number | null;

  constructor(kind: FramingErrorKind, message: string, size: number | null = null) {
    super(message);
    this.name = "FramingError";
    this.kind = kind;
    this.size = size;
  }
}

function frameTooLarge(size: number): FramingError {
  return new FramingError("frame_too_large", `frame too large: ${size} bytes (max ${MAX_FRAME_SIZE})`, size);
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** `[u32 BE length][JSON payload]` */
export function encodeFrame<T>(message: T, codec: MessageCodec<T>): Uint8Array {
  const payload = Buffer.from(JSON.stringify(codec.encode(message)), "utf8");
  if (payload.length > MAX_FRAME_SIZE) throw frameTooLarge(payload.length);
  const frame = Buffer.allocUnsafe(LENGTH_PREFIX_BYTES + payload.length);
  frame.writeUInt32BE(payload.length, 0);
  payload.copy(frame, LENGTH_PREFIX_BYTES);
  return frame;
}

/** Reads the length prefix; rejects oversized values before any payload is read. */
export function decodeLength(bytes: Uint8Array): number {
  if (bytes.length < LENGTH_PREFIX_BYTES) {
    throw new FramingError("incomplete_length_prefix", `need ${LENGTH_PREFIX_BYTES} bytes, got ${bytes.length}`);
  }
  const length = new DataView(bytes.buffer, bytes.byteOffset, LENGTH_PREFIX_BYTES).getUint32(0, false);
  if (length > MAX_FRAME_SIZE) throw frameTooLarge(length);
  return length;
}

export function decodePayload<T>(bytes: Uint8Array, codec: MessageCodec<T>): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(utf8.decode(bytes));
  } catch (err) {
    throw new SchemaDecodeError("invalid_json", "$", err instanceof Error ? err.message : String(err));
  }
  return codec.decode(parsed);
}

/**
 * Incremental frame splitter for byte streams that arrive in arbitrary chunks.
 * Yields complete payloads in order; a partial frame stays buffered.
 */
export class FrameDecoder {
  private chunks: Buffer[] = [];
  private buffered = 0;

  get bufferedBytes(): number {
    return this.buffered;
  }

  push(chunk: Uint8Array): Uint8Array[] {
    if (chunk.length > 0) {
      this.chunks.push(Buffer.from(chunk.buffer, chunk.byteOffset, chunk.length));
      this.buffered += chunk.length;
    }
    const frames: Uint8Array[] = [];
    while (this.buffered >= LENGTH_PREFIX_BYTES) {
      const head = this.peek(LENGTH_PREFIX_BYTES);
      const length = decodeLength(head);
      if (this.buffered < LENGTH_PREFIX_BYTES + length) break;
      this.take(LENGTH_PREFIX_BYTES);
      frames.push(this.take(length));
    }
    return frames;
  }

  private flatten(): Buffer {
    if (this.chunks.length !== 1) this.chunks = [Buffer.concat(this.chunks, this.buffered)];
    return this.chunks[0];
  }

  private peek(count: number): Buffer {
    return this.flatten().subarray(0, count);
  }

  private take(count: number): Buffer {
    const all = this.flatten();
    const out = all.subarray(0, count);
    const rest = all.subarray(count);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    return out;
  }
}
