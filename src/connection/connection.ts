import net from "node:net";
import type { Socket } from "node:net";
import { resolveSocketPath, socketPathFits } from "../config.js";
import {
  FramingError,
  LENGTH_PREFIX_BYTES,
  decodeLength,
  decodePayload,
  encodeFrame,
  type MessageCodec,
} from "../framing.js";
import { defaultLogger, type Logger } from "../logger.js";

export type ConnectionErrorKind =
  | "socket_creation_failed"
  | "path_too_long"
  | "connect_failed"
  | "write_failed"
  | "read_failed";

export class ConnectionError extends Error {
  readonly kind: ConnectionErrorKind;
  /** System error code such as `ECONNREFUSED`, when the OS supplied one. */
  readonly code: string | null;

  constructor(kind: ConnectionErrorKind, message: string, code: string | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
    this.kind = kind;
    this.code = code;
  }
}

function errnoCode(err: unknown): string | null {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return null;
}

/**
 * Kind for an asynchronous socket `error` event: a broken pipe, or any error
 * raised while a write is in flight, is a write failure; the rest are reads.
 */
export function socketErrorKind(code: string | null, writesInFlight: number): ConnectionErrorKind {
  if (code === "EPIPE" || writesInFlight > 0) return "write_failed";
  return "read_failed";
}

function wrap(kind: ConnectionErrorKind, prefix: string, err: unknown): ConnectionError {
  const message = err instanceof Error ? err.message : String(err);
  return new ConnectionError(kind, `${prefix}: ${message}`, errnoCode(err), { cause: err });
}

export type ConnectionOptions = {
  logger?: Logger;
  /** Unread bytes buffered before the socket is paused. */
  readHighWaterMark?: number;
};

const DEFAULT_READ_HIGH_WATER_MARK = 1024 * 1024;

/**
 * One framed stream to the daemon over a Unix-domain socket.
 *
 * Writes go through a single in-order chain so frames never interleave;
 * there is exactly one reader at a time.
 */
export class PaneConnection {
  private readonly socket: Socket;
  private readonly logger: Logger;
  private readonly readHighWaterMark: number;

  private chunks: Buffer[] = [];
  private buffered = 0;
  private ended = false;
  private failure: ConnectionError | null = null;
  private wake: (() => void) | null = null;
  private reading = false;
  private writeChain: Promise<void> = Promise.resolve();
  private writesInFlight = 0;
  private closed = false;

  private constructor(socket: Socket, opts?: ConnectionOptions) {
    this.socket = socket;
    this.logger = opts?.logger ?? defaultLogger();
    this.readHighWaterMark = opts?.readHighWaterMark ?? DEFAULT_READ_HIGH_WATER_MARK;

    socket.on("data", (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.buffered += chunk.length;
      if (this.buffered >= this.readHighWaterMark && !this.wake) socket.pause();
      this.notify();
    });
    socket.on("end", () => {
      this.ended = true;
      this.notify();
    });
    socket.on("close", () => {
      this.ended = true;
      this.notify();
    });
    socket.on("error", (err) => {
      if (!this.closed) this.logger.debug({ err: err.message }, "socket error");
      const kind = socketErrorKind(errnoCode(err), this.writesInFlight);
      this.failure ??= wrap(kind, kind === "write_failed" ? "write failed" : "read failed", err);
      this.notify();
    });
  }

  static async connect(path?: string | null, opts?: ConnectionOptions): Promise<PaneConnection> {
    const socketPath = resolveSocketPath(path);
    if (!socketPathFits(socketPath)) {
      throw new ConnectionError("path_too_long", `socket path exceeds maximum length: ${socketPath}`);
    }

    let socket: Socket;
    try {
      socket = net.createConnection({ path: socketPath });
    } catch (err) {
      throw wrap("socket_creation_failed", "failed to create socket", err);
    }

    await new Promise<void>((resolve, reject) => {
      const onConnect = () => {
        socket.off("error", onError);
        resolve();
      };
      const onError = (err: Error) => {
        socket.off("connect", onConnect);
        socket.destroy();
        reject(wrap("connect_failed", `failed to connect to ${socketPath}`, err));
      };
      socket.once("connect", onConnect);
      socket.once("error", onError);
    });

    const conn = new PaneConnection(socket, opts);
    conn.logger.debug({ socketPath }, "connected");
    return conn;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send<T>(message: T, codec: MessageCodec<T>): Promise<void> {
    let frame: Uint8Array;
    try {
      frame = encodeFrame(message, codec);
    } catch (err) {
      return Promise.reject(err);
    }
    return this.sendRaw(frame);
  }

  /** Queues an already-framed buffer behind any writes still in flight. */
  sendRaw(frame: Uint8Array): Promise<void> {
    const next = this.writeChain.then(() => this.writeFrame(frame));
    // The chain only orders writes; each caller sees its own failure via `next`.
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  private writeFrame(frame: Uint8Array): Promise<void> {
    if (this.closed || this.socket.destroyed || !this.socket.writable) {
      return Promise.reject(new ConnectionError("write_failed", "write failed: connection is closed", "EPIPE"));
    }
    // The stream keeps whatever the kernel did not accept and flushes it in
    // order; the callback fires once the whole frame has been handed off.
    this.writesInFlight++;
    return new Promise((resolve, reject) => {
      this.socket.write(frame, (err) => {
        this.writesInFlight--;
        if (err) reject(wrap("write_failed", "write failed", err));
        else resolve();
      });
    });
  }

  /**
   * Reads one frame. Resolves `null` on a clean close between frames; a close
   * inside a frame is a `connection_closed` framing error.
   */
  async receive<T>(codec: MessageCodec<T>): Promise<T | null> {
    if (this.reading) throw new Error("receive already in progress");
    this.reading = true;
    try {
      const prefix = await this.readExact(LENGTH_PREFIX_BYTES);
      if (!prefix) return null;
      const length = decodeLength(prefix);
      const payload = await this.readExact(length);
      if (!payload) throw new FramingError("connection_closed", "connection closed before the frame payload arrived");
      return decodePayload(payload, codec);
    } finally {
      this.reading = false;
    }
  }

  private async readExact(count: number): Promise<Buffer | null> {
    while (this.buffered < count) {
      if (this.failure) throw this.failure;
      if (this.ended) {
        if (this.buffered === 0) return null;
        throw new FramingError(
          "connection_closed",
          `connection closed mid-frame (${this.buffered} of ${count} bytes)`,
        );
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
        if (this.socket.isPaused()) this.socket.resume();
      });
    }
    return this.take(count);
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private take(count: number): Buffer {
    const all = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.buffered);
    const out = all.subarray(0, count);
    const rest = all.subarray(count);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    return out;
  }

  /** Closes both directions. Safe to call more than once. */
  disconnect(): void {
    if (this.closed) return;
    this.closed = true;
    this.socket.destroy();
    this.ended = true;
    this.notify();
    this.logger.debug("disconnected");
  }
}
