import path from "node:path";
import process from "node:process";

const PINO_LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const DEFAULT_SOCKET_DIR_PREFIX = "/tmp/pane-";
export const SOCKET_FILE_NAME = "pane.sock";

const requestedLogLevel = (process.env.PANE_LOG_LEVEL?.trim() || "warn").toLowerCase();
export const LOG_LEVEL = PINO_LEVELS.has(requestedLogLevel) ? requestedLogLevel : "warn";

export const COMMAND_TIMEOUT_MS = Math.max(100, Number(process.env.PANE_COMMAND_TIMEOUT_MS ?? "5000") || 5000);

// sockaddr_un.sun_path capacity, including the trailing NUL.
export const MAX_SOCKET_PATH_BYTES = process.platform === "darwin" ? 104 : 108;

/** Per-user well-known socket path, derived from the numeric uid. */
export function defaultSocketPath(uid: number = process.getuid?.() ?? 0): string {
  return path.join(`${DEFAULT_SOCKET_DIR_PREFIX}${uid}`, SOCKET_FILE_NAME);
}

export function resolveSocketPath(explicit?: string | null): string {
  const fromArg = explicit?.trim();
  if (fromArg) return fromArg;
  const fromEnv = process.env.PANE_SOCKET?.trim();
  if (fromEnv) return fromEnv;
  return defaultSocketPath();
}

export function socketPathFits(socketPath: string): boolean {
  return Buffer.byteLength(socketPath, "utf8") + 1 <= MAX_SOCKET_PATH_BYTES;
}
