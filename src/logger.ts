import { pino, type Logger } from "pino";
import { LOG_LEVEL } from "./config.js";

export type { Logger };

export function createLogger(opts?: { name?: string; level?: string }): Logger {
  return pino({ name: opts?.name ?? "pane-client", level: opts?.level ?? LOG_LEVEL });
}

let shared: Logger | null = null;

export function defaultLogger(): Logger {
  shared ??= createLogger();
  return shared;
}
