/* eslint-disable no-console */
import type { Logger } from "./core.js";

type Env = Readonly<Record<string, string | undefined>>;
type Level = keyof Logger;

const writers: Record<Level, (...data: unknown[]) => void> = {
  info: (...data) => console.info(...data),
  warn: (...data) => console.warn(...data),
  error: (...data) => console.error(...data),
  debug: (...data) => console.debug(...data),
};

/** Console logger tagged with `[namespace]`. Debug lines need `DEBUG` set. */
export function createConsoleLogger(namespace: string, env: Env = process.env): Logger {
  const prefix = `[${namespace}]`;
  const debugEnabled = Boolean(env["DEBUG"]);

  const emit =
    (level: Level) =>
    (message: string, meta?: unknown): void => {
      if (level === "debug" && !debugEnabled) return;
      writers[level](prefix, message, meta ?? "");
    };

  return {
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    debug: emit("debug"),
  } satisfies Logger;
}
