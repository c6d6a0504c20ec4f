import type { LogLevel } from "@depwire/types";

export type LoggerOptions = {
  /** Bound to every record as `name`. */
  name?: string;
  level?: LogLevel;
  /** Pretty-print through pino-pretty instead of writing JSON lines. */
  pretty?: boolean;
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Logger options from `DEPWIRE_SERVICE_NAME`, `DEPWIRE_LOG_LEVEL` and
 * `DEPWIRE_LOG_FORMAT` (`pretty` or `json`). Unknown levels fall back to `info`.
 */
export function readLoggerOptions(
  env: Readonly<Record<string, string | undefined>> = process.env,
): LoggerOptions {
  const level = env.DEPWIRE_LOG_LEVEL;
  return {
    name: env.DEPWIRE_SERVICE_NAME ?? "depwire",
    level: isLogLevel(level) ? level : "info",
    pretty: env.DEPWIRE_LOG_FORMAT === "pretty",
  };
}
