import pino from "pino";
import type { Logger } from "@depwire/types";
import type { LoggerOptions } from "./options";

/** `Logger` over a pino instance; attributes become fields of the record. */
export class PinoLogger implements Logger {
  constructor(private readonly instance: pino.Logger) {}

  debug(message: string, attributes: Record<string, unknown> = {}): void {
    this.instance.debug(attributes, message);
  }

  info(message: string, attributes: Record<string, unknown> = {}): void {
    this.instance.info(attributes, message);
  }

  warn(message: string, attributes: Record<string, unknown> = {}): void {
    this.instance.warn(attributes, message);
  }

  error(message: string, attributes: Record<string, unknown> = {}): void {
    this.instance.error(attributes, message);
  }

  child(name: string, attributes?: Record<string, unknown>): Logger {
    return new PinoLogger(this.instance.child({ ...attributes, name }));
  }

  withContext(attributes: Record<string, unknown>): Logger {
    return new PinoLogger(this.instance.child(attributes));
  }
}

/** JSON lines to `destination` (stdout by default), or pretty output when asked. */
export function createLogger(
  options: LoggerOptions = {},
  destination?: pino.DestinationStream,
): PinoLogger {
  const settings: pino.LoggerOptions = {
    name: options.name ?? "depwire",
    level: options.level ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (destination) return new PinoLogger(pino(settings, destination));
  if (options.pretty) {
    return new PinoLogger(pino({ ...settings, transport: { target: "pino-pretty" } }));
  }
  return new PinoLogger(pino(settings));
}
