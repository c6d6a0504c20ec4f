import { DependencyMap } from "@depwire/core";
import type { DependencyRegistry, Logger } from "@depwire/types";
import { createLogger } from "./logger";
import { readLoggerOptions } from "./options";
import { LOGGER } from "./tokens";

/**
 * Registers the application logger under `LOGGER`. Without an explicit
 * logger, one is created from the environment on first resolution.
 */
export function registerLogger(registry: DependencyRegistry, logger?: Logger): void {
  if (logger) {
    registry.register(LOGGER, { useValue: logger });
    return;
  }

  registry.register(LOGGER, {
    useFactory: () => createLogger(readLoggerOptions()),
    lifetime: "singleton",
  });
}

export type LoggedMapOptions = {
  name?: string;
  logger?: Logger;
};

/**
 * A dependency map that reports construction failures through a `depwire`
 * child of `logger` and serves `logger` itself under `LOGGER`.
 */
export function createLoggedDependencyMap(options: LoggedMapOptions = {}): DependencyMap {
  const logger = options.logger ?? createLogger(readLoggerOptions());
  const map = new DependencyMap({ name: options.name, logger: logger.child("depwire") });
  registerLogger(map, logger);
  return map;
}
