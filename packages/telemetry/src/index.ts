export { readLoggerOptions } from "./options";
export { PinoLogger, createLogger } from "./logger";
export { NoopLogger, noopLogger } from "./noop";
export { LOGGER } from "./tokens";
export { registerLogger, createLoggedDependencyMap } from "./register";

export type { LoggerOptions } from "./options";
export type { LoggedMapOptions } from "./register";
