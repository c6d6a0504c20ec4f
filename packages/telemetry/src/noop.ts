import type { Logger } from "@depwire/types";

export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}

  child(): Logger {
    return this;
  }

  withContext(): Logger {
    return this;
  }
}

export const noopLogger: Logger = new NoopLogger();
