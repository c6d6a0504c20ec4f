import { describe, it, expect } from "vitest";
import { NoopLogger, noopLogger } from "../src/noop";

describe("noopLogger", () => {
  it("should have no-op log methods that do not throw", () => {
    expect(() => noopLogger.debug("d")).not.toThrow();
    expect(() => noopLogger.info("i", { a: 1 })).not.toThrow();
    expect(() => noopLogger.warn("w")).not.toThrow();
    expect(() => noopLogger.error("e", { error: "boom" })).not.toThrow();
  });

  it("should return itself from child and withContext", () => {
    expect(noopLogger).toBeInstanceOf(NoopLogger);
    expect(noopLogger.child("nested")).toBe(noopLogger);
    expect(noopLogger.withContext({ context: "x" })).toBe(noopLogger);
  });
});
