import { describe, it, expect } from "vitest";
import pino from "pino";
import { PinoLogger, createLogger } from "../src/logger";
import { createCapture } from "./capture";

describe("PinoLogger", () => {
  it("should write each level with its pino level number", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoLogger(pino({ level: "debug" }, stream));

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(lines().map((l) => [l.level, l.msg])).toEqual([
      [20, "d"],
      [30, "i"],
      [40, "w"],
      [50, "e"],
    ]);
  });

  it("should merge attributes into the record", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoLogger(pino({ level: "debug" }, stream));

    logger.error("Unexpected problem when creating an instance", { key: "db:url" });

    const line = lines()[0]!;
    expect(line.msg).toBe("Unexpected problem when creating an instance");
    expect(line.key).toBe("db:url");
  });

  it("should name child loggers and keep their attributes", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoLogger(pino({ level: "debug" }, stream));

    logger.child("repositories", { table: "orders" }).info("resolving");

    const line = lines()[0]!;
    expect(line.name).toBe("repositories");
    expect(line.table).toBe("orders");
  });

  it("should add context attributes via withContext", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoLogger(pino({ level: "debug" }, stream));

    logger.withContext({ context: "request-1" }).warn("slow");

    expect(lines()[0]!.context).toBe("request-1");
  });
});

describe("createLogger", () => {
  it("should write JSON lines with name and ISO time to the destination", () => {
    const { stream, lines } = createCapture();
    const logger = createLogger({ name: "orders" }, stream);

    logger.info("ready");

    const line = lines()[0]!;
    expect(line.name).toBe("orders");
    expect(line.msg).toBe("ready");
    expect(typeof line.time).toBe("string");
  });

  it("should default to info level and the depwire name", () => {
    const { stream, lines } = createCapture();
    const logger = createLogger({}, stream);

    logger.debug("hidden");
    logger.info("shown");

    expect(lines()).toHaveLength(1);
    expect(lines()[0]!.name).toBe("depwire");
  });

  it("should filter messages below the configured level", () => {
    const { stream, lines } = createCapture();
    const logger = createLogger({ level: "warn" }, stream);

    logger.info("skip");
    logger.warn("keep");
    logger.error("keep");

    expect(lines().map((l) => l.msg)).toEqual(["keep", "keep"]);
  });

  it("should create a stdout logger without a destination", () => {
    expect(createLogger()).toBeInstanceOf(PinoLogger);
  });
});
