import { describe, expect, it, vi } from "vitest";
import { ConsoleLogger, formatContext, logError } from "../src/logging/index.js";
import { StoreError } from "../src/error/index.js";
import { RecordingLogger } from "./helpers.js";

const TIME = new Date("2025-01-01T00:00:00.000Z");

describe("ConsoleLogger", () => {
  it("formats level, scope, message and context", () => {
    const logger = new ConsoleLogger("info", "firestore");

    expect(logger.format("info", "Document created", { collection: "users", size: 3n }, TIME)).toBe(
      '[2025-01-01T00:00:00.000Z] [INFO] [firestore] Document created {"collection":"users","size":"3"}'
    );
  });

  it("omits absent scope and context", () => {
    expect(new ConsoleLogger().format("warn", "slow", undefined, TIME)).toBe("[2025-01-01T00:00:00.000Z] [WARN] slow");
  });

  it("nests child scopes", () => {
    const logger = new ConsoleLogger("info", "firestore").child("auth");

    expect(logger.format("error", "failed", undefined, TIME)).toBe(
      "[2025-01-01T00:00:00.000Z] [ERROR] [firestore.auth] failed"
    );
  });

  it("drops messages below the minimum level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new ConsoleLogger("info");

    logger.debug("hidden");
    logger.error("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0]?.[0]).toMatch(/\[ERROR\] shown$/);
  });
});

describe("formatContext", () => {
  it("serializes bigints as strings", () => {
    expect(formatContext({ count: 9007199254740993n })).toBe('{"count":"9007199254740993"}');
  });
});

describe("logError", () => {
  it("logs the operation with the error's name and message", () => {
    const logger = new RecordingLogger();

    logError(logger, "get", new StoreError("Failed to get document: 500 boom", { status: 500 }), { collection: "users" });

    expect(logger.entries).toEqual([
      {
        level: "error",
        message: "Firestore get failed",
        context: {
          collection: "users",
          operation: "get",
          errorName: "StoreError",
          errorMessage: "Failed to get document: 500 boom",
        },
      },
    ]);
  });
});
