import { afterEach, describe, expect, it } from "vitest";
import { createLogger, getLogLevel, setLogLevel, setLogSink, type LogRecord } from "../src/logging/logger.js";

describe("logger", () => {
  const previous = getLogLevel();

  afterEach(() => {
    setLogSink();
    setLogLevel(previous);
  });

  it("drops records below the threshold", () => {
    const records: LogRecord[] = [];
    setLogSink((r) => records.push(r));
    setLogLevel("warn");

    const log = createLogger("adapter.gtest");
    log.info("hidden");
    log.warn("build timed out", { timeout_ms: 1000 });

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ level: "warn", scope: "adapter.gtest", msg: "build timed out", timeout_ms: 1000 });
    expect(typeof records[0]?.ts).toBe("string");
  });

  it("emits nothing when silent", () => {
    const records: LogRecord[] = [];
    setLogSink((r) => records.push(r));
    setLogLevel("silent");
    createLogger("x").error("nope");
    expect(records).toEqual([]);
  });

  it("keeps reserved fields over caller fields", () => {
    const records: LogRecord[] = [];
    setLogSink((r) => records.push(r));
    setLogLevel("debug");
    createLogger("registry").debug("detected", { scope: "spoofed", msg: "spoofed" });
    expect(records[0]?.scope).toBe("registry");
    expect(records[0]?.msg).toBe("detected");
  });
});
