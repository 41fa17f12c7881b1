// test/adapters/logging.spec.ts
// Tests for log sinks

import { describe, it, expect, vi, afterEach } from "vitest";
import { consoleSink, memorySink, teeSink } from "../../src/adapters/logging";

describe("memorySink", () => {
  it("keeps records in order", () => {
    const sink = memorySink();
    sink.write({ level: "info", message: "a" });
    sink.write({ level: "warn", message: "b", module: "core" });
    expect(sink.records).toEqual([
      { level: "info", message: "a" },
      { level: "warn", message: "b", module: "core" },
    ]);
  });
});

describe("teeSink", () => {
  it("forwards to every sink", () => {
    const a = memorySink();
    const b = memorySink();
    teeSink(a, b).write({ level: "info", message: "x" });
    expect(a.records).toHaveLength(1);
    expect(b.records).toHaveLength(1);
  });
});

describe("consoleSink", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("tags lines with the module", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    consoleSink().write({ level: "info", message: "hello", module: "core" });
    expect(log).toHaveBeenCalledWith("[modbox:core] hello");
  });

  it("routes levels to the matching console method", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const sink = consoleSink("game");

    sink.write({ level: "warn", message: "careful" });
    sink.write({ level: "error", message: "boom", module: "core", trace: "at init.js:1" });

    expect(warn).toHaveBeenCalledWith("[game] careful");
    expect(error).toHaveBeenCalledWith("[game:core] boom\nat init.js:1");
  });
});
