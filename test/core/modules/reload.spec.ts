// test/core/modules/reload.spec.ts
// Tests for hot reload and per-library rollback

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "../../../src/core/errors";
import { createTestSandbox, messages } from "../../helpers/sandbox";

function setup(clearModuleState?: (moduleId: string) => void) {
  return createTestSandbox(
    {
      core: {
        "scripts/init.js": `state = require("state"); NAME = "core";`,
        "scripts/state.js": `NO_RELOAD = true; items = [];`,
        "scripts/counter.js": `VERSION = 1;`,
      },
    },
    { clearModuleState }
  );
}

describe("HotReloader", () => {
  it("re-executes reloadable libraries and keeps the ones that opt out", () => {
    const { sandbox, source, log } = setup();
    sandbox.loadModule("core");
    sandbox.require("core", "counter");
    const stateBefore = sandbox.getScope("core").libraries.get("state");

    source.set("core", "scripts/counter.js", "VERSION = 2;");
    const report = sandbox.reloadModule("core");

    expect(report).toEqual({ module: "core", reloaded: ["init", "counter"], kept: ["state"], failed: [] });
    expect(sandbox.getScope("core").libraries.get("state")).toBe(stateBefore);
    expect(sandbox.require("core", "counter").lookup("VERSION")).toBe(2);
    expect(messages(log).slice(-2)).toEqual([
      "state can't be reloaded for core",
      "Reloaded module: core (2 reloaded, 1 kept, 0 failed)",
    ]);
  });

  it("rolls back a library that fails to reload", () => {
    const { sandbox, source, log } = setup();
    sandbox.loadModule("core");
    sandbox.require("core", "counter");
    const counterBefore = sandbox.getScope("core").libraries.get("counter");

    source.set("core", "scripts/counter.js", `VERSION = 2; throw "broken";`);
    const report = sandbox.reloadModule("core");

    expect(report.reloaded).toEqual(["init"]);
    expect(report.failed).toEqual([{ library: "counter", message: "core:scripts/counter.js: broken" }]);
    expect(sandbox.getScope("core").libraries.get("counter")).toBe(counterBefore);
    expect(sandbox.require("core", "counter").lookup("VERSION")).toBe(1);

    const failure = log.records.find((record) => record.level === "error");
    expect(failure?.message).toBe("Failed to reload counter: core:scripts/counter.js: broken");
    expect(messages(log).at(-1)).toBe("Reloaded module: core (1 reloaded, 1 kept, 1 failed)");
  });

  it("rolls back a library that no longer compiles", () => {
    const { sandbox, source } = setup();
    sandbox.loadModule("core");
    sandbox.require("core", "counter");

    source.set("core", "scripts/counter.js", "VERSION = (");
    const report = sandbox.reloadModule("core");

    expect(report.failed.map((f) => f.library)).toEqual(["counter"]);
    expect(report.failed[0].message).toMatch(/^core:scripts\/counter\.js: /);
    expect(sandbox.require("core", "counter").lookup("VERSION")).toBe(1);
  });

  it("clears host state for the module first", () => {
    const cleared: string[] = [];
    const { sandbox } = setup((id) => cleared.push(id));
    sandbox.loadModule("core");
    sandbox.reloadModule("core");
    expect(cleared).toEqual(["core"]);
  });

  it("refuses modules that were never loaded", () => {
    const { sandbox } = setup();
    expect(() => sandbox.reloadModule("ghost")).toThrow(InvalidArgumentError);
    expect(() => sandbox.reloadModule("ghost")).toThrow("Module not loaded: ghost");
  });
});
