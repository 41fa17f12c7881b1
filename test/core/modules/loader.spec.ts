// test/core/modules/loader.spec.ts
// Tests for require: resolution, memoization and eviction

import { describe, it, expect } from "vitest";
import { ScriptNotFoundError } from "../../../src/core/errors";
import { isFail } from "../../../src/outcome";
import { createTestSandbox, messages } from "../../helpers/sandbox";

describe("ModuleLoader", () => {
  it("executes a library once and returns the same view after", () => {
    const { sandbox, log } = createTestSandbox({
      core: {
        "scripts/init.js": `
          util = require("util");
          again = require("util");
          same = util === again;
          print("init", util.VALUE);
        `,
        "scripts/util.js": `print("util loaded"); VALUE = 42;`,
      },
    });

    expect(sandbox.loadModule("core")).toBe(true);
    expect(messages(log)).toEqual(["util loaded", "init 42", "Loaded module: core"]);
    expect(sandbox.require("core", "init").lookup("same")).toBe(true);
  });

  it("attributes printed lines to their module", () => {
    const { sandbox, log } = createTestSandbox({ core: { "scripts/init.js": `print("a", 1, true)` } });
    sandbox.loadModule("core");
    expect(log.records[0]).toEqual({ level: "info", message: "a 1 true", module: "core" });
  });

  it("resolves dotted names to nested paths", () => {
    const { sandbox } = createTestSandbox({
      core: {
        "scripts/init.js": `office = require("rooms.office").NAME;`,
        "scripts/rooms/office.js": `NAME = "office";`,
      },
    });
    sandbox.loadModule("core");
    expect(sandbox.require("core", "init").lookup("office")).toBe("office");
  });

  it("resolves namespaced references in the other module", () => {
    const { sandbox } = createTestSandbox({
      core: { "scripts/init.js": `other = require("mod2:shared").NAME;` },
      mod2: { "scripts/init.js": "", "scripts/shared.js": `NAME = "mod2 shared";` },
    });

    sandbox.loadModule("core");
    expect(sandbox.require("core", "init").lookup("other")).toBe("mod2 shared");
    expect(sandbox.loadedModules()).toEqual(["core", "mod2"]);
    expect([...sandbox.getScope("mod2").libraries.keys()]).toEqual(["shared"]);
  });

  it("lets a cycle see the partially built library", () => {
    const { sandbox } = createTestSandbox({
      core: {
        "scripts/init.js": `A = 1; b = require("b");`,
        "scripts/b.js": `fromInit = require("init").A;`,
      },
    });
    sandbox.loadModule("core");
    expect(sandbox.require("core", "b").lookup("fromInit")).toBe(1);
  });

  it("keeps library scopes separate", () => {
    const { sandbox } = createTestSandbox({
      core: {
        "scripts/init.js": `x = "init"; require("other");`,
        "scripts/other.js": `x = "other";`,
      },
    });
    sandbox.loadModule("core");
    expect(sandbox.require("core", "init").lookup("x")).toBe("init");
    expect(sandbox.require("core", "other").lookup("x")).toBe("other");
  });

  it("reports missing scripts", () => {
    const { sandbox } = createTestSandbox({ core: { "scripts/init.js": `require("missing")` } });
    const outcome = sandbox.tryLoadModule("core");

    expect(isFail(outcome)).toBe(true);
    if (!isFail(outcome)) return;
    expect(outcome.failure.reason).toBe("script-not-found");
    expect(outcome.failure.message).toBe("Script not found: core:scripts/missing.js");
    expect(outcome.meta).toEqual({ module: "core" });
  });

  it("never resolves outside the script directory", () => {
    const { sandbox } = createTestSandbox({ core: { "scripts/init.js": "", "secret.js": "SECRET = 1" } });
    expect(() => sandbox.require("core", "../secret")).toThrow(ScriptNotFoundError);
    expect(() => sandbox.require("core", "../secret")).toThrow("Script not found: core:scripts/secret.js");
    expect(() => sandbox.require("core", "..")).toThrow("Script not found: core:..");
  });

  it("evicts a library whose execution failed", () => {
    const { sandbox, source, log } = createTestSandbox({
      flaky: {
        "scripts/init.js": `require("bad")`,
        "scripts/bad.js": `first = 1; throw "nope";`,
      },
    });

    const outcome = sandbox.tryLoadModule("flaky");
    expect(isFail(outcome) ? outcome.failure.message : undefined).toBe("flaky:scripts/bad.js: nope");
    expect(sandbox.getScope("flaky").libraries.size).toBe(0);
    expect(messages(log)).toEqual(["Error loading module: flaky: flaky:scripts/bad.js: nope"]);

    source.set("flaky", "scripts/bad.js", "first = 2;");
    expect(sandbox.loadModule("flaky")).toBe(true);
    expect([...sandbox.getScope("flaky").libraries.keys()]).toEqual(["init", "bad"]);
    expect(sandbox.require("flaky", "bad").lookup("first")).toBe(2);
  });

  it("rejects non-string references from scripts", () => {
    const { sandbox } = createTestSandbox({ core: { "scripts/init.js": `require(3)` } });
    const outcome = sandbox.tryLoadModule("core");
    expect(isFail(outcome) ? outcome.failure.message : undefined).toBe("require expects a library name");
  });
});
