// test/core/ui/events.spec.ts
// Tests for inline event-handler snippets

import { describe, it, expect } from "vitest";
import { CompileError, ExecutionError } from "../../../src/core/errors";
import { UINode } from "../../../src/core/ui/node";
import { createTestSandbox } from "../../helpers/sandbox";

const HANDLER = "return label + '/' + node.name + ':' + event.type";

function setup() {
  return createTestSandbox({
    core: {
      "scripts/init.js": "",
      "scripts/menu.js": "label = 'menu';",
    },
  });
}

describe("EventCompiler", () => {
  it("compiles a snippet once per library scope", () => {
    const { sandbox } = setup();
    const first = sandbox.compileUiAction("core", "menu", HANDLER);
    const second = sandbox.compileUiAction("core", "menu", HANDLER);
    expect(second).toBe(first);
  });

  it("resolves free names through the library and passes node and event", () => {
    const { sandbox } = setup();
    const result = sandbox.dispatchUiEvent("core", "menu", HANDLER, new UINode("button"), { type: "click" });
    expect(result).toBe("menu/button:click");
  });

  it("starts a new cache after the library is reloaded", () => {
    const { sandbox, source } = setup();
    sandbox.loadModule("core");
    const before = sandbox.compileUiAction("core", "menu", HANDLER);

    source.set("core", "scripts/menu.js", "label = 'shop';");
    sandbox.reloadModule("core");

    const after = sandbox.compileUiAction("core", "menu", HANDLER);
    expect(after).not.toBe(before);
    expect(sandbox.dispatchUiEvent("core", "menu", HANDLER, new UINode("button"), { type: "hover" })).toBe(
      "shop/button:hover"
    );
  });

  it("hands the handler read-only arguments", () => {
    const { sandbox } = setup();
    const node = new UINode("button");
    expect(() => sandbox.dispatchUiEvent("core", "menu", "event.type = 'x'", node, { type: "click" })).toThrow(
      "Immutable table (write to 'type')"
    );
  });

  it("reports snippets that do not parse", () => {
    const { sandbox } = setup();
    expect(() => sandbox.compileUiAction("core", "menu", "return (")).toThrow(CompileError);
    expect(() => sandbox.compileUiAction("core", "menu", "return (")).toThrow(/^core:scripts\/menu\.js#event: /);
  });

  it("reports failures raised by the handler", () => {
    const { sandbox } = setup();
    const run = () => sandbox.dispatchUiEvent("core", "menu", "throw 'nope'", new UINode("button"), { type: "click" });
    expect(run).toThrow(ExecutionError);
    expect(run).toThrow("core:scripts/menu.js#event: nope");
  });
});
