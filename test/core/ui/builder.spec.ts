// test/core/ui/builder.spec.ts
// Tests for UI nodes and the declarative builder

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "../../../src/core/errors";
import { lockTable, unwrapLocked } from "../../../src/core/table/immutable";
import { build, defaultNodeFactory, type NodeConstructor } from "../../../src/core/ui/builder";
import { TEXT_NODE, UINode } from "../../../src/core/ui/node";

type Env = Record<string, NodeConstructor>;

function buildNode(body: (ui: Env) => unknown): UINode {
  const node = unwrapLocked(build(body, defaultNodeFactory));
  if (!(node instanceof UINode)) throw new Error("builder did not return a node");
  return node;
}

describe("UINode", () => {
  it("types its properties", () => {
    const node = new UINode("panel");
    expect(node.setProperty("title", "Shop")).toBe(true);
    expect(node.setProperty("width", 10)).toBe(true);
    expect(node.setProperty("visible", false)).toBe(true);
    expect(node.setProperty("data", {})).toBe(false);

    expect(node.properties.get("title")).toEqual({ type: "string", value: "Shop" });
    expect(node.properties.get("width")).toEqual({ type: "float", value: 10 });
    expect(node.getProperty("visible")).toBe(false);
    expect(node.properties.has("data")).toBe(false);
  });

  it("moves a child between parents", () => {
    const a = new UINode("a");
    const b = new UINode("b");
    const child = UINode.text("x");
    a.addChild(child);
    b.addChild(lockTable(child));

    expect(a.children).toEqual([]);
    expect(b.children).toEqual([child]);
    expect(child.parent).toBe(b);
    expect(b.removeChild(child)).toBe(true);
    expect(child.parent).toBeUndefined();
  });

  it("collects text content", () => {
    const node = new UINode("p");
    node.addChild(UINode.text("a"));
    const inner = new UINode("b");
    inner.addChild(UINode.text("c"));
    node.addChild(inner);
    expect(node.textContent()).toBe("ac");
  });
});

describe("build", () => {
  it("turns tables into properties and strings into text children", () => {
    const node = buildNode((ui) => ui.panel({ width: 10 }, "hi"));

    expect(node.name).toBe("panel");
    expect(node.properties.get("width")).toEqual({ type: "float", value: 10 });
    expect(node.children).toHaveLength(1);
    expect(node.children[0].name).toBe(TEXT_NODE);
    expect(node.children[0].text).toBe("hi");
  });

  it("nests nodes and flattens lists", () => {
    const node = buildNode((ui) => ui.column(ui.label("a"), [ui.label("b"), "c"]));

    expect(node.children.map((child) => child.name)).toEqual(["label", "label", TEXT_NODE]);
    expect(node.textContent()).toBe("abc");
    expect(node.children[0].parent).toBe(node);
  });

  it("rejects arguments it cannot place", () => {
    expect(() => buildNode((ui) => ui.panel(5))).toThrow("Invalid UI builder argument: number");
    expect(() => buildNode((ui) => ui.panel(null))).toThrow("Invalid UI builder argument: null");
  });

  it("requires a function", () => {
    expect(() => build("panel", defaultNodeFactory)).toThrow(InvalidArgumentError);
  });

  it("gives scripts no way to add names to the environment", () => {
    expect(() =>
      build((ui: Env) => {
        ui.extra = () => new UINode("x");
      }, defaultNodeFactory)
    ).toThrow("Immutable table (write to 'extra')");
  });
});
