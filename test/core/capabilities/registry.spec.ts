// test/core/capabilities/registry.spec.ts
// Tests for the capability registry, bridges and direction helpers

import { describe, it, expect } from "vitest";
import { directionOffset, isDirection, reverseDirection } from "../../../src/core/capabilities/direction";
import { flattenArgs, formatValue } from "../../../src/core/capabilities/format";
import { CapabilityRegistry, bridgeNamespace, defineBridge } from "../../../src/core/capabilities/registry";
import { ImmutableWriteError, InvalidArgumentError } from "../../../src/core/errors";
import { isLocked, lockTable } from "../../../src/core/table/immutable";

describe("CapabilityRegistry", () => {
  it("stores locked values", () => {
    const registry = new CapabilityRegistry();
    registry.define("settings", { volume: 3 });

    const settings = registry.get("settings");
    expect(isLocked(settings)).toBe(true);
    expect(registry.has("settings")).toBe(true);
    expect(registry.names()).toEqual(["settings"]);
  });

  it("refuses definitions once frozen", () => {
    const registry = new CapabilityRegistry();
    registry.define("a", 1);
    registry.freeze();

    expect(registry.isFrozen).toBe(true);
    expect(() => registry.define("b", 2)).toThrow(ImmutableWriteError);
    expect(() => registry.define("b", 2)).toThrow("Immutable table (write to 'b')");
    expect(registry.get("a")).toBe(1);
  });

  it("refuses empty names", () => {
    const registry = new CapabilityRegistry();
    expect(() => registry.define("", 1)).toThrow(InvalidArgumentError);
  });

  it("defines functions as bridges", () => {
    const registry = new CapabilityRegistry();
    registry.defineFunction("double", (n) => (typeof n === "number" ? n * 2 : 0));

    const double = registry.get("double");
    expect(typeof double).toBe("function");
    expect(isLocked(double)).toBe(true);
    expect(typeof double === "function" ? double(4) : undefined).toBe(8);
  });
});

describe("bridges", () => {
  it("lock their results", () => {
    const bridge = defineBridge(() => ({ items: [1, 2] }));
    const result = bridge();
    expect(isLocked(result)).toBe(true);
  });

  it("hide the wrapped function", () => {
    const bridge = defineBridge(() => 1);
    expect(Reflect.get(bridge, "constructor")).toBeUndefined();
    expect(Object.getPrototypeOf(bridge)).toBeNull();
  });

  it("namespaces have no prototype and refuse writes", () => {
    const ns = bridgeNamespace({ greet: (name: unknown) => `hi ${String(name)}`, VERSION: 2 });

    expect(Object.getPrototypeOf(ns)).toBeNull();
    expect(ns.VERSION).toBe(2);
    const greet = ns.greet;
    expect(typeof greet === "function" ? greet("bob") : undefined).toBe("hi bob");
    expect(() => {
      ns.VERSION = 3;
    }).toThrow("Immutable table (write to 'VERSION')");
  });
});

describe("direction", () => {
  it("offsets keep east and west mirrored", () => {
    expect(directionOffset("north")).toEqual([0, -1]);
    expect(directionOffset("south")).toEqual([0, 1]);
    expect(directionOffset("east")).toEqual([-1, 0]);
    expect(directionOffset("west")).toEqual([1, 0]);
  });

  it("reverses", () => {
    expect(reverseDirection("north")).toBe("south");
    expect(reverseDirection("east")).toBe("west");
  });

  it("rejects unknown directions", () => {
    expect(isDirection("toString")).toBe(false);
    expect(() => directionOffset("up")).toThrow("Invalid direction: up");
    expect(() => reverseDirection(3)).toThrow(InvalidArgumentError);
  });
});

describe("format", () => {
  it("renders values the way print does", () => {
    expect(formatValue("raw")).toBe("raw");
    expect(formatValue(1.5)).toBe("1.5");
    expect(formatValue(undefined)).toBe("undefined");
    expect(formatValue(null)).toBe("null");
    expect(formatValue(lockTable({ a: 1 }))).toBe("{ a: 1 }");
    expect(flattenArgs(["x", 2, true])).toBe("x 2 true");
  });
});
