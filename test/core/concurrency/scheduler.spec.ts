// test/core/concurrency/scheduler.spec.ts
// Tests for free-roam behaviors driven through the sandbox

import { describe, it, expect } from "vitest";
import { parseSuspension, suspensionKey } from "../../../src/core/concurrency/suspension";
import { ExecutionError, InvalidArgumentError } from "../../../src/core/errors";
import { createTestSandbox } from "../../helpers/sandbox";

const WALKER = `
walk = function* () {
  const e = yield* free_roam.entity();
  seen = e.name;
  yield* free_roam.wait();
  return "done";
};

door = function* () {
  const state = yield "door_state";
  return state;
};

who = function* () {
  const p = yield* free_roam.player();
  return p;
};

ping = function* () {
  yield* free_roam.notify_player("menu#show", { a: 1 });
  return "sent";
};

trip = function* () {
  yield "wait";
  throw "boom";
};

bad = function* () {
  yield 5;
};

plain = function () {
  return 7;
};
`;

function setup() {
  return createTestSandbox({ npc: { "scripts/init.js": "", "scripts/walker.js": WALKER } });
}

describe("suspensions", () => {
  it("parses yielded strings", () => {
    expect(parseSuspension(undefined)).toEqual({ tag: "Wait" });
    expect(parseSuspension("wait")).toEqual({ tag: "Wait" });
    expect(parseSuspension("entity")).toEqual({ tag: "Entity" });
    expect(parseSuspension("notify_player")).toEqual({ tag: "NotifyPlayer" });
    expect(parseSuspension("door_state")).toEqual({ tag: "Extension", key: "door_state" });
  });

  it("maps suspensions to context keys", () => {
    expect(suspensionKey({ tag: "Wait" })).toBeUndefined();
    expect(suspensionKey({ tag: "Player" })).toBe("player");
    expect(suspensionKey({ tag: "Extension", key: "door_state" })).toBe("door_state");
  });

  it("refuses anything but strings", () => {
    expect(() => parseSuspension(5)).toThrow("Free roam behaviors may only yield strings, got number");
  });
});

describe("FreeRoamScheduler", () => {
  it("returns a fresh handle without running anything", () => {
    const { sandbox } = setup();
    const handle = sandbox.invokeFreeRoam("npc", "walker", "walk", undefined);

    expect(handle.status).toBe("fresh");
    expect(handle.unit).toBe("npc:walker#walk");
    expect(sandbox.require("npc", "walker").lookup("seen")).toBeUndefined();
  });

  it("feeds bound context values and parks on wait", () => {
    const { sandbox } = setup();
    const handle = sandbox.invokeFreeRoam("npc", "walker", "walk", undefined);

    sandbox.invokeFreeRoam("npc", "walker", "walk", handle, { entity: { name: "Bob" } });

    expect(handle.status).toBe("suspended");
    expect(handle.suspension).toEqual({ tag: "Wait" });
    expect(sandbox.require("npc", "walker").lookup("seen")).toBe("Bob");
  });

  it("completes on a later call and restarts once finished", () => {
    const { sandbox } = setup();
    const handle = sandbox.invokeFreeRoam("npc", "walker", "walk", undefined);
    sandbox.invokeFreeRoam("npc", "walker", "walk", handle, { entity: { name: "Bob" } });

    const same = sandbox.invokeFreeRoam("npc", "walker", "walk", handle);
    expect(same).toBe(handle);
    expect(handle.status).toBe("completed");
    expect(handle.result).toBe("done");

    const next = sandbox.invokeFreeRoam("npc", "walker", "walk", handle);
    expect(next).not.toBe(handle);
    expect(next.status).toBe("fresh");
  });

  it("parks on a key the context does not bind and resumes once it does", () => {
    const { sandbox } = setup();
    const handle = sandbox.invokeFreeRoam("npc", "walker", "door", undefined);

    sandbox.invokeFreeRoam("npc", "walker", "door", handle, {});
    expect(handle.suspension).toEqual({ tag: "Extension", key: "door_state" });

    sandbox.invokeFreeRoam("npc", "walker", "door", handle, { door_state: "open" });
    expect(handle.status).toBe("completed");
    expect(handle.result).toBe("open");
  });

  it("resumes helpers used through yield*", () => {
    const { sandbox } = setup();
    const handle = sandbox.invokeFreeRoam("npc", "walker", "who", undefined);
    sandbox.invokeFreeRoam("npc", "walker", "who", handle, { player: 7 });

    expect(handle.result).toBe(7);
  });

  it("hands notify_player its method and data", () => {
    const { sandbox } = setup();
    const calls: unknown[][] = [];
    const notify = (...args: unknown[]) => {
      calls.push(args);
    };
    const handle = sandbox.invokeFreeRoam("npc", "walker", "ping", undefined);
    sandbox.invokeFreeRoam("npc", "walker", "ping", handle, { notify_player: notify });

    expect(handle.result).toBe("sent");
    expect(calls).toHaveLength(1);
    expect(calls[0][0]).toBe("menu#show");
    expect(Reflect.get(Object(calls[0][1]), "a")).toBe(1);
  });

  it("wraps plain functions", () => {
    const { sandbox } = setup();
    const handle = sandbox.invokeFreeRoam("npc", "walker", "plain", undefined);
    sandbox.invokeFreeRoam("npc", "walker", "plain", handle);

    expect(handle.status).toBe("completed");
    expect(handle.result).toBe(7);
  });

  it("fails the handle when the behavior throws", () => {
    const { sandbox } = setup();
    const handle = sandbox.invokeFreeRoam("npc", "walker", "trip", undefined);
    sandbox.invokeFreeRoam("npc", "walker", "trip", handle);

    expect(() => sandbox.invokeFreeRoam("npc", "walker", "trip", handle)).toThrow(ExecutionError);
    expect(handle.status).toBe("failed");
  });

  it("reports the behavior's unit in the error", () => {
    const { sandbox } = setup();
    const handle = sandbox.invokeFreeRoam("npc", "walker", "trip", undefined);
    sandbox.invokeFreeRoam("npc", "walker", "trip", handle);

    expect(() => sandbox.invokeFreeRoam("npc", "walker", "trip", handle)).toThrow("npc:walker#trip: boom");
  });

  it("fails the handle on a non-string yield", () => {
    const { sandbox } = setup();
    const handle = sandbox.invokeFreeRoam("npc", "walker", "bad", undefined);

    expect(() => sandbox.invokeFreeRoam("npc", "walker", "bad", handle)).toThrow(InvalidArgumentError);
    expect(handle.status).toBe("failed");
  });

  it("rejects unknown methods", () => {
    const { sandbox } = setup();
    expect(() => sandbox.invokeFreeRoam("npc", "walker", "nope", undefined)).toThrow(
      "npc:walker has no method 'nope'"
    );
  });
});
