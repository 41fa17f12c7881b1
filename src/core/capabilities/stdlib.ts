// src/core/capabilities/stdlib.ts
// The allow-listed standard surface every module sees

import { format } from "util";
import type { ClockPort } from "../../ports/clock";
import type { LevelPort } from "../../ports/level";
import type { SerializerPort } from "../../ports/serializer";
import { InvalidArgumentError } from "../errors";
import { lockTable, unwrapLocked } from "../table/immutable";
import { ALL_DIRECTIONS, directionOffset, isDirection, reverseDirection } from "./direction";
import { formatValue } from "./format";
import { freeRoamHelpers } from "./freeRoam";
import type { CapabilityRegistry } from "./registry";

export type Side = "client" | "server";

export interface StdlibOptions {
  side: Side;
  serializer: SerializerPort;
  clock?: ClockPort;
  level?: LevelPort;
}

const MATH_MEMBERS = [
  "abs", "ceil", "floor", "round", "trunc", "sign", "min", "max", "sqrt", "pow",
  "exp", "log", "sin", "cos", "tan", "atan2", "hypot", "random", "PI", "E",
] as const;

function expectArray(value: unknown, fn: string): unknown[] {
  if (!Array.isArray(value)) throw new InvalidArgumentError(`${fn}: expected an array`);
  return value;
}

function expectObject(value: unknown, fn: string): object {
  if ((typeof value !== "object" && typeof value !== "function") || value === null) {
    throw new InvalidArgumentError(`${fn}: expected a table`);
  }
  return value;
}

function expectString(value: unknown, fn: string): string {
  if (typeof value !== "string") throw new InvalidArgumentError(`${fn}: expected a string`);
  return value;
}

function expectInteger(value: unknown, fn: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new InvalidArgumentError(`${fn}: expected an integer`);
  }
  return value;
}

export function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isNaN(value) ? undefined : value;
  if (typeof value !== "string" || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isNaN(n) ? undefined : n;
}

function mathSubset(): Record<string, unknown> {
  const members: Record<string, unknown> = {};
  for (const name of MATH_MEMBERS) members[name] = Math[name];
  return members;
}

const stringLib = {
  split: (s: unknown, sep: unknown) => expectString(s, "string.split").split(expectString(sep, "string.split")),
  rep: (s: unknown, n: unknown, sep: unknown = "") => {
    const count = expectInteger(n, "string.rep");
    return count <= 0 ? "" : new Array<string>(count).fill(expectString(s, "string.rep")).join(expectString(sep, "string.rep"));
  },
  format: (fmt: unknown, ...args: unknown[]) => format(expectString(fmt, "string.format"), ...args),
};

const tableLib = {
  keys: (t: unknown) => Object.keys(expectObject(t, "table.keys")),
  values: (t: unknown) => Object.values(expectObject(t, "table.values")),
  entries: (t: unknown) => Object.entries(expectObject(t, "table.entries")),
  insert: (t: unknown, ...rest: unknown[]) => {
    const list = expectArray(t, "table.insert");
    if (rest.length >= 2) {
      list.splice(expectInteger(rest[0], "table.insert"), 0, rest[1]);
    } else {
      list.push(rest[0]);
    }
    return list.length;
  },
  remove: (t: unknown, pos?: unknown) => {
    const list = expectArray(t, "table.remove");
    if (pos === undefined) return list.pop();
    return list.splice(expectInteger(pos, "table.remove"), 1)[0];
  },
  concat: (t: unknown, sep: unknown = "") =>
    expectArray(t, "table.concat").map(formatValue).join(expectString(sep, "table.concat")),
  sort: (t: unknown, compare?: unknown) => {
    const list = expectArray(t, "table.sort");
    if (compare === undefined) return list.sort();
    if (typeof compare !== "function") throw new InvalidArgumentError("table.sort: comparator must be a function");
    return list.sort((a, b) => Number(Reflect.apply(compare, undefined, [a, b])));
  },
  is_array: (t: unknown) => Array.isArray(t),
};

function levelLib(level: LevelPort): Record<string, unknown> {
  return {
    tile_at: (x: unknown, y: unknown) => {
      const tile = level.tileAt(expectInteger(x, "level.tile_at"), expectInteger(y, "level.tile_at"));
      if (!tile) return undefined;
      return { name: tile.name, has_property: (property: unknown) => tile.hasProperty(expectString(property, "has_property")) };
    },
    wall_at: (x: unknown, y: unknown, dir: unknown) => {
      if (!isDirection(dir)) throw new InvalidArgumentError(`Invalid direction: ${formatValue(dir)}`);
      return level.wallAt(expectInteger(x, "level.wall_at"), expectInteger(y, "level.wall_at"), dir);
    },
    room_type_at: (x: unknown, y: unknown) =>
      level.roomTypeAt(expectInteger(x, "level.room_type_at"), expectInteger(y, "level.room_type_at")),
    room_name: (id: unknown) => level.roomDisplayName(expectInteger(id, "level.room_name")),
    rooms_for_player: (id: unknown) => level.playerRooms(expectInteger(id, "level.rooms_for_player")),
  };
}

/**
 * Populate the registry with the standard surface. Must run before the
 * registry is frozen.
 */
export function installStdlib(registry: CapabilityRegistry, options: StdlibOptions): void {
  registry.define("NaN", NaN);
  registry.define("Infinity", Infinity);
  registry.defineFunction("isNaN", (v) => typeof v === "number" && Number.isNaN(v));
  registry.defineFunction("isFinite", (v) => typeof v === "number" && Number.isFinite(v));
  registry.defineFunction("parseInt", (s, radix) => parseInt(expectString(s, "parseInt"), typeof radix === "number" ? radix : 10));
  registry.defineFunction("parseFloat", (s) => parseFloat(expectString(s, "parseFloat")));
  registry.defineFunction("tostring", (v) => formatValue(v));
  registry.defineFunction("tonumber", (v) => toNumber(v));
  registry.defineNamespace("Math", mathSubset());
  registry.defineNamespace("string", stringLib);
  registry.defineNamespace("table", tableLib);
  registry.defineNamespace("JSON", {
    parse: (text: unknown) => JSON.parse(expectString(text, "JSON.parse")),
    stringify: (value: unknown, _replacer?: unknown, indent?: unknown) =>
      JSON.stringify(value, null, typeof indent === "number" || typeof indent === "string" ? indent : undefined),
  });
  registry.defineNamespace("direction", {
    ALL: lockTable([...ALL_DIRECTIONS]),
    offset: directionOffset,
    reverse: reverseDirection,
  });
  registry.defineNamespace("free_roam", freeRoamHelpers(options.level));
  registry.defineNamespace("serialize", {
    define: (schema: unknown) => {
      const codec = options.serializer.define(schema);
      return {
        encode: (value: unknown) => codec.encode(value),
        decode: (value: unknown) => {
          const bytes = unwrapLocked(value);
          if (!(bytes instanceof Uint8Array)) throw new InvalidArgumentError("serialize: decode expects bytes");
          return codec.decode(bytes);
        },
      };
    },
  });
  registry.define("is_client", options.side === "client");

  const { clock, level } = options;
  if (clock) registry.defineFunction("game_time", () => clock.nowTicks());
  if (level) registry.defineNamespace("level", levelLib(level));
}
