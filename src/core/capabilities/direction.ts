// src/core/capabilities/direction.ts
// Compass helpers exposed to scripts as `direction`

import { InvalidArgumentError } from "../errors";
import { formatValue } from "./format";

export type Direction = "north" | "south" | "east" | "west";

export const ALL_DIRECTIONS: readonly Direction[] = ["north", "south", "east", "west"];

// east/west are mirrored relative to screen x; hosts depend on this.
const OFFSETS: Record<Direction, readonly [number, number]> = {
  north: [0, -1],
  south: [0, 1],
  east: [-1, 0],
  west: [1, 0],
};

const REVERSE: Record<Direction, Direction> = {
  north: "south",
  south: "north",
  east: "west",
  west: "east",
};

export function isDirection(value: unknown): value is Direction {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(OFFSETS, value);
}

function expectDirection(value: unknown): Direction {
  if (!isDirection(value)) {
    throw new InvalidArgumentError(`Invalid direction: ${formatValue(value)}`);
  }
  return value;
}

export function directionOffset(value: unknown): [number, number] {
  const [x, y] = OFFSETS[expectDirection(value)];
  return [x, y];
}

export function reverseDirection(value: unknown): Direction {
  return REVERSE[expectDirection(value)];
}
