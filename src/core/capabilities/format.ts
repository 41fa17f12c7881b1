// src/core/capabilities/format.ts
// Rendering script values as log text

import { inspect } from "util";
import { unwrapLocked } from "../table/immutable";

export function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (value === undefined) return "undefined";
  if (value === null) return "null";
  return inspect(unwrapLocked(value), { depth: 2, breakLength: Infinity });
}

/** Join print-style arguments into one line */
export function flattenArgs(args: readonly unknown[]): string {
  return args.map(formatValue).join(" ");
}
