// src/core/concurrency/suspension.ts
// What a free-roam behavior is waiting for when it yields

import { InvalidArgumentError } from "../errors";

export type Suspension =
  | { tag: "Wait" }
  | { tag: "Entity" }
  | { tag: "Player" }
  | { tag: "NotifyPlayer" }
  | { tag: "Extension"; key: string };

/**
 * Parse a yielded value. Nothing (or "wait") parks until the next call;
 * any other string names a context key.
 */
export function parseSuspension(value: unknown): Suspension {
  if (value === undefined || value === null) return { tag: "Wait" };
  if (typeof value !== "string") {
    throw new InvalidArgumentError(`Free roam behaviors may only yield strings, got ${typeof value}`);
  }
  switch (value) {
    case "wait":
      return { tag: "Wait" };
    case "entity":
      return { tag: "Entity" };
    case "player":
      return { tag: "Player" };
    case "notify_player":
      return { tag: "NotifyPlayer" };
    default:
      return { tag: "Extension", key: value };
  }
}

/** Context key a suspension resumes from; Wait has none. */
export function suspensionKey(suspension: Suspension): string | undefined {
  switch (suspension.tag) {
    case "Wait":
      return undefined;
    case "Entity":
      return "entity";
    case "Player":
      return "player";
    case "NotifyPlayer":
      return "notify_player";
    case "Extension":
      return suspension.key;
  }
}
