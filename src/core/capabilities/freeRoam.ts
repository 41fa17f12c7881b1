// src/core/capabilities/freeRoam.ts
// Generator helpers for free-roam behaviors, used with `yield*`

import type { LevelPort } from "../../ports/level";

export type Yielding<T> = Generator<string, T, unknown>;

export function* wait(): Yielding<unknown> {
  const resumed: unknown = yield "wait";
  return resumed;
}

export function* entity(): Yielding<unknown> {
  const current: unknown = yield "entity";
  return current;
}

export function* player(): Yielding<unknown> {
  const current: unknown = yield "player";
  return current;
}

/**
 * Ask the host to run `method` (`script#function`) on the owning player's
 * side with `data`. Without a bound notifier this is a no-op.
 */
export function* notifyPlayer(method: unknown, data: unknown): Yielding<void> {
  const notify: unknown = yield "notify_player";
  if (typeof notify === "function") Reflect.apply(notify, undefined, [method, data]);
}

export function freeRoamHelpers(level?: LevelPort): Record<string, unknown> {
  const helpers: Record<string, unknown> = {
    wait,
    entity,
    player,
    notify_player: notifyPlayer,
  };
  if (level) {
    helpers.rooms_for_player = function* (): Yielding<number[]> {
      const owner: unknown = yield "player";
      return typeof owner === "number" ? level.playerRooms(owner) : [];
    };
  }
  return helpers;
}
