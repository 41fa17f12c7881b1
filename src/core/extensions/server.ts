// src/core/extensions/server.ts
// Server-only module names

import type { ControlPort } from "../../ports/control";
import type { LevelPort } from "../../ports/level";
import { bridgeNamespace } from "../capabilities/registry";
import { InvalidArgumentError } from "../errors";
import type { ScopeHook } from "../scope/manager";
import { unwrapLocked } from "../table/immutable";

function expectInteger(value: unknown, fn: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new InvalidArgumentError(`${fn}: expected an integer`);
  }
  return value;
}

export function serverHook(control: ControlPort, level?: LevelPort): ScopeHook {
  return (record) => {
    record.scope.define(
      "control",
      bridgeNamespace({
        players: () => control.players(),
        player: () => control.currentPlayer(),
        submit_command: (command: unknown) => control.submitCommand(unwrapLocked(command)),
        give_money: (player: unknown, amount: unknown) =>
          control.giveMoney(expectInteger(player, "control.give_money"), expectInteger(amount, "control.give_money")),
        rooms_for_player: (player: unknown) =>
          level ? level.playerRooms(expectInteger(player, "control.rooms_for_player")) : [],
      })
    );
  };
}
