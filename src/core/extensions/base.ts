// src/core/extensions/base.ts
// Names every module scope gets on both sides

import type { LogSink } from "../../ports/sink";
import { bridgeNamespace } from "../capabilities/registry";
import type { MissionRegistry } from "../missions/registry";
import type { ScopeHook } from "../scope/manager";

export function baseHook(missions: MissionRegistry, log: LogSink): ScopeHook {
  return (record) => {
    record.scope.define(
      "mission",
      bridgeNamespace({
        add: (def: unknown) => {
          const mission = missions.add(record.id, def);
          log.write({
            level: "info",
            message: `Registered mission ${mission.name} with handler ${mission.handler}`,
            module: record.id,
          });
          return mission.name;
        },
      })
    );
  };
}
