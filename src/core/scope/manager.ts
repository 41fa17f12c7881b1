// src/core/scope/manager.ts
// One cached, frozen scope per module

import type { LogSink } from "../../ports/sink";
import { defineBridge, type CapabilityRegistry } from "../capabilities/registry";
import { flattenArgs } from "../capabilities/format";
import { InvalidArgumentError, LifecycleError } from "../errors";
import type { ModuleRecord } from "../modules/library";
import { assertModuleId } from "../modules/path";
import { Scope } from "./scope";

/**
 * Installs extra names into a module scope before it is frozen.
 */
export type ScopeHook = (record: ModuleRecord) => void;

export interface ScopeManagerOptions {
  registry: CapabilityRegistry;
  log: LogSink;
  require: (record: ModuleRecord, ref: string) => Scope;
  /** Run in order: the shared base hook first, then the side hook */
  hooks: ScopeHook[];
}

export class ScopeManager {
  private readonly records = new Map<string, ModuleRecord>();

  constructor(private readonly options: ScopeManagerOptions) {}

  getScope(moduleId: string): ModuleRecord {
    const cached = this.records.get(moduleId);
    if (cached) return cached;

    if (!this.options.registry.isFrozen) {
      throw new LifecycleError("Module scopes cannot be created before setup");
    }
    const id = assertModuleId(moduleId);

    const record: ModuleRecord = {
      id,
      scope: new Scope(id, this.options.registry),
      libraries: new Map(),
    };
    const { scope } = record;
    const { log } = this.options;

    scope.define(
      "print",
      defineBridge((...args) => log.write({ level: "info", message: flattenArgs(args), module: id }))
    );
    scope.define(
      "require",
      defineBridge((ref) => {
        if (typeof ref !== "string") throw new InvalidArgumentError("require expects a library name");
        return this.options.require(record, ref).view();
      })
    );

    for (const hook of this.options.hooks) hook(record);

    scope.freeze();
    this.records.set(id, record);
    return record;
  }

  peek(moduleId: string): ModuleRecord | undefined {
    return this.records.get(moduleId);
  }

  modules(): string[] {
    return [...this.records.keys()];
  }
}
