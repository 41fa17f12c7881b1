// src/core/modules/loader.ts
// require: resolve, compile, execute and memoize libraries

import type { ScriptSource } from "../../ports/source";
import { ScriptNotFoundError } from "../errors";
import { Scope } from "../scope/scope";
import type { ScriptEngine } from "../vm/engine";
import { LibraryEntry, type ModuleRecord } from "./library";
import { DEFAULT_LAYOUT, libraryPath, normalizeLibraryName, splitRef, type ScriptLayout } from "./path";

export interface ModuleLoaderOptions {
  engine: ScriptEngine;
  source: ScriptSource;
  /** Resolve (creating if needed) another module's record */
  resolveModule: (moduleId: string) => ModuleRecord;
  layout?: ScriptLayout;
  /** Called for every script read, before it is compiled */
  onScriptFetched?: (moduleId: string, path: string) => void;
}

export class ModuleLoader {
  private readonly layout: ScriptLayout;

  constructor(private readonly options: ModuleLoaderOptions) {
    this.layout = options.layout ?? DEFAULT_LAYOUT;
  }

  /**
   * Resolve `name` or `othermodule:name` to a library scope, executing the
   * library on first use.
   *
   * The entry is cached before the library runs, so a library that requires
   * itself (directly or through another) sees its partially populated scope.
   * A library whose execution fails is evicted again.
   */
  require(record: ModuleRecord, ref: string): Scope {
    const { module, name } = splitRef(ref);
    if (module !== undefined) {
      return this.require(this.options.resolveModule(module), name);
    }

    const normalized = normalizeLibraryName(name);
    if (normalized === undefined) throw new ScriptNotFoundError(record.id, ref);

    const cached = record.libraries.get(normalized);
    if (cached) return cached.scope;

    const path = libraryPath(normalized, this.layout);
    const source = this.options.source.fetch(record.id, path);
    if (source === undefined) throw new ScriptNotFoundError(record.id, path);
    this.options.onScriptFetched?.(record.id, path);

    const unit = `${record.id}:${path}`;
    const scope = new Scope(unit, record.scope);
    const run = this.options.engine.compile(unit, source, scope);

    const entry = new LibraryEntry(normalized, path, scope);
    record.libraries.set(normalized, entry);
    try {
      run();
    } catch (e) {
      if (record.libraries.get(normalized) === entry) record.libraries.delete(normalized);
      throw e;
    }
    return scope;
  }
}
