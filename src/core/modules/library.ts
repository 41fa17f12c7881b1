// src/core/modules/library.ts

import type { Scope } from "../scope/scope";

/** Top-level name a library sets to opt out of hot reload */
export const NO_RELOAD = "NO_RELOAD";

export class LibraryEntry {
  constructor(
    public readonly name: string,
    public readonly path: string,
    public readonly scope: Scope
  ) {}

  /** Read after execution, so the library decides for itself */
  get reloadable(): boolean {
    return !this.scope.own.get(NO_RELOAD);
  }
}

export interface ModuleRecord {
  readonly id: string;
  readonly scope: Scope;
  /** Normalized library name -> entry. Replaced wholesale on reload. */
  libraries: Map<string, LibraryEntry>;
}
