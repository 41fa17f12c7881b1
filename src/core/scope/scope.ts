// src/core/scope/scope.ts
// Scopes: an own table plus an explicit, ordered lookup chain

import { ImmutableWriteError } from "../errors";
import { rejectWrite } from "../table/immutable";

/**
 * One layer of a lookup chain. Registries and scope tables both qualify.
 */
export interface LookupLayer {
  readonly label: string;
  has(name: string): boolean;
  get(name: string): unknown;
}

/**
 * Mutable name table that can be frozen once.
 */
export class Table implements LookupLayer {
  private readonly entries = new Map<string, unknown>();
  private frozen = false;

  constructor(public readonly label: string) {}

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): unknown {
    return this.entries.get(name);
  }

  set(name: string, value: unknown): void {
    if (this.frozen) throw new ImmutableWriteError(name);
    this.entries.set(name, value);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}

/**
 * A scope owns one table and falls back through its parent's chain.
 *
 * Module scopes chain to the capability registry; library scopes chain to
 * their module scope. Scripts never hold a Scope directly: they run against
 * `environment()` and receive `view()` when they require a library.
 */
export class Scope {
  readonly own: Table;
  readonly layers: readonly LookupLayer[];

  private readOnlyView?: Record<string, unknown>;
  private scriptEnvironment?: object;

  constructor(
    public readonly name: string,
    parent?: Scope | LookupLayer
  ) {
    this.own = new Table(name);
    const inherited = parent === undefined ? [] : parent instanceof Scope ? parent.layers : [parent];
    this.layers = [this.own, ...inherited];
  }

  lookup(name: string): unknown {
    for (const layer of this.layers) {
      if (layer.has(name)) return layer.get(name);
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.layers.some((layer) => layer.has(name));
  }

  define(name: string, value: unknown): void {
    this.own.set(name, value);
  }

  freeze(): void {
    this.own.freeze();
  }

  get isFrozen(): boolean {
    return this.own.isFrozen;
  }

  /**
   * Read-only window onto the scope, handed to code outside it.
   */
  view(): Record<string, unknown> {
    if (!this.readOnlyView) this.readOnlyView = createView(this);
    return this.readOnlyView;
  }

  /**
   * Global environment for code compiled into this scope: every free
   * identifier resolves through the chain, every assignment to one defines
   * it in the own table.
   */
  environment(): object {
    if (!this.scriptEnvironment) this.scriptEnvironment = createEnvironment(this);
    return this.scriptEnvironment;
  }
}

function createView(scope: Scope): Record<string, unknown> {
  const target: Record<string, unknown> = Object.create(null);
  return new Proxy(target, {
    get(_target, key) {
      return typeof key === "string" ? scope.lookup(key) : undefined;
    },
    has(_target, key) {
      return typeof key === "string" && scope.has(key);
    },
    ownKeys() {
      return scope.own.keys();
    },
    getOwnPropertyDescriptor(_target, key) {
      if (typeof key !== "string" || !scope.own.has(key)) return undefined;
      return { value: scope.own.get(key), writable: false, enumerable: true, configurable: true };
    },
    getPrototypeOf() {
      return null;
    },
    set(_target, key) {
      return rejectWrite(key);
    },
    defineProperty(_target, key) {
      return rejectWrite(key);
    },
    deleteProperty(_target, key) {
      return rejectWrite(key);
    },
    setPrototypeOf() {
      return rejectWrite("[[Prototype]]");
    },
    preventExtensions() {
      return rejectWrite("[[Extensible]]");
    },
  });
}

function createEnvironment(scope: Scope): object {
  const target: object = Object.create(null);
  return new Proxy(target, {
    // Claiming every name keeps free identifiers from reaching the realm's globals.
    has(_target, key) {
      return typeof key === "string";
    },
    get(_target, key) {
      return typeof key === "string" ? scope.lookup(key) : undefined;
    },
    set(_target, key, value: unknown) {
      if (typeof key !== "string" || scope.isFrozen) return rejectWrite(key);
      scope.define(key, value);
      return true;
    },
    deleteProperty(_target, key) {
      return rejectWrite(key);
    },
    defineProperty(_target, key) {
      return rejectWrite(key);
    },
    getPrototypeOf() {
      return null;
    },
  });
}
