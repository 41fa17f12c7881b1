// src/core/capabilities/registry.ts
// Process-wide allow-list of everything scripts may reach

import { ImmutableWriteError, InvalidArgumentError } from "../errors";
import { Table, type LookupLayer } from "../scope/scope";
import { lockTable } from "../table/immutable";

export type HostFunction = (...args: unknown[]) => unknown;

/**
 * Wrap a host function as an opaque call boundary: scripts can call it but
 * cannot reach the function object or bind its receiver.
 */
export function defineBridge(fn: HostFunction): HostFunction {
  return lockTable((...args: unknown[]) => fn(...args));
}

/**
 * Build a locked namespace whose functions are all bridges.
 */
export function bridgeNamespace(members: Record<string, unknown>): Record<string, unknown> {
  const ns: Record<string, unknown> = Object.create(null);
  for (const [name, member] of Object.entries(members)) {
    ns[name] = typeof member === "function" ? defineBridge((...args) => Reflect.apply(member, undefined, args)) : member;
  }
  return lockTable(ns);
}

/**
 * Capability registry: written during boot, frozen by setup, then read by
 * every module scope as the last layer of its lookup chain.
 */
export class CapabilityRegistry implements LookupLayer {
  readonly label = "registry";
  private readonly table = new Table("registry");

  define(name: string, value: unknown): void {
    if (this.table.isFrozen) throw new ImmutableWriteError(name);
    if (name.length === 0) throw new InvalidArgumentError("Capability name must not be empty");
    this.table.set(name, lockTable(value));
  }

  defineNamespace(name: string, members: Record<string, unknown>): void {
    this.define(name, bridgeNamespace(members));
  }

  defineFunction(name: string, fn: HostFunction): void {
    this.define(name, defineBridge(fn));
  }

  has(name: string): boolean {
    return this.table.has(name);
  }

  get(name: string): unknown {
    return this.table.get(name);
  }

  names(): string[] {
    return this.table.keys();
  }

  freeze(): void {
    this.table.freeze();
  }

  get isFrozen(): boolean {
    return this.table.isFrozen;
  }
}
