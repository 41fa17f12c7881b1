// src/core/concurrency/scheduler.ts
// Free-roam scheduler: drives behavior generators against host context

import { InvalidArgumentError } from "../errors";
import type { Scope } from "../scope/scope";
import { lockTable } from "../table/immutable";
import { BehaviorHandle } from "./behavior";
import { suspensionKey } from "./suspension";

/** Values a behavior can ask for, keyed by suspension key */
export type FreeRoamContext = Readonly<Record<string, unknown>>;

export type LibraryResolver = (moduleId: string, library: string) => Scope;

// Generators made inside the script realm fail `instanceof`, so check shape.
function isIterator(value: unknown): value is Iterable<unknown> {
  if (typeof value !== "object" || value === null) return false;
  return (
    "next" in value &&
    typeof value.next === "function" &&
    typeof Reflect.get(value, Symbol.iterator) === "function"
  );
}

function boundValue(context: FreeRoamContext, key: string): { value: unknown } | undefined {
  if (!Object.prototype.hasOwnProperty.call(context, key)) return undefined;
  const value = context[key];
  return value === undefined ? undefined : { value: lockTable(value) };
}

export class FreeRoamScheduler {
  constructor(private readonly resolveLibrary: LibraryResolver) {}

  /**
   * Advance a behavior.
   *
   * With no handle, or a finished one, returns a fresh handle for
   * `library[method]` without running it. Otherwise resumes the handle and
   * keeps feeding it context values until it asks for something the context
   * does not bind, then returns it parked.
   */
  invoke(
    moduleId: string,
    library: string,
    method: string,
    handle: BehaviorHandle | undefined,
    context: FreeRoamContext = {}
  ): BehaviorHandle {
    if (!handle || handle.isTerminal) return this.start(moduleId, library, method);

    const parked = handle.suspension;
    const parkedKey = parked ? suspensionKey(parked) : undefined;
    let payload: unknown = parkedKey === undefined ? undefined : boundValue(context, parkedKey)?.value;

    for (;;) {
      const step = handle.resume(payload);
      if (step.done) return handle;

      const key = suspensionKey(step.suspension);
      const bound = key === undefined ? undefined : boundValue(context, key);
      if (!bound) return handle;
      payload = bound.value;
    }
  }

  private start(moduleId: string, library: string, method: string): BehaviorHandle {
    const scope = this.resolveLibrary(moduleId, library);
    const fn = scope.lookup(method);
    if (typeof fn !== "function") {
      throw new InvalidArgumentError(`${moduleId}:${library} has no method '${method}'`);
    }
    const receiver = scope.view();

    // Nothing runs until the first resume, plain functions included.
    const body = function* (): Generator<unknown, unknown, unknown> {
      const result: unknown = Reflect.apply(fn, receiver, []);
      if (isIterator(result)) return yield* result;
      return result;
    };

    return new BehaviorHandle(`${moduleId}:${library}#${method}`, body());
  }
}
