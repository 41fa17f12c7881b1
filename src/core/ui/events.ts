// src/core/ui/events.ts
// Inline event-handler snippets, compiled once per library scope

import { InvalidArgumentError } from "../errors";
import type { Scope } from "../scope/scope";
import { lockTable } from "../table/immutable";
import { runGuarded, type ScriptEngine, type ScriptFunction } from "../vm/engine";

export class EventCompiler {
  // Keyed by scope identity: a reloaded library gets a new scope and so an
  // empty cache.
  private readonly cache = new WeakMap<Scope, Map<string, ScriptFunction>>();

  constructor(private readonly engine: ScriptEngine) {}

  /**
   * Wrap `snippet` as the body of `function (node, event)` and run the
   * wrapper once in `library` to obtain the handler. Free names in the
   * handler resolve through the library scope.
   */
  compile(library: Scope, snippet: string): ScriptFunction {
    let handlers = this.cache.get(library);
    if (!handlers) {
      handlers = new Map();
      this.cache.set(library, handlers);
    }

    const cached = handlers.get(snippet);
    if (cached) return cached;

    const unit = `${library.name}#event`;
    const produce = this.engine.compile(unit, `return function (node, event) {\n${snippet}\n};`, library);
    const fn = produce();
    if (typeof fn !== "function") throw new InvalidArgumentError(`${unit}: handler is not a function`);
    const handler: ScriptFunction = (...args) => runGuarded(unit, () => Reflect.apply(fn, undefined, args));
    handlers.set(snippet, handler);
    return handler;
  }

  dispatch(library: Scope, snippet: string, node: unknown, event: unknown): unknown {
    return this.compile(library, snippet)(lockTable(node), lockTable(event));
  }
}
