// src/core/vm/engine.ts
// Compiles script text into functions bound to a scope environment

import * as vm from "vm";
import { CompileError, ExecutionError, describeThrown, isSandboxError, type SandboxError } from "../errors";
import type { Scope } from "../scope/scope";
import { unwrapLocked } from "../table/immutable";

export type ScriptFunction = (...args: unknown[]) => unknown;

const ENV_PARAM = "__env";

/**
 * One isolated realm shared by every module. The realm has no host globals
 * and refuses string code generation; names resolve through the scope each
 * unit is compiled against.
 */
export class ScriptEngine {
  private readonly context: vm.Context;

  constructor(contextName = "modbox") {
    // A null-prototype global keeps host Object.prototype out of the realm.
    const global: vm.Context = Object.create(null);
    this.context = vm.createContext(
      global,
      {
        name: contextName,
        codeGeneration: { strings: false, wasm: false },
      }
    );
  }

  /**
   * Compile `source` as the body of a function whose free identifiers resolve
   * through `scope`. Top-level assignments to undeclared names define them in
   * the scope's own table.
   *
   * The body sits in a function nested inside `with (env)`, so its
   * parameters and declarations bind before the scope environment is
   * consulted and never leak into it.
   *
   * @param unit - Name used in stack traces and errors, usually `module:path`
   * @param params - Parameter names of the compiled function
   */
  compile(unit: string, source: string, scope: Scope, params: string[] = []): ScriptFunction {
    const wrapped = `with (${ENV_PARAM}) return function (${params.join(", ")}) {\n${source}\n};`;
    let bind: Function;
    try {
      bind = vm.compileFunction(wrapped, [ENV_PARAM], {
        filename: unit,
        parsingContext: this.context,
      });
    } catch (e) {
      throw new CompileError(unit, describeThrown(e).message);
    }
    const fn: unknown = Reflect.apply(bind, undefined, [scope.environment()]);
    if (typeof fn !== "function") throw new CompileError(unit, "script body is not a function");
    return (...args: unknown[]) => runGuarded(unit, () => Reflect.apply(fn, undefined, args));
  }
}

/**
 * Map a value thrown out of script code to a host error. Sandbox errors
 * raised by host calls come back unchanged; anything else becomes an
 * ExecutionError carrying the script's stack.
 */
export function scriptFailure(unit: string, thrown: unknown): SandboxError {
  const e = unwrapLocked(thrown);
  if (isSandboxError(e)) return e;
  const { message, trace } = describeThrown(e);
  return new ExecutionError(unit, message, trace);
}

export function runGuarded<T>(unit: string, body: () => T): T {
  try {
    return body();
  } catch (e) {
    throw scriptFailure(unit, e);
  }
}
