import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";
import {
  CompileError,
  ExecutionError,
  ImmutableWriteError,
  MissingRequiredFieldError,
  ScriptNotFoundError,
  describeThrown,
  isSandboxError,
} from "../core/errors";
import { unwrapLocked } from "../core/table/immutable";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

/**
 * Map anything thrown by the loader, a script or a host bridge onto a
 * Failure with a diagnostic code.
 */
export function toFailure(thrown: unknown): Failure {
  const e = unwrapLocked(thrown);
  if (e instanceof ImmutableWriteError) {
    return failure(e.code, e.message, {
      diagnostics: [makeDiagnostic("S0001", { key: e.key ?? "?" })],
    });
  }
  if (e instanceof ScriptNotFoundError) {
    return failure(e.code, e.message, {
      diagnostics: [makeDiagnostic("S0100", { path: e.path }, `${e.moduleId}:${e.path}`)],
    });
  }
  if (e instanceof CompileError) {
    return failure(e.code, e.message, {
      diagnostics: [makeDiagnostic("S0101", { unit: e.unit }, e.unit)],
    });
  }
  if (e instanceof ExecutionError) {
    return failure(e.code, e.message, {
      diagnostics: [makeDiagnostic("S0200", { unit: e.unit }, e.unit)],
      trace: e.trace,
    });
  }
  if (e instanceof MissingRequiredFieldError) {
    return failure(e.code, e.message, {
      diagnostics: [makeDiagnostic("S0300", { field: e.field })],
    });
  }
  if (isSandboxError(e)) {
    return failure(e.code, e.message, {
      diagnostics: [makeDiagnostic(e.code === "lifecycle" ? "S0400" : "S0301")],
    });
  }

  const { message, trace } = describeThrown(e);
  return failure("internal-error", message, {
    diagnostics: [makeDiagnostic("S0900")],
    trace,
  });
}
