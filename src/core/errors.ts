// src/core/errors.ts
// Sandbox error kinds

export type SandboxErrorCode =
  | "immutable-write"
  | "script-not-found"
  | "compile-error"
  | "execution-error"
  | "missing-required-field"
  | "invalid-argument"
  | "lifecycle";

export abstract class SandboxError extends Error {
  abstract readonly code: SandboxErrorCode;
}

export class ImmutableWriteError extends SandboxError {
  readonly code = "immutable-write";

  constructor(public readonly key?: string) {
    super(key === undefined ? "Immutable table" : `Immutable table (write to '${key}')`);
    this.name = "ImmutableWriteError";
  }
}

export class ScriptNotFoundError extends SandboxError {
  readonly code = "script-not-found";

  constructor(
    public readonly moduleId: string,
    public readonly path: string
  ) {
    super(`Script not found: ${moduleId}:${path}`);
    this.name = "ScriptNotFoundError";
  }
}

export class CompileError extends SandboxError {
  readonly code = "compile-error";

  constructor(
    public readonly unit: string,
    message: string
  ) {
    super(`${unit}: ${message}`);
    this.name = "CompileError";
  }
}

export class ExecutionError extends SandboxError {
  readonly code = "execution-error";

  constructor(
    public readonly unit: string,
    message: string,
    public readonly trace: string
  ) {
    super(`${unit}: ${message}`);
    this.name = "ExecutionError";
  }
}

export class MissingRequiredFieldError extends SandboxError {
  readonly code = "missing-required-field";

  constructor(
    public readonly field: string,
    context?: string
  ) {
    super(`Missing required field '${field}'${context ? ` (${context})` : ""}`);
    this.name = "MissingRequiredFieldError";
  }
}

export class InvalidArgumentError extends SandboxError {
  readonly code = "invalid-argument";

  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class LifecycleError extends SandboxError {
  readonly code = "lifecycle";

  constructor(message: string) {
    super(message);
    this.name = "LifecycleError";
  }
}

export function isSandboxError(e: unknown): e is SandboxError {
  return e instanceof SandboxError;
}

/**
 * Values thrown by script code come from another realm, so `instanceof Error`
 * is not reliable for them.
 */
export function describeThrown(e: unknown): { message: string; trace: string } {
  if (typeof e === "object" && e !== null) {
    const message = "message" in e && typeof e.message === "string" ? e.message : Object.prototype.toString.call(e);
    const trace = "stack" in e && typeof e.stack === "string" ? e.stack : message;
    return { message, trace };
  }
  return { message: String(e), trace: String(e) };
}
