import type { SandboxErrorCode } from "../core/errors";
import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | SandboxErrorCode
  | "internal-error"
  | `custom:${string}`;

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  /** Script stack trace, when the failure came from executing script code */
  trace?: string;
  cause?: Failure;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    context: opts?.context,
    trace: opts?.trace,
    cause: opts?.cause,
  };
}

export function wrapFailure(
  inner: Failure,
  message: string,
  context?: Record<string, unknown>
): Failure {
  return {
    ...inner,
    message,
    context: { ...inner.context, ...context },
    cause: inner,
  };
}
