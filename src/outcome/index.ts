export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome";
export { isDone, isFail } from "./outcome";
export type { Failure, FailureReason } from "./failure";
export { failure, wrapFailure } from "./failure";
export type { Diagnostic, DiagnosticSeverity } from "./diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./codes";
export { done, fail, toFailure } from "./constructors";
export { match, mapOutcome, unwrap, unwrapOr } from "./matchers";
