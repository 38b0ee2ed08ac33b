// src/outcome/index.ts
// Outcome, failure and diagnostic exports

export type { Span } from "./span";
export type { Diagnostic, DiagnosticSeverity } from "./diagnostic";
export { errorDiag, warnDiag } from "./diagnostic";
export type { DiagnosticCode } from "./codes";
export { DIAGNOSTIC_CODES, makeDiagnostic } from "./codes";
export type { Failure, FailureReason } from "./failure";
export { failure } from "./failure";
export type { Outcome, OutcomeMeta, Done, Fail } from "./outcome";
export { isDone, isFail } from "./outcome";
export { done, fail, syntaxFailed, semanticFailed, oscillating, notLoaded } from "./constructors";
export { match } from "./matchers";
