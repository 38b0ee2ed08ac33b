import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "syntax-error"
  | "semantic-error"
  | "oscillation"
  | "source-unreadable"
  | "not-loaded"
  | "not-started"
  | "invalid-argument";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  recoverable: boolean;
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
    recoverable: opts?.recoverable ?? false,
    context: opts?.context,
  };
}
