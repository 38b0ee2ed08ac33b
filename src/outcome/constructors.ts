import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";
import type { Diagnostic } from "./diagnostic";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

/**
 * Parse rejected. `errorCount` is the number of syntax errors recorded,
 * which may exceed `diagnostics.length` when a sink dropped some.
 */
export function syntaxFailed(errorCount: number, diagnostics: Diagnostic[], meta: OutcomeMeta = {}): Fail {
  const noun = errorCount === 1 ? "error" : "errors";
  return fail(
    failure("syntax-error", `${errorCount} syntax ${noun} detected in the file`, {
      diagnostics,
      context: { errorCount },
      recoverable: true,
    }),
    meta
  );
}

export function semanticFailed(diagnostics: Diagnostic[], meta: OutcomeMeta = {}): Fail {
  const first = diagnostics.find((d) => d.severity === "error");
  return fail(
    failure("semantic-error", first ? first.message : "Semantic error in the circuit definition", {
      diagnostics,
      recoverable: true,
    }),
    meta
  );
}

export function oscillating(cycle: number, meta: OutcomeMeta = {}): Fail {
  const diag = makeDiagnostic("E0201", { cycle });
  return fail(
    failure("oscillation", diag.message, {
      diagnostics: [diag],
      recoverable: true,
    }),
    { ...meta, cycle }
  );
}

export function notLoaded(meta: OutcomeMeta = {}): Fail {
  return fail(failure("not-loaded", "No circuit definition has been loaded"), meta);
}
