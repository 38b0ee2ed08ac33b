// src/core/semantic/severity.ts
// Semantic error kinds and whether each one stops the build

import type { DiagnosticCode } from "../../outcome/codes";

export const SEMANTIC_KINDS = [
  "invalid-qualifier",
  "no-qualifier",
  "bad-device",
  "qualifier-present",
  "device-present",
  "input-to-input",
  "output-to-output",
  "input-connected",
  "port-absent",
  "device-absent",
  "not-output",
  "monitor-present",
] as const;

export type SemanticErrorKind = (typeof SEMANTIC_KINDS)[number];

export type Severity = "fatal" | "warning";

export type SeverityTable = Readonly<Record<SemanticErrorKind, Severity>>;

export type SeverityOverrides = Partial<Record<SemanticErrorKind, Severity>>;

export const DEFAULT_SEVERITY: SeverityTable = {
  "invalid-qualifier": "fatal",
  "no-qualifier": "fatal",
  "bad-device": "fatal",
  "qualifier-present": "fatal",
  "device-present": "fatal",
  "input-to-input": "fatal",
  "output-to-output": "fatal",
  "input-connected": "fatal",
  "port-absent": "fatal",
  "device-absent": "fatal",
  "not-output": "fatal",
  "monitor-present": "warning",
};

/** Diagnostic code each kind is reported under. Port-absent may also report E0114. */
export const KIND_CODES: Readonly<Record<SemanticErrorKind, DiagnosticCode>> = {
  "invalid-qualifier": "E0101",
  "no-qualifier": "E0102",
  "bad-device": "E0103",
  "qualifier-present": "E0104",
  "device-present": "E0105",
  "input-to-input": "E0110",
  "output-to-output": "E0111",
  "input-connected": "E0112",
  "port-absent": "E0113",
  "device-absent": "E0115",
  "not-output": "E0120",
  "monitor-present": "W0101",
};

export function isSemanticErrorKind(value: string): value is SemanticErrorKind {
  return SEMANTIC_KINDS.some((k) => k === value);
}

export function isSeverity(value: unknown): value is Severity {
  return value === "fatal" || value === "warning";
}

export function resolveSeverity(overrides: SeverityOverrides = {}): SeverityTable {
  return { ...DEFAULT_SEVERITY, ...overrides };
}
