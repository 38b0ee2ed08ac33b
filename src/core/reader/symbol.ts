// src/core/reader/symbol.ts
// Scanned symbols and the pure classification helpers behind them

import type { NameId } from "./names";

export type SymbolCategory =
  | "keyword"
  | "name"
  | "string"
  | "number"
  | "integer"
  | "input_pin"
  | "output_pin"
  | "semicolon"
  | "colon"
  | "comma"
  | "dot"
  | "arrow"
  | "other";

/** One scanned symbol. Line and column are 1-based. */
export interface Sym {
  readonly id: NameId;
  readonly category: SymbolCategory;
  readonly line: number;
  readonly column: number;
}

export const MAX_INPUT_PINS = 16;

export const KEYWORDS: ReadonlySet<string> = new Set([
  "DEVICES", "CONNECT", "MONITOR", "END",
  "AND", "NAND", "OR", "NOR", "DTYPE", "XOR", "SWITCH", "CLOCK", "RC", "SIGGEN",
]);

export const DTYPE_INPUT_PINS: ReadonlySet<string> = new Set(["DATA", "SET", "CLEAR", "CLK"]);

export const INPUT_PINS: ReadonlySet<string> = new Set([
  ...Array.from({ length: MAX_INPUT_PINS }, (_, i) => `I${i + 1}`),
  ...DTYPE_INPUT_PINS,
]);

export const OUTPUT_PINS: ReadonlySet<string> = new Set(["Q", "QBAR"]);

const PUNCTUATION: ReadonlyMap<string, SymbolCategory> = new Map<string, SymbolCategory>([
  [";", "semicolon"],
  [":", "colon"],
  [",", "comma"],
  [".", "dot"],
  [">", "arrow"],
]);

export function makeSym(id: NameId, category: SymbolCategory, line: number, column: number): Sym {
  return Object.freeze({ id, category, line, column });
}

export function isNumeric(text: string): boolean {
  return /^[0-9]+$/.test(text);
}

export function isAlnumText(text: string): boolean {
  return /^[A-Za-z0-9_]+$/.test(text);
}

/** Lowercase letter first, then lowercase letters, digits and underscores. */
export function isName(text: string): boolean {
  return /^[a-z][a-z0-9_]*$/.test(text);
}

export function classify(text: string): SymbolCategory {
  if (INPUT_PINS.has(text)) return "input_pin";
  if (OUTPUT_PINS.has(text)) return "output_pin";
  if (KEYWORDS.has(text)) return "keyword";
  if (isNumeric(text)) return text.startsWith("0") ? "number" : "integer";
  if (isAlnumText(text)) return isName(text) ? "name" : "string";
  return PUNCTUATION.get(text) ?? "other";
}

// ═══════════════════════════════════════════════════════════════════════════
// Validation helpers
// ═══════════════════════════════════════════════════════════════════════════

/**
 * 1: first character is not a lowercase letter,
 * 2: a character is not a letter, digit or underscore,
 * 3: a character is not lowercase.
 */
export type NameViolationCode = 1 | 2 | 3;

export interface NameViolation {
  offset: number;
  subcode: NameViolationCode;
}

export const NAME_VIOLATIONS: Readonly<Record<NameViolationCode, string>> = {
  1: "first character is not a lowercase letter",
  2: "character is not a letter, digit or underscore",
  3: "character is not lowercase",
};

/** First position where `text` breaks the name rule, or null for a valid name. */
export function indexNotName(text: string): NameViolation | null {
  if (!/^[a-z]$/.test(text.charAt(0))) return { offset: 0, subcode: 1 };
  for (let i = 1; i < text.length; i++) {
    const c = text.charAt(i);
    if (!/[A-Za-z0-9_]/.test(c)) return { offset: i, subcode: 2 };
    if (/[A-Z]/.test(c)) return { offset: i, subcode: 3 };
  }
  return null;
}

export interface WaveformCheck {
  valid: boolean;
  /** Offset of the first character that is not `0` or `1`; null when valid. */
  offset: number | null;
}

export function isWaveform(text: string | null): WaveformCheck {
  if (!text) return { valid: false, offset: 0 };
  for (let i = 0; i < text.length; i++) {
    const c = text.charAt(i);
    if (c !== "0" && c !== "1") return { valid: false, offset: i };
  }
  return { valid: true, offset: null };
}
