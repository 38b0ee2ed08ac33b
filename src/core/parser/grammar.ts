// src/core/parser/grammar.ts
// Device keyword → shape table driving device parsing

import { isWaveform, MAX_INPUT_PINS, type Sym } from "../reader/symbol";

export type PropertyCode = "E0010" | "E0011" | "E0012" | "E0023";

export interface PropertyRule {
  readonly code: PropertyCode;
  /** Caret offset of the first violation, or null when `text` is valid. */
  violation(symbol: Sym, text: string): number | null;
}

export interface DeviceShape {
  readonly keyword: string;
  /** Null for devices declared by name alone. */
  readonly property: PropertyRule | null;
}

const FAN_IN: ReadonlySet<string> = new Set(
  Array.from({ length: MAX_INPUT_PINS }, (_, i) => String(i + 1))
);

export const POSITIVE_INTEGER: PropertyRule = {
  code: "E0010",
  violation: (symbol) => (symbol.category === "integer" ? null : 0),
};

export const BIT: PropertyRule = {
  code: "E0011",
  violation: (_symbol, text) => (text === "0" || text === "1" ? null : 0),
};

export const GATE_FAN_IN: PropertyRule = {
  code: "E0012",
  violation: (_symbol, text) => (FAN_IN.has(text) ? null : 0),
};

export const WAVEFORM: PropertyRule = {
  code: "E0023",
  violation: (_symbol, text) => {
    const check = isWaveform(text);
    return check.valid ? null : check.offset ?? 0;
  },
};

function shape(keyword: string, property: PropertyRule | null): [string, DeviceShape] {
  return [keyword, { keyword, property }];
}

export const DEVICE_SHAPES: ReadonlyMap<string, DeviceShape> = new Map([
  shape("CLOCK", POSITIVE_INTEGER),
  shape("RC", POSITIVE_INTEGER),
  shape("SWITCH", BIT),
  shape("AND", GATE_FAN_IN),
  shape("NAND", GATE_FAN_IN),
  shape("OR", GATE_FAN_IN),
  shape("NOR", GATE_FAN_IN),
  shape("XOR", null),
  shape("DTYPE", null),
  shape("SIGGEN", WAVEFORM),
]);
