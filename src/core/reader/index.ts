// src/core/reader/index.ts
// Reader exports

export { NameTable, type NameId } from "./names";
export {
  classify,
  indexNotName,
  isName,
  isNumeric,
  isWaveform,
  makeSym,
  INPUT_PINS,
  OUTPUT_PINS,
  KEYWORDS,
  DTYPE_INPUT_PINS,
  MAX_INPUT_PINS,
  NAME_VIOLATIONS,
  type Sym,
  type SymbolCategory,
  type NameViolation,
  type NameViolationCode,
  type WaveformCheck,
} from "./symbol";
export { Scanner, type ScannerOptions } from "./scanner";
