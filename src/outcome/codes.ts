import type { Span } from "./span";
import { errorDiag, warnDiag, type Diagnostic, type DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: "Syntax" | "Semantic" | "Scanner" | "Runtime";
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "File should start with keyword 'DEVICES'" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "';' after the last device should be followed by keyword 'CONNECT'" },
  E0003: { code: "E0003", severity: "error", category: "Syntax", template: "';' after the last connection should be followed by keyword 'MONITOR'" },
  E0004: { code: "E0004", severity: "error", category: "Syntax", template: "';' after the last monitor should be followed by keyword 'END'" },
  E0005: { code: "E0005", severity: "error", category: "Syntax", template: "There should be at least one device" },
  E0006: { code: "E0006", severity: "error", category: "Syntax", template: "A CLOCK/RC/SWITCH/AND/NAND/OR/NOR/SIGGEN device needs a type, a name and a property. Check for missing or misplaced punctuation" },
  E0007: { code: "E0007", severity: "error", category: "Syntax", template: "A XOR/DTYPE device needs a type and a name. Check for missing or misplaced punctuation" },
  E0008: { code: "E0008", severity: "error", category: "Syntax", template: "A device should start with its device type keyword" },
  E0009: { code: "E0009", severity: "error", category: "Syntax", template: "Device name should be a lowercase alphanumeric string (including '_'): {detail}" },
  E0010: { code: "E0010", severity: "error", category: "Syntax", template: "Clock period/RC time constant should be a positive integer" },
  E0011: { code: "E0011", severity: "error", category: "Syntax", template: "Switch state should be either 0 or 1" },
  E0012: { code: "E0012", severity: "error", category: "Syntax", template: "Number of inputs for an AND/NAND/OR/NOR device should be between 1 and 16" },
  E0013: { code: "E0013", severity: "error", category: "Syntax", template: "Connections should be separated by ',' and ended by ';'. Check for extra parameters in a connection" },
  E0014: { code: "E0014", severity: "error", category: "Syntax", template: "Output pins can only be Q or QBAR" },
  E0015: { code: "E0015", severity: "error", category: "Syntax", template: "The 2nd parameter of a connection should be '>'" },
  E0016: { code: "E0016", severity: "error", category: "Syntax", template: "The 3rd parameter of a connection must be a device name followed by '.input_pin'" },
  E0017: { code: "E0017", severity: "error", category: "Syntax", template: "The input pin should be one of: I1, I2, ..., I16, DATA, CLK, SET, CLEAR" },
  E0018: { code: "E0018", severity: "error", category: "Syntax", template: "Monitors should be separated by ',' and ended by ';'. Check for extra parameters in a monitor" },
  E0019: { code: "E0019", severity: "error", category: "Syntax", template: "Devices should be separated by ',' and ended by ';'. Check for extra parameters in a device" },
  E0020: { code: "E0020", severity: "error", category: "Syntax", template: "DEVICES, CONNECT and MONITOR should be followed by ':'" },
  E0021: { code: "E0021", severity: "error", category: "Syntax", template: "'END' should be followed by ';'" },
  E0022: { code: "E0022", severity: "error", category: "Syntax", template: "Premature end of file. Check for missing sections" },
  E0023: { code: "E0023", severity: "error", category: "Syntax", template: "SIGGEN waveform should only consist of 0s and 1s" },

  E0101: { code: "E0101", severity: "error", category: "Semantic", template: "Invalid property for device {device}" },
  E0102: { code: "E0102", severity: "error", category: "Semantic", template: "Device {device} requires a property" },
  E0103: { code: "E0103", severity: "error", category: "Semantic", template: "Unknown device type {kind}" },
  E0104: { code: "E0104", severity: "error", category: "Semantic", template: "Device {device} does not take a property" },
  E0105: { code: "E0105", severity: "error", category: "Semantic", template: "Device names are not unique. {device} is already the name of a device" },
  E0110: { code: "E0110", severity: "error", category: "Semantic", template: "Input {first} is connected to input {second}. Connections must be from outputs to inputs." },
  E0111: { code: "E0111", severity: "error", category: "Semantic", template: "Output {first} is connected to output {second}. Connections must be from outputs to inputs." },
  E0112: { code: "E0112", severity: "error", category: "Semantic", template: "Signal {driver} is already connected to the input pin {input}. Only one signal must be connected to an input." },
  E0113: { code: "E0113", severity: "error", category: "Semantic", template: "Port {port} is not defined for device {device}" },
  E0114: { code: "E0114", severity: "error", category: "Semantic", template: "Port is missing for device {device}" },
  E0115: { code: "E0115", severity: "error", category: "Semantic", template: "Device {device} is not defined" },
  E0116: { code: "E0116", severity: "error", category: "Semantic", template: "The following input pins are not connected to a device: {pins}" },
  E0120: { code: "E0120", severity: "error", category: "Semantic", template: "This is not an output. Only outputs can be monitored." },
  W0101: { code: "W0101", severity: "warning", category: "Semantic", template: "Monitor exists at this output already." },

  W0001: { code: "W0001", severity: "warning", category: "Scanner", template: "Unterminated multi-line comment. The rest of the file is ignored" },

  E0201: { code: "E0201", severity: "error", category: "Runtime", template: "Network oscillating at cycle {cycle}" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];
  if (!def) {
    throw new Error(`Unknown diagnostic code: ${String(code)}`);
  }

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  const make = def.severity === "error" ? errorDiag : warnDiag;
  return make(def.code, message, { span, data: params ? { ...params } : undefined });
}
