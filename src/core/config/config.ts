// src/core/config/config.ts
// Configuration for diagnostics rendering, semantic severities and tracing

import * as fs from "fs";
import * as path from "path";
import type { DiagnosticMode } from "../../ports/sink";
import {
  isSemanticErrorKind,
  isSeverity,
  SEMANTIC_KINDS,
  type Severity,
  type SeverityOverrides,
} from "../semantic/severity";

// =========================================================================
// Configuration Types
// =========================================================================

export type DiagnosticsConfig = {
  /** direct: print as diagnostics occur; buffered: keep them for the host */
  mode: DiagnosticMode;
  /** Prefix echoed source lines with `Line N: ` */
  linePrefix: boolean;
  /** Print the "N syntax errors detected" line on rejection */
  summary: boolean;
};

export type SemanticConfig = {
  /** Per-kind severity overrides, keyed by semantic error kind */
  severity: Readonly<Record<string, Severity>>;
};

export type TraceConfig = {
  /** Log build-phase collaborator calls through console.debug */
  enabled: boolean;
};

export type CircuitConfig = {
  diagnostics: DiagnosticsConfig;
  semantic: SemanticConfig;
  trace: TraceConfig;
};

export type ConfigOverrides = {
  diagnostics?: Partial<DiagnosticsConfig>;
  semantic?: Partial<SemanticConfig>;
  trace?: Partial<TraceConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_DIAGNOSTICS_CONFIG: DiagnosticsConfig = {
  mode: "direct",
  linePrefix: true,
  summary: true,
};

export const DEFAULT_CONFIG: CircuitConfig = {
  diagnostics: DEFAULT_DIAGNOSTICS_CONFIG,
  semantic: { severity: {} },
  trace: { enabled: false },
};

export const DEFAULT_CONFIG_FILES = ["circuitdef.config.json", "circuitdef.config.yaml", "circuitdef.config.yml"];

// =========================================================================
// Configuration Loading
// =========================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMode(value: unknown): value is DiagnosticMode {
  return value === "direct" || value === "buffered";
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const v = value.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "no") return false;
  return undefined;
}

function pick<T>(data: Record<string, unknown>, keys: string[], guard: (v: unknown) => v is T): T | undefined {
  for (const key of keys) {
    const value = data[key];
    if (guard(value)) return value;
  }
  return undefined;
}

const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";

function diagnosticsOverrides(
  mode: DiagnosticMode | undefined,
  linePrefix: boolean | undefined,
  summary: boolean | undefined
): Partial<DiagnosticsConfig> {
  const out: Partial<DiagnosticsConfig> = {};
  if (mode !== undefined) out.mode = mode;
  if (linePrefix !== undefined) out.linePrefix = linePrefix;
  if (summary !== undefined) out.summary = summary;
  return out;
}

function traceOverrides(enabled: boolean | undefined): Partial<TraceConfig> {
  return enabled === undefined ? {} : { enabled };
}

/**
 * Overrides set through environment variables. Unparseable values are ignored.
 */
export function overridesFromEnv(prefix = "CIRCUITDEF"): ConfigOverrides {
  const mode = process.env[`${prefix}_DIAGNOSTICS_MODE`];
  const linePrefix = parseFlag(process.env[`${prefix}_LINE_PREFIX`]);
  const summary = parseFlag(process.env[`${prefix}_SUMMARY`]);
  const trace = parseFlag(process.env[`${prefix}_TRACE`]);

  return {
    diagnostics: diagnosticsOverrides(isMode(mode) ? mode : undefined, linePrefix, summary),
    trace: traceOverrides(trace),
  };
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "CIRCUITDEF"): CircuitConfig {
  return mergeConfigs(overridesFromEnv(prefix));
}

/**
 * Overrides from a plain object (e.g., parsed JSON/YAML). Accepts camelCase
 * and snake_case keys.
 */
export function overridesFromObject(data: Record<string, unknown>): ConfigOverrides {
  const diagnostics = isRecord(data.diagnostics) ? data.diagnostics : {};
  const semantic = isRecord(data.semantic) ? data.semantic : {};
  const trace = isRecord(data.trace) ? data.trace : {};

  const rawMode = diagnostics.mode;
  if (rawMode !== undefined && !isMode(rawMode)) {
    throw new Error(`Unsupported diagnostics mode: ${String(rawMode)}`);
  }
  const mode = isMode(rawMode) ? rawMode : undefined;

  const severity: Record<string, Severity> = {};
  if (isRecord(semantic.severity)) {
    for (const [kind, value] of Object.entries(semantic.severity)) {
      if (!isSeverity(value)) {
        throw new Error(`Unsupported severity for ${kind}: ${String(value)}`);
      }
      severity[kind] = value;
    }
  }

  return {
    diagnostics: diagnosticsOverrides(
      mode,
      pick(diagnostics, ["linePrefix", "line_prefix"], isBoolean),
      pick(diagnostics, ["summary"], isBoolean)
    ),
    semantic: { severity },
    trace: traceOverrides(pick(trace, ["enabled"], isBoolean)),
  };
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 */
export function configFromObject(data: Record<string, unknown>): CircuitConfig {
  return mergeConfigs(overridesFromObject(data));
}

function readConfigFile(filePath: string): ConfigOverrides {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;
  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must contain an object: ${filePath}`);
  }
  return overridesFromObject(data);
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): CircuitConfig {
  return mergeConfigs(readConfigFile(filePath));
}

/**
 * Merge onto the defaults, later configs overriding earlier ones.
 */
export function mergeConfigs(...configs: ConfigOverrides[]): CircuitConfig {
  const result: CircuitConfig = {
    diagnostics: { ...DEFAULT_CONFIG.diagnostics },
    semantic: { severity: { ...DEFAULT_CONFIG.semantic.severity } },
    trace: { ...DEFAULT_CONFIG.trace },
  };

  for (const cfg of configs) {
    if (cfg.diagnostics) {
      result.diagnostics = { ...result.diagnostics, ...cfg.diagnostics };
    }
    if (cfg.semantic?.severity) {
      result.semantic = { severity: { ...result.semantic.severity, ...cfg.semantic.severity } };
    }
    if (cfg.trace) {
      result.trace = { ...result.trace, ...cfg.trace };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  cwd?: string;
  overrides?: ConfigOverrides;
}): CircuitConfig {
  const layers: ConfigOverrides[] = [overridesFromEnv()];

  if (options?.configFile) {
    layers.push(readConfigFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        layers.push(readConfigFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

/**
 * Severity overrides for known kinds only.
 */
export function severityOverrides(config: CircuitConfig): SeverityOverrides {
  const out: SeverityOverrides = {};
  for (const [kind, severity] of Object.entries(config.semantic.severity)) {
    if (isSemanticErrorKind(kind)) out[kind] = severity;
  }
  return out;
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);
    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }
    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value === "true") {
      parent[key] = true;
    } else if (value === "false") {
      parent[key] = false;
    } else if (value === "null") {
      parent[key] = null;
    } else if (/^-?\d+$/.test(value)) {
      parent[key] = parseInt(value, 10);
    } else if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      parent[key] = value.slice(1, -1);
    } else {
      parent[key] = value;
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: CircuitConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isMode(config.diagnostics.mode)) {
    errors.push(`Unknown diagnostics mode: ${String(config.diagnostics.mode)}`);
  }

  for (const kind of Object.keys(config.semantic.severity)) {
    if (!isSemanticErrorKind(kind)) {
      errors.push(`Unknown semantic error kind: ${kind}. Expected one of ${SEMANTIC_KINDS.join(", ")}`);
    }
  }

  const severity = severityOverrides(config);
  if (SEMANTIC_KINDS.every((kind) => severity[kind] === "warning")) {
    warnings.push("Every semantic error kind is a warning; semantic errors will never stop a build");
  }

  if (config.diagnostics.mode === "buffered" && config.trace.enabled) {
    warnings.push("Tracing writes to the console even in buffered mode");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
