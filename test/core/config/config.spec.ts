// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  parseSimpleYaml,
  severityOverrides,
  validateConfig,
  DEFAULT_CONFIG,
} from "../../../src/core/config/config";
import { SEMANTIC_KINDS, type Severity } from "../../../src/core/semantic/severity";

const ENV_KEYS = ["CIRCUITDEF_DIAGNOSTICS_MODE", "CIRCUITDEF_LINE_PREFIX", "CIRCUITDEF_SUMMARY", "CIRCUITDEF_TRACE"];

describe("configFromEnv", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    // Create a fresh copy
    process.env = { ...originalEnv };
    for (const key of ENV_KEYS) delete process.env[key];
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("returns defaults when no env vars set", () => {
    expect(configFromEnv()).toEqual(DEFAULT_CONFIG);
  });

  it("reads mode from CIRCUITDEF_DIAGNOSTICS_MODE", () => {
    process.env.CIRCUITDEF_DIAGNOSTICS_MODE = "buffered";
    expect(configFromEnv().diagnostics.mode).toBe("buffered");
  });

  it("ignores unknown modes", () => {
    process.env.CIRCUITDEF_DIAGNOSTICS_MODE = "loud";
    expect(configFromEnv().diagnostics.mode).toBe("direct");
  });

  it("reads flags", () => {
    process.env.CIRCUITDEF_LINE_PREFIX = "no";
    process.env.CIRCUITDEF_SUMMARY = "FALSE";
    process.env.CIRCUITDEF_TRACE = "1";
    const config = configFromEnv();
    expect(config.diagnostics.linePrefix).toBe(false);
    expect(config.diagnostics.summary).toBe(false);
    expect(config.trace.enabled).toBe(true);
  });

  it("honours a custom prefix", () => {
    process.env.LOGSIM_TRACE = "yes";
    expect(configFromEnv("LOGSIM").trace.enabled).toBe(true);
  });
});

describe("configFromObject", () => {
  it("parses basic config object", () => {
    const config = configFromObject({
      diagnostics: { mode: "buffered", linePrefix: false, summary: false },
      semantic: { severity: { "monitor-present": "fatal" } },
      trace: { enabled: true },
    });
    expect(config).toEqual({
      diagnostics: { mode: "buffered", linePrefix: false, summary: false },
      semantic: { severity: { "monitor-present": "fatal" } },
      trace: { enabled: true },
    });
  });

  it("handles snake_case keys", () => {
    const config = configFromObject({ diagnostics: { line_prefix: false } });
    expect(config.diagnostics.linePrefix).toBe(false);
  });

  it("uses defaults for missing fields", () => {
    expect(configFromObject({})).toEqual(DEFAULT_CONFIG);
  });

  it("rejects unknown modes", () => {
    expect(() => configFromObject({ diagnostics: { mode: "loud" } })).toThrow("Unsupported diagnostics mode: loud");
  });

  it("rejects unknown severities", () => {
    expect(() => configFromObject({ semantic: { severity: { "port-absent": "error" } } })).toThrow(
      "Unsupported severity for port-absent: error"
    );
  });
});

describe("mergeConfigs", () => {
  it("later configs override earlier ones", () => {
    const config = mergeConfigs({ diagnostics: { mode: "buffered" } }, { diagnostics: { mode: "direct" } });
    expect(config.diagnostics.mode).toBe("direct");
    expect(config.diagnostics.linePrefix).toBe(true);
  });

  it("merges severities per kind", () => {
    const config = mergeConfigs(
      { semantic: { severity: { "device-present": "warning" } } },
      { semantic: { severity: { "monitor-present": "fatal" } } }
    );
    expect(config.semantic.severity).toEqual({ "device-present": "warning", "monitor-present": "fatal" });
  });

  it("does not alias the defaults", () => {
    const config = mergeConfigs();
    config.diagnostics.mode = "buffered";
    expect(DEFAULT_CONFIG.diagnostics.mode).toBe("direct");
  });
});

describe("config files", () => {
  const originalEnv = process.env;
  let dir: string;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of ENV_KEYS) delete process.env[key];
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "circuitdef-config-"));
  });

  afterEach(() => {
    process.env = originalEnv;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const yaml = [
    "# session defaults",
    "diagnostics:",
    "  mode: buffered",
    "  line_prefix: false",
    "semantic:",
    "  severity:",
    "    monitor-present: fatal",
  ].join("\n");

  it("reads YAML files", () => {
    const file = path.join(dir, "settings.yaml");
    fs.writeFileSync(file, yaml);
    const config = configFromFile(file);
    expect(config.diagnostics).toEqual({ mode: "buffered", linePrefix: false, summary: true });
    expect(config.semantic.severity).toEqual({ "monitor-present": "fatal" });
  });

  it("reads JSON files", () => {
    const file = path.join(dir, "settings.json");
    fs.writeFileSync(file, JSON.stringify({ trace: { enabled: true } }));
    expect(configFromFile(file).trace.enabled).toBe(true);
  });

  it("rejects missing files and unknown formats", () => {
    const toml = path.join(dir, "settings.toml");
    fs.writeFileSync(toml, "");
    expect(() => configFromFile(toml)).toThrow("Unsupported config file format: .toml");
    expect(() => configFromFile(path.join(dir, "none.json"))).toThrow("Config file not found");
  });

  it("finds the default file in the working directory", () => {
    fs.writeFileSync(path.join(dir, "circuitdef.config.yaml"), yaml);
    expect(loadConfig({ cwd: dir }).diagnostics.mode).toBe("buffered");
  });

  it("layers env, file and explicit overrides", () => {
    process.env.CIRCUITDEF_TRACE = "true";
    process.env.CIRCUITDEF_SUMMARY = "false";
    fs.writeFileSync(path.join(dir, "circuitdef.config.yaml"), yaml);
    const config = loadConfig({ cwd: dir, overrides: { diagnostics: { mode: "direct" } } });
    expect(config.diagnostics).toEqual({ mode: "direct", linePrefix: false, summary: false });
    expect(config.trace.enabled).toBe(true);
  });

  it("uses an explicit file over the default one", () => {
    fs.writeFileSync(path.join(dir, "circuitdef.config.yaml"), yaml);
    const explicit = path.join(dir, "other.json");
    fs.writeFileSync(explicit, JSON.stringify({ diagnostics: { summary: false } }));
    const config = loadConfig({ cwd: dir, configFile: explicit });
    expect(config.diagnostics).toEqual({ mode: "direct", linePrefix: true, summary: false });
  });
});

describe("parseSimpleYaml", () => {
  it("parses scalars and nesting", () => {
    expect(
      parseSimpleYaml("a:\n  b: 12\n  c: 'x y'\n  d: null\ne: true\n# skipped\nf: plain")
    ).toEqual({ a: { b: 12, c: "x y", d: null }, e: true, f: "plain" });
  });
});

describe("severityOverrides", () => {
  it("keeps known kinds only", () => {
    const config = mergeConfigs({ semantic: { severity: { "port-absent": "warning", bogus: "fatal" } } });
    expect(severityOverrides(config)).toEqual({ "port-absent": "warning" });
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("errors on unknown semantic kinds", () => {
    const result = validateConfig(mergeConfigs({ semantic: { severity: { bogus: "fatal" } } }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      `Unknown semantic error kind: bogus. Expected one of ${SEMANTIC_KINDS.join(", ")}`,
    ]);
  });

  it("warns when no semantic error is fatal", () => {
    const severity: Record<string, Severity> = {};
    for (const kind of SEMANTIC_KINDS) severity[kind] = "warning";
    const result = validateConfig(mergeConfigs({ semantic: { severity } }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      "Every semantic error kind is a warning; semantic errors will never stop a build",
    ]);
  });

  it("warns when tracing in buffered mode", () => {
    const result = validateConfig(mergeConfigs({ diagnostics: { mode: "buffered" }, trace: { enabled: true } }));
    expect(result.warnings).toEqual(["Tracing writes to the console even in buffered mode"]);
  });
});
