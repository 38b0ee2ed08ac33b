// src/core/config/index.ts
// Configuration system exports

export {
  type DiagnosticsConfig,
  type SemanticConfig,
  type TraceConfig,
  type CircuitConfig,
  type ConfigOverrides,
  type ConfigValidation,
  DEFAULT_DIAGNOSTICS_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  overridesFromEnv,
  overridesFromObject,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  severityOverrides,
  parseSimpleYaml,
  validateConfig,
} from "./config";
