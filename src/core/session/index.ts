// src/core/session/index.ts
// Session exports

export {
  CircuitSession,
  type CircuitBackend,
  type BackendFactory,
  type LoadResult,
  type RunReport,
} from "./circuitSession";
