// src/index.ts
// circuitdef - Public API
//
// Compiler front end for circuit definition files, plus a headless session
// host for tools that drive a simulator through the collaborator ports.

// ═══════════════════════════════════════════════════════════════════════════════
// COMPILE & SESSION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  compileCircuit,
  failureMessages,
  type CompileInput,
  type CompileReport,
  type CircuitSource,
} from "./core/pipeline/compileCircuit";
export * from "./core/session";

// ═══════════════════════════════════════════════════════════════════════════════
// READER
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/reader";

// ═══════════════════════════════════════════════════════════════════════════════
// PARSER & SEMANTIC DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/parser";
export * from "./core/semantic";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS & ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./ports";
export { ConsoleSink, BufferSink, createSink } from "./adapters/sinks";
export {
  loggingDevices,
  loggingNetwork,
  loggingMonitors,
  consoleTraceSink,
  memoryTraceSink,
  type MemoryTraceSink,
} from "./adapters/logging";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
