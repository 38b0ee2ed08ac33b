// src/core/semantic/index.ts
// Semantic diagnostics exports

export {
  SemanticErrorHandler,
  connectionRoles,
  type ConnectionRoles,
  type SemanticErrorHandlerOptions,
} from "./errorHandler";
export {
  SEMANTIC_KINDS,
  DEFAULT_SEVERITY,
  KIND_CODES,
  isSemanticErrorKind,
  isSeverity,
  resolveSeverity,
  type SemanticErrorKind,
  type Severity,
  type SeverityTable,
  type SeverityOverrides,
} from "./severity";
