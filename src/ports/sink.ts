/** Direct output to stdout, or buffered for a host to collect. */
export type DiagnosticMode = "direct" | "buffered";

/**
 * Diagnostic sink port.
 * Receives rendered diagnostic blocks (message, source line, caret line).
 */
export interface DiagnosticSink {
  /**
   * Write one block. The sink terminates it with a newline.
   */
  write(block: string): void;

  /**
   * Everything written so far, for sinks that keep it; "" otherwise.
   */
  contents(): string;
}
