import type { DiagnosticMode, DiagnosticSink } from "../ports/sink";

/**
 * Direct mode: each block goes straight to stdout.
 */
export class ConsoleSink implements DiagnosticSink {
  write(block: string): void {
    console.log(block);
  }

  contents(): string {
    return "";
  }
}

/**
 * Embedded mode: blocks are kept for bulk retrieval by a host.
 */
export class BufferSink implements DiagnosticSink {
  private readonly blocks: string[] = [];

  write(block: string): void {
    this.blocks.push(block);
  }

  contents(): string {
    return this.blocks.map((b) => `${b}\n`).join("");
  }

  clear(): void {
    this.blocks.length = 0;
  }
}

export function createSink(mode: DiagnosticMode): DiagnosticSink {
  return mode === "buffered" ? new BufferSink() : new ConsoleSink();
}
