// src/core/reader/scanner.ts
// Turns a definition file into a cached, replayable sequence of symbols

import * as fs from "fs";
import type { DiagnosticSink } from "../../ports/sink";
import type { Diagnostic } from "../../outcome/diagnostic";
import { makeDiagnostic } from "../../outcome/codes";
import type { NameTable } from "./names";
import { classify, makeSym, type Sym } from "./symbol";

export interface ScannerOptions {
  /** Where rendered diagnostics go. */
  sink: DiagnosticSink;
  /** Prefix echoed source lines with `Line N: `. Defaults to true. */
  linePrefix?: boolean;
  /** Scan this text instead of reading the file at `path`. */
  text?: string;
}

const WHITESPACE = /\s/;
const DIGIT = /[0-9]/;
const LETTER = /[A-Za-z]/;
const WORD_END = /[\s;:,.]/;

/**
 * Tokenizes once at construction. `getSymbol` walks the cached symbols with a
 * cursor that starts before the first symbol; running past the end yields
 * null once and rewinds, so the next call starts over.
 */
export class Scanner {
  readonly path: string;
  private readonly names: NameTable;
  private readonly sink: DiagnosticSink;
  private readonly linePrefix: boolean;
  private readonly symbols: Sym[] = [];
  private readonly lines: string[];
  private readonly scanWarnings: Diagnostic[] = [];
  private cursor = -1;

  constructor(path: string, names: NameTable, options: ScannerOptions) {
    this.path = path;
    this.names = names;
    this.sink = options.sink;
    this.linePrefix = options.linePrefix ?? true;

    const text = options.text ?? fs.readFileSync(path, "utf8");
    this.lines = text.split("\n").map((l) => (l.endsWith("\r") ? l.slice(0, -1) : l));
    this.tokenize(text);
  }

  static fromText(text: string, names: NameTable, options: Omit<ScannerOptions, "text"> & { path?: string }): Scanner {
    return new Scanner(options.path ?? "<memory>", names, { ...options, text });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Cursor
  // ═══════════════════════════════════════════════════════════════════════════

  getSymbol(): Sym | null {
    this.cursor++;
    if (this.cursor >= this.symbols.length) {
      this.cursor = -1;
      return null;
    }
    return this.symbols[this.cursor];
  }

  /** The symbol the next `getSymbol` call returns, without moving. */
  peek(): Sym | null {
    return this.symbolAt(this.cursor + 1);
  }

  /** The symbol before the current one. */
  previous(): Sym | null {
    return this.symbolAt(this.cursor - 1);
  }

  symbolAt(index: number): Sym | null {
    if (index < 0 || index >= this.symbols.length) return null;
    return this.symbols[index];
  }

  lastSymbol(): Sym | null {
    return this.symbolAt(this.symbols.length - 1);
  }

  getAllSymbols(): Sym[] {
    return [...this.symbols];
  }

  resetCursor(): void {
    this.cursor = -1;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Diagnostics
  // ═══════════════════════════════════════════════════════════════════════════

  /** Source line `n` (1-based), or null outside the file. */
  getLine(n: number): string | null {
    if (!Number.isInteger(n) || n < 1 || n > this.lines.length) return null;
    return this.lines[n - 1];
  }

  /**
   * Render `message`, the symbol's source line, and a caret under
   * `symbol.column + arrowOffset`. False when nothing could be rendered.
   */
  printError(symbol: Sym | null, arrowOffset: number, message: string): boolean {
    if (!symbol) return false;
    return this.renderAt(symbol.line, symbol.column + arrowOffset, message);
  }

  /** Write a line that points at no symbol, such as a summary. */
  printMessage(message: string): void {
    this.sink.write(message);
  }

  getErrorMessages(): string {
    return this.sink.contents();
  }

  warnings(): Diagnostic[] {
    return [...this.scanWarnings];
  }

  private renderAt(lineNo: number, column: number, message: string): boolean {
    const source = this.getLine(lineNo);
    if (source === null) return false;
    const prefix = this.linePrefix ? `Line ${lineNo}: ` : "";
    const caret = `${" ".repeat(Math.max(0, prefix.length + column - 1))}^`;
    this.sink.write(`${message}\n${prefix}${source}\n${caret}`);
    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Tokenizer
  // ═══════════════════════════════════════════════════════════════════════════

  private tokenize(text: string): void {
    let i = 0;
    let line = 1;
    let column = 1;

    const step = (): void => {
      if (text.charAt(i) === "\n") {
        line++;
        column = 1;
      } else {
        column++;
      }
      i++;
    };

    while (i < text.length) {
      const c = text.charAt(i);

      if (WHITESPACE.test(c)) { step(); continue; }

      if (c === "#") {
        while (i < text.length && text.charAt(i) !== "\n") step();
        continue;
      }

      if (c === "!") {
        const openLine = line;
        const openColumn = column;
        step();
        while (i < text.length && text.charAt(i) !== "!") step();
        if (i >= text.length) {
          this.unterminatedComment(openLine, openColumn);
          break;
        }
        step();
        continue;
      }

      const start = i;
      const startLine = line;
      const startColumn = column;
      if (DIGIT.test(c)) {
        while (i < text.length && DIGIT.test(text.charAt(i))) step();
      } else if (LETTER.test(c)) {
        while (i < text.length && !WORD_END.test(text.charAt(i))) step();
      } else {
        step();
      }

      const word = text.slice(start, i);
      this.symbols.push(makeSym(this.names.intern(word), classify(word), startLine, startColumn));
    }
  }

  private unterminatedComment(line: number, column: number): void {
    const diag = makeDiagnostic("W0001", undefined, { file: this.path, startLine: line, startCol: column });
    this.scanWarnings.push(diag);
    this.renderAt(line, column, `Warning: ${diag.message}`);
  }
}
