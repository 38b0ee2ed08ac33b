// src/core/parser/parser.ts
// Recursive-descent parser for definition files, with per-item error recovery,
// followed by the build pass that drives the collaborator ports

import type { Diagnostic } from "../../outcome/diagnostic";
import { makeDiagnostic, type DiagnosticCode } from "../../outcome/codes";
import type { Outcome } from "../../outcome/outcome";
import { isFail } from "../../outcome/outcome";
import { done, syntaxFailed } from "../../outcome/constructors";
import type { DevicesPort } from "../../ports/devices";
import type { NetworkPort } from "../../ports/network";
import type { MonitorsPort } from "../../ports/monitors";
import type { TraceSink } from "../../ports/types";
import type { NameTable } from "../reader/names";
import type { Scanner } from "../reader/scanner";
import { indexNotName, NAME_VIOLATIONS, type NameViolation, type Sym } from "../reader/symbol";
import { SemanticErrorHandler, connectionRoles } from "../semantic/errorHandler";
import type { SeverityOverrides } from "../semantic/severity";
import { DEVICE_SHAPES } from "./grammar";
import type { ItemDescriptor, ItemSlot, NetworkDescription, SectionName } from "./types";

export interface ParserOptions {
  severity?: SeverityOverrides;
  trace?: TraceSink;
  /** Write the "N syntax errors detected" line when a file is rejected. */
  summary?: boolean;
}

/** Thrown by `advance` when the symbols run out; caught in `parseFile`. */
class EndOfInput extends Error {
  constructor() {
    super("premature end of input");
    this.name = "EndOfInput";
  }
}

interface ListRule {
  /** Keyword that opens the following section. */
  next: "CONNECT" | "MONITOR" | "END";
  /** Reported when the list is not closed by `;`. */
  code: DiagnosticCode;
  /** Reported for an empty list, when empty lists are not allowed. */
  emptyCode?: DiagnosticCode;
  item: (list: ItemSlot[]) => void;
}

const isTerminator = (s: Sym): boolean => s.category === "comma" || s.category === "semicolon";

export class Parser {
  private readonly handler: SemanticErrorHandler;
  private readonly trace?: TraceSink;
  private readonly summary: boolean;
  private symbol: Sym | null = null;
  private errorCount = 0;
  private syntaxDiagnostics: Diagnostic[] = [];
  private keywords: Partial<Record<SectionName, Sym>> = {};

  constructor(
    private readonly names: NameTable,
    private readonly devices: DevicesPort,
    private readonly network: NetworkPort,
    private readonly monitors: MonitorsPort,
    private readonly scanner: Scanner,
    options: ParserOptions = {}
  ) {
    this.trace = options.trace;
    this.summary = options.summary ?? true;
    this.handler = new SemanticErrorHandler(names, devices, network, monitors, scanner, {
      severity: options.severity,
    });
  }

  get syntaxErrorCount(): number {
    return this.errorCount;
  }

  /**
   * Parse, then build into the collaborators. True only when the file is
   * syntactically clean and no fatal semantic error occurred.
   */
  parseNetwork(): boolean {
    const parsed = this.parseFile();
    if (isFail(parsed)) return false;
    return this.buildNetwork(parsed.value);
  }

  /** Scanner warnings, syntax errors and semantic diagnostics, in that order. */
  getDiagnostics(): Diagnostic[] {
    return [...this.scanner.warnings(), ...this.syntaxDiagnostics, ...this.handler.getDiagnostics()];
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Syntax pass
  // ═══════════════════════════════════════════════════════════════════════════

  parseFile(): Outcome<NetworkDescription> {
    this.scanner.resetCursor();
    this.symbol = null;
    this.errorCount = 0;
    this.syntaxDiagnostics = [];
    this.keywords = {};

    const slots: Record<SectionName, ItemSlot[]> = { DEVICES: [], CONNECT: [], MONITOR: [] };
    try {
      this.file(slots);
    } catch (e) {
      if (!(e instanceof EndOfInput)) throw e;
    }

    if (this.errorCount > 0) {
      const rejected = syntaxFailed(this.errorCount, [...this.syntaxDiagnostics]);
      if (this.summary) this.scanner.printMessage(rejected.failure.message);
      return rejected;
    }
    return done({
      DEVICES: filled(slots.DEVICES),
      CONNECT: filled(slots.CONNECT),
      MONITOR: filled(slots.MONITOR),
      keywords: { ...this.keywords },
    });
  }

  private file(slots: Record<SectionName, ItemSlot[]>): void {
    this.advance();
    this.header("DEVICES", "E0001");
    slots.DEVICES = this.itemList({
      next: "CONNECT",
      code: "E0019",
      emptyCode: "E0005",
      item: (list) => this.device(list),
    });

    this.header("CONNECT", "E0002");
    slots.CONNECT = this.itemList({ next: "MONITOR", code: "E0013", item: (list) => this.connection(list) });

    this.header("MONITOR", "E0003");
    slots.MONITOR = this.itemList({ next: "END", code: "E0018", item: (list) => this.monitor(list) });

    const end = this.current();
    if (!this.isKeyword(end, "END")) this.syntaxError("E0004", end);
    const next = this.scanner.getSymbol();
    if (next === null) {
      this.syntaxError("E0021", this.scanner.lastSymbol());
      return;
    }
    this.symbol = next;
    if (next.category !== "semicolon") this.syntaxError("E0021", next);
  }

  private header(name: SectionName, code: DiagnosticCode): void {
    const sym = this.current();
    if (this.isKeyword(sym, name)) {
      this.keywords[name] = sym;
    } else {
      this.syntaxError(code, sym);
    }
    const colon = this.advance();
    if (colon.category !== "colon") this.syntaxError("E0020", colon);
  }

  private itemList(rule: ListRule): ItemSlot[] {
    const list: ItemSlot[] = [];
    const first = this.advance();
    if (first.category === "semicolon") {
      if (rule.emptyCode) this.syntaxError(rule.emptyCode, first);
      this.advance();
      return list;
    }

    rule.item(list);
    let trailingComma = false;
    while (this.current().category === "comma") {
      if (this.isKeyword(this.advance(), rule.next)) {
        trailingComma = true;
        break;
      }
      rule.item(list);
    }

    const sym = this.current();
    if (sym.category === "semicolon") {
      this.advance();
      return list;
    }
    if (this.isKeyword(sym, rule.next)) {
      // `a, b, CONNECT`: the last comma stands where `;` belongs
      if (trailingComma) this.syntaxError(rule.code, this.scanner.previous());
      return list;
    }
    this.syntaxError(rule.code, this.scanner.previous());
    this.skipTo((s) => this.isKeyword(s, rule.next));
    return list;
  }

  private device(list: ItemSlot[]): void {
    const keyword = this.current();
    const shape = keyword.category === "keyword" ? DEVICE_SHAPES.get(this.text(keyword)) : undefined;
    if (!shape) {
      this.fail(list, "E0008", keyword);
      this.skipTo(isTerminator);
      return;
    }

    const item: Sym[] = [keyword];
    let sym = this.advance();
    if (isTerminator(sym)) {
      this.fail(list, shape.property ? "E0006" : "E0007", sym);
      return;
    }
    if (!this.checkName(sym)) {
      list.push(null);
      this.skipTo(isTerminator);
      return;
    }
    item.push(sym);
    sym = this.advance();

    if (shape.property) {
      // `SWITCH sw, 0` reads as `SWITCH sw 0`
      const after = this.scanner.peek();
      if (sym.category === "comma" && after && (after.category === "integer" || after.category === "number")) {
        sym = this.advance();
      }
      if (isTerminator(sym)) {
        this.fail(list, "E0006", sym);
        return;
      }
      const offset = shape.property.violation(sym, this.text(sym));
      if (offset !== null) {
        this.fail(list, shape.property.code, sym, offset);
        this.skipTo(isTerminator);
        return;
      }
      item.push(sym);
      sym = this.advance();
    }

    this.closeItem(list, item, "E0019", "CONNECT");
  }

  private connection(list: ItemSlot[]): void {
    const item: Sym[] = [];
    let sym = this.current();
    if (!this.checkName(sym)) {
      list.push(null);
      this.skipTo(isTerminator);
      return;
    }
    item.push(sym);

    sym = this.advance();
    if (sym.category === "dot") {
      item.push(sym);
      sym = this.advance();
      if (sym.category !== "output_pin") {
        this.fail(list, "E0014", sym);
        this.skipTo(isTerminator);
        return;
      }
      item.push(sym);
      sym = this.advance();
    }

    if (sym.category !== "arrow") {
      this.fail(list, "E0015", sym);
      this.skipTo(isTerminator);
      return;
    }
    item.push(sym);

    sym = this.advance();
    if (!this.checkName(sym)) {
      list.push(null);
      this.skipTo(isTerminator);
      return;
    }
    item.push(sym);

    sym = this.advance();
    if (sym.category !== "dot") {
      this.fail(list, "E0016", sym);
      this.skipTo(isTerminator);
      return;
    }
    item.push(sym);

    sym = this.advance();
    if (sym.category !== "input_pin") {
      this.fail(list, "E0017", sym);
      this.advance();
      return;
    }
    item.push(sym);
    this.advance();

    this.closeItem(list, item, "E0013", "MONITOR");
  }

  private monitor(list: ItemSlot[]): void {
    const item: Sym[] = [];
    let sym = this.current();
    if (!this.checkName(sym)) {
      list.push(null);
      this.skipTo(isTerminator);
      return;
    }
    item.push(sym);

    sym = this.advance();
    if (sym.category === "dot") {
      item.push(sym);
      sym = this.advance();
      if (sym.category !== "output_pin") {
        this.fail(list, "E0014", sym);
        this.skipTo(isTerminator);
        return;
      }
      item.push(sym);
      this.advance();
    }

    this.closeItem(list, item, "E0018", "END");
  }

  /** Accept `item` when the current symbol ends it; otherwise resync. */
  private closeItem(list: ItemSlot[], item: Sym[], code: DiagnosticCode, next: string): void {
    const sym = this.current();
    if (isTerminator(sym)) {
      list.push(item);
      return;
    }
    this.fail(list, code, sym);
    this.skipTo((s) => isTerminator(s) || this.isKeyword(s, next));
  }

  private checkName(sym: Sym): boolean {
    if (sym.category === "name") return true;
    const fallback: NameViolation = { offset: 0, subcode: 1 };
    const violation = indexNotName(this.text(sym)) ?? fallback;
    this.syntaxError("E0009", sym, violation.offset, { detail: NAME_VIOLATIONS[violation.subcode] });
    return false;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Symbol access and error recording
  // ═══════════════════════════════════════════════════════════════════════════

  /** Next symbol; at end of input reports E0022 once and stops the parse. */
  private advance(): Sym {
    const next = this.scanner.getSymbol();
    if (next === null) {
      this.syntaxError("E0022", this.scanner.lastSymbol());
      throw new EndOfInput();
    }
    this.symbol = next;
    return next;
  }

  private current(): Sym {
    if (this.symbol === null) throw new Error("parser has no current symbol");
    return this.symbol;
  }

  private skipTo(stop: (s: Sym) => boolean): void {
    let sym = this.current();
    while (!stop(sym)) sym = this.advance();
  }

  private fail(list: ItemSlot[], code: DiagnosticCode, sym: Sym, offset = 0): void {
    list.push(null);
    this.syntaxError(code, sym, offset);
  }

  private syntaxError(
    code: DiagnosticCode,
    symbol: Sym | null,
    offset = 0,
    params?: Record<string, string>
  ): void {
    this.errorCount++;
    const span = symbol
      ? { file: this.scanner.path, startLine: symbol.line, startCol: symbol.column + offset }
      : undefined;
    const diag = makeDiagnostic(code, params, span);
    this.syntaxDiagnostics.push(diag);
    this.scanner.printError(symbol, offset, diag.message);
  }

  private isKeyword(sym: Sym, keyword: string): boolean {
    return sym.category === "keyword" && this.text(sym) === keyword;
  }

  private text(sym: Sym): string {
    return this.names.resolve(sym.id) ?? "";
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Build pass
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Devices, then connections, then monitors; each phase runs only if the
   * previous one succeeded.
   */
  buildNetwork(description: NetworkDescription): boolean {
    return (
      this.phase("DEVICES", () => this.buildDevices(description.DEVICES)) &&
      this.phase("CONNECT", () => this.buildConnections(description.CONNECT, description.keywords.CONNECT ?? null)) &&
      this.phase("MONITOR", () => this.buildMonitors(description.MONITOR))
    );
  }

  private phase(name: SectionName, run: () => boolean): boolean {
    const ok = run();
    this.trace?.emit({ tag: "E_PhaseDone", phase: name, ok });
    return ok;
  }

  private buildDevices(items: ItemDescriptor[]): boolean {
    for (const item of items) {
      const property = item.length === 3 ? this.text(item[2]) : null;
      const code = this.devices.makeDevice(item[1].id, item[0].id, property);
      if (this.handler.handleError(code, item)) return false;
    }
    return true;
  }

  private buildConnections(items: ItemDescriptor[], connectKeyword: Sym | null): boolean {
    for (const item of items) {
      const roles = connectionRoles(item);
      const code = this.network.makeConnection(
        roles.firstDevice.id,
        roles.firstPort?.id ?? null,
        roles.secondDevice.id,
        roles.secondPort?.id ?? null
      );
      if (this.handler.handleError(code, item)) return false;
    }

    if (!this.network.checkNetwork()) {
      let anchor = connectKeyword;
      let offset = 0;
      if (items.length > 0) {
        const lastItem = items[items.length - 1];
        const lastSym = lastItem[lastItem.length - 1];
        anchor = lastSym;
        offset = this.text(lastSym).length;
      }
      this.handler.reportUnconnectedInputs(anchor, offset);
      return false;
    }
    return true;
  }

  private buildMonitors(items: ItemDescriptor[]): boolean {
    for (const item of items) {
      const code = this.monitors.makeMonitor(item[0].id, item.length === 3 ? item[2].id : null);
      if (this.handler.handleError(code, item)) return false;
    }
    return true;
  }
}

function filled(slots: ItemSlot[]): ItemDescriptor[] {
  return slots.filter((s): s is ItemDescriptor => s !== null);
}
