// src/core/semantic/errorHandler.ts
// Maps collaborator result codes to located semantic diagnostics

import type { Diagnostic } from "../../outcome/diagnostic";
import { makeDiagnostic, type DiagnosticCode } from "../../outcome/codes";
import type { Span } from "../../outcome/span";
import type { DevicesPort } from "../../ports/devices";
import type { NetworkPort, OutputRef } from "../../ports/network";
import type { MonitorsPort } from "../../ports/monitors";
import type { NameId, NameTable } from "../reader/names";
import type { Scanner } from "../reader/scanner";
import type { Sym } from "../reader/symbol";
import {
  KIND_CODES,
  resolveSeverity,
  type SemanticErrorKind,
  type Severity,
  type SeverityOverrides,
  type SeverityTable,
} from "./severity";

/** The four roles of a connection item. Ports are absent when not written. */
export interface ConnectionRoles {
  firstDevice: Sym;
  firstPort: Sym | null;
  secondDevice: Sym;
  secondPort: Sym | null;
}

/**
 * Split a raw connection item (`a > b.I1`, `a.Q > b.I1`) into its roles by
 * where the dots sit.
 */
export function connectionRoles(items: readonly Sym[]): ConnectionRoles {
  if (items.length < 3) {
    throw new Error(`Not a connection item: ${items.length} symbols`);
  }
  const at = (i: number): Sym | null => (i < items.length ? items[i] : null);
  const isDot = (i: number): boolean => at(i)?.category === "dot";

  if (isDot(1)) {
    const secondDevice = at(4);
    if (!secondDevice) throw new Error("Connection item has no target device");
    return {
      firstDevice: items[0],
      firstPort: at(2),
      secondDevice,
      secondPort: isDot(5) ? at(6) : null,
    };
  }
  return {
    firstDevice: items[0],
    firstPort: null,
    secondDevice: items[2],
    secondPort: isDot(3) ? at(4) : null,
  };
}

export interface SemanticErrorHandlerOptions {
  severity?: SeverityOverrides;
}

/**
 * Owns the code → kind table for one circuit. Codes missing from the table
 * mean the collaborator call succeeded.
 */
export class SemanticErrorHandler {
  private readonly kinds: ReadonlyMap<number, SemanticErrorKind>;
  private readonly severity: SeverityTable;
  private readonly reported: Diagnostic[] = [];

  constructor(
    private readonly names: NameTable,
    private readonly devices: DevicesPort,
    private readonly network: NetworkPort,
    monitors: MonitorsPort,
    private readonly scanner: Scanner,
    options: SemanticErrorHandlerOptions = {}
  ) {
    this.severity = resolveSeverity(options.severity);
    this.kinds = new Map<number, SemanticErrorKind>([
      [devices.codes.INVALID_QUALIFIER, "invalid-qualifier"],
      [devices.codes.NO_QUALIFIER, "no-qualifier"],
      [devices.codes.BAD_DEVICE, "bad-device"],
      [devices.codes.QUALIFIER_PRESENT, "qualifier-present"],
      [devices.codes.DEVICE_PRESENT, "device-present"],
      [network.codes.INPUT_TO_INPUT, "input-to-input"],
      [network.codes.OUTPUT_TO_OUTPUT, "output-to-output"],
      [network.codes.INPUT_CONNECTED, "input-connected"],
      [network.codes.PORT_ABSENT, "port-absent"],
      [network.codes.DEVICE_ABSENT, "device-absent"],
      [monitors.codes.NOT_OUTPUT, "not-output"],
      [monitors.codes.MONITOR_PRESENT, "monitor-present"],
    ]);
  }

  kindOf(code: number): SemanticErrorKind | null {
    return this.kinds.get(code) ?? null;
  }

  /**
   * Report `code` against the item that produced it.
   * Returns true when the error is fatal.
   */
  handleError(code: number, items: readonly Sym[]): boolean {
    const kind = this.kinds.get(code);
    if (kind === undefined) return false;
    const severity = this.severity[kind];
    this.describe(kind, items, severity);
    return severity === "fatal";
  }

  /**
   * One diagnostic listing every input the network reports as undriven.
   */
  reportUnconnectedInputs(anchor: Sym | null, arrowOffset: number): Diagnostic {
    const pins: string[] = [];
    for (const id of this.devices.findDevices()) {
      const device = this.devices.getDevice(id);
      if (!device) continue;
      for (const input of device.inputs) {
        if (this.network.getConnectedOutput(id, input) === null) {
          pins.push(`${this.nameOf(id)}.${this.nameOf(input)}`);
        }
      }
    }
    return this.report("E0116", anchor, { pins: pins.join(", ") }, "fatal", arrowOffset);
  }

  getDiagnostics(): Diagnostic[] {
    return [...this.reported];
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Per-kind messages
  // ═══════════════════════════════════════════════════════════════════════════

  private describe(kind: SemanticErrorKind, items: readonly Sym[], severity: Severity): void {
    const code = KIND_CODES[kind];
    const last = items.length > 0 ? items[items.length - 1] : null;
    const itemAt = (i: number): Sym | null => (i < items.length ? items[i] : null);

    switch (kind) {
      case "invalid-qualifier":
      case "qualifier-present": {
        const name = itemAt(1);
        this.report(code, itemAt(2) ?? name, { device: this.textOf(name) }, severity);
        return;
      }
      case "no-qualifier":
      case "device-present": {
        const name = itemAt(1);
        this.report(code, name, { device: this.textOf(name) }, severity);
        return;
      }
      case "bad-device": {
        const type = itemAt(0);
        this.report(code, type, { kind: this.textOf(type) }, severity);
        return;
      }
      case "input-to-input": {
        const roles = connectionRoles(items);
        this.report(code, roles.firstPort ?? roles.firstDevice, this.sides(roles), severity);
        return;
      }
      case "output-to-output": {
        const roles = connectionRoles(items);
        this.report(code, roles.secondPort ?? roles.secondDevice, this.sides(roles), severity);
        return;
      }
      case "input-connected": {
        const roles = connectionRoles(items);
        const { first, second } = this.sides(roles);
        const existing = roles.secondPort
          ? this.network.getConnectedOutput(roles.secondDevice.id, roles.secondPort.id)
          : null;
        const driver = existing ? this.refName(existing) : first;
        this.report(code, roles.secondPort ?? roles.secondDevice, { driver, input: second }, severity);
        return;
      }
      case "port-absent":
        this.describePortAbsent(items, severity);
        return;
      case "device-absent":
        this.describeDeviceAbsent(items, severity);
        return;
      case "not-output":
      case "monitor-present":
        this.report(code, last, {}, severity);
        return;
    }
  }

  private describePortAbsent(items: readonly Sym[], severity: Severity): void {
    const roles = connectionRoles(items);
    const source = this.devices.getDevice(roles.firstDevice.id);
    const target = this.devices.getDevice(roles.secondDevice.id);
    let count = 0;

    if (roles.firstPort) {
      if (source && !source.outputs.has(roles.firstPort.id)) {
        this.reportMissingPort(roles.firstPort, roles.firstDevice, severity);
        count++;
      }
    } else if (source && !source.outputs.has(null)) {
      this.report("E0114", roles.firstDevice, { device: this.textOf(roles.firstDevice) }, severity);
      count++;
    }

    if (roles.secondPort && target && !target.inputs.has(roles.secondPort.id)) {
      this.reportMissingPort(roles.secondPort, roles.secondDevice, severity);
      count++;
    }

    if (count === 0) {
      const port = roles.secondPort ?? roles.secondDevice;
      this.reportMissingPort(port, roles.secondDevice, severity);
    }
  }

  private describeDeviceAbsent(items: readonly Sym[], severity: Severity): void {
    const monitorShaped = items.length === 1 || (items.length === 3 && items[1].category === "dot");
    if (monitorShaped) {
      this.report("E0115", items[0], { device: this.textOf(items[0]) }, severity);
      return;
    }

    const roles = connectionRoles(items);
    let count = 0;
    for (const device of [roles.firstDevice, roles.secondDevice]) {
      if (this.devices.getDevice(device.id) === null) {
        this.report("E0115", device, { device: this.textOf(device) }, severity);
        count++;
      }
    }
    if (count === 0) {
      this.report("E0115", roles.firstDevice, { device: this.textOf(roles.firstDevice) }, severity);
    }
  }

  private reportMissingPort(port: Sym, device: Sym, severity: Severity): void {
    this.report("E0113", port, { port: this.textOf(port), device: this.textOf(device) }, severity);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Rendering
  // ═══════════════════════════════════════════════════════════════════════════

  private report(
    code: DiagnosticCode,
    symbol: Sym | null,
    params: Record<string, string>,
    severity: Severity,
    arrowOffset = 0
  ): Diagnostic {
    const span: Span | undefined = symbol
      ? { file: this.scanner.path, startLine: symbol.line, startCol: symbol.column + arrowOffset }
      : undefined;
    const diag: Diagnostic = {
      ...makeDiagnostic(code, params, span),
      severity: severity === "warning" ? "warning" : "error",
    };
    this.reported.push(diag);
    const message = severity === "warning" ? `Warning: ${diag.message}` : diag.message;
    this.scanner.printError(symbol, arrowOffset, message);
    return diag;
  }

  private sides(roles: ConnectionRoles): { first: string; second: string } {
    return {
      first: this.dotted(roles.firstDevice, roles.firstPort),
      second: this.dotted(roles.secondDevice, roles.secondPort),
    };
  }

  private dotted(device: Sym, port: Sym | null): string {
    return port ? `${this.textOf(device)}.${this.textOf(port)}` : this.textOf(device);
  }

  private refName(ref: OutputRef): string {
    return ref.port === null ? this.nameOf(ref.device) : `${this.nameOf(ref.device)}.${this.nameOf(ref.port)}`;
  }

  private textOf(symbol: Sym | null): string {
    return symbol ? this.nameOf(symbol.id) : "";
  }

  private nameOf(id: NameId): string {
    return this.names.resolve(id) ?? `#${id}`;
  }
}
