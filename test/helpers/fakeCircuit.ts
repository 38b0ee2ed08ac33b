// test/helpers/fakeCircuit.ts
// In-process stand-in for the simulator's Devices, Network and Monitors

import { NameTable, type NameId } from "../../src/core/reader/names";
import type { DeviceResultCodes, DevicesPort, DeviceView, SignalLevel } from "../../src/ports/devices";
import type { NetworkPort, NetworkResultCodes, OutputRef } from "../../src/ports/network";
import type { MonitorResultCodes, MonitorsPort, MonitorTrace } from "../../src/ports/monitors";
import type { CircuitBackend } from "../../src/core/session/circuitSession";

type FakeDevice = {
  id: NameId;
  kind: NameId;
  kindText: string;
  inputs: Set<NameId>;
  outputs: Map<NameId | null, SignalLevel>;
  switchState?: SignalLevel;
};

const GATES = new Set(["AND", "NAND", "OR", "NOR"]);

export class FakeDevices implements DevicesPort {
  readonly codes: DeviceResultCodes;
  private readonly devices = new Map<NameId, FakeDevice>();

  constructor(private readonly names: NameTable) {
    const [NO_ERROR, INVALID_QUALIFIER, NO_QUALIFIER, BAD_DEVICE, QUALIFIER_PRESENT, DEVICE_PRESENT] =
      names.allocate(6);
    this.codes = { NO_ERROR, INVALID_QUALIFIER, NO_QUALIFIER, BAD_DEVICE, QUALIFIER_PRESENT, DEVICE_PRESENT };
  }

  makeDevice(name: NameId, kind: NameId, property: string | null): number {
    if (this.devices.has(name)) return this.codes.DEVICE_PRESENT;
    const kindText = this.names.resolve(kind) ?? "";
    const device: FakeDevice = { id: name, kind, kindText, inputs: new Set(), outputs: new Map() };

    if (kindText === "XOR" || kindText === "DTYPE") {
      if (property !== null) return this.codes.QUALIFIER_PRESENT;
      if (kindText === "XOR") {
        this.addInputs(device, ["I1", "I2"]);
        device.outputs.set(null, 0);
      } else {
        this.addInputs(device, ["DATA", "CLK", "SET", "CLEAR"]);
        device.outputs.set(this.names.intern("Q"), 0);
        device.outputs.set(this.names.intern("QBAR"), 1);
      }
    } else if (kindText === "SWITCH" || kindText === "CLOCK" || kindText === "RC" || kindText === "SIGGEN" || GATES.has(kindText)) {
      if (property === null) return this.codes.NO_QUALIFIER;
      const value = Number(property);
      if (kindText === "SWITCH") {
        if (property !== "0" && property !== "1") return this.codes.INVALID_QUALIFIER;
        device.switchState = property === "1" ? 1 : 0;
      } else if (GATES.has(kindText)) {
        if (!Number.isInteger(value) || value < 1 || value > 16) return this.codes.INVALID_QUALIFIER;
        this.addInputs(device, Array.from({ length: value }, (_, i) => `I${i + 1}`));
      } else if (kindText !== "SIGGEN" && !(Number.isInteger(value) && value > 0)) {
        return this.codes.INVALID_QUALIFIER;
      }
      device.outputs.set(null, device.switchState ?? 0);
    } else {
      return this.codes.BAD_DEVICE;
    }

    this.devices.set(name, device);
    return this.codes.NO_ERROR;
  }

  findDevices(kind?: NameId): NameId[] {
    return [...this.devices.values()].filter((d) => kind === undefined || d.kind === kind).map((d) => d.id);
  }

  getDevice(id: NameId): DeviceView | null {
    return this.devices.get(id) ?? null;
  }

  setSwitch(id: NameId, state: SignalLevel): boolean {
    const device = this.devices.get(id);
    if (!device || device.kindText !== "SWITCH") return false;
    device.switchState = state;
    device.outputs.set(null, state);
    return true;
  }

  coldStartup(): void {
    for (const device of this.devices.values()) {
      for (const port of device.outputs.keys()) {
        device.outputs.set(port, device.kindText === "SWITCH" ? device.switchState ?? 0 : 0);
      }
    }
  }

  /** Output level driven by `ref`, for the network's evaluation pass. */
  level(ref: OutputRef): SignalLevel {
    return this.devices.get(ref.device)?.outputs.get(ref.port) ?? 0;
  }

  /** Recompute every gate output from its input levels. */
  evaluate(inputLevel: (device: NameId, port: NameId) => SignalLevel): void {
    for (const device of this.devices.values()) {
      const levels = [...device.inputs].map((port) => inputLevel(device.id, port));
      let out: SignalLevel;
      switch (device.kindText) {
        case "AND":
          out = levels.every((l) => l === 1) ? 1 : 0;
          break;
        case "NAND":
          out = levels.every((l) => l === 1) ? 0 : 1;
          break;
        case "OR":
          out = levels.some((l) => l === 1) ? 1 : 0;
          break;
        case "NOR":
          out = levels.some((l) => l === 1) ? 0 : 1;
          break;
        case "XOR":
          out = levels.filter((l) => l === 1).length === 1 ? 1 : 0;
          break;
        default:
          continue;
      }
      device.outputs.set(null, out);
    }
  }

  private addInputs(device: FakeDevice, pins: string[]): void {
    for (const id of this.names.internMany(pins)) device.inputs.add(id);
  }
}

export class FakeNetwork implements NetworkPort {
  readonly codes: NetworkResultCodes;
  /** Cycle (1-based) at which `executeNetwork` starts reporting oscillation. */
  oscillateAt: number | null = null;
  private readonly drivers = new Map<string, OutputRef>();
  private executed = 0;

  constructor(names: NameTable, private readonly devices: FakeDevices) {
    const [NO_ERROR, INPUT_TO_INPUT, OUTPUT_TO_OUTPUT, INPUT_CONNECTED, PORT_ABSENT, DEVICE_ABSENT] =
      names.allocate(6);
    this.codes = { NO_ERROR, INPUT_TO_INPUT, OUTPUT_TO_OUTPUT, INPUT_CONNECTED, PORT_ABSENT, DEVICE_ABSENT };
  }

  makeConnection(fromDevice: NameId, fromPort: NameId | null, toDevice: NameId, toPort: NameId | null): number {
    const first = this.devices.getDevice(fromDevice);
    const second = this.devices.getDevice(toDevice);
    if (!first || !second) return this.codes.DEVICE_ABSENT;

    if (fromPort !== null && first.inputs.has(fromPort)) {
      return toPort !== null && second.inputs.has(toPort) ? this.codes.INPUT_TO_INPUT : this.codes.PORT_ABSENT;
    }
    if (!first.outputs.has(fromPort)) return this.codes.PORT_ABSENT;
    if (toPort === null || !second.inputs.has(toPort)) {
      return second.outputs.has(toPort) ? this.codes.OUTPUT_TO_OUTPUT : this.codes.PORT_ABSENT;
    }
    const key = pinKey(toDevice, toPort);
    if (this.drivers.has(key)) return this.codes.INPUT_CONNECTED;
    this.drivers.set(key, { device: fromDevice, port: fromPort });
    return this.codes.NO_ERROR;
  }

  checkNetwork(): boolean {
    for (const id of this.devices.findDevices()) {
      const device = this.devices.getDevice(id);
      if (!device) continue;
      for (const input of device.inputs) {
        if (!this.drivers.has(pinKey(id, input))) return false;
      }
    }
    return true;
  }

  getConnectedOutput(device: NameId, inputPort: NameId): OutputRef | null {
    return this.drivers.get(pinKey(device, inputPort)) ?? null;
  }

  executeNetwork(): boolean {
    if (this.oscillateAt !== null && this.executed + 1 >= this.oscillateAt) return false;
    this.executed++;
    this.devices.evaluate((device, port) => {
      const driver = this.getConnectedOutput(device, port);
      return driver ? this.devices.level(driver) : 0;
    });
    return true;
  }
}

type FakeMonitor = { device: NameId; port: NameId | null; signals: SignalLevel[] };

export class FakeMonitors implements MonitorsPort {
  readonly codes: MonitorResultCodes;
  private readonly monitors: FakeMonitor[] = [];

  constructor(names: NameTable, private readonly devices: FakeDevices, private readonly network: FakeNetwork) {
    const [NO_ERROR, NOT_OUTPUT, MONITOR_PRESENT] = names.allocate(3);
    this.codes = { NO_ERROR, NOT_OUTPUT, MONITOR_PRESENT };
  }

  makeMonitor(device: NameId, port: NameId | null): number {
    const view = this.devices.getDevice(device);
    if (!view) return this.network.codes.DEVICE_ABSENT;
    if (!view.outputs.has(port)) return this.codes.NOT_OUTPUT;
    if (this.find(device, port)) return this.codes.MONITOR_PRESENT;
    this.monitors.push({ device, port, signals: [] });
    return this.codes.NO_ERROR;
  }

  removeMonitor(device: NameId, port: NameId | null): boolean {
    const monitor = this.find(device, port);
    if (!monitor) return false;
    this.monitors.splice(this.monitors.indexOf(monitor), 1);
    return true;
  }

  resetMonitors(): void {
    for (const monitor of this.monitors) monitor.signals = [];
  }

  recordSignals(): void {
    for (const monitor of this.monitors) {
      monitor.signals.push(this.devices.level({ device: monitor.device, port: monitor.port }));
    }
  }

  traces(): MonitorTrace[] {
    return this.monitors.map((m) => ({ device: m.device, port: m.port, signals: [...m.signals] }));
  }

  private find(device: NameId, port: NameId | null): FakeMonitor | undefined {
    return this.monitors.find((m) => m.device === device && m.port === port);
  }
}

export type FakeCircuit = CircuitBackend & {
  names: NameTable;
  devices: FakeDevices;
  network: FakeNetwork;
  monitors: FakeMonitors;
};

export function createFakeCircuit(names = new NameTable()): FakeCircuit {
  const devices = new FakeDevices(names);
  const network = new FakeNetwork(names, devices);
  const monitors = new FakeMonitors(names, devices, network);
  return { names, devices, network, monitors };
}

function pinKey(device: NameId, port: NameId): string {
  return `${device}:${port}`;
}
