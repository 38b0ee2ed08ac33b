// src/core/session/circuitSession.ts
// Headless host over one compiled circuit: load, switches, monitors, simulation
//
// Usage:
//   const session = new CircuitSession(() => createBackend());
//   const { success, message } = session.load("adder.def");
//   session.setSwitchState("sw1", 1);
//   session.run(10);
//   session.signals(); // { "g1": [0, 1, ...] }

import type { Fail, Outcome } from "../../outcome/outcome";
import { match } from "../../outcome/matchers";
import { done, fail, notLoaded, oscillating } from "../../outcome/constructors";
import { failure } from "../../outcome/failure";
import type { CircuitPorts } from "../../ports/composite";
import type { SignalLevel } from "../../ports/devices";
import type { TraceSink } from "../../ports/types";
import { BufferSink } from "../../adapters/sinks";
import { DEFAULT_CONFIG, type CircuitConfig } from "../config/config";
import type { NameId, NameTable } from "../reader/names";
import { compileCircuit, failureMessages, type CircuitSource } from "../pipeline/compileCircuit";

/**
 * Fresh collaborators sharing one NameTable. Each load builds into its own.
 */
export type CircuitBackend = CircuitPorts & { names: NameTable };

export type BackendFactory = () => CircuitBackend;

export type LoadResult = {
  /** Whether the definition compiled and the circuit was swapped in */
  success: boolean;

  /** Buffered diagnostics, or a one-line status when there were none */
  message: string;
};

export type RunReport = {
  /** Cycles simulated since the last `run` */
  cycles: number;
};

type OutputKey = { device: NameId; port: NameId | null };

export class CircuitSession {
  private backend: CircuitBackend | null = null;
  private started = false;
  private cyclesRun = 0;

  constructor(
    private readonly factory: BackendFactory,
    private readonly config: CircuitConfig = DEFAULT_CONFIG,
    private readonly trace?: TraceSink
  ) {}

  get loaded(): boolean {
    return this.backend !== null;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Loading
  // ═══════════════════════════════════════════════════════════════════════════

  load(path: string): LoadResult {
    return this.compile({ path }, path);
  }

  loadSource(text: string, label = "<memory>"): LoadResult {
    return this.compile({ source: text, path: label }, label);
  }

  private compile(source: CircuitSource, label: string): LoadResult {
    const backend = this.factory();
    const sink = new BufferSink();
    const result = compileCircuit({
      ...backend,
      ...source,
      config: this.config,
      sink,
      trace: this.trace,
    });

    return match(result, {
      done: ({ value }): LoadResult => {
        this.backend = backend;
        this.started = false;
        this.cyclesRun = 0;
        return { success: true, message: value.messages || `Loaded ${label}` };
      },
      fail: ({ failure: f }) => ({ success: false, message: failureMessages(f.context) || f.message }),
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Switches
  // ═══════════════════════════════════════════════════════════════════════════

  listSwitches(): string[] {
    const backend = this.backend;
    if (!backend) return [];
    const kind = backend.names.query("SWITCH");
    if (kind === null) return [];
    return backend.devices.findDevices(kind).map((id) => this.nameOf(backend, id));
  }

  /** Current state of switch `name`, or null when there is no such switch. */
  getSwitchState(name: string): SignalLevel | null {
    const backend = this.backend;
    if (!backend) return null;
    const id = backend.names.query(name);
    if (id === null) return null;
    return backend.devices.getDevice(id)?.switchState ?? null;
  }

  setSwitchState(name: string, state: SignalLevel): Outcome<SignalLevel> {
    const backend = this.backend;
    if (!backend) return notLoaded();
    const id = backend.names.query(name);
    if (id === null || !backend.devices.setSwitch(id, state)) {
      return fail(failure("invalid-argument", `${name} is not a switch`, { context: { name } }));
    }
    return done(state);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Monitors
  // ═══════════════════════════════════════════════════════════════════════════

  /** Every device output, as `dev` for single-output devices or `dev.port`. */
  listOutputs(): string[] {
    const backend = this.backend;
    if (!backend) return [];
    const out: string[] = [];
    for (const id of backend.devices.findDevices()) {
      const device = backend.devices.getDevice(id);
      if (!device) continue;
      for (const port of device.outputs.keys()) {
        out.push(this.outputName(backend, { device: id, port }));
      }
    }
    return out;
  }

  isMonitored(output: string): boolean {
    const backend = this.backend;
    if (!backend) return false;
    const key = this.parseOutput(backend, output);
    if (!key) return false;
    return backend.monitors.traces().some((t) => t.device === key.device && t.port === key.port);
  }

  setMonitored(output: string, on: boolean): Outcome<boolean> {
    const backend = this.backend;
    if (!backend) return notLoaded();
    const key = this.parseOutput(backend, output);
    if (!key) {
      return fail(failure("invalid-argument", `Unknown output ${output}`, { context: { output } }));
    }

    if (on) {
      const code = backend.monitors.makeMonitor(key.device, key.port);
      if (code === backend.monitors.codes.NOT_OUTPUT) {
        return fail(failure("invalid-argument", `${output} is not an output`, { context: { output } }));
      }
      return done(true);
    }

    if (!backend.monitors.removeMonitor(key.device, key.port)) {
      return fail(failure("invalid-argument", `No monitor at ${output}`, { context: { output } }));
    }
    return done(false);
  }

  /** Recorded traces of every monitored output, keyed like `listOutputs`. */
  signals(): Record<string, SignalLevel[]> {
    const backend = this.backend;
    const out: Record<string, SignalLevel[]> = {};
    if (!backend) return out;
    for (const t of backend.monitors.traces()) {
      out[this.outputName(backend, t)] = [...t.signals];
    }
    return out;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Simulation
  // ═══════════════════════════════════════════════════════════════════════════

  /** Reset monitors, cold-start every device, then simulate `cycles` cycles. */
  run(cycles: number): Outcome<RunReport> {
    const backend = this.backend;
    if (!backend) return notLoaded();
    const invalid = checkCycles(cycles);
    if (invalid) return invalid;

    backend.monitors.resetMonitors();
    backend.devices.coldStartup();
    this.started = true;
    this.cyclesRun = 0;
    return this.simulate(backend, cycles);
  }

  /** Simulate `cycles` more cycles without resetting. */
  continue(cycles: number): Outcome<RunReport> {
    const backend = this.backend;
    if (!backend) return notLoaded();
    const invalid = checkCycles(cycles);
    if (invalid) return invalid;
    if (!this.started) {
      return fail(failure("not-started", "Nothing to continue. Run the simulation first"));
    }
    return this.simulate(backend, cycles);
  }

  private simulate(backend: CircuitBackend, cycles: number): Outcome<RunReport> {
    for (let i = 0; i < cycles; i++) {
      if (!backend.network.executeNetwork()) {
        return oscillating(this.cyclesRun + 1);
      }
      backend.monitors.recordSignals();
      this.cyclesRun++;
    }
    return done({ cycles: this.cyclesRun });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Names
  // ═══════════════════════════════════════════════════════════════════════════

  private parseOutput(backend: CircuitBackend, output: string): OutputKey | null {
    const [deviceText, portText, ...rest] = output.split(".");
    if (rest.length > 0) return null;
    const device = backend.names.query(deviceText);
    if (device === null || backend.devices.getDevice(device) === null) return null;
    if (portText === undefined) return { device, port: null };
    const port = backend.names.query(portText);
    return port === null ? null : { device, port };
  }

  private outputName(backend: CircuitBackend, key: OutputKey): string {
    const device = this.nameOf(backend, key.device);
    return key.port === null ? device : `${device}.${this.nameOf(backend, key.port)}`;
  }

  private nameOf(backend: CircuitBackend, id: NameId): string {
    return backend.names.resolve(id) ?? `#${id}`;
  }
}

function checkCycles(cycles: number): Fail | null {
  if (Number.isInteger(cycles) && cycles > 0) return null;
  return fail(
    failure("invalid-argument", `Number of cycles must be a positive integer, got ${String(cycles)}`, {
      context: { cycles },
    })
  );
}
