import type { DevicesPort, SignalLevel } from "../ports/devices";
import type { MonitorsPort } from "../ports/monitors";
import type { NetworkPort } from "../ports/network";
import type { TraceEvent, TraceSink } from "../ports/types";
import type { NameId } from "../core/reader/names";

function makeId(kind: string): string {
  const random = Math.random().toString(36).slice(2);
  return `${kind}:${Date.now()}:${random}`;
}

/**
 * Wrap devices port with logging.
 */
export function loggingDevices(inner: DevicesPort, trace: TraceSink): DevicesPort {
  return {
    codes: inner.codes,
    makeDevice(name: NameId, kind: NameId, property: string | null): number {
      const code = inner.makeDevice(name, kind, property);
      trace.emit({ tag: "E_MakeDevice", id: makeId("device"), device: name, kind, property, code });
      return code;
    },
    findDevices: (kind?: NameId) => inner.findDevices(kind),
    getDevice: (id: NameId) => inner.getDevice(id),
    setSwitch: (id: NameId, state: SignalLevel) => inner.setSwitch(id, state),
    coldStartup: () => inner.coldStartup(),
  };
}

/**
 * Wrap network port with logging.
 */
export function loggingNetwork(inner: NetworkPort, trace: TraceSink): NetworkPort {
  return {
    codes: inner.codes,
    makeConnection(from: NameId, fromPort: NameId | null, to: NameId, toPort: NameId | null): number {
      const code = inner.makeConnection(from, fromPort, to, toPort);
      trace.emit({ tag: "E_MakeConnection", id: makeId("connection"), from, fromPort, to, toPort, code });
      return code;
    },
    checkNetwork(): boolean {
      const ok = inner.checkNetwork();
      trace.emit({ tag: "E_CheckNetwork", id: makeId("check"), ok });
      return ok;
    },
    getConnectedOutput: (device: NameId, inputPort: NameId) => inner.getConnectedOutput(device, inputPort),
    executeNetwork: () => inner.executeNetwork(),
  };
}

/**
 * Wrap monitors port with logging.
 */
export function loggingMonitors(inner: MonitorsPort, trace: TraceSink): MonitorsPort {
  return {
    codes: inner.codes,
    makeMonitor(device: NameId, port: NameId | null): number {
      const code = inner.makeMonitor(device, port);
      trace.emit({ tag: "E_MakeMonitor", id: makeId("monitor"), device, port, code });
      return code;
    },
    removeMonitor: (device: NameId, port: NameId | null) => inner.removeMonitor(device, port),
    resetMonitors: () => inner.resetMonitors(),
    recordSignals: () => inner.recordSignals(),
    traces: () => inner.traces(),
  };
}

/**
 * Trace sink writing one debug line per event.
 */
export function consoleTraceSink(): TraceSink {
  return {
    emit(event: TraceEvent): void {
      const { tag, ...rest } = event;
      console.debug(`[trace] ${tag} ${JSON.stringify(rest)}`);
    },
  };
}

export interface MemoryTraceSink extends TraceSink {
  readonly events: TraceEvent[];
}

/**
 * Trace sink keeping every event in memory.
 */
export function memoryTraceSink(): MemoryTraceSink {
  const events: TraceEvent[] = [];
  return {
    events,
    emit: (event: TraceEvent) => {
      events.push(event);
    },
  };
}
