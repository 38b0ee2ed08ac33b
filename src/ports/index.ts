export type { DiagnosticMode, DiagnosticSink } from "./sink";
export type { DevicesPort, DeviceResultCodes, DeviceView, SignalLevel } from "./devices";
export type { NetworkPort, NetworkResultCodes, OutputRef } from "./network";
export type { MonitorsPort, MonitorResultCodes, MonitorTrace } from "./monitors";
export type { CircuitPorts } from "./composite";
export type { SectionName, TraceEvent, TraceSink } from "./types";
