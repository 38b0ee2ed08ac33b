import type { NameId } from "../core/reader/names";

/** Section of a definition file. */
export type SectionName = "DEVICES" | "CONNECT" | "MONITOR";

/**
 * Trace event types for build logging.
 */
export type TraceEvent =
  | { tag: "E_MakeDevice"; id: string; device: NameId; kind: NameId; property: string | null; code: number }
  | { tag: "E_MakeConnection"; id: string; from: NameId; fromPort: NameId | null; to: NameId; toPort: NameId | null; code: number }
  | { tag: "E_MakeMonitor"; id: string; device: NameId; port: NameId | null; code: number }
  | { tag: "E_CheckNetwork"; id: string; ok: boolean }
  | { tag: "E_PhaseDone"; phase: SectionName; ok: boolean };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}
