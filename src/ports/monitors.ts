import type { NameId } from "../core/reader/names";
import type { SignalLevel } from "./devices";

/**
 * Result codes of the monitors collaborator, minted from the shared NameTable.
 */
export interface MonitorResultCodes {
  readonly NO_ERROR: number;
  readonly NOT_OUTPUT: number;
  readonly MONITOR_PRESENT: number;
}

/** Signals recorded at one monitored output, one entry per cycle. */
export interface MonitorTrace {
  readonly device: NameId;
  readonly port: NameId | null;
  readonly signals: readonly SignalLevel[];
}

/**
 * Monitors port interface.
 */
export interface MonitorsPort {
  readonly codes: MonitorResultCodes;

  makeMonitor(device: NameId, port: NameId | null): number;

  /**
   * Returns false when no monitor sits at that output.
   */
  removeMonitor(device: NameId, port: NameId | null): boolean;

  /**
   * Clear recorded signals, keeping the monitors.
   */
  resetMonitors(): void;

  /**
   * Append the current level of every monitored output.
   */
  recordSignals(): void;

  traces(): MonitorTrace[];
}
