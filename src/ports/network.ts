import type { NameId } from "../core/reader/names";

/**
 * Result codes of the network collaborator, minted from the shared NameTable.
 */
export interface NetworkResultCodes {
  readonly NO_ERROR: number;
  readonly INPUT_TO_INPUT: number;
  readonly OUTPUT_TO_OUTPUT: number;
  readonly INPUT_CONNECTED: number;
  readonly PORT_ABSENT: number;
  readonly DEVICE_ABSENT: number;
}

/** An output that drives an input. */
export interface OutputRef {
  readonly device: NameId;
  readonly port: NameId | null;
}

/**
 * Network port interface.
 * Wires device outputs to inputs and propagates signals.
 */
export interface NetworkPort {
  readonly codes: NetworkResultCodes;

  makeConnection(
    fromDevice: NameId,
    fromPort: NameId | null,
    toDevice: NameId,
    toPort: NameId | null
  ): number;

  /**
   * True when every declared input is driven.
   */
  checkNetwork(): boolean;

  getConnectedOutput(device: NameId, inputPort: NameId): OutputRef | null;

  /**
   * Run one simulation cycle. False when the network oscillates.
   */
  executeNetwork(): boolean;
}
