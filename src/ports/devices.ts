import type { NameId } from "../core/reader/names";

/**
 * Result codes of the devices collaborator, minted from the shared NameTable.
 */
export interface DeviceResultCodes {
  readonly NO_ERROR: number;
  readonly INVALID_QUALIFIER: number;
  readonly NO_QUALIFIER: number;
  readonly BAD_DEVICE: number;
  readonly QUALIFIER_PRESENT: number;
  readonly DEVICE_PRESENT: number;
}

export type SignalLevel = 0 | 1;

/**
 * Read-only view of one built device.
 */
export interface DeviceView {
  readonly id: NameId;
  readonly kind: NameId;
  /** Input port ids. */
  readonly inputs: ReadonlySet<NameId>;
  /** Output signal per port id; a single-output device uses the `null` key. */
  readonly outputs: ReadonlyMap<NameId | null, SignalLevel>;
  readonly switchState?: SignalLevel;
}

/**
 * Devices port interface.
 * Builds and owns the device models of one circuit.
 */
export interface DevicesPort {
  readonly codes: DeviceResultCodes;

  /**
   * Create a device. `property` is the raw property text, or null for
   * devices that take none.
   */
  makeDevice(name: NameId, kind: NameId, property: string | null): number;

  /**
   * Ids of every device, or only those of `kind`.
   */
  findDevices(kind?: NameId): NameId[];

  getDevice(id: NameId): DeviceView | null;

  /**
   * Set a switch output. Returns false when `id` is not a switch.
   */
  setSwitch(id: NameId, state: SignalLevel): boolean;

  /**
   * Reset every device to its power-on state.
   */
  coldStartup(): void;
}
