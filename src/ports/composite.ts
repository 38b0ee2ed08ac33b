import type { DevicesPort } from "./devices";
import type { MonitorsPort } from "./monitors";
import type { NetworkPort } from "./network";

/**
 * The collaborator ports one circuit is built into.
 */
export interface CircuitPorts {
  devices: DevicesPort;
  network: NetworkPort;
  monitors: MonitorsPort;
}
