// src/core/parser/types.ts
// Parse results handed from the syntax pass to the build pass

import type { Sym } from "../reader/symbol";
import type { SectionName } from "../../ports/types";

export type { SectionName };

/** Raw symbols of one device, connection or monitor declaration. */
export type ItemDescriptor = readonly Sym[];

/** A list entry during parsing; null marks an item that failed. */
export type ItemSlot = ItemDescriptor | null;

/**
 * Syntactically clean file. `keywords` holds the section keyword symbols,
 * which anchor diagnostics for empty sections.
 */
export interface NetworkDescription {
  DEVICES: ItemDescriptor[];
  CONNECT: ItemDescriptor[];
  MONITOR: ItemDescriptor[];
  keywords: Partial<Record<SectionName, Sym>>;
}
