// src/core/parser/index.ts
// Parser exports

export { Parser, type ParserOptions } from "./parser";
export { DEVICE_SHAPES, type DeviceShape, type PropertyRule, type PropertyCode } from "./grammar";
export type { ItemDescriptor, ItemSlot, NetworkDescription } from "./types";
