/**
 * EMU Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  CurrentSummation,
  DeviceInfo,
  EmuConnectionState,
  InstantaneousDemand,
  RavenFragment,
} from "./schema.js";
export type { EmuError } from "./errors.js";
export type {
  EmuDriver,
  EmuDriverOptions,
  EmuPort,
  EmuPortFactory,
} from "./service.js";

// Error utilities
export { formatEmuError } from "./errors.js";

// Service functions (side effects)
export { createEmuDriver } from "./service.js";

// Pure transformations
export {
  encodeCommand,
  extractFragments,
  normalizeScale,
  parseFields,
  parseHex,
  toCurrentSummation,
  toDeviceInfo,
  toInstantaneousDemand,
} from "./transform.js";
