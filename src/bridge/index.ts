/**
 * Bridge Module - Public API
 */

// Types
export type {
  BridgeDeps,
  BridgePhase,
  BridgeSettings,
  BridgeStatus,
} from "./schema.js";
export type { BridgeError } from "./errors.js";

// Error utilities
export { bridgeErrorCause, formatBridgeError } from "./errors.js";

// Service functions
export { getBridgeStatus, startBridge, stopBridge } from "./service.js";
