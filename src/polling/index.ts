/**
 * Polling Module - Public API
 */

// Types
export type {
  CycleOutcome,
  LastReading,
  PollingDeps,
  PollingSession,
  PollingState,
  PollingStatus,
} from "./schema.js";
export type { PollingError } from "./errors.js";

export { INITIAL_POLLING_STATUS } from "./schema.js";

// Error utilities
export { formatPollingError } from "./errors.js";

// Service functions
export {
  createPollingSession,
  pollReading,
  runCycle,
  runPollingLoop,
  sleep,
  stopPollingLoop,
} from "./service.js";
