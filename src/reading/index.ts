/**
 * Reading Module - Public API
 *
 * Exports types and pure conversions for device readings.
 */

// Types
export type {
  RawReading,
  ReadingKind,
  ReadingUnit,
  StatePayload,
} from "./schema.js";

export { READING_KINDS, READING_UNITS } from "./schema.js";

// Errors
export { InvalidDivisorError } from "./errors.js";

// Pure transformations
export {
  convertReading,
  hasTimestamp,
  serializeStatePayload,
  toStatePayload,
} from "./transform.js";
