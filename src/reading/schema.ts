/**
 * Reading Module - Types
 *
 * Raw device readings and the two physical quantities the bridge publishes.
 */

// =============================================================================
// Reading Kinds
// =============================================================================

/**
 * The two readings tracked per meter. Also used as topic segments.
 */
export type ReadingKind = "current_summation" | "instantaneous_demand";

export const READING_KINDS: ReadonlyArray<ReadingKind> = [
  "current_summation",
  "instantaneous_demand",
] as const;

/**
 * Unit of each published reading.
 */
export const READING_UNITS = {
  current_summation: "kWh",
  instantaneous_demand: "kW",
} as const satisfies Record<ReadingKind, string>;

export type ReadingUnit = (typeof READING_UNITS)[ReadingKind];

// =============================================================================
// Raw Reading
// =============================================================================

/**
 * A reading as reported by the device: value × multiplier / divisor.
 * `timestamp` is device seconds; null or 0 means the device had no data.
 */
export type RawReading = Readonly<{
  value: bigint;
  multiplier: number;
  divisor: number;
  timestamp: number | null;
}>;

/**
 * JSON body published on a state topic.
 */
export type StatePayload = Readonly<{
  reading: number;
}>;
