/**
 * Reading Module - Pure Transformations
 *
 * Converts raw device readings to physical quantities. Arithmetic is done
 * in decimal; the value only becomes a binary float in the state payload.
 */
import { Decimal } from "decimal.js";

import { InvalidDivisorError } from "./errors.js";
import type { RawReading, StatePayload } from "./schema.js";

/**
 * Decimal constructor with enough significant digits that any 64-bit raw
 * value times a 32-bit multiplier stays exact.
 */
const ExactDecimal = Decimal.clone({ precision: 64 });

// =============================================================================
// Conversion
// =============================================================================

/**
 * Convert a raw reading to its physical quantity.
 *
 * @throws InvalidDivisorError when divisor is 0
 *
 * @example
 * convertReading({ value: 12345n, multiplier: 1, divisor: 1000 }).toString()
 * // "12.345"
 */
export function convertReading(
  raw: Pick<RawReading, "value" | "multiplier" | "divisor">,
): Decimal {
  if (raw.divisor === 0) {
    throw new InvalidDivisorError(raw);
  }

  return new ExactDecimal(raw.value.toString())
    .times(raw.multiplier)
    .dividedBy(raw.divisor);
}

/**
 * Whether the device actually answered with data.
 */
export function hasTimestamp(raw: Pick<RawReading, "timestamp">): boolean {
  return raw.timestamp !== null && raw.timestamp !== 0;
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Build the state payload object for a quantity.
 */
export function toStatePayload(quantity: Decimal): StatePayload {
  return { reading: quantity.toNumber() };
}

/**
 * Serialize a quantity for a state topic.
 *
 * @example
 * serializeStatePayload(new Decimal("12.345")) // '{"reading":12.345}'
 */
export function serializeStatePayload(quantity: Decimal): string {
  return JSON.stringify(toStatePayload(quantity));
}
