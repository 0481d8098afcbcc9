/**
 * Reading Module - Errors
 *
 * A zero divisor breaks the driver contract and is thrown as a defect.
 */
import type { RawReading } from "./schema.js";

export class InvalidDivisorError extends Error {
  override readonly name = "InvalidDivisorError";

  constructor(readonly reading: Pick<RawReading, "value" | "multiplier" | "divisor">) {
    super(
      `Reading has divisor 0 (value=${reading.value.toString()}, multiplier=${reading.multiplier})`,
    );
  }
}
