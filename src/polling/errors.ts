/**
 * Polling Module - Error Types
 *
 * Only failures that end the loop are errors here; non-responses are
 * absorbed by the state machine.
 */
import { type EmuError, formatEmuError } from "../emu/index.js";

export type PollingError = {
  readonly type: "RECONNECT_FAILED";
  readonly message: string;
  readonly cause: EmuError;
};

export function reconnectFailed(cause: EmuError): PollingError {
  return {
    type: "RECONNECT_FAILED",
    message: "Could not reopen the device link",
    cause,
  };
}

/**
 * Format error for logging.
 */
export function formatPollingError(error: PollingError): string {
  switch (error.type) {
    case "RECONNECT_FAILED":
      return `${error.message}: ${formatEmuError(error.cause)}`;
  }
}
