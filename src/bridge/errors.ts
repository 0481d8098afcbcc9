/**
 * Bridge Module - Error Types
 *
 * Failures that stop the bridge. The entry point turns each into exit 1.
 */
import { type EmuError, formatEmuError } from "../emu/index.js";
import { type MqttError, formatMqttError } from "../mqtt/index.js";
import { type PollingError, formatPollingError } from "../polling/index.js";

export type BridgeError =
  | { readonly type: "DEVICE_UNAVAILABLE"; readonly message: string; readonly cause: EmuError }
  | { readonly type: "BROKER_UNAVAILABLE"; readonly message: string; readonly cause: MqttError }
  | { readonly type: "POLLING_FAILED"; readonly message: string; readonly cause: PollingError }
  | { readonly type: "ALREADY_RUNNING"; readonly message: string };

export function deviceUnavailable(message: string, cause: EmuError): BridgeError {
  return { type: "DEVICE_UNAVAILABLE", message, cause };
}

export function brokerUnavailable(cause: MqttError): BridgeError {
  return { type: "BROKER_UNAVAILABLE", message: "Could not connect to the broker", cause };
}

export function pollingFailed(cause: PollingError): BridgeError {
  return { type: "POLLING_FAILED", message: "Polling loop ended", cause };
}

export function alreadyRunning(): BridgeError {
  return { type: "ALREADY_RUNNING", message: "Bridge is already running" };
}

/**
 * Format error for logging.
 */
export function formatBridgeError(error: BridgeError): string {
  switch (error.type) {
    case "DEVICE_UNAVAILABLE":
      return `${error.message}: ${formatEmuError(error.cause)}`;
    case "BROKER_UNAVAILABLE":
      return `${error.message}: ${formatMqttError(error.cause)}`;
    case "POLLING_FAILED":
      return `${error.message}: ${formatPollingError(error.cause)}`;
    case "ALREADY_RUNNING":
      return error.message;
  }
}

/**
 * The underlying exception, when one was caught on the way.
 */
export function bridgeErrorCause(error: BridgeError): Error | undefined {
  switch (error.type) {
    case "DEVICE_UNAVAILABLE":
      return "cause" in error.cause ? error.cause.cause : undefined;
    case "BROKER_UNAVAILABLE":
      return "cause" in error.cause ? error.cause.cause : undefined;
    case "POLLING_FAILED":
      return "cause" in error.cause.cause ? error.cause.cause.cause : undefined;
    case "ALREADY_RUNNING":
      return undefined;
  }
}
