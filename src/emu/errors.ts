/**
 * EMU Module - Error Types
 *
 * Typed error union for device link operations.
 * Errors are values, not exceptions.
 */

/**
 * All possible errors from the EMU driver.
 */
export type EmuError =
  | { readonly type: "CONNECTION_FAILED"; readonly message: string; readonly cause?: Error }
  | { readonly type: "NOT_CONNECTED"; readonly message: string }
  | { readonly type: "WRITE_FAILED"; readonly message: string; readonly cause?: Error }
  | { readonly type: "TIMEOUT"; readonly message: string; readonly timeoutMs: number }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly message: string;
      readonly responseData?: unknown;
    }
  | { readonly type: "BUSY"; readonly message: string };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function connectionFailed(message: string, cause?: Error): EmuError {
  return cause !== undefined
    ? { type: "CONNECTION_FAILED", message, cause }
    : { type: "CONNECTION_FAILED", message };
}

export function notConnected(message: string): EmuError {
  return { type: "NOT_CONNECTED", message };
}

export function writeFailed(message: string, cause?: Error): EmuError {
  return cause !== undefined
    ? { type: "WRITE_FAILED", message, cause }
    : { type: "WRITE_FAILED", message };
}

export function timeout(message: string, timeoutMs: number): EmuError {
  return { type: "TIMEOUT", message, timeoutMs };
}

export function invalidResponse(
  message: string,
  responseData?: unknown,
): EmuError {
  return { type: "INVALID_RESPONSE", message, responseData };
}

export function busy(message: string): EmuError {
  return { type: "BUSY", message };
}

/**
 * Format error for logging.
 */
export function formatEmuError(error: EmuError): string {
  switch (error.type) {
    case "CONNECTION_FAILED":
      return `Connection failed: ${error.message}`;
    case "NOT_CONNECTED":
      return `Not connected: ${error.message}`;
    case "WRITE_FAILED":
      return `Write failed: ${error.message}`;
    case "TIMEOUT":
      return `Timeout after ${error.timeoutMs}ms: ${error.message}`;
    case "INVALID_RESPONSE":
      return `Invalid response: ${error.message}`;
    case "BUSY":
      return `Device busy: ${error.message}`;
  }
}
