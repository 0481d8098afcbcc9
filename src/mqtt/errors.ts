/**
 * MQTT Module - Error Types
 */

export type MqttError =
  | { readonly type: "CONNECTION_FAILED"; readonly message: string; readonly cause?: Error }
  | { readonly type: "PUBLISH_FAILED"; readonly message: string; readonly topic: string };

export function connectionFailed(message: string, cause?: Error): MqttError {
  return cause !== undefined
    ? { type: "CONNECTION_FAILED", message, cause }
    : { type: "CONNECTION_FAILED", message };
}

export function publishFailed(message: string, topic: string): MqttError {
  return { type: "PUBLISH_FAILED", message, topic };
}

/**
 * Format error for logging.
 */
export function formatMqttError(error: MqttError): string {
  switch (error.type) {
    case "CONNECTION_FAILED":
      return `Broker connection failed: ${error.message}`;
    case "PUBLISH_FAILED":
      return `Publish to ${error.topic} failed: ${error.message}`;
  }
}
