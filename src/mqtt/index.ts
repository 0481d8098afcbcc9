/**
 * MQTT Module - Public API
 */

// Types
export type {
  ConnectListener,
  LastWill,
  PublishOptions,
  TelemetryPublisher,
  TelemetryPublisherOptions,
} from "./schema.js";
export type { MqttError } from "./errors.js";

// Error utilities
export { formatMqttError } from "./errors.js";

// Service functions
export { connectTelemetryPublisher } from "./service.js";
