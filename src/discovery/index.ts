/**
 * Discovery Module - Public API
 */

// Types
export type {
  AvailabilityPayload,
  DeviceDescriptor,
  DiscoveryMessage,
  DiscoveryTopics,
  SensorDescriptor,
  SensorTopics,
} from "./schema.js";

// Service functions
export {
  OFFLINE,
  ONLINE,
  publishDiscovery,
  publishOffline,
  registerAvailability,
} from "./service.js";

// Pure transformations
export {
  VALUE_TEMPLATE,
  buildDeviceDescriptor,
  buildDiscoveryMessages,
  buildSensorDescriptor,
  buildTopics,
} from "./transform.js";
