/**
 * Discovery Module - Types
 *
 * Topic layout and descriptor shapes for Home Assistant MQTT discovery.
 * Field names of the descriptor are the ones Home Assistant reads.
 */
import type { ReadingKind, ReadingUnit } from "../reading/index.js";

export type AvailabilityPayload = "online" | "offline";

export type SensorTopics = Readonly<{
  config: string;
  state: string;
}>;

export type DiscoveryTopics = Readonly<{
  /** `<prefix>/sensor/<node_id>-<meter>` */
  base: string;
  availability: string;
  sensors: Readonly<Record<ReadingKind, SensorTopics>>;
}>;

export type DeviceDescriptor = Readonly<{
  manufacturer: string;
  model: string;
  name: string;
  sw_version: string;
  identifiers: ReadonlyArray<string>;
}>;

export type SensorStateClass = "total_increasing" | "measurement";
export type SensorDeviceClass = "energy" | "power";

export type SensorDescriptor = Readonly<{
  name: string;
  unique_id: string;
  state_topic: string;
  availability_topic: string;
  device: DeviceDescriptor;
  unit_of_measurement: ReadingUnit;
  state_class: SensorStateClass;
  device_class: SensorDeviceClass;
  value_template: string;
}>;

export type DiscoveryMessage = Readonly<{
  topic: string;
  payload: string;
}>;
