/**
 * Discovery Module - Pure Transformations
 *
 * Builds topic names and discovery descriptors from the device identity.
 */
import type { DeviceInfo } from "../emu/index.js";
import { READING_KINDS, READING_UNITS, type ReadingKind } from "../reading/index.js";
import type {
  DeviceDescriptor,
  DiscoveryMessage,
  DiscoveryTopics,
  SensorDescriptor,
  SensorDeviceClass,
  SensorStateClass,
} from "./schema.js";

const SENSOR_TRAITS: Readonly<
  Record<
    ReadingKind,
    Readonly<{ label: string; stateClass: SensorStateClass; deviceClass: SensorDeviceClass }>
  >
> = {
  current_summation: {
    label: "EMU-2 Current Summation",
    stateClass: "total_increasing",
    deviceClass: "energy",
  },
  instantaneous_demand: {
    label: "EMU-2 Instantaneous Demand",
    stateClass: "measurement",
    deviceClass: "power",
  },
};

export const VALUE_TEMPLATE = "{{ value_json.reading }}";

/**
 * @example
 * buildTopics("homeassistant", "emu_bridge", "0x00135003000f4c5d").availability
 * // "homeassistant/sensor/emu_bridge-0x00135003000f4c5d/availability"
 */
export function buildTopics(
  discoveryPrefix: string,
  nodeId: string,
  meterMac: string,
): DiscoveryTopics {
  const base = `${discoveryPrefix}/sensor/${nodeId}-${meterMac}`;
  const sensorTopics = (kind: ReadingKind) => ({
    config: `${base}/${kind}/config`,
    state: `${base}/${kind}/state`,
  });

  return {
    base,
    availability: `${base}/availability`,
    sensors: {
      current_summation: sensorTopics("current_summation"),
      instantaneous_demand: sensorTopics("instantaneous_demand"),
    },
  };
}

export function buildDeviceDescriptor(info: DeviceInfo): DeviceDescriptor {
  return {
    manufacturer: info.manufacturer,
    model: info.modelId,
    name: info.modelId,
    sw_version: info.firmwareVersion,
    identifiers: [info.deviceMac],
  };
}

export function buildSensorDescriptor(
  kind: ReadingKind,
  meterMac: string,
  topics: DiscoveryTopics,
  device: DeviceDescriptor,
): SensorDescriptor {
  const traits = SENSOR_TRAITS[kind];

  return {
    name: `${traits.label} ${meterMac}`,
    unique_id: `${meterMac}_${kind}`,
    state_topic: topics.sensors[kind].state,
    availability_topic: topics.availability,
    device,
    unit_of_measurement: READING_UNITS[kind],
    state_class: traits.stateClass,
    device_class: traits.deviceClass,
    value_template: VALUE_TEMPLATE,
  };
}

/**
 * One retained config message per reading kind.
 */
export function buildDiscoveryMessages(
  info: DeviceInfo,
  meterMac: string,
  topics: DiscoveryTopics,
): ReadonlyArray<DiscoveryMessage> {
  const device = buildDeviceDescriptor(info);

  return READING_KINDS.map((kind) => ({
    topic: topics.sensors[kind].config,
    payload: JSON.stringify(buildSensorDescriptor(kind, meterMac, topics, device)),
  }));
}
