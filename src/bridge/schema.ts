/**
 * Bridge Module - Types
 */
import type { Result } from "neverthrow";

import type { DeviceInfo, EmuConnectionState, EmuDriver } from "../emu/index.js";
import type {
  MqttError,
  TelemetryPublisher,
  TelemetryPublisherOptions,
} from "../mqtt/index.js";
import type { PollingStatus } from "../polling/index.js";

export type BridgeSettings = Readonly<{
  mqtt: Omit<TelemetryPublisherOptions, "will"> &
    Readonly<{ discoveryPrefix: string; nodeId: string }>;
  polling: Readonly<{ intervalMs: number; unresponsiveMax: number }>;
}>;

/**
 * Collaborators are injected so startup can run against fakes.
 */
export type BridgeDeps = Readonly<{
  settings: BridgeSettings;
  createDriver: () => EmuDriver;
  connectPublisher: (
    options: TelemetryPublisherOptions,
  ) => Promise<Result<TelemetryPublisher, MqttError>>;
  sleep?: (ms: number) => Promise<void>;
}>;

export type BridgePhase = "idle" | "starting" | "running" | "stopped";

export type BridgeStatus = Readonly<{
  phase: BridgePhase;
  startedAt: number | null;
  meterMac: string | null;
  device: DeviceInfo | null;
  emuConnection: EmuConnectionState;
  mqttConnected: boolean;
  polling: PollingStatus | null;
}>;
