/**
 * Bridge Module - Service Layer
 *
 * Startup sequence and lifecycle of the bridge:
 * 1. open the device link and identify device and meter
 * 2. connect to the broker with the offline will registered
 * 3. announce availability and publish discovery descriptors
 * 4. hand over to the polling loop
 *
 * The broker is contacted only after the device answered, so an
 * unreachable device never leaves anything on the broker.
 */
import { type Result, err, ok } from "neverthrow";

import { type DeviceInfo, type EmuDriver, formatEmuError } from "../emu/index.js";
import {
  OFFLINE,
  buildDiscoveryMessages,
  buildTopics,
  type DiscoveryTopics,
  publishDiscovery,
  publishOffline,
  registerAvailability,
} from "../discovery/index.js";
import { createLogger, logOperationComplete, logOperationStart } from "../logger.js";
import type { TelemetryPublisher } from "../mqtt/index.js";
import {
  type PollingSession,
  createPollingSession,
  runPollingLoop,
  sleep as defaultSleep,
  stopPollingLoop,
} from "../polling/index.js";
import {
  type BridgeError,
  alreadyRunning,
  brokerUnavailable,
  deviceUnavailable,
  formatBridgeError,
  pollingFailed,
} from "./errors.js";
import type { BridgeDeps, BridgePhase, BridgeStatus } from "./schema.js";

const log = createLogger("bridge");

// =============================================================================
// Module State
// =============================================================================

type BridgeRuntime = Readonly<{
  driver: EmuDriver;
  publisher: TelemetryPublisher;
  session: PollingSession;
  topics: DiscoveryTopics;
  device: DeviceInfo;
  meterMac: string;
  startedAt: number;
}>;

let phase: BridgePhase = "idle";
let runtime: BridgeRuntime | null = null;

// =============================================================================
// Startup
// =============================================================================

type DeviceIdentity = Readonly<{ device: DeviceInfo; meterMac: string }>;

async function identifyDevice(
  driver: EmuDriver,
): Promise<Result<DeviceIdentity, BridgeError>> {
  const connected = await driver.connect();
  if (connected.isErr()) {
    return err(deviceUnavailable("Could not open the device link", connected.error));
  }

  const schedule = await driver.setScheduleDefault();
  if (schedule.isErr()) {
    log.warn({ error: formatEmuError(schedule.error) }, "Could not restore default schedule");
  }

  const info = await driver.getDeviceInfo();
  if (info.isErr()) {
    return err(deviceUnavailable("Device did not report its identity", info.error));
  }

  const demand = await driver.getInstantaneousDemand();
  if (demand.isErr()) {
    return err(deviceUnavailable("Device did not report the meter", demand.error));
  }

  return ok({ device: info.value, meterMac: demand.value.meterMac });
}

/**
 * Run the bridge. Resolves when the loop is stopped, or with an error when
 * startup fails or the loop cannot recover the device link.
 */
export async function startBridge(deps: BridgeDeps): Promise<Result<void, BridgeError>> {
  if (phase === "starting" || phase === "running") {
    return err(alreadyRunning());
  }

  const startTime = Date.now();
  phase = "starting";
  logOperationStart(log, "startBridge");

  const driver = deps.createDriver();
  const identity = await identifyDevice(driver);
  if (identity.isErr()) {
    await driver.disconnect();
    return fail(identity.error);
  }

  const { device, meterMac } = identity.value;
  log.info(
    { deviceMac: device.deviceMac, model: device.modelId, firmware: device.firmwareVersion, meterMac },
    "Device identified",
  );

  const { mqtt, polling } = deps.settings;
  const topics = buildTopics(mqtt.discoveryPrefix, mqtt.nodeId, meterMac);

  const connected = await deps.connectPublisher({
    hostname: mqtt.hostname,
    port: mqtt.port,
    clientId: mqtt.clientId,
    username: mqtt.username,
    password: mqtt.password,
    will: { topic: topics.availability, payload: OFFLINE, retain: true },
  });
  if (connected.isErr()) {
    await driver.disconnect();
    return fail(brokerUnavailable(connected.error));
  }

  const publisher = connected.value;
  registerAvailability(publisher, topics.availability);
  publishDiscovery(publisher, buildDiscoveryMessages(device, meterMac, topics));

  const session = createPollingSession({
    driver,
    publisher,
    stateTopics: {
      current_summation: topics.sensors.current_summation.state,
      instantaneous_demand: topics.sensors.instantaneous_demand.state,
    },
    intervalMs: polling.intervalMs,
    unresponsiveMax: polling.unresponsiveMax,
    sleep: deps.sleep ?? defaultSleep,
  });

  runtime = { driver, publisher, session, topics, device, meterMac, startedAt: Date.now() };
  phase = "running";
  logOperationComplete(log, "startBridge", startTime, { meterMac });

  const result = await runPollingLoop(session);
  phase = "stopped";
  return result.mapErr(pollingFailed);
}

function fail(error: BridgeError): Result<void, BridgeError> {
  phase = "stopped";
  log.error({ error: formatBridgeError(error) }, "Bridge failed to start");
  return err(error);
}

// =============================================================================
// Shutdown and Status
// =============================================================================

/**
 * Stop polling, mark the bridge offline and close both links.
 */
export async function stopBridge(): Promise<void> {
  const current = runtime;
  if (!current) return;

  runtime = null;
  log.info("Stopping bridge...");

  stopPollingLoop(current.session);
  publishOffline(current.publisher, current.topics.availability);
  await current.publisher.close();
  await current.driver.disconnect();

  phase = "stopped";
  log.info("Bridge stopped");
}

export function getBridgeStatus(): BridgeStatus {
  if (!runtime) {
    return {
      phase,
      startedAt: null,
      meterMac: null,
      device: null,
      emuConnection: "disconnected",
      mqttConnected: false,
      polling: null,
    };
  }

  return {
    phase,
    startedAt: runtime.startedAt,
    meterMac: runtime.meterMac,
    device: runtime.device,
    emuConnection: runtime.driver.getConnectionState(),
    mqttConnected: runtime.publisher.isConnected(),
    polling: runtime.session.status,
  };
}
