/**
 * Bridge Service Tests
 *
 * Startup order, discovery and availability publishing against fakes of
 * the device driver and the telemetry publisher.
 */
import { type Result, err, ok } from "neverthrow";
import { type Mock, afterEach, beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Import after mocks
import type {
  CurrentSummation,
  DeviceInfo,
  EmuConnectionState,
  EmuDriver,
  EmuError,
  InstantaneousDemand,
} from "../../emu/index.js";
import type {
  ConnectListener,
  MqttError,
  TelemetryPublisher,
  TelemetryPublisherOptions,
} from "../../mqtt/index.js";
import type { BridgeSettings, BridgeStatus } from "../schema.js";
import type { BridgeError } from "../errors.js";
import { getBridgeStatus, startBridge, stopBridge } from "../service.js";

const METER_MAC = "0x00135003000f4c5d";
const BASE = `homeassistant/sensor/emu_bridge-${METER_MAC}`;
const TIMESTAMP = 740231739;

const DEVICE_INFO: DeviceInfo = {
  deviceMac: "0xd8d5b90000001a2b",
  manufacturer: "Rainforest Automation, Inc.",
  modelId: "Z105-2-EMU2-LEDD_JM",
  firmwareVersion: "2.0.0 (7400)",
  hardwareVersion: "2.7.3",
  dateCode: null,
};

const PORT_MISSING: EmuError = { type: "CONNECTION_FAILED", message: "No such file or directory" };
const SILENT: EmuError = { type: "TIMEOUT", message: "No DeviceInfo response", timeoutMs: 5000 };
const WRITE_ERROR: EmuError = { type: "WRITE_FAILED", message: "EIO" };
const BROKER_DOWN: MqttError = { type: "CONNECTION_FAILED", message: "connect ECONNREFUSED" };

function settings(unresponsiveMax = 3): BridgeSettings {
  return {
    mqtt: {
      hostname: "broker.test",
      port: 1883,
      clientId: "emu-bridge-test",
      username: undefined,
      password: undefined,
      discoveryPrefix: "homeassistant",
      nodeId: "emu_bridge",
    },
    polling: { intervalMs: 10000, unresponsiveMax },
  };
}

function createFakeDriver() {
  return {
    connect: vi.fn(async (): Promise<Result<true, EmuError>> => ok(true)),
    disconnect: vi.fn(async () => {}),
    setScheduleDefault: vi.fn(async (): Promise<Result<true, EmuError>> => ok(true)),
    getDeviceInfo: vi.fn(async (): Promise<Result<DeviceInfo, EmuError>> => ok(DEVICE_INFO)),
    getCurrentSummation: vi.fn(
      async (): Promise<Result<CurrentSummation, EmuError>> =>
        ok({ meterMac: METER_MAC, value: 12345n, multiplier: 1, divisor: 1000, timestamp: TIMESTAMP }),
    ),
    getInstantaneousDemand: vi.fn(
      async (): Promise<Result<InstantaneousDemand, EmuError>> =>
        ok({ meterMac: METER_MAC, value: 1500n, multiplier: 1, divisor: 1000, timestamp: TIMESTAMP }),
    ),
    getConnectionState: vi.fn((): EmuConnectionState => "connected"),
  } satisfies EmuDriver;
}

function createFakePublisher() {
  const listeners: ConnectListener[] = [];
  const publisher = {
    publish: vi.fn(),
    onConnect: vi.fn((listener: ConnectListener) => {
      listeners.push(listener);
      listener();
    }),
    isConnected: vi.fn(() => true),
    close: vi.fn(async () => {}),
  } satisfies TelemetryPublisher;

  return {
    publisher,
    reconnect: () => {
      for (const listener of listeners) listener();
    },
  };
}

describe("Bridge Service", () => {
  let driver: ReturnType<typeof createFakeDriver>;
  let fake: ReturnType<typeof createFakePublisher>;
  let connectPublisher: Mock<
    (options: TelemetryPublisherOptions) => Promise<Result<TelemetryPublisher, MqttError>>
  >;

  function start(options: { unresponsiveMax?: number; onSleep?: () => Promise<void> } = {}) {
    return startBridge({
      settings: settings(options.unresponsiveMax),
      createDriver: () => driver,
      connectPublisher,
      sleep: options.onSleep ?? (() => stopBridge()),
    });
  }

  function publishedTopics(): string[] {
    return fake.publisher.publish.mock.calls.map((call) => `${call[0]} ${call[1]}`);
  }

  beforeEach(() => {
    driver = createFakeDriver();
    fake = createFakePublisher();
    connectPublisher = vi.fn(
      async (_options: TelemetryPublisherOptions): Promise<Result<TelemetryPublisher, MqttError>> =>
        ok(fake.publisher),
    );
  });

  afterEach(async () => {
    await stopBridge();
  });

  // ===========================================================================
  // Startup
  // ===========================================================================

  describe("startBridge", () => {
    test("announces, describes and then publishes readings", async () => {
      // Act
      const result = await start();

      // Assert
      expect(result.isOk()).toBe(true);
      expect(fake.publisher.publish.mock.calls.map((call) => call[0])).toEqual([
        `${BASE}/availability`,
        `${BASE}/current_summation/config`,
        `${BASE}/instantaneous_demand/config`,
        `${BASE}/current_summation/state`,
        `${BASE}/instantaneous_demand/state`,
        `${BASE}/availability`,
      ]);
      expect(fake.publisher.publish.mock.calls.every((call) => call[2]?.retain === true)).toBe(
        true,
      );
    });

    test("marks the bridge offline on stop", async () => {
      await start();

      expect(publishedTopics().at(0)).toBe(`${BASE}/availability online`);
      expect(publishedTopics().at(-1)).toBe(`${BASE}/availability offline`);
      expect(fake.publisher.close).toHaveBeenCalledTimes(1);
      expect(driver.disconnect).toHaveBeenCalledTimes(1);
    });

    test("identifies the device before contacting the broker", async () => {
      await start();

      const [infoOrder] = driver.getDeviceInfo.mock.invocationCallOrder;
      const [demandOrder] = driver.getInstantaneousDemand.mock.invocationCallOrder;
      const [brokerOrder] = connectPublisher.mock.invocationCallOrder;
      expect(driver.setScheduleDefault).toHaveBeenCalledTimes(1);
      expect(infoOrder).toBeLessThan(demandOrder ?? 0);
      expect(demandOrder).toBeLessThan(brokerOrder ?? 0);
    });

    test("registers the offline will in the connect options", async () => {
      await start();

      expect(connectPublisher).toHaveBeenCalledWith({
        hostname: "broker.test",
        port: 1883,
        clientId: "emu-bridge-test",
        username: undefined,
        password: undefined,
        will: { topic: `${BASE}/availability`, payload: "offline", retain: true },
      });
    });

    test("publishes online again after a broker reconnect", async () => {
      await start({
        onSleep: async () => {
          fake.reconnect();
          await stopBridge();
        },
      });

      expect(publishedTopics().filter((t) => t === `${BASE}/availability online`)).toHaveLength(2);
    });

    test("tolerates a failed schedule reset", async () => {
      driver.setScheduleDefault.mockResolvedValue(err(WRITE_ERROR));

      const result = await start();

      expect(result.isOk()).toBe(true);
      expect(connectPublisher).toHaveBeenCalledTimes(1);
    });

    test("refuses a second start while running", async () => {
      const attempts: Result<void, BridgeError>[] = [];

      await start({
        onSleep: async () => {
          attempts.push(await start());
          await stopBridge();
        },
      });

      expect(attempts[0]?._unsafeUnwrapErr().type).toBe("ALREADY_RUNNING");
    });
  });

  // ===========================================================================
  // Startup failures
  // ===========================================================================

  describe("startBridge failures", () => {
    test("fails without touching the broker when the device is unreachable", async () => {
      driver.connect.mockResolvedValue(err(PORT_MISSING));

      const result = await start();

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "DEVICE_UNAVAILABLE",
        message: "Could not open the device link",
      });
      expect(connectPublisher).not.toHaveBeenCalled();
      expect(fake.publisher.publish).not.toHaveBeenCalled();
      expect(getBridgeStatus().phase).toBe("stopped");
    });

    test("fails when the device does not report its identity", async () => {
      driver.getDeviceInfo.mockResolvedValue(err(SILENT));

      const result = await start();

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "DEVICE_UNAVAILABLE",
        message: "Device did not report its identity",
      });
      expect(driver.disconnect).toHaveBeenCalledTimes(1);
      expect(connectPublisher).not.toHaveBeenCalled();
    });

    test("fails when the broker is unreachable", async () => {
      connectPublisher.mockResolvedValue(err(BROKER_DOWN));

      const result = await start();

      expect(result._unsafeUnwrapErr().type).toBe("BROKER_UNAVAILABLE");
      expect(driver.disconnect).toHaveBeenCalledTimes(1);
    });

    test("fails when the device link cannot be reopened", async () => {
      driver.getCurrentSummation.mockResolvedValue(
        ok({ meterMac: METER_MAC, value: 0n, multiplier: 1, divisor: 1000, timestamp: null }),
      );
      driver.connect.mockResolvedValueOnce(ok(true)).mockResolvedValue(err(PORT_MISSING));

      const result = await start({ unresponsiveMax: 0 });

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "POLLING_FAILED",
        cause: { type: "RECONNECT_FAILED" },
      });
    });
  });

  // ===========================================================================
  // Status
  // ===========================================================================

  describe("getBridgeStatus", () => {
    test("reports identity, links and polling progress while running", async () => {
      const seen: BridgeStatus[] = [];

      await start({
        onSleep: async () => {
          seen.push(getBridgeStatus());
          await stopBridge();
        },
      });

      expect(seen[0]).toMatchObject({
        phase: "running",
        meterMac: METER_MAC,
        device: { deviceMac: "0xd8d5b90000001a2b" },
        emuConnection: "connected",
        mqttConnected: true,
        polling: { state: "polling", cycles: 1, unresponsiveCount: 0 },
      });
    });
  });
});
