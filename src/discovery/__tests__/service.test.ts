/**
 * Discovery Service Tests
 */
import { beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

// Import after mocks
import type { ConnectListener, TelemetryPublisher } from "../../mqtt/index.js";
import { publishDiscovery, publishOffline, registerAvailability } from "../service.js";

const AVAILABILITY = "homeassistant/sensor/emu_bridge-0x01/availability";

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

describe("Discovery Service", () => {
  let fake: ReturnType<typeof createFakePublisher>;

  beforeEach(() => {
    fake = createFakePublisher();
  });

  describe("publishDiscovery", () => {
    test("publishes each descriptor retained, in order", () => {
      publishDiscovery(fake.publisher, [
        { topic: "a/config", payload: '{"name":"a"}' },
        { topic: "b/config", payload: '{"name":"b"}' },
      ]);

      expect(fake.publisher.publish.mock.calls).toEqual([
        ["a/config", '{"name":"a"}', { retain: true }],
        ["b/config", '{"name":"b"}', { retain: true }],
      ]);
    });
  });

  describe("registerAvailability", () => {
    test("publishes online retained on connect", () => {
      registerAvailability(fake.publisher, AVAILABILITY);

      expect(fake.publisher.publish).toHaveBeenCalledWith(AVAILABILITY, "online", {
        retain: true,
      });
    });

    test("publishes online again after each reconnect", () => {
      registerAvailability(fake.publisher, AVAILABILITY);

      fake.reconnect();
      fake.reconnect();

      expect(fake.publisher.publish).toHaveBeenCalledTimes(3);
    });
  });

  describe("publishOffline", () => {
    test("publishes offline retained", () => {
      publishOffline(fake.publisher, AVAILABILITY);

      expect(fake.publisher.publish).toHaveBeenCalledWith(AVAILABILITY, "offline", {
        retain: true,
      });
    });
  });
});
