/**
 * API Routes Integration Tests
 *
 * Exercises the status endpoints with the bridge state mocked.
 * Uses Hono's app.request() for realistic HTTP testing.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { Hono } from "hono";

// Mock the service layer modules BEFORE importing routes
vi.mock("../../bridge/index.js", () => ({
  getBridgeStatus: vi.fn(),
}));

vi.mock("../../config.js", () => ({
  config: {
    APP_NAME: "EmuBridge",
    LOG_LEVEL: "silent",
    NODE_ENV: "test",
  },
}));

// Mock logger to prevent pino initialization issues
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

// Now import the modules (after mocks are set up)
import { getBridgeStatus, type BridgeStatus } from "../../bridge/index.js";
import { createApp } from "../app.js";
import { routes } from "../routes.js";

const METER_MAC = "0x00135003000f4c5d";

const RUNNING: BridgeStatus = {
  phase: "running",
  startedAt: Date.UTC(2026, 0, 2, 3, 4, 5),
  meterMac: METER_MAC,
  device: {
    deviceMac: "0xd8d5b90000001a2b",
    manufacturer: "Rainforest Automation, Inc.",
    modelId: "Z105-2-EMU2-LEDD_JM",
    firmwareVersion: "2.0.0 (7400)",
    hardwareVersion: "2.7.3",
    dateCode: null,
  },
  emuConnection: "connected",
  mqttConnected: true,
  polling: {
    state: "polling",
    unresponsiveCount: 1,
    cycles: 42,
    resets: 2,
    lastReadings: {
      current_summation: { value: "12.345", unit: "kWh", publishedAt: 1 },
    },
    stopRequested: false,
  },
};

const IDLE: BridgeStatus = {
  phase: "starting",
  startedAt: null,
  meterMac: null,
  device: null,
  emuConnection: "disconnected",
  mqttConnected: false,
  polling: null,
};

// Create a test app with the routes
function createTestApp() {
  const app = new Hono();

  // Add minimal middleware for requestId
  app.use("*", async (c, next) => {
    c.set("requestId", "test-request-id");
    await next();
  });

  app.route("/", routes);
  return app;
}

describe("API Routes", () => {
  let app: Hono;

  beforeEach(() => {
    app = createTestApp();
    vi.mocked(getBridgeStatus).mockReturnValue(RUNNING);
  });

  afterEach(() => {
    vi.resetAllMocks();
  });

  // ===========================================================================
  // Health Check
  // ===========================================================================

  describe("GET /api/health", () => {
    test("returns 200 while polling with both links up", async () => {
      // Act
      const res = await app.request("/api/health");
      const body = await res.json();

      // Assert
      expect(res.status).toBe(200);
      expect(body).toMatchObject({
        status: "ok",
        requestId: "test-request-id",
        version: "1.0.0",
        phase: "running",
        links: { emu: "connected", mqtt: "connected" },
      });
    });

    test("returns 503 when the broker link is down", async () => {
      vi.mocked(getBridgeStatus).mockReturnValue({ ...RUNNING, mqttConnected: false });

      const res = await app.request("/api/health");
      const body = await res.json();

      expect(res.status).toBe(503);
      expect(body).toMatchObject({
        status: "degraded",
        links: { emu: "connected", mqtt: "disconnected" },
      });
    });

    test("returns 503 before the bridge is running", async () => {
      vi.mocked(getBridgeStatus).mockReturnValue(IDLE);

      const res = await app.request("/api/health");

      expect(res.status).toBe(503);
    });
  });

  describe("GET /api/version", () => {
    test("returns version string", async () => {
      // Act
      const res = await app.request("/api/version");
      const body = await res.json();

      // Assert
      expect(res.status).toBe(200);
      expect(body).toEqual({ version: "1.0.0" });
    });
  });

  // ===========================================================================
  // Bridge Status
  // ===========================================================================

  describe("GET /api/status", () => {
    test("returns the polling snapshot", async () => {
      const res = await app.request("/api/status");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toEqual({
        requestId: "test-request-id",
        appName: "EmuBridge",
        phase: "running",
        startedAt: "2026-01-02T03:04:05.000Z",
        meterMac: METER_MAC,
        device: RUNNING.device,
        links: { emu: "connected", mqtt: "connected" },
        polling: {
          state: "polling",
          unresponsiveCount: 1,
          cycles: 42,
          resets: 2,
          lastReadings: {
            current_summation: { value: "12.345", unit: "kWh", publishedAt: 1 },
          },
        },
      });
    });

    test("returns nulls before startup completes", async () => {
      vi.mocked(getBridgeStatus).mockReturnValue(IDLE);

      const res = await app.request("/api/status");
      const body = await res.json();

      expect(body).toMatchObject({
        phase: "starting",
        startedAt: null,
        meterMac: null,
        device: null,
        polling: null,
      });
    });
  });
});

// =============================================================================
// Application wiring
// =============================================================================

describe("createApp", () => {
  beforeEach(() => {
    vi.mocked(getBridgeStatus).mockReturnValue(RUNNING);
  });

  test("echoes an incoming request id", async () => {
    const app = createApp();

    const res = await app.request("/api/version", {
      headers: { "x-request-id": "req-123" },
    });

    expect(res.headers.get("x-request-id")).toBe("req-123");
  });

  test("generates a request id when none is sent", async () => {
    const app = createApp();

    const res = await app.request("/api/version");

    expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  test("turns a thrown error into a JSON 500", async () => {
    const app = createApp();
    app.get("/api/explode", () => {
      throw new Error("kaboom");
    });

    const res = await app.request("/api/explode", {
      headers: { "x-request-id": "req-500" },
    });
    const body = await res.json();

    expect(res.status).toBe(500);
    expect(body).toEqual({ error: "kaboom", requestId: "req-500" });
  });
});
