/**
 * Status API routes.
 *
 * - /api/health - liveness and link state
 * - /api/status - polling session snapshot
 * - /api/version - app version
 */
import { Hono } from "hono";

import { getBridgeStatus } from "../bridge/index.js";
import { config } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

export const VERSION = "1.0.0";

export const routes = new Hono();

// =============================================================================
// Health Check
// =============================================================================

/**
 * 200 while polling with both links up, 503 otherwise.
 */
routes.get("/api/health", (c) => {
  const requestId = c.get("requestId");
  log.debug({ requestId }, "Health check");

  const bridge = getBridgeStatus();
  const healthy =
    bridge.phase === "running" &&
    bridge.emuConnection === "connected" &&
    bridge.mqttConnected;

  return c.json(
    {
      status: healthy ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      requestId,
      version: VERSION,
      uptimeS: Math.round(process.uptime()),
      phase: bridge.phase,
      links: {
        emu: bridge.emuConnection,
        mqtt: bridge.mqttConnected ? "connected" : "disconnected",
      },
    },
    healthy ? 200 : 503,
  );
});

routes.get("/api/version", (c) => {
  return c.json({ version: VERSION });
});

// =============================================================================
// Bridge Status
// =============================================================================

routes.get("/api/status", (c) => {
  const requestId = c.get("requestId");
  log.debug({ requestId }, "GET /api/status");

  const bridge = getBridgeStatus();

  return c.json({
    requestId,
    appName: config.APP_NAME,
    phase: bridge.phase,
    startedAt: bridge.startedAt === null ? null : new Date(bridge.startedAt).toISOString(),
    meterMac: bridge.meterMac,
    device: bridge.device,
    links: {
      emu: bridge.emuConnection,
      mqtt: bridge.mqttConnected ? "connected" : "disconnected",
    },
    polling: bridge.polling && {
      state: bridge.polling.state,
      unresponsiveCount: bridge.polling.unresponsiveCount,
      cycles: bridge.polling.cycles,
      resets: bridge.polling.resets,
      lastReadings: bridge.polling.lastReadings,
    },
  });
});
