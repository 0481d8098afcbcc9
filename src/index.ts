#!/usr/bin/env node
/**
 * EMU-2 MQTT Bridge - Application Entry Point
 *
 * Starts the status API (when enabled) and the bridge. Any failure that
 * stops the bridge exits with status 1 so the service manager restarts it.
 */
import { serve } from "@hono/node-server";

import { createApp } from "./api/app.js";
import {
  type BridgeError,
  bridgeErrorCause,
  formatBridgeError,
  startBridge,
  stopBridge,
} from "./bridge/index.js";
import { config, getEmuConfig, getMqttConfig, getPollingConfig } from "./config.js";
import { createEmuDriver } from "./emu/index.js";
import { createLogger } from "./logger.js";
import { connectTelemetryPublisher } from "./mqtt/index.js";

const log = createLogger("bridge");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  EMU-2 MQTT BRIDGE");
console.log("========================================");
console.log("");

const emuConfig = getEmuConfig();
const mqttConfig = getMqttConfig();
const pollingConfig = getPollingConfig();

// Non-sensitive values only
log.info(
  {
    env: config.NODE_ENV,
    serialPath: emuConfig.serialPath,
    baudRate: emuConfig.baudRate,
    timeoutMs: emuConfig.timeoutMs,
    broker: `${mqttConfig.hostname}:${mqttConfig.port}`,
    clientId: mqttConfig.clientId,
    discoveryPrefix: mqttConfig.discoveryPrefix,
    nodeId: mqttConfig.nodeId,
    intervalMs: pollingConfig.intervalMs,
    unresponsiveMax: pollingConfig.unresponsiveMax,
  },
  "Configuration loaded",
);

// =============================================================================
// FATAL HANDLING
// =============================================================================

function exitWithBridgeError(error: BridgeError): never {
  const message = formatBridgeError(error);
  log.fatal({ type: error.type, error: message }, "Bridge stopped");

  console.error(message);
  const cause = bridgeErrorCause(error);
  if (cause?.stack) console.error(cause.stack);

  process.exit(1);
}

function exitWithDefect(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  log.fatal({ error: message }, "Unexpected failure");

  console.error(error instanceof Error ? (error.stack ?? message) : message);

  process.exit(1);
}

process.on("uncaughtException", exitWithDefect);
process.on("unhandledRejection", exitWithDefect);

// =============================================================================
// STATUS API
// =============================================================================

const server = config.HTTP_ENABLED
  ? serve({ fetch: createApp().fetch, port: config.HTTP_PORT, hostname: "0.0.0.0" }, (info) => {
      log.info({ port: info.port }, `${config.APP_NAME} status API listening on port ${info.port}`);
    })
  : null;

if (!server) {
  log.info("Status API: DISABLED");
}

// =============================================================================
// START BRIDGE
// =============================================================================

startBridge({
  settings: { mqtt: mqttConfig, polling: pollingConfig },
  createDriver: () => createEmuDriver(emuConfig),
  connectPublisher: connectTelemetryPublisher,
})
  .then((result) => {
    if (result.isErr()) exitWithBridgeError(result.error);
    log.info("Polling loop finished");
  })
  .catch(exitWithDefect);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string): void => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  server?.close();

  stopBridge()
    .then(() => {
      log.info("Shutdown complete");
      process.exit(0);
    })
    .catch(exitWithDefect);
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
