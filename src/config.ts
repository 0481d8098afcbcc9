/**
 * Typed configuration - all config lives in the environment, parsed with Zod
 * at startup. App crashes immediately on invalid config - fail fast.
 *
 * EMU bridge configuration covering:
 * - Runtime settings
 * - RAVEn device link (serial path, timeout, unresponsiveness budget)
 * - MQTT broker and discovery topics
 * - Polling cadence
 * - Status API
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("EmuBridge").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // RAVEn Device
  // ==========================================================================
  EMU_SERIAL_PATH: z
    .string()
    .min(1, "EMU_SERIAL_PATH is required")
    .describe("Serial device path of the EMU-2 (e.g. /dev/ttyACM0)"),
  EMU_BAUD_RATE: z.coerce
    .number()
    .int()
    .positive()
    .default(115200)
    .describe("Serial baud rate"),
  EMU_TIMEOUT_S: z.coerce
    .number()
    .positive()
    .default(5)
    .describe("Seconds to wait for a device response before giving up"),
  EMU_UNRESPONSIVE_MAX: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(3)
    .describe("Consecutive non-responses tolerated before resetting the link"),

  // ==========================================================================
  // MQTT
  // ==========================================================================
  MQTT_HOSTNAME: z
    .string()
    .min(1, "MQTT_HOSTNAME is required")
    .describe("MQTT broker hostname"),
  MQTT_PORT: z.coerce
    .number()
    .int()
    .positive()
    .default(1883)
    .describe("MQTT broker port"),
  MQTT_CLIENT_ID: z.string().min(1).default("emu-bridge").describe("MQTT client id"),
  MQTT_USERNAME: optionalString.describe("MQTT username"),
  MQTT_PASSWORD: optionalString.describe("MQTT password"),
  MQTT_DISCOVERY_PREFIX: z
    .string()
    .min(1)
    .default("homeassistant")
    .describe("Home Assistant discovery topic prefix"),
  MQTT_NODE_ID: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, "MQTT_NODE_ID must be a topic-safe identifier")
    .default("emu_bridge")
    .describe("Node segment used in discovery topics"),

  // ==========================================================================
  // Polling
  // ==========================================================================
  POLL_INTERVAL_S: z.coerce
    .number()
    .positive()
    .default(10)
    .describe("Seconds to sleep between poll cycles and after a non-response"),

  // ==========================================================================
  // Status API
  // ==========================================================================
  HTTP_ENABLED: envBoolean(false).describe("Serve the status API"),
  HTTP_PORT: z.coerce.number().int().positive().default(8084).describe("Status API port"),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse a raw environment into typed config.
 */
export function parseConfig(env: Record<string, string | undefined>) {
  return ConfigSchema.safeParse(env);
}

// Parse at startup - crashes immediately if invalid
const parsed = parseConfig(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config: Config = parsed.data;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Device link configuration for the EMU driver.
 */
export function getEmuConfig(): Readonly<{
  serialPath: string;
  baudRate: number;
  timeoutMs: number;
}> {
  return {
    serialPath: config.EMU_SERIAL_PATH,
    baudRate: config.EMU_BAUD_RATE,
    timeoutMs: config.EMU_TIMEOUT_S * 1000,
  };
}

/**
 * Broker connection and topic configuration.
 */
export function getMqttConfig(): Readonly<{
  hostname: string;
  port: number;
  clientId: string;
  username: string | undefined;
  password: string | undefined;
  discoveryPrefix: string;
  nodeId: string;
}> {
  return {
    hostname: config.MQTT_HOSTNAME,
    port: config.MQTT_PORT,
    clientId: config.MQTT_CLIENT_ID,
    username: config.MQTT_USERNAME,
    password: config.MQTT_PASSWORD,
    discoveryPrefix: config.MQTT_DISCOVERY_PREFIX,
    nodeId: config.MQTT_NODE_ID,
  };
}

/**
 * Polling cadence for the main loop.
 */
export function getPollingConfig(): Readonly<{
  intervalMs: number;
  unresponsiveMax: number;
}> {
  return {
    intervalMs: config.POLL_INTERVAL_S * 1000,
    unresponsiveMax: config.EMU_UNRESPONSIVE_MAX,
  };
}
