/**
 * Module-scoped color-coded loggers for the EMU bridge.
 *
 * Each module gets its own named logger with an assigned color for
 * easy visual identification in development logs.
 */
import { type Logger, pino } from "pino";
import { config } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  // Core modules
  bridge: "\x1b[34m", // blue
  polling: "\x1b[33m", // yellow

  // Device modules
  emu: "\x1b[36m", // cyan
  reading: "\x1b[35m", // magenta

  // Communication modules
  mqtt: "\x1b[91m", // bright red
  discovery: "\x1b[32m", // green
  api: "\x1b[94m", // bright blue
  middleware: "\x1b[95m", // bright magenta

  // Infrastructure
  config: "\x1b[90m", // gray
} as const;

const RESET = "\x1b[0m";

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @example
 * const log = createLogger('emu');
 * log.info({ path }, 'Opening serial port');
 */
export function createLogger(module: ModuleName): Logger {
  const color = MODULE_COLORS[module];

  const isDevelopment = config.NODE_ENV === "development";

  if (isDevelopment) {
    // Pretty printing for development
    return pino({
      name: module,
      level: config.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          messageFormat: `${color}[{name}]${RESET} {msg}`,
          ignore: "pid,hostname",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  // Structured JSON for production
  return pino({
    name: module,
    level: config.LOG_LEVEL,
  });
}

/**
 * Log operation entry with consistent format.
 */
export function logOperationStart(
  logger: Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.info({ operation, ...context }, `→ ${operation} started`);
}

/**
 * Log operation completion with duration.
 */
export function logOperationComplete(
  logger: Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

/**
 * Log operation failure. Callers pass the reason already formatted by
 * their module's `format…Error`.
 */
export function logOperationFailed(
  logger: Logger,
  operation: string,
  reason: string,
  context: Record<string, unknown> = {},
): void {
  logger.error({ operation, error: reason, ...context }, `✗ ${operation} failed: ${reason}`);
}
