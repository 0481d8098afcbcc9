/**
 * EMU Module - Service Layer
 *
 * Request/response client for the EMU-2 over its USB serial port.
 * One request may be in flight at a time; a request that gets no matching
 * fragment within the timeout resolves as a TIMEOUT error.
 */
import { type Result, err, ok } from "neverthrow";
import { SerialPort } from "serialport";

import { createLogger } from "../logger.js";
import {
  type EmuError,
  busy,
  connectionFailed,
  formatEmuError,
  invalidResponse,
  notConnected,
  timeout,
  writeFailed,
} from "./errors.js";
import {
  type CurrentSummation,
  type DeviceInfo,
  type EmuConnectionState,
  type EmuQueryName,
  type EmuResponseTag,
  type InstantaneousDemand,
  RESPONSE_TAGS,
  type RavenFragment,
} from "./schema.js";
import {
  encodeCommand,
  extractFragments,
  toCurrentSummation,
  toDeviceInfo,
  toInstantaneousDemand,
} from "./transform.js";

const log = createLogger("emu");

/**
 * Unframed text kept beyond this is noise and gets dropped.
 */
const MAX_BUFFERED_CHARS = 16 * 1024;

// =============================================================================
// Port Abstraction
// =============================================================================

/**
 * The part of a serialport stream the driver uses.
 */
export type EmuPort = {
  readonly isOpen: boolean;
  open(callback: (error: Error | null) => void): void;
  close(callback: (error: Error | null) => void): void;
  write(data: string, callback: (error: Error | null | undefined) => void): boolean;
  on(event: "data", listener: (chunk: Buffer) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "close", listener: () => void): unknown;
};

export type EmuPortFactory = (
  options: Readonly<{ path: string; baudRate: number }>,
) => EmuPort;

const openSerialPort: EmuPortFactory = (options) =>
  new SerialPort({ path: options.path, baudRate: options.baudRate, autoOpen: false });

// =============================================================================
// Driver
// =============================================================================

export type EmuDriverOptions = Readonly<{
  serialPath: string;
  baudRate: number;
  timeoutMs: number;
  createPort?: EmuPortFactory;
}>;

/**
 * Operations the polling loop and bootstrap use.
 */
export type EmuDriver = Readonly<{
  connect: () => Promise<Result<true, EmuError>>;
  disconnect: () => Promise<void>;
  setScheduleDefault: () => Promise<Result<true, EmuError>>;
  getDeviceInfo: () => Promise<Result<DeviceInfo, EmuError>>;
  getCurrentSummation: () => Promise<Result<CurrentSummation, EmuError>>;
  getInstantaneousDemand: () => Promise<Result<InstantaneousDemand, EmuError>>;
  getConnectionState: () => EmuConnectionState;
}>;

type PendingRequest = {
  readonly tag: EmuResponseTag;
  readonly timer: ReturnType<typeof setTimeout>;
  readonly resolve: (result: Result<RavenFragment, EmuError>) => void;
};

/**
 * Create a driver bound to one serial path. Every connect opens a fresh port.
 */
export function createEmuDriver(options: EmuDriverOptions): EmuDriver {
  const createPort = options.createPort ?? openSerialPort;

  let port: EmuPort | null = null;
  let connectionState: EmuConnectionState = "disconnected";
  let buffer = "";
  let pending: PendingRequest | null = null;

  function settle(
    entry: PendingRequest | null,
    result: Result<RavenFragment, EmuError>,
  ): void {
    if (entry === null || pending !== entry) return;

    pending = null;
    clearTimeout(entry.timer);
    entry.resolve(result);
  }

  function handleData(chunk: Buffer): void {
    buffer += chunk.toString("utf8");

    const { fragments, rest } = extractFragments(buffer);
    if (rest.length > MAX_BUFFERED_CHARS) {
      log.warn({ droppedChars: rest.length }, "Dropping unframed serial data");
      buffer = "";
    } else {
      buffer = rest;
    }

    for (const fragment of fragments) {
      if (pending && fragment.tag === pending.tag) {
        log.debug({ tag: fragment.tag }, "Response received");
        settle(pending, ok(fragment));
      } else {
        log.debug({ tag: fragment.tag }, "Ignoring unsolicited fragment");
      }
    }
  }

  // ===========================================================================
  // Connection
  // ===========================================================================

  async function connect(): Promise<Result<true, EmuError>> {
    if (port && connectionState === "connected") {
      log.warn("EMU already connected");
      return ok(true);
    }

    log.info({ path: options.serialPath, baudRate: options.baudRate }, "Opening serial port...");

    const next = createPort({ path: options.serialPath, baudRate: options.baudRate });

    next.on("data", (chunk) => {
      if (port === next) handleData(chunk);
    });

    next.on("error", (error) => {
      log.error({ error: error.message }, "Serial port error");
    });

    next.on("close", () => {
      if (port !== next) return;

      log.warn("Serial port closed");
      port = null;
      connectionState = "disconnected";
      settle(pending, err(notConnected("Serial port closed")));
    });

    try {
      await new Promise<void>((resolve, reject) => {
        next.open((error) => (error ? reject(error) : resolve()));
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      log.error({ path: options.serialPath, error: cause.message }, "Failed to open serial port");
      return err(connectionFailed(cause.message, cause));
    }

    port = next;
    buffer = "";
    connectionState = "connected";

    log.info({ path: options.serialPath }, "Serial port open");
    return ok(true);
  }

  async function disconnect(): Promise<void> {
    const current = port;

    port = null;
    connectionState = "disconnected";
    buffer = "";
    settle(pending, err(notConnected("Disconnected")));

    if (!current?.isOpen) return;

    log.info({ path: options.serialPath }, "Closing serial port...");

    await new Promise<void>((resolve) => {
      current.close((error) => {
        if (error) {
          log.warn({ error: error.message }, "Error while closing serial port");
        }
        resolve();
      });
    });
  }

  // ===========================================================================
  // Requests
  // ===========================================================================

  function request(
    name: EmuQueryName,
    args: Readonly<Record<string, string>> = {},
  ): Promise<Result<RavenFragment, EmuError>> {
    const current = port;
    if (!current || connectionState !== "connected") {
      return Promise.resolve(err(notConnected(`Cannot send ${name}`)));
    }
    if (pending) {
      return Promise.resolve(
        err(busy(`Cannot send ${name} while waiting for ${pending.tag}`)),
      );
    }

    const tag = RESPONSE_TAGS[name];

    return new Promise((resolve) => {
      const entry: PendingRequest = {
        tag,
        resolve,
        timer: setTimeout(() => {
          settle(entry, err(timeout(`No ${tag} response`, options.timeoutMs)));
        }, options.timeoutMs),
      };
      pending = entry;

      log.debug({ command: name }, "Sending command");
      current.write(encodeCommand(name, args), (error) => {
        if (error) settle(entry, err(writeFailed(error.message, error)));
      });
    });
  }

  async function query<T>(
    name: EmuQueryName,
    args: Readonly<Record<string, string>>,
    decode: (fragment: RavenFragment) => T | null,
  ): Promise<Result<T, EmuError>> {
    const response = await request(name, args);
    if (response.isErr()) {
      log.debug({ command: name, error: formatEmuError(response.error) }, "No usable response");
      return err(response.error);
    }

    const decoded = decode(response.value);
    if (decoded === null) {
      return err(
        invalidResponse(`Malformed ${response.value.tag} fragment`, response.value.fields),
      );
    }
    return ok(decoded);
  }

  async function setScheduleDefault(): Promise<Result<true, EmuError>> {
    const current = port;
    if (!current || connectionState !== "connected") {
      return err(notConnected("Cannot send set_schedule_default"));
    }

    return new Promise((resolve) => {
      current.write(encodeCommand("set_schedule_default"), (error) => {
        resolve(error ? err(writeFailed(error.message, error)) : ok(true));
      });
    });
  }

  return {
    connect,
    disconnect,
    setScheduleDefault,
    getDeviceInfo: () => query("get_device_info", {}, toDeviceInfo),
    getCurrentSummation: () =>
      query("get_current_summation_delivered", { Refresh: "Y" }, toCurrentSummation),
    getInstantaneousDemand: () =>
      query("get_instantaneous_demand", { Refresh: "Y" }, toInstantaneousDemand),
    getConnectionState: () => connectionState,
  };
}
