/**
 * Polling Module - Service Layer
 *
 * The polling state machine. Each cycle requests CurrentSummation and then
 * InstantaneousDemand, publishing each as it arrives. A non-response bumps
 * the shared unresponsiveness counter and ends the cycle: below the
 * threshold the loop sleeps, above it the device link is reopened and the
 * next cycle starts at once.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type CurrentSummation,
  type EmuError,
  type InstantaneousDemand,
  formatEmuError,
} from "../emu/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  READING_KINDS,
  READING_UNITS,
  type ReadingKind,
  convertReading,
  hasTimestamp,
  serializeStatePayload,
} from "../reading/index.js";
import { type PollingError, formatPollingError, reconnectFailed } from "./errors.js";
import {
  type CycleOutcome,
  INITIAL_POLLING_STATUS,
  type LastReading,
  type PollingDeps,
  type PollingSession,
  type PollingStatus,
} from "./schema.js";

const log = createLogger("polling");

/**
 * Promise-based sleep used outside tests.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createPollingSession(deps: PollingDeps): PollingSession {
  return { ...deps, status: INITIAL_POLLING_STATUS };
}

function updateStatus(session: PollingSession, patch: Partial<PollingStatus>): void {
  session.status = { ...session.status, ...patch };
}

// =============================================================================
// Reading Steps
// =============================================================================

function requestReading(
  session: PollingSession,
  kind: ReadingKind,
): Promise<Result<CurrentSummation | InstantaneousDemand, EmuError>> {
  switch (kind) {
    case "current_summation":
      return session.driver.getCurrentSummation();
    case "instantaneous_demand":
      return session.driver.getInstantaneousDemand();
  }
}

/**
 * Close and reopen the device link, then zero the counter.
 */
async function resetDeviceLink(
  session: PollingSession,
): Promise<Result<true, PollingError>> {
  const startTime = Date.now();
  updateStatus(session, { state: "resetting" });
  logOperationStart(log, "resetDeviceLink", { count: session.status.unresponsiveCount });

  await session.driver.disconnect();
  const reopened = await session.driver.connect();

  if (reopened.isErr()) {
    logOperationFailed(log, "resetDeviceLink", formatEmuError(reopened.error));
    return err(reconnectFailed(reopened.error));
  }

  updateStatus(session, {
    state: "polling",
    unresponsiveCount: 0,
    resets: session.status.resets + 1,
  });
  logOperationComplete(log, "resetDeviceLink", startTime);
  return ok(true);
}

async function handleNonResponse(
  session: PollingSession,
  kind: ReadingKind,
  reason: string,
): Promise<Result<CycleOutcome, PollingError>> {
  if (session.status.stopRequested) {
    log.debug({ kind, reason }, "Stopping, ignoring non-response");
    return ok("backoff");
  }

  const count = session.status.unresponsiveCount + 1;
  updateStatus(session, { unresponsiveCount: count });

  if (count > session.unresponsiveMax) {
    log.warn({ kind, count, reason }, "Device unresponsive, reopening link");
    const reset = await resetDeviceLink(session);
    return reset.map((): CycleOutcome => "reset");
  }

  log.info({ kind, count, reason }, "No reading, sleeping");
  await session.sleep(session.intervalMs);
  return ok("backoff");
}

function publishReading(
  session: PollingSession,
  kind: ReadingKind,
  reading: CurrentSummation | InstantaneousDemand,
): void {
  const quantity = convertReading(reading);
  const unit = READING_UNITS[kind];

  session.publisher.publish(session.stateTopics[kind], serializeStatePayload(quantity), {
    retain: true,
  });

  const lastReadings: Partial<Record<ReadingKind, LastReading>> = {
    ...session.status.lastReadings,
  };
  lastReadings[kind] = { value: quantity.toString(), unit, publishedAt: Date.now() };
  updateStatus(session, { lastReadings });

  log.info({ kind, value: quantity.toString(), unit }, "Reading published");
}

/**
 * Request one reading and publish it, or apply the non-response policy.
 */
export async function pollReading(
  session: PollingSession,
  kind: ReadingKind,
): Promise<Result<CycleOutcome, PollingError>> {
  const response = await requestReading(session, kind);

  if (response.isErr()) {
    return handleNonResponse(session, kind, formatEmuError(response.error));
  }
  if (!hasTimestamp(response.value)) {
    return handleNonResponse(session, kind, "Response without timestamp");
  }

  updateStatus(session, { unresponsiveCount: 0 });
  publishReading(session, kind, response.value);
  return ok("published");
}

// =============================================================================
// Cycle and Loop
// =============================================================================

/**
 * Run one polling cycle.
 *
 * @throws InvalidDivisorError when a reading cannot be converted
 */
export async function runCycle(
  session: PollingSession,
): Promise<Result<CycleOutcome, PollingError>> {
  updateStatus(session, { cycles: session.status.cycles + 1 });

  for (const kind of READING_KINDS) {
    const step = await pollReading(session, kind);
    if (step.isErr() || step.value !== "published") return step;
  }

  await session.sleep(session.intervalMs);
  return ok("published");
}

/**
 * Run cycles until stopped. Returns an error only when the device link
 * could not be reopened.
 */
export async function runPollingLoop(
  session: PollingSession,
): Promise<Result<void, PollingError>> {
  log.info(
    { intervalMs: session.intervalMs, unresponsiveMax: session.unresponsiveMax },
    "Polling loop started",
  );

  while (!session.status.stopRequested) {
    const outcome = await runCycle(session);
    if (outcome.isErr()) {
      log.error({ error: formatPollingError(outcome.error) }, "Polling loop failed");
      return err(outcome.error);
    }
  }

  log.info({ cycles: session.status.cycles }, "Polling loop stopped");
  return ok(undefined);
}

/**
 * Ask the loop to exit after the current cycle.
 */
export function stopPollingLoop(session: PollingSession): void {
  updateStatus(session, { stopRequested: true });
}
