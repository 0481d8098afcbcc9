/**
 * Polling Module - Types
 *
 * The session object carried through every cycle of the polling loop.
 */
import type { EmuDriver } from "../emu/index.js";
import type { TelemetryPublisher } from "../mqtt/index.js";
import type { ReadingKind, ReadingUnit } from "../reading/index.js";

export type PollingState = "polling" | "resetting";

/**
 * How a cycle ended:
 * - published: both readings went out, then slept
 * - backoff: a non-response below the threshold, then slept
 * - reset: threshold exceeded, link reopened, no sleep
 */
export type CycleOutcome = "published" | "backoff" | "reset";

export type LastReading = Readonly<{
  /** Exact decimal string */
  value: string;
  unit: ReadingUnit;
  publishedAt: number;
}>;

export type PollingStatus = Readonly<{
  state: PollingState;
  unresponsiveCount: number;
  cycles: number;
  resets: number;
  lastReadings: Readonly<Partial<Record<ReadingKind, LastReading>>>;
  stopRequested: boolean;
}>;

export const INITIAL_POLLING_STATUS: PollingStatus = {
  state: "polling",
  unresponsiveCount: 0,
  cycles: 0,
  resets: 0,
  lastReadings: {},
  stopRequested: false,
};

export type PollingDeps = Readonly<{
  driver: EmuDriver;
  publisher: TelemetryPublisher;
  stateTopics: Readonly<Record<ReadingKind, string>>;
  intervalMs: number;
  unresponsiveMax: number;
  sleep: (ms: number) => Promise<void>;
}>;

/**
 * Dependencies are fixed; `status` is replaced as the loop progresses.
 */
export type PollingSession = PollingDeps & {
  status: PollingStatus;
};
