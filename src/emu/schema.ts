/**
 * EMU Module - Schemas and Types
 *
 * Data shapes for the RAVEn XML protocol spoken by the EMU-2.
 * Responses are flat XML fragments whose numeric fields are hex strings.
 * Schemas are the source of truth - fragment types derived with z.infer<>.
 */
import { z } from "zod";

import type { RawReading } from "../reading/index.js";

// =============================================================================
// Commands
// =============================================================================

/**
 * Commands the bridge sends to the device.
 */
export type EmuCommandName =
  | "get_device_info"
  | "get_current_summation_delivered"
  | "get_instantaneous_demand"
  | "set_schedule_default";

/**
 * Root tag of the fragment that answers each query command.
 */
export const RESPONSE_TAGS = {
  get_device_info: "DeviceInfo",
  get_current_summation_delivered: "CurrentSummationDelivered",
  get_instantaneous_demand: "InstantaneousDemand",
} as const;

export type EmuQueryName = keyof typeof RESPONSE_TAGS;
export type EmuResponseTag = (typeof RESPONSE_TAGS)[EmuQueryName];

// =============================================================================
// Raw Fragments
// =============================================================================

/**
 * A complete top-level XML fragment read from the serial stream.
 */
export type RavenFragment = Readonly<{
  tag: string;
  fields: Readonly<Record<string, string>>;
}>;

const HexSchema = z
  .string()
  .regex(/^0x[0-9A-Fa-f]+$/, "Expected a 0x-prefixed hex value");

/**
 * Empty elements are reported as missing.
 */
const OptionalHexSchema = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val === "" ? undefined : val))
  .pipe(HexSchema.optional());

export const DeviceInfoFragmentSchema = z.object({
  DeviceMacId: z.string().min(1).describe("MAC of the EMU itself"),
  FWVersion: z.string().default("").describe("Firmware version"),
  HWVersion: z.string().default("").describe("Hardware version"),
  Manufacturer: z.string().default("").describe("Manufacturer name"),
  ModelId: z.string().default("").describe("Model identifier"),
  DateCode: z.string().optional().describe("Manufacturing date code"),
});

export type DeviceInfoFragment = z.infer<typeof DeviceInfoFragmentSchema>;

export const CurrentSummationFragmentSchema = z.object({
  DeviceMacId: z.string().min(1),
  MeterMacId: z.string().min(1),
  TimeStamp: OptionalHexSchema.describe("Seconds since 2000-01-01 UTC"),
  SummationDelivered: HexSchema.describe("Energy delivered to the premises"),
  SummationReceived: OptionalHexSchema.describe("Energy received from the premises"),
  Multiplier: HexSchema,
  Divisor: HexSchema,
});

export type CurrentSummationFragment = z.infer<typeof CurrentSummationFragmentSchema>;

export const InstantaneousDemandFragmentSchema = z.object({
  DeviceMacId: z.string().min(1),
  MeterMacId: z.string().min(1),
  TimeStamp: OptionalHexSchema.describe("Seconds since 2000-01-01 UTC"),
  Demand: HexSchema.describe("Signed 32-bit demand"),
  Multiplier: HexSchema,
  Divisor: HexSchema,
});

export type InstantaneousDemandFragment = z.infer<
  typeof InstantaneousDemandFragmentSchema
>;

// =============================================================================
// Parsed Responses
// =============================================================================

/**
 * Device identity, fetched once at startup.
 */
export type DeviceInfo = Readonly<{
  deviceMac: string;
  manufacturer: string;
  modelId: string;
  firmwareVersion: string;
  hardwareVersion: string;
  dateCode: string | null;
}>;

export type CurrentSummation = RawReading &
  Readonly<{
    meterMac: string;
  }>;

export type InstantaneousDemand = RawReading &
  Readonly<{
    meterMac: string;
  }>;

// =============================================================================
// Connection State
// =============================================================================

export type EmuConnectionState = "disconnected" | "connected";
