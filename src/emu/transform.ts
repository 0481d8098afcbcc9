/**
 * EMU Module - Pure Transformations
 *
 * Encoding of RAVEn commands and decoding of the XML fragments the device
 * writes back. No side effects, no I/O - just data in, data out.
 */
import type {
  CurrentSummation,
  DeviceInfo,
  EmuCommandName,
  InstantaneousDemand,
  RavenFragment,
} from "./schema.js";
import {
  CurrentSummationFragmentSchema,
  DeviceInfoFragmentSchema,
  InstantaneousDemandFragmentSchema,
  RESPONSE_TAGS,
} from "./schema.js";

// =============================================================================
// Command Encoding
// =============================================================================

/**
 * Encode a command for the serial link.
 *
 * @example
 * encodeCommand("get_instantaneous_demand", { Refresh: "Y" })
 * // "<Command>\n<Name>get_instantaneous_demand</Name>\n<Refresh>Y</Refresh>\n</Command>\n"
 */
export function encodeCommand(
  name: EmuCommandName,
  args: Readonly<Record<string, string>> = {},
): string {
  const lines = [
    "<Command>",
    `<Name>${name}</Name>`,
    ...Object.entries(args).map(([key, value]) => `<${key}>${value}</${key}>`),
    "</Command>",
  ];
  return `${lines.join("\n")}\n`;
}

// =============================================================================
// Stream Framing
// =============================================================================

const OPEN_TAG = /<([A-Za-z][A-Za-z0-9]*)>/g;
const FIELD = /<([A-Za-z][A-Za-z0-9]*)>([^<]*)<\/\1>/g;
const RESPONSE_ROOTS: ReadonlySet<string> = new Set(Object.values(RESPONSE_TAGS));

/**
 * Split buffered serial text into complete top-level fragments.
 *
 * `rest` holds the text that may still become a fragment once more bytes
 * arrive: an opened but unclosed element, or a partial tag at the end.
 * An unclosed element followed by a response root is discarded, and
 * framing resumes at that root.
 */
export function extractFragments(
  buffer: string,
): Readonly<{ fragments: ReadonlyArray<RavenFragment>; rest: string }> {
  const fragments: RavenFragment[] = [];
  let cursor = 0;

  for (;;) {
    OPEN_TAG.lastIndex = cursor;
    const open = OPEN_TAG.exec(buffer);
    const tag = open?.[1];

    if (!open || tag === undefined) {
      return { fragments, rest: trailingPartialTag(buffer, cursor) };
    }

    const closeTag = `</${tag}>`;
    const bodyStart = open.index + open[0].length;
    const end = buffer.indexOf(closeTag, bodyStart);

    if (end === -1) {
      const resync = nextResponseRoot(buffer, bodyStart);
      if (resync === -1) {
        return { fragments, rest: buffer.slice(open.index) };
      }
      cursor = resync;
      continue;
    }

    fragments.push({ tag, fields: parseFields(buffer.slice(bodyStart, end)) });
    cursor = end + closeTag.length;
  }
}

function nextResponseRoot(buffer: string, from: number): number {
  OPEN_TAG.lastIndex = from;
  for (let open = OPEN_TAG.exec(buffer); open; open = OPEN_TAG.exec(buffer)) {
    const tag = open[1];
    if (tag !== undefined && RESPONSE_ROOTS.has(tag)) return open.index;
  }
  return -1;
}

function trailingPartialTag(buffer: string, from: number): string {
  const lastOpen = buffer.lastIndexOf("<");
  if (lastOpen < from) return "";

  const tail = buffer.slice(lastOpen);
  return tail.includes(">") ? "" : tail;
}

/**
 * Collect the leaf elements of a fragment body into a record.
 */
export function parseFields(body: string): Readonly<Record<string, string>> {
  const fields: Record<string, string> = {};
  for (const match of body.matchAll(FIELD)) {
    const [, key, value] = match;
    if (key !== undefined && value !== undefined) {
      fields[key] = value.trim();
    }
  }
  return fields;
}

// =============================================================================
// Value Decoding
// =============================================================================

/**
 * Decode a 0x-prefixed hex string.
 */
export function parseHex(value: string): bigint {
  return BigInt(value);
}

/**
 * The protocol defines a multiplier or divisor of zero as one.
 */
export function normalizeScale(value: number): number {
  return value === 0 ? 1 : value;
}

function parseScale(value: string): number {
  return normalizeScale(Number(parseHex(value)));
}

function parseTimestamp(value: string | undefined): number | null {
  return value === undefined ? null : Number(parseHex(value));
}

// =============================================================================
// Response Decoding
// =============================================================================

/**
 * Decode a DeviceInfo fragment.
 *
 * @returns DeviceInfo or null if required fields are missing
 */
export function toDeviceInfo(fragment: RavenFragment): DeviceInfo | null {
  const parsed = DeviceInfoFragmentSchema.safeParse(fragment.fields);
  if (!parsed.success) return null;

  const info = parsed.data;

  return {
    deviceMac: info.DeviceMacId,
    manufacturer: info.Manufacturer,
    modelId: info.ModelId,
    firmwareVersion: info.FWVersion,
    hardwareVersion: info.HWVersion,
    dateCode: info.DateCode ?? null,
  };
}

/**
 * Decode a CurrentSummationDelivered fragment.
 *
 * @returns CurrentSummation or null if the fragment is malformed
 */
export function toCurrentSummation(
  fragment: RavenFragment,
): CurrentSummation | null {
  const parsed = CurrentSummationFragmentSchema.safeParse(fragment.fields);
  if (!parsed.success) return null;

  const msg = parsed.data;

  return {
    meterMac: msg.MeterMacId,
    value: parseHex(msg.SummationDelivered),
    multiplier: parseScale(msg.Multiplier),
    divisor: parseScale(msg.Divisor),
    timestamp: parseTimestamp(msg.TimeStamp),
  };
}

/**
 * Decode an InstantaneousDemand fragment. Demand is a signed 32-bit value,
 * negative when the premises export power.
 *
 * @returns InstantaneousDemand or null if the fragment is malformed
 */
export function toInstantaneousDemand(
  fragment: RavenFragment,
): InstantaneousDemand | null {
  const parsed = InstantaneousDemandFragmentSchema.safeParse(fragment.fields);
  if (!parsed.success) return null;

  const msg = parsed.data;

  return {
    meterMac: msg.MeterMacId,
    value: BigInt.asIntN(32, parseHex(msg.Demand)),
    multiplier: parseScale(msg.Multiplier),
    divisor: parseScale(msg.Divisor),
    timestamp: parseTimestamp(msg.TimeStamp),
  };
}
