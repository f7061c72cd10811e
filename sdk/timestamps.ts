import { DateTime } from "luxon";
import { TogglDecodeError } from "./errors";

type TimestampFormat = {
  pattern: RegExp;
  zone: "utc" | "offset";
};

// The API switched from "Z" suffixes to explicit offsets between versions, and a single response
// can still carry both.
const TIMESTAMP_FORMATS: TimestampFormat[] = [
  { pattern: /^\d{4}-\d{2}-\d{2}T([01]\d|2[0-3]):\d{2}:\d{2}(\.\d{1,9})?Z$/, zone: "utc" },
  { pattern: /^\d{4}-\d{2}-\d{2}T([01]\d|2[0-3]):\d{2}:\d{2}(\.\d{1,9})?[+-]\d{2}:\d{2}$/, zone: "offset" },
];

const tryFormat = (value: string, format: TimestampFormat): DateTime | null => {
  if (!format.pattern.test(value)) return null;
  const parsed =
    format.zone === "utc"
      ? DateTime.fromISO(value, { zone: "utc" })
      : DateTime.fromISO(value, { setZone: true });
  return parsed.isValid ? parsed : null;
};

/**
 * Parses a time-entry timestamp, trying the UTC form first and the offset form second.
 *
 * @throws {TogglDecodeError} naming the input when neither format matches
 */
export function parseTimestamp(value: string): DateTime {
  for (const format of TIMESTAMP_FORMATS) {
    const parsed = tryFormat(value, format);
    if (parsed) return parsed;
  }
  throw new TogglDecodeError(`Cannot parse timestamp "${value}"`, value);
}

/** Empty and absent values decode to `null`, never to a zero date. */
export function parseOptionalTimestamp(value: string | null | undefined): DateTime | null {
  if (value === undefined || value === null || value === "") return null;
  return parseTimestamp(value);
}

/**
 * RFC 3339 in the value's own offset. Milliseconds are written only when non-zero.
 */
export function formatTimestamp(dt: DateTime): string {
  const iso = dt.toISO({ suppressMilliseconds: true });
  if (!iso) {
    throw new TogglDecodeError(`Cannot format invalid timestamp: ${dt.invalidReason ?? "unknown"}`, String(dt));
  }
  return iso;
}
