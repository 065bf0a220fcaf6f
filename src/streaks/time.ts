import { DateTime, IANAZone } from "luxon";
import { ValidationError } from "../errors";

/**
 * Source of "now". Swapped for a fixed clock in tests.
 */
export interface Clock {
  now(timeZone: string): DateTime;
}

// Unknown zone values already logged
const reportedZones = new Set<string>();

/**
 * Returns the zone name if it is a known IANA zone, otherwise the fallback.
 * An unknown zone is logged once per value, never thrown.
 */
export function resolveZone(timeZone: string | null | undefined, fallback: string): string {
  if (timeZone && IANAZone.isValidZone(timeZone)) {
    return timeZone;
  }
  const value = timeZone ?? "";
  if (!reportedZones.has(value)) {
    reportedZones.add(value);
    console.warn(`[Time] Unknown timezone '${value}', falling back to ${fallback}`);
  }
  return fallback;
}

export function isValidZone(timeZone: string): boolean {
  return IANAZone.isValidZone(timeZone);
}

/**
 * Clock backed by the system time.
 */
export function systemClock(defaultTimezone: string): Clock {
  return {
    now: (timeZone) => DateTime.now().setZone(resolveZone(timeZone, defaultTimezone)),
  };
}

/**
 * Clock frozen at (or moved to) a given instant.
 */
export function fixedClock(startIso: string) {
  let current = parseInstant(startIso);
  return {
    now: (timeZone: string) => current.setZone(timeZone),
    set(iso: string) {
      current = parseInstant(iso);
    },
    advance(duration: { days?: number; hours?: number; minutes?: number }) {
      current = current.plus(duration);
    },
  };
}

/**
 * Parses a stored timestamp. Strings without an offset are read as UTC.
 */
export function parseInstant(value: string | Date | DateTime): DateTime {
  if (DateTime.isDateTime(value)) return value;
  const dt =
    value instanceof Date
      ? DateTime.fromJSDate(value, { zone: "utc" })
      : DateTime.fromISO(value, { zone: "utc" });
  if (!dt.isValid) {
    throw new ValidationError(`Invalid timestamp: ${String(value)}`);
  }
  return dt;
}

/**
 * Serialises an instant as a UTC ISO string.
 */
export function toUtcIso(dt: DateTime): string {
  const iso = dt.toUTC().toISO();
  if (!iso) {
    throw new ValidationError(`Cannot serialise invalid DateTime: ${dt.invalidReason}`);
  }
  return iso;
}

/**
 * Whole local calendar days between two instants, counted in the zone of `to`.
 */
export function calendarDaysBetween(from: DateTime, to: DateTime): number {
  const fromDay = from.setZone(to.zone).startOf("day");
  return Math.round(to.startOf("day").diff(fromDay, "days").days);
}

const TIME_OF_DAY = /^([01]?\d|2[0-3]):([0-5]\d)$/;

/**
 * A local time of day, minute granularity.
 */
export type TimeOfDay = {
  hour: number;
  minute: number;
};

/**
 * Parses "H:MM" / "HH:MM" (24-hour).
 * @throws ValidationError on any other shape
 */
export function parseTimeOfDay(value: string): TimeOfDay {
  const match = TIME_OF_DAY.exec(value.trim());
  if (!match) {
    throw new ValidationError(`Invalid time of day: '${value}'`);
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

/**
 * Formats a time of day as zero-padded "HH:MM".
 */
export function formatTimeOfDay(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, "0")}:${String(time.minute).padStart(2, "0")}`;
}

/**
 * Normalises "8:05" to "08:05". Returns null for a malformed value.
 */
export function normalizeTimeOfDay(value: string): string | null {
  try {
    return formatTimeOfDay(parseTimeOfDay(value));
  } catch (e) {
    if (e instanceof ValidationError) return null;
    throw e;
  }
}

/**
 * Formats just the time portion (HH:mm) of a local DateTime.
 */
export function formatTimeOnly(dt: DateTime): string {
  return dt.toFormat("HH:mm");
}
