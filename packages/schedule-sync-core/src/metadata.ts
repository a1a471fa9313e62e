import { createHash } from "node:crypto";
import type { CalendarEvent, ScheduleEntry, TimeOfDay } from "./types.js";

export const MANAGED_PROPERTY = "scheduleSyncManaged";
export const MANAGED_VALUE = "true";
export const SOURCE_KEY_PROPERTY = "scheduleSyncKey";

const SOURCE_KEY_LENGTH = 32;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export function isoDate(entry: ScheduleEntry): string {
  return `${pad(entry.date.year, 4)}-${pad(entry.date.month)}-${pad(entry.date.day)}`;
}

export function minuteOfDay(time: TimeOfDay): number {
  return time.hour * 60 + time.minute;
}

/**
 * Fingerprint of (name, date, start, end). Equal entries always hash to the same key,
 * so a second run finds what the first one created.
 */
export function deriveSourceKey(entry: ScheduleEntry): string {
  const normalized = [
    entry.name.trim().toLowerCase(),
    isoDate(entry),
    minuteOfDay(entry.start),
    minuteOfDay(entry.end)
  ].join("|");
  return createHash("sha256").update(normalized, "utf8").digest("hex").slice(0, SOURCE_KEY_LENGTH);
}

export function sourceMarker(sourceKey: string): Record<string, string> {
  return {
    [MANAGED_PROPERTY]: MANAGED_VALUE,
    [SOURCE_KEY_PROPERTY]: sourceKey
  };
}

export function readSourceKey(event: CalendarEvent): string | null {
  const properties = event.extendedProperties?.private;
  if (!properties || properties[MANAGED_PROPERTY] !== MANAGED_VALUE) {
    return null;
  }
  const key = properties[SOURCE_KEY_PROPERTY];
  if (!key || !/^[0-9a-f]+$/.test(key)) {
    return null;
  }
  return key;
}
