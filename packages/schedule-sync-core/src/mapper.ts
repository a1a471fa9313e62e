import { DateTime, IANAZone } from "luxon";
import { resolveColor } from "./colors.js";
import { InvalidTimeError } from "./errors.js";
import { deriveSourceKey, sourceMarker } from "./metadata.js";
import { assertEndAfterStart, describeEntry } from "./schedule.js";
import type { CalendarEvent, CalendarEventTime, ColorScheme, ScheduleEntry, TimeOfDay } from "./types.js";

export const EVENT_DESCRIPTION_HEADER = "Created by schedule-sync";

export function isValidTimeZone(timeZone: string): boolean {
  return IANAZone.isValidZone(timeZone);
}

function localize(entry: ScheduleEntry, time: TimeOfDay, timeZone: string): CalendarEventTime {
  const local = DateTime.fromObject({ ...entry.date, hour: time.hour, minute: time.minute }, { zone: timeZone });
  if (!local.isValid) {
    throw new InvalidTimeError(`Cannot localize ${describeEntry(entry)} to ${timeZone}: ${local.invalidReason ?? "invalid"}`);
  }
  // Wall-clock times skipped by a DST change come back shifted.
  if (local.hour !== time.hour || local.minute !== time.minute) {
    throw new InvalidTimeError(`${describeEntry(entry)} falls in a clock change gap in ${timeZone}`);
  }
  const dateTime = local.toISO({ suppressMilliseconds: true });
  if (!dateTime) {
    throw new InvalidTimeError(`Cannot format ${describeEntry(entry)} in ${timeZone}`);
  }
  return { dateTime, timeZone };
}

export function toCalendarEvent(entry: ScheduleEntry, scheme: ColorScheme, timeZone: string): CalendarEvent {
  if (!isValidTimeZone(timeZone)) {
    throw new InvalidTimeError(`Unknown time zone: ${timeZone}`);
  }
  assertEndAfterStart(entry);

  return {
    summary: entry.name,
    description: `${EVENT_DESCRIPTION_HEADER}\nCategory: ${entry.name}`,
    colorId: resolveColor(entry.name, scheme),
    start: localize(entry, entry.start, timeZone),
    end: localize(entry, entry.end, timeZone),
    extendedProperties: {
      private: sourceMarker(deriveSourceKey(entry))
    }
  };
}
