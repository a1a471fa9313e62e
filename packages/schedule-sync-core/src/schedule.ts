import { DateTime } from "luxon";
import { InvalidTimeError } from "./errors.js";
import { isoDate, minuteOfDay } from "./metadata.js";
import type { ScheduleEntry, TimeOfDay } from "./types.js";

const TUPLE_FIELDS = ["name", "year", "month", "day", "startHour", "startMinute", "endHour", "endMinute"] as const;

type RowFields = {
  name: unknown;
  year: unknown;
  month: unknown;
  day: unknown;
  startHour: unknown;
  startMinute: unknown;
  endHour: unknown;
  endMinute: unknown;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function rowFields(row: unknown): RowFields {
  if (Array.isArray(row)) {
    if (row.length !== TUPLE_FIELDS.length) {
      throw new InvalidTimeError(`Schedule row must have ${TUPLE_FIELDS.length} fields, got ${row.length}`);
    }
    const values: unknown[] = row;
    const [name, year, month, day, startHour, startMinute, endHour, endMinute] = values;
    return { name, year, month, day, startHour, startMinute, endHour, endMinute };
  }
  if (isRecord(row)) {
    return {
      name: row.name,
      year: row.year,
      month: row.month,
      day: row.day,
      startHour: row.startHour,
      startMinute: row.startMinute,
      endHour: row.endHour,
      endMinute: row.endMinute
    };
  }
  throw new InvalidTimeError("Schedule row must be an array or an object");
}

function integerField(fields: RowFields, key: Exclude<keyof RowFields, "name">, min: number, max: number): number {
  const value = fields[key];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new InvalidTimeError(`${key} must be an integer, got ${JSON.stringify(value)}`);
  }
  if (value < min || value > max) {
    throw new InvalidTimeError(`${key} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function formatTime(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, "0")}:${String(time.minute).padStart(2, "0")}`;
}

export function describeEntry(entry: ScheduleEntry): string {
  return `${entry.name} ${isoDate(entry)} ${formatTime(entry.start)}-${formatTime(entry.end)}`;
}

export function describeRow(row: unknown): string {
  if (Array.isArray(row) || isRecord(row)) {
    return JSON.stringify(row);
  }
  return String(row);
}

export function assertEndAfterStart(entry: ScheduleEntry): void {
  if (minuteOfDay(entry.end) <= minuteOfDay(entry.start)) {
    throw new InvalidTimeError(`End ${formatTime(entry.end)} must be after start ${formatTime(entry.start)} for "${entry.name}"`);
  }
}

export function parseScheduleRow(row: unknown): ScheduleEntry {
  const fields = rowFields(row);
  if (typeof fields.name !== "string" || fields.name.trim().length === 0) {
    throw new InvalidTimeError("name must be a non-empty string");
  }

  const entry: ScheduleEntry = {
    name: fields.name.trim(),
    date: {
      year: integerField(fields, "year", 1970, 9999),
      month: integerField(fields, "month", 1, 12),
      day: integerField(fields, "day", 1, 31)
    },
    start: {
      hour: integerField(fields, "startHour", 0, 23),
      minute: integerField(fields, "startMinute", 0, 59)
    },
    end: {
      hour: integerField(fields, "endHour", 0, 23),
      minute: integerField(fields, "endMinute", 0, 59)
    }
  };

  if (!DateTime.fromObject(entry.date, { zone: "utc" }).isValid) {
    throw new InvalidTimeError(`${isoDate(entry)} is not a calendar date`);
  }
  assertEndAfterStart(entry);
  return Object.freeze(entry);
}
