import { describe, expect, it } from "vitest";
import {
  InvalidTimeError,
  SOURCE_KEY_PROPERTY,
  deriveSourceKey,
  describeEntry,
  parseScheduleRow,
  readSourceKey,
  resolveColor,
  toCalendarEvent
} from "../src/index.js";
import type { ColorScheme, ScheduleEntry } from "../src/index.js";

const deepWork: ScheduleEntry = {
  name: "Deep Work",
  date: { year: 2025, month: 7, day: 7 },
  start: { hour: 9, minute: 0 },
  end: { hour: 11, minute: 0 }
};

const scheme: ColorScheme = {
  rules: [{ pattern: "Deep Work", colorId: "9" }],
  defaultColorId: "1"
};

describe("source key", () => {
  it("is stable for equal entries", () => {
    const copy: ScheduleEntry = {
      name: "Deep Work",
      date: { year: 2025, month: 7, day: 7 },
      start: { hour: 9, minute: 0 },
      end: { hour: 11, minute: 0 }
    };
    expect(deriveSourceKey(copy)).toBe(deriveSourceKey(deepWork));
    expect(deriveSourceKey(deepWork)).toMatch(/^[0-9a-f]{32}$/);
  });

  it("ignores case and surrounding whitespace in the name", () => {
    expect(deriveSourceKey({ ...deepWork, name: "  deep work " })).toBe(deriveSourceKey(deepWork));
  });

  it("differs when any part of the slot changes", () => {
    const base = deriveSourceKey(deepWork);
    expect(deriveSourceKey({ ...deepWork, end: { hour: 11, minute: 30 } })).not.toBe(base);
    expect(deriveSourceKey({ ...deepWork, date: { year: 2025, month: 7, day: 8 } })).not.toBe(base);
    expect(deriveSourceKey({ ...deepWork, name: "Deep Work 2" })).not.toBe(base);
  });

  it("is read back only from events carrying the managed marker", () => {
    const event = toCalendarEvent(deepWork, scheme, "Europe/Tirane");
    expect(readSourceKey(event)).toBe(deriveSourceKey(deepWork));
    expect(readSourceKey({ ...event, extendedProperties: { private: { [SOURCE_KEY_PROPERTY]: "abc123" } } })).toBeNull();
    expect(readSourceKey({ ...event, extendedProperties: undefined })).toBeNull();
  });
});

describe("color resolution", () => {
  const ordered: ColorScheme = {
    rules: [
      { pattern: "Deep Work 1", colorId: "9" },
      { pattern: "Deep Work 1 (deload)", colorId: "1" },
      { pattern: "Gym", colorId: "11" }
    ],
    defaultColorId: "5"
  };

  it("prefers an exact name over an earlier contained pattern", () => {
    expect(resolveColor("Deep Work 1 (deload)", ordered)).toBe("1");
  });

  it("matches contained patterns case-insensitively", () => {
    expect(resolveColor("gym (deload)", ordered)).toBe("11");
  });

  it("takes the first contained pattern in rule order", () => {
    const overlapping: ColorScheme = {
      rules: [
        { pattern: "Work", colorId: "2" },
        { pattern: "Deep Work", colorId: "9" }
      ],
      defaultColorId: "1"
    };
    expect(resolveColor("Deep Work session", overlapping)).toBe("2");
  });

  it("falls back to the default color", () => {
    expect(resolveColor("Reading", ordered)).toBe("5");
  });
});

describe("toCalendarEvent", () => {
  it("colors and localizes an entry", () => {
    const event = toCalendarEvent(deepWork, scheme, "Europe/Tirane");
    expect(event.summary).toBe("Deep Work");
    expect(event.colorId).toBe("9");
    expect(event.start).toEqual({ dateTime: "2025-07-07T09:00:00+02:00", timeZone: "Europe/Tirane" });
    expect(event.end).toEqual({ dateTime: "2025-07-07T11:00:00+02:00", timeZone: "Europe/Tirane" });
    expect(event.description).toBe("Created by schedule-sync\nCategory: Deep Work");
  });

  it("uses the configured zone's offset", () => {
    const event = toCalendarEvent(deepWork, scheme, "America/New_York");
    expect(event.start.dateTime).toBe("2025-07-07T09:00:00-04:00");
  });

  it("rejects an end that is not after the start", () => {
    const broken: ScheduleEntry = { ...deepWork, end: { hour: 9, minute: 0 } };
    expect(() => toCalendarEvent(broken, scheme, "Europe/Tirane")).toThrow(InvalidTimeError);
  });

  it("rejects unknown time zones", () => {
    expect(() => toCalendarEvent(deepWork, scheme, "Mars/Olympus")).toThrow("Unknown time zone: Mars/Olympus");
  });

  it("rejects wall-clock times skipped by daylight saving", () => {
    const skipped: ScheduleEntry = {
      name: "Night shift",
      date: { year: 2025, month: 3, day: 9 },
      start: { hour: 2, minute: 30 },
      end: { hour: 4, minute: 0 }
    };
    expect(() => toCalendarEvent(skipped, scheme, "America/New_York")).toThrow(InvalidTimeError);
  });
});

describe("parseScheduleRow", () => {
  it("reads the tuple form", () => {
    expect(parseScheduleRow(["Deep Work", 2025, 7, 7, 9, 0, 11, 0])).toEqual(deepWork);
  });

  it("reads the object form", () => {
    const entry = parseScheduleRow({
      name: "Deep Work",
      year: 2025,
      month: 7,
      day: 7,
      startHour: 9,
      startMinute: 0,
      endHour: 11,
      endMinute: 0
    });
    expect(describeEntry(entry)).toBe("Deep Work 2025-07-07 09:00-11:00");
  });

  it("rejects rows with the wrong number of fields", () => {
    expect(() => parseScheduleRow(["Gym", 2025, 7, 7, 17, 45])).toThrow("Schedule row must have 8 fields, got 6");
  });

  it("rejects out-of-range and non-integer fields", () => {
    expect(() => parseScheduleRow(["Gym", 2025, 13, 7, 17, 45, 19, 15])).toThrow("month must be between 1 and 12, got 13");
    expect(() => parseScheduleRow(["Gym", 2025, 7, 7, 17.5, 45, 19, 15])).toThrow("startHour must be an integer, got 17.5");
  });

  it("rejects dates that do not exist", () => {
    expect(() => parseScheduleRow(["Gym", 2025, 2, 30, 17, 45, 19, 15])).toThrow("2025-02-30 is not a calendar date");
  });

  it("rejects entries ending before they start", () => {
    expect(() => parseScheduleRow(["Gym", 2025, 7, 7, 19, 15, 17, 45])).toThrow(InvalidTimeError);
  });
});
