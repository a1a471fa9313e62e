import { readFileSync } from "node:fs";
import {
  ConfigError,
  InvalidTimeError,
  describeRow,
  errorMessage,
  parseScheduleRow,
  type ScheduleEntry,
  type SyncFailure
} from "@schedule-sync/core";

export const DEFAULT_SCHEDULE_PATH = "schedule.json";

export function parseSchedule(rows: unknown[]): { entries: ScheduleEntry[]; failed: SyncFailure[] } {
  const entries: ScheduleEntry[] = [];
  const failed: SyncFailure[] = [];

  for (const [index, row] of rows.entries()) {
    try {
      entries.push(parseScheduleRow(row));
    } catch (error) {
      if (!(error instanceof InvalidTimeError)) {
        throw error;
      }
      failed.push({ label: `row ${index + 1} ${describeRow(row)}`, reason: error.message });
    }
  }

  return { entries, failed };
}

export function loadSchedule(path: string): { entries: ScheduleEntry[]; failed: SyncFailure[] } {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigError(`Cannot read schedule ${path}: ${errorMessage(error)}`, error);
  }
  if (!Array.isArray(raw)) {
    throw new ConfigError(`Schedule ${path} must contain a JSON array of rows`);
  }
  return parseSchedule(raw);
}
