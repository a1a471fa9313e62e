import { Store } from "@tanstack/store";
import { DateTime } from "luxon";
import { AmbiguousTargetError, ConfigError, InvalidTimeError, NotFoundError, errorMessage } from "./errors.js";
import { toCalendarEvent } from "./mapper.js";
import { deriveSourceKey, isoDate, readSourceKey } from "./metadata.js";
import { describeEntry } from "./schedule.js";
import type {
  CalendarEvent,
  CalendarGateway,
  ClearResult,
  ColorScheme,
  CompletionStrategy,
  DateRange,
  EventPatch,
  MarkDoneResult,
  ScheduleEntry,
  SyncFailure,
  SyncPlan,
  SyncResult
} from "./types.js";

export const DONE_PREFIX = "✓ ";
export const DEFAULT_DONE_COLOR_ID = "8";
export const DEFAULT_BATCH_SIZE = 50;

export type BatchProgress = {
  index: number;
  total: number;
  size: number;
  succeeded: number;
};

function toIso(value: DateTime, what: string): string {
  const iso = value.toISO({ suppressMilliseconds: true });
  if (!iso) {
    throw new InvalidTimeError(`Cannot compute ${what}: ${value.invalidReason ?? "invalid date"}`);
  }
  return iso;
}

/** Start of the earliest entry's day to the start of the day after the latest one. */
export function scheduleRange(entries: readonly ScheduleEntry[], timeZone: string): DateRange {
  if (entries.length === 0) {
    throw new InvalidTimeError("Cannot compute the range of an empty schedule");
  }
  const days = entries.map(isoDate).sort();
  const first = days[0] ?? "";
  const last = days[days.length - 1] ?? first;
  return {
    timeMin: toIso(DateTime.fromISO(first, { zone: timeZone }).startOf("day"), "schedule start"),
    timeMax: toIso(DateTime.fromISO(last, { zone: timeZone }).startOf("day").plus({ days: 1 }), "schedule end")
  };
}

export function dayRange(timeZone: string, date?: string): DateRange {
  const day = date ? DateTime.fromISO(date, { zone: timeZone }) : DateTime.now().setZone(timeZone);
  if (!day.isValid) {
    throw new InvalidTimeError(`Invalid date ${date ?? "today"} in ${timeZone}: ${day.invalidReason ?? "invalid"}`);
  }
  const start = day.startOf("day");
  return {
    timeMin: toIso(start, "day start"),
    timeMax: toIso(start.plus({ days: 1 }), "day end")
  };
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    batches.push(items.slice(index, index + size));
  }
  return batches;
}

function indexManaged(remoteEvents: readonly CalendarEvent[]): Map<string, CalendarEvent> {
  const byKey = new Map<string, CalendarEvent>();
  for (const event of remoteEvents) {
    if (event.status === "cancelled") {
      continue;
    }
    const key = readSourceKey(event);
    if (key && !byKey.has(key)) {
      byKey.set(key, event);
    }
  }
  return byKey;
}

/**
 * Pure planning step shared by normal and dry-run syncs.
 * `doneColorId` is the completion colour; events wearing it are never recoloured back.
 */
export function planSync(args: {
  entries: readonly ScheduleEntry[];
  scheme: ColorScheme;
  timeZone: string;
  remoteEvents: readonly CalendarEvent[];
  doneColorId?: string;
}): { plan: SyncPlan; failed: SyncFailure[] } {
  const { entries, scheme, timeZone, remoteEvents, doneColorId } = args;
  const remoteByKey = indexManaged(remoteEvents);
  const plannedKeys = new Set<string>();
  const recoloredIds = new Set<string>();

  const state = new Store<SyncPlan & { failed: SyncFailure[] }>({
    toCreate: [],
    toSkip: [],
    skippedEntries: [],
    toRecolor: [],
    failed: []
  });

  for (const entry of entries) {
    let event: CalendarEvent;
    try {
      event = toCalendarEvent(entry, scheme, timeZone);
    } catch (error) {
      if (!(error instanceof InvalidTimeError)) {
        throw error;
      }
      const failure = { label: describeEntry(entry), entry, reason: error.message };
      state.setState((prev) => ({ ...prev, failed: [...prev.failed, failure] }));
      continue;
    }

    const key = deriveSourceKey(entry);
    const existing = remoteByKey.get(key);

    if (plannedKeys.has(key) || existing) {
      state.setState((prev) => ({
        ...prev,
        toSkip: [...prev.toSkip, key],
        skippedEntries: [...prev.skippedEntries, entry]
      }));
    } else {
      state.setState((prev) => ({ ...prev, toCreate: [...prev.toCreate, { entry, event }] }));
    }
    plannedKeys.add(key);

    const id = existing?.id;
    const colorId = event.colorId;
    if (!existing || !id || !colorId || recoloredIds.has(id)) {
      continue;
    }
    const currentColor = existing.colorId ?? "";
    if (currentColor !== colorId && currentColor !== doneColorId) {
      recoloredIds.add(id);
      const summary = existing.summary;
      state.setState((prev) => ({
        ...prev,
        toRecolor: [...prev.toRecolor, { id, summary, colorId }]
      }));
    }
  }

  const { failed, ...plan } = state.state;
  return { plan, failed };
}

export async function runSync(args: {
  gateway: CalendarGateway;
  entries: readonly ScheduleEntry[];
  scheme: ColorScheme;
  timeZone: string;
  dryRun: boolean;
  batchSize?: number;
  doneColorId?: string;
  onBatch?: (progress: BatchProgress) => void;
}): Promise<SyncResult> {
  const { gateway, entries, scheme, timeZone, dryRun, doneColorId, onBatch } = args;
  const batchSize = args.batchSize ?? DEFAULT_BATCH_SIZE;

  if (entries.length === 0) {
    return {
      created: 0,
      skipped: 0,
      recolored: 0,
      failed: [],
      plan: { toCreate: [], toSkip: [], skippedEntries: [], toRecolor: [] },
      dryRun
    };
  }

  const remoteEvents = await gateway.listEvents({ range: scheduleRange(entries, timeZone), managedOnly: true });
  const { plan, failed } = planSync({ entries, scheme, timeZone, remoteEvents, doneColorId });

  const counters = new Store({ created: 0, recolored: 0, failed });

  if (!dryRun) {
    const batches = chunk(plan.toCreate, batchSize);
    for (const [index, batch] of batches.entries()) {
      let succeeded = 0;
      for (const planned of batch) {
        try {
          await gateway.insert(planned.event);
          succeeded += 1;
          counters.setState((state) => ({ ...state, created: state.created + 1 }));
        } catch (error) {
          const failure = { label: describeEntry(planned.entry), entry: planned.entry, reason: errorMessage(error) };
          counters.setState((state) => ({ ...state, failed: [...state.failed, failure] }));
        }
      }
      onBatch?.({ index: index + 1, total: batches.length, size: batch.length, succeeded });
    }

    for (const recolor of plan.toRecolor) {
      try {
        await gateway.patch(recolor.id, { colorId: recolor.colorId });
        counters.setState((state) => ({ ...state, recolored: state.recolored + 1 }));
      } catch (error) {
        const failure = { label: `${recolor.summary} (${recolor.id})`, reason: errorMessage(error) };
        counters.setState((state) => ({ ...state, failed: [...state.failed, failure] }));
      }
    }
  }

  return {
    ...counters.state,
    skipped: plan.toSkip.length,
    plan,
    dryRun
  };
}

/** Deletes every event this tool created. Events without a readable source-key are left alone. */
export async function clearManaged(args: { gateway: CalendarGateway; dryRun: boolean }): Promise<ClearResult> {
  const { gateway, dryRun } = args;
  const listed = await gateway.listEvents({ managedOnly: true });
  const candidates = listed.filter((event) => Boolean(event.id) && readSourceKey(event) !== null);

  const counters = new Store<{ deleted: number; failed: SyncFailure[] }>({ deleted: 0, failed: [] });
  if (!dryRun) {
    for (const event of candidates) {
      const id = event.id ?? "";
      try {
        await gateway.delete(id);
        counters.setState((state) => ({ ...state, deleted: state.deleted + 1 }));
      } catch (error) {
        const failure = { label: `${event.summary} (${id})`, reason: errorMessage(error) };
        counters.setState((state) => ({ ...state, failed: [...state.failed, failure] }));
      }
    }
  }

  return { candidates, ...counters.state, dryRun };
}

function stripDonePrefix(summary: string): string {
  return summary.startsWith(DONE_PREFIX) ? summary.slice(DONE_PREFIX.length) : summary;
}

function isCompleted(event: CalendarEvent, completion: CompletionStrategy, doneColorId: string): boolean {
  if (completion.method === "color_change") {
    return event.colorId === doneColorId;
  }
  return event.summary.startsWith(DONE_PREFIX);
}

function describeMatch(event: CalendarEvent): string {
  return `${event.summary} @ ${event.start.dateTime}`;
}

export function completionPatch(event: CalendarEvent, completion: CompletionStrategy, doneColorId: string): EventPatch {
  if (completion.method === "color_change") {
    return { colorId: doneColorId };
  }
  return { summary: `${DONE_PREFIX}${event.summary}` };
}

export function findTarget(events: readonly CalendarEvent[], name: string): CalendarEvent {
  const needle = name.trim().toLowerCase();
  if (!needle) {
    throw new NotFoundError("Event name to mark done is empty");
  }
  const title = (event: CalendarEvent) => stripDonePrefix(event.summary).trim().toLowerCase();

  for (const matches of [
    events.filter((event) => title(event) === needle),
    events.filter((event) => title(event).includes(needle))
  ]) {
    const [only, ...rest] = matches;
    if (!only) {
      continue;
    }
    if (rest.length > 0) {
      throw new AmbiguousTargetError(`"${name}" matches ${matches.length} events; be more specific`, matches.map(describeMatch));
    }
    return only;
  }
  throw new NotFoundError(`No active event matching "${name}"`);
}

export async function markDone(args: {
  gateway: CalendarGateway;
  name: string;
  completion: CompletionStrategy;
  range: DateRange;
  doneColorId?: string;
  dryRun: boolean;
}): Promise<MarkDoneResult> {
  const { gateway, name, completion, range, dryRun } = args;
  const doneColorId = args.doneColorId ?? DEFAULT_DONE_COLOR_ID;
  if (!completion.enabled) {
    throw new ConfigError("completion_strategies.enabled is false; marking events done is turned off");
  }

  const listed = await gateway.listEvents({ range, managedOnly: true });
  const active = listed.filter(
    (event) =>
      Boolean(event.id) &&
      event.status !== "cancelled" &&
      readSourceKey(event) !== null &&
      !isCompleted(event, completion, doneColorId)
  );

  const event = findTarget(active, name);
  const patch = completionPatch(event, completion, doneColorId);
  if (!dryRun) {
    await gateway.patch(event.id ?? "", patch);
  }
  return { event, method: completion.method, patch, dryRun };
}
