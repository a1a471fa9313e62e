import { colorName, isoDate, type ClearResult, type MarkDoneResult, type SyncFailure, type SyncResult } from "@schedule-sync/core";

export function formatFailures(failed: readonly SyncFailure[]): string[] {
  return failed.map((failure) => `  failed: ${failure.label}: ${failure.reason}`);
}

export function formatSyncResult(result: SyncResult): string[] {
  const lines = [
    `sync: created=${result.created} skipped=${result.skipped} recolored=${result.recolored} failed=${result.failed.length} dryRun=${result.dryRun}`
  ];

  if (result.dryRun) {
    const { toCreate, toSkip, skippedEntries, toRecolor } = result.plan;
    lines.push(`  would create ${toCreate.length}, skip ${toSkip.length}, recolor ${toRecolor.length}`);
    for (const planned of toCreate) {
      lines.push(`  + ${planned.event.summary} on ${isoDate(planned.entry)} [${colorName(planned.event.colorId ?? "")}]`);
    }
    for (const entry of skippedEntries) {
      lines.push(`  = ${entry.name} on ${isoDate(entry)}`);
    }
    for (const recolor of toRecolor) {
      lines.push(`  ~ ${recolor.summary} -> ${colorName(recolor.colorId)}`);
    }
  }

  return lines;
}

export function formatClearResult(result: ClearResult): string[] {
  const lines = [
    `clear: candidates=${result.candidates.length} deleted=${result.deleted} failed=${result.failed.length} dryRun=${result.dryRun}`
  ];
  if (result.dryRun) {
    for (const event of result.candidates) {
      lines.push(`  - ${event.summary} @ ${event.start.dateTime}`);
    }
  }
  return lines;
}

export function formatMarkDoneResult(result: MarkDoneResult): string {
  const change =
    result.patch.colorId !== undefined ? `color -> ${colorName(result.patch.colorId)}` : `title -> ${result.patch.summary ?? ""}`;
  return `mark-done: ${result.event.summary} @ ${result.event.start.dateTime} ${change} method=${result.method} dryRun=${result.dryRun}`;
}
