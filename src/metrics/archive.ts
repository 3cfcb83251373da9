import { writeFile } from "node:fs/promises";

import type { TelemetryEvent } from "./events.js";
import type { RunArchivePaths } from "./layout.js";

/** Serialises events back to NDJSON using each event's original line text. */
export function serialiseRunEvents(events: readonly TelemetryEvent[]): string {
  return events.map((event) => `${event.line}\n`).join("");
}

/**
 * Writes `events.jsonl` (the filtered, non-deduplicated slice) and
 * `summary.md`. Both files are overwritten in full, so re-summarizing a run
 * against an unchanged log reproduces them byte for byte.
 */
export async function writeRunArchive(
  paths: RunArchivePaths,
  events: readonly TelemetryEvent[],
  summaryMarkdown: string,
): Promise<void> {
  await writeFile(paths.eventsPath, serialiseRunEvents(events), "utf8");
  await writeFile(paths.summaryPath, summaryMarkdown, "utf8");
}
