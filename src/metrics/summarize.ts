import type { StructuredLogger } from "../logger.js";
import { writeRunArchive } from "./archive.js";
import { categorizeEvents, countRows, type ReportCategory } from "./categories.js";
import { dedupeProbes } from "./dedupe.js";
import { filterRunEvents, readEventLog } from "./events.js";
import {
  prepareOutputDirectory,
  resolveMetricsLayout,
  resolveRunArchivePaths,
  toPortableRelative,
} from "./layout.js";
import { buildReportHeader, renderRunReport } from "./report.js";
import { updateRunIndex, type RunIndexStatus } from "./runIndex.js";

/** Options accepted by {@link summarizeRun}. */
export interface SummarizeRunOptions {
  /** Opaque run identifier matched against each event's `runID`. */
  readonly runId: string;
  /** Directory receiving `events.jsonl` and `summary.md`. */
  readonly outDir: string;
  /** Repository root hosting the `test_outputs/` tree. */
  readonly repoRoot: string;
  /** Event log override (absolute, or relative to {@link repoRoot}). */
  readonly eventLogPath?: string;
  /** ISO timestamp printed as `generatedUTC`; omitted when unset. */
  readonly generatedAt?: string;
  readonly logger?: StructuredLogger;
}

/** Counters and paths produced by one invocation. */
export interface SummarizeRunResult {
  readonly runId: string;
  /** Events matching the run, before deduplication. */
  readonly eventCount: number;
  /** Distinct probe keys after deduplication. */
  readonly probeCount: number;
  /** Malformed lines skipped anywhere in the log. */
  readonly skippedLines: number;
  readonly rowCounts: Record<ReportCategory, number>;
  readonly eventLogPath: string;
  readonly eventsPath: string;
  readonly summaryPath: string;
  readonly indexPath: string;
  readonly indexStatus: RunIndexStatus;
}

/**
 * Summarizes one run: reads the log, isolates the run, deduplicates probes,
 * renders the report, archives both artefacts and records the run in the
 * cumulative index. A missing log or a run without events still produces a
 * complete, empty report.
 */
export async function summarizeRun(options: SummarizeRunOptions): Promise<SummarizeRunResult> {
  const { runId, logger } = options;
  const layout = resolveMetricsLayout(options.repoRoot, { eventLogPath: options.eventLogPath });
  const paths = resolveRunArchivePaths(await prepareOutputDirectory(options.outDir));

  const log = await readEventLog(layout.eventLogPath);
  logger?.info("metrics_log_read", {
    path: layout.eventLogPath,
    found: log.found,
    events: log.events.length,
    skipped_lines: log.skippedLines,
  });
  if (log.skippedLines > 0) {
    logger?.warn("metrics_log_malformed_lines", { path: layout.eventLogPath, skipped_lines: log.skippedLines });
  }

  const events = filterRunEvents(log.events, runId);
  const probes = dedupeProbes(events);
  const rows = categorizeEvents(probes);

  const summary = renderRunReport({
    header: buildReportHeader(runId, events, options.generatedAt),
    rows,
    files: {
      events: toPortableRelative(layout.repoRoot, paths.eventsPath),
      summary: toPortableRelative(layout.repoRoot, paths.summaryPath),
    },
  });
  await writeRunArchive(paths, events, summary);
  const rowCounts = countRows(rows);
  logger?.info("metrics_summary_written", {
    run_id: runId,
    events: events.length,
    probes: probes.length,
    rows: rowCounts,
    summary_path: paths.summaryPath,
    events_path: paths.eventsPath,
  });

  const index = await updateRunIndex({ indexPath: layout.indexPath, runId, outDir: paths.outDir });
  if (index.status === "appended") {
    logger?.warn("metrics_index_marker_missing", { index_path: layout.indexPath });
  }
  logger?.info("metrics_index_updated", {
    index_path: layout.indexPath,
    status: index.status,
    created: index.created,
  });

  return {
    runId,
    eventCount: events.length,
    probeCount: probes.length,
    skippedLines: log.skippedLines,
    rowCounts,
    eventLogPath: layout.eventLogPath,
    eventsPath: paths.eventsPath,
    summaryPath: paths.summaryPath,
    indexPath: layout.indexPath,
    indexStatus: index.status,
  };
}
