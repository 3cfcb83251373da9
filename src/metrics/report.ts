import type {
  BakeRow,
  CategorizedRows,
  ColorRow,
  LutRow,
  MemoryRow,
  PerformanceRow,
} from "./categories.js";
import { readTextField, type TelemetryEvent } from "./events.js";
import { DECIMAL_PLACES, formatFixed, formatTableRow, formatText } from "./format.js";

/** Summary block printed at the top of the report. */
export interface RunReportHeader {
  readonly runId: string;
  /** Events matching the run before deduplication. */
  readonly eventCount: number;
  readonly osVersion?: string;
  readonly arch?: string;
  readonly firstTimestamp?: string;
  /** Only set when the caller asked for a generation stamp. */
  readonly generatedAt?: string;
}

/** Artefact paths listed in the `## Files` section, relative to the repository root. */
export interface RunReportFiles {
  readonly events: string;
  readonly summary: string;
}

export interface RunReportInput {
  readonly header: RunReportHeader;
  readonly rows: CategorizedRows;
  readonly files: RunReportFiles;
}

/**
 * Builds the header from the filtered (not deduplicated) events. Environment
 * metadata comes from the first event in log order.
 */
export function buildReportHeader(
  runId: string,
  events: readonly TelemetryEvent[],
  generatedAt?: string,
): RunReportHeader {
  const first = events[0];
  return {
    runId,
    eventCount: events.length,
    ...(first
      ? {
          osVersion: readTextField(first, "osVersion"),
          arch: readTextField(first, "processArch"),
          firstTimestamp: readTextField(first, "timestampISO8601"),
        }
      : {}),
    ...(generatedAt !== undefined ? { generatedAt } : {}),
  };
}

/** Code unit comparison; locale collation would vary between hosts. */
function compareText(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

function byTextThen<Row>(
  primary: (row: Row) => string | undefined,
  secondary: (row: Row) => string | undefined,
): (left: Row, right: Row) => number {
  return (left, right) =>
    compareText(primary(left) ?? "", primary(right) ?? "") ||
    compareText(secondary(left) ?? "", secondary(right) ?? "");
}

/**
 * Returns sorted copies of every row set. Sorting is stable, so ties keep the
 * first-seen order of their probe keys.
 */
export function sortReportRows(rows: CategorizedRows): CategorizedRows {
  return {
    performance: [...rows.performance].sort(
      (left, right) =>
        compareText(left.label ?? "", right.label ?? "") || (left.height ?? 0) - (right.height ?? 0),
    ),
    memory: [...rows.memory].sort(byTextThen<MemoryRow>((row) => row.label, (row) => row.test)),
    color: [...rows.color].sort(byTextThen<ColorRow>((row) => row.label, (row) => row.test)),
    lut: [...rows.lut].sort(byTextThen<LutRow>((row) => row.label, (row) => row.test)),
    bake: [...rows.bake].sort(byTextThen<BakeRow>((row) => row.name, (row) => row.test)),
  };
}

/** Static description of one report table. */
interface SectionSpec<Row> {
  readonly title: string;
  readonly placeholder: string;
  readonly columns: readonly string[];
  readonly alignment: string;
  readonly cells: (row: Row) => string[];
}

const PERFORMANCE_SECTION: SectionSpec<PerformanceRow> = {
  title: "Performance",
  placeholder: "(no perf events found for this run)",
  columns: ["label", "res", "frames", "avgMs", "suite", "test"],
  alignment: "|---|---:|---:|---:|---|---|",
  cells: (row) => [
    formatText(row.label),
    formatResolution(row.width, row.height),
    formatText(row.frames),
    formatFixed(row.avgMs, DECIMAL_PLACES.avgMs),
    formatText(row.suite),
    formatText(row.test),
  ],
};

const MEMORY_SECTION: SectionSpec<MemoryRow> = {
  title: "Memory",
  placeholder: "(no memory events found for this run)",
  columns: ["label", "peakRSSDeltaMB", "message", "suite", "test"],
  alignment: "|---|---:|---|---|---|",
  cells: (row) => [
    formatText(row.label),
    formatFixed(row.peakRSSDeltaMB, DECIMAL_PLACES.memoryMB),
    formatText(row.message),
    formatText(row.suite),
    formatText(row.test),
  ],
};

const COLOR_SECTION: SectionSpec<ColorRow> = {
  title: "Color (ΔE2000)",
  placeholder: "(no ΔE events found for this run)",
  columns: ["label", "ΔE avg", "ΔE max", "worst", "suite", "test"],
  alignment: "|---|---:|---:|---|---|---|",
  cells: (row) => [
    formatText(row.label),
    formatFixed(row.deltaE2000Avg, DECIMAL_PLACES.deltaE),
    formatFixed(row.deltaE2000Max, DECIMAL_PLACES.deltaE),
    formatText(row.worstPatch),
    formatText(row.suite),
    formatText(row.test),
  ],
};

const LUT_SECTION: SectionSpec<LutRow> = {
  title: "Reference LUT Match",
  placeholder: "(no reference LUT events found for this run)",
  columns: ["label", "meanAbsErr", "maxAbsErr", "worst", "suite", "test"],
  alignment: "|---|---:|---:|---|---|---|",
  cells: (row) => [
    formatText(row.label),
    formatFixed(row.meanAbsErr, DECIMAL_PLACES.lutError),
    formatFixed(row.maxAbsErr, DECIMAL_PLACES.lutError),
    formatText(row.worstPatch),
    formatText(row.suite),
    formatText(row.test),
  ],
};

const BAKE_SECTION: SectionSpec<BakeRow> = {
  title: "External Bake Match",
  placeholder: "(no external bake events found for this run)",
  columns: ["name", "meanAbsErr", "maxAbsErr", "suite", "test"],
  alignment: "|---|---:|---:|---|---|",
  cells: (row) => [
    formatText(row.name),
    formatFixed(row.meanAbsErr, DECIMAL_PLACES.bakeError),
    formatFixed(row.maxAbsErr, DECIMAL_PLACES.bakeError),
    formatText(row.suite),
    formatText(row.test),
  ],
};

/** `<width>x<height>` when both sides are non-zero, empty otherwise. */
function formatResolution(width: number | undefined, height: number | undefined): string {
  return width && height ? `${width}x${height}` : "";
}

/**
 * Renders the Markdown report. Rows are sorted here, so callers may pass the
 * categorizer output directly. Every section is always present; empty ones
 * carry a placeholder line.
 */
export function renderRunReport(input: RunReportInput): string {
  const { header, files } = input;
  const rows = sortReportRows(input.rows);

  const lines: string[] = ["# Metrics Run", "", `- runID: \`${header.runId}\``, `- events: \`${header.eventCount}\``];
  if (header.osVersion) {
    lines.push(`- os: \`${header.osVersion}\``);
  }
  if (header.arch) {
    lines.push(`- arch: \`${header.arch}\``);
  }
  if (header.firstTimestamp) {
    lines.push(`- firstTimestamp: \`${header.firstTimestamp}\``);
  }
  if (header.generatedAt) {
    lines.push(`- generatedUTC: \`${header.generatedAt}\``);
  }
  lines.push("");

  appendSection(lines, PERFORMANCE_SECTION, rows.performance);
  appendSection(lines, MEMORY_SECTION, rows.memory);
  appendSection(lines, COLOR_SECTION, rows.color);
  appendSection(lines, LUT_SECTION, rows.lut);
  appendSection(lines, BAKE_SECTION, rows.bake);

  lines.push("## Files");
  lines.push("");
  lines.push(`- events: \`${files.events}\``);
  lines.push(`- summary: \`${files.summary}\``);

  return `${lines.join("\n")}\n`;
}

function appendSection<Row>(lines: string[], section: SectionSpec<Row>, rows: readonly Row[]): void {
  lines.push(`## ${section.title}`);
  lines.push("");
  if (rows.length === 0) {
    lines.push(section.placeholder);
    lines.push("");
    return;
  }

  lines.push(`| ${section.columns.join(" | ")} |`);
  lines.push(section.alignment);
  for (const row of rows) {
    lines.push(formatTableRow(section.cells(row)));
  }
  lines.push("");
}
