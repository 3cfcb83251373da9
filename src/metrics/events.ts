import { readFile } from "node:fs/promises";
import { z } from "zod";

import { hasErrnoCode } from "../nodePrimitives.js";

/**
 * Schema accepted for a single log line. Only plain JSON objects qualify;
 * arrays, scalars and `null` are rejected and the line is skipped.
 */
export const TelemetryFieldsSchema = z.record(z.string(), z.unknown());

export type TelemetryFields = z.infer<typeof TelemetryFieldsSchema>;

/** Scalar value usable as a probe key component. */
export type KeyComponent = string | number | boolean | null;

/** One telemetry record read from the event log. */
export interface TelemetryEvent {
  /** Parsed field mapping, in source order. */
  readonly fields: Readonly<TelemetryFields>;
  /** Trimmed source text, written back verbatim when archiving. */
  readonly line: string;
  /** 1-based line number inside the log file. */
  readonly lineNumber: number;
}

/** Outcome of {@link readEventLog}. */
export interface EventLogReadResult {
  readonly events: readonly TelemetryEvent[];
  /** Non-blank lines that were not a JSON object. */
  readonly skippedLines: number;
  /** False when the log file does not exist. */
  readonly found: boolean;
}

/**
 * Reads a newline-delimited JSON log. A missing file yields no events; lines
 * that fail to parse as an object are counted and skipped.
 */
export async function readEventLog(logPath: string): Promise<EventLogReadResult> {
  let raw: string;
  try {
    raw = await readFile(logPath, { encoding: "utf8" });
  } catch (error) {
    if (hasErrnoCode(error, "ENOENT")) {
      return { events: [], skippedLines: 0, found: false };
    }
    throw error;
  }

  const { events, skippedLines } = parseEventLines(raw);
  return { events, skippedLines, found: true };
}

/** Parses NDJSON text into events, preserving file order. */
export function parseEventLines(raw: string): { events: TelemetryEvent[]; skippedLines: number } {
  const events: TelemetryEvent[] = [];
  let skippedLines = 0;

  const lines = raw.split("\n");
  for (let index = 0; index < lines.length; index += 1) {
    const line = (lines[index] ?? "").trim();
    if (line.length === 0) {
      continue;
    }

    const fields = parseJsonObject(line);
    if (!fields) {
      skippedLines += 1;
      continue;
    }
    events.push({ fields, line, lineNumber: index + 1 });
  }

  return { events, skippedLines };
}

/** Safely parses a JSON line into a field mapping. Returns `null` on failure. */
function parseJsonObject(line: string): TelemetryFields | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = TelemetryFieldsSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/** Keeps the events whose `runID` equals {@link runId} exactly. */
export function filterRunEvents(events: readonly TelemetryEvent[], runId: string): TelemetryEvent[] {
  return events.filter((event) => event.fields.runID === runId);
}

/** Returns a finite numeric field, or `undefined` when missing or not numeric. */
export function readNumberField(event: TelemetryEvent, key: string): number | undefined {
  const value = event.fields[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/** Returns a textual field; numbers and booleans are rendered with `String`. */
export function readTextField(event: TelemetryEvent, key: string): string | undefined {
  const value = event.fields[key];
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return undefined;
}

/**
 * Returns the raw scalar stored under {@link key} for probe key construction.
 * Missing values, `null` and nested structures all collapse to `null`.
 */
export function readKeyComponent(event: TelemetryEvent, key: string): KeyComponent {
  const value = event.fields[key];
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return null;
}
