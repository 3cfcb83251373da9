import { mkdir } from "node:fs/promises";
import path from "node:path";

import { OutputDirectoryError } from "./errors.js";

/**
 * Canonical paths of the `test_outputs/` tree. Every location is absolute and
 * derived from the repository root.
 */
export interface MetricsLayout {
  /** Absolute repository root. */
  readonly repoRoot: string;
  /** NDJSON log appended by the instrumented test suite. */
  readonly eventLogPath: string;
  /** Directory hosting the cumulative index. */
  readonly metricsRoot: string;
  /** Cumulative run index (`test_outputs/metrics/README.md`). */
  readonly indexPath: string;
}

/** Default log location, relative to the repository root. */
export const DEFAULT_EVENT_LOG = path.join("test_outputs", "perf", "perf.jsonl");

/**
 * Resolves the layout for {@link repoRoot}. A relative `eventLogPath`
 * override is resolved against the repository root.
 */
export function resolveMetricsLayout(repoRoot: string, overrides: { eventLogPath?: string } = {}): MetricsLayout {
  const root = path.resolve(repoRoot);
  const metricsRoot = path.join(root, "test_outputs", "metrics");
  return {
    repoRoot: root,
    eventLogPath: path.resolve(root, overrides.eventLogPath ?? DEFAULT_EVENT_LOG),
    metricsRoot,
    indexPath: path.join(metricsRoot, "README.md"),
  };
}

/** Paths of the two per-run artefacts. */
export interface RunArchivePaths {
  readonly outDir: string;
  readonly eventsPath: string;
  readonly summaryPath: string;
}

export function resolveRunArchivePaths(outDir: string): RunArchivePaths {
  const resolved = path.resolve(outDir);
  return {
    outDir: resolved,
    eventsPath: path.join(resolved, "events.jsonl"),
    summaryPath: path.join(resolved, "summary.md"),
  };
}

/**
 * Creates the run output directory (recursively). This is the only failure
 * that turns a summarize invocation into an error exit.
 *
 * @throws {OutputDirectoryError} When the directory cannot be created.
 */
export async function prepareOutputDirectory(outDir: string): Promise<string> {
  const resolved = path.resolve(outDir);
  try {
    await mkdir(resolved, { recursive: true });
  } catch (error) {
    throw new OutputDirectoryError(resolved, error);
  }
  return resolved;
}

/**
 * Relative path from {@link from} to {@link to} with `/` separators, `.` when
 * both point at the same directory.
 */
export function toPortableRelative(from: string, to: string): string {
  const relative = path.relative(from, to);
  return relative.length === 0 ? "." : relative.split(path.sep).join("/");
}
