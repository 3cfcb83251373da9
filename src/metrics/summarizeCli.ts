import { loadMetricsConfig } from "../config/metricsConfig.js";
import type { EnvSource } from "../config/env.js";
import type { StructuredLogger } from "../logger.js";
import { REPORT_CATEGORIES } from "./categories.js";
import type { CliConsole } from "./cliLogger.js";
import { CliUsageError } from "./errors.js";
import { summarizeRun, type SummarizeRunResult } from "./summarize.js";

/** CLI flags recognised by `scripts/summarizeMetrics.ts`. */
export interface SummarizeCliOptions {
  runId?: string;
  outDir?: string;
  /** Repository root (`METRICS_REPO_ROOT` or the working directory by default). */
  repoRoot?: string;
  /** Event log override (`METRICS_EVENT_LOG` by default). */
  logPath?: string;
  /** `now` or an ISO timestamp stamped into the report header. */
  generatedAt?: string;
}

/** Parses CLI arguments. Unknown tokens are ignored. */
export function parseSummarizeCliOptions(argv: readonly string[]): SummarizeCliOptions {
  const options: SummarizeCliOptions = {};

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    const value = argv[index + 1];
    if (value === undefined) {
      continue;
    }
    if (token === "--run-id") {
      options.runId = value;
      index += 1;
    } else if (token === "--out-dir") {
      options.outDir = value;
      index += 1;
    } else if (token === "--repo-root") {
      options.repoRoot = value;
      index += 1;
    } else if (token === "--log") {
      options.logPath = value;
      index += 1;
    } else if (token === "--generated-at") {
      options.generatedAt = value;
      index += 1;
    }
  }

  return options;
}

/**
 * Normalises a `--generated-at` value to `YYYY-MM-DDTHH:MM:SSZ`.
 *
 * @throws {CliUsageError} When the value is neither `now` nor a parseable date.
 */
export function resolveGeneratedAt(raw: string, now: () => Date = () => new Date()): string {
  const date = raw === "now" ? now() : new Date(raw);
  if (Number.isNaN(date.getTime())) {
    throw new CliUsageError(`invalid --generated-at value '${raw}'`, "--generated-at");
  }
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/** Optional collaborators consumed by {@link executeSummarizeCli}. */
export interface SummarizeCliOverrides {
  readonly logger?: StructuredLogger;
  readonly cwd?: string;
  readonly now?: () => Date;
}

/**
 * Runs the summarizer with CLI semantics: required flags are validated, the
 * environment fills in the optional ones and progress goes to {@link output}.
 *
 * @throws {CliUsageError} When `--run-id` or `--out-dir` is missing.
 */
export async function executeSummarizeCli(
  options: SummarizeCliOptions,
  env: EnvSource,
  output: CliConsole,
  overrides: SummarizeCliOverrides = {},
): Promise<SummarizeRunResult> {
  if (!options.runId) {
    throw new CliUsageError("missing required flag --run-id", "--run-id");
  }
  if (!options.outDir) {
    throw new CliUsageError("missing required flag --out-dir", "--out-dir");
  }

  const config = loadMetricsConfig(env, overrides.cwd);
  const result = await summarizeRun({
    runId: options.runId,
    outDir: options.outDir,
    repoRoot: options.repoRoot ?? config.repoRoot,
    eventLogPath: options.logPath ?? config.eventLogPath,
    generatedAt: options.generatedAt !== undefined ? resolveGeneratedAt(options.generatedAt, overrides.now) : undefined,
    logger: overrides.logger,
  });

  output.log(`→ Metrics run: ${result.runId} (${result.eventCount} events, ${result.probeCount} probes)`);
  if (result.skippedLines > 0) {
    output.warn(`   skipped ${result.skippedLines} malformed line(s) in ${result.eventLogPath}`);
  }
  output.log(`   rows: ${REPORT_CATEGORIES.map((category) => `${category}=${result.rowCounts[category]}`).join(" ")}`);
  output.log(`wrote: ${result.summaryPath}`);
  output.log(`wrote: ${result.eventsPath}`);
  output.log(`${result.indexStatus === "unchanged" ? "unchanged" : "updated"}: ${result.indexPath}`);

  return result;
}
