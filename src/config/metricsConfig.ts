import { readInt, readOptionalString, type EnvSource } from "./env.js";

/** Settings read from `METRICS_*` environment variables. */
export interface MetricsConfig {
  /** Repository root used when `--repo-root` is not given. */
  readonly repoRoot: string;
  /** Event log override, relative to the repository root or absolute. */
  readonly eventLogPath?: string;
  /** Optional file mirroring the structured log. */
  readonly logFile: string | null;
  readonly logRotateSizeBytes: number;
  readonly logRotateKeep: number;
}

/**
 * Reads the summarizer configuration. Without `METRICS_REPO_ROOT` the
 * repository root is the current working directory.
 */
export function loadMetricsConfig(env: EnvSource = process.env, cwd: string = process.cwd()): MetricsConfig {
  return {
    repoRoot: readOptionalString("METRICS_REPO_ROOT", env) ?? cwd,
    eventLogPath: readOptionalString("METRICS_EVENT_LOG", env),
    logFile: readOptionalString("METRICS_LOG_FILE", env) ?? null,
    logRotateSizeBytes: readInt("METRICS_LOG_ROTATE_SIZE_BYTES", 5 * 1024 * 1024, { min: 1 }, env),
    logRotateKeep: readInt("METRICS_LOG_ROTATE_KEEP", 5, { min: 1, max: 50 }, env),
  };
}
