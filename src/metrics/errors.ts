/** Base error used by the metrics summarizer. */
export class MetricsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MetricsError";
  }
}

/** Raised when the run output directory cannot be created. */
export class OutputDirectoryError extends MetricsError {
  public readonly code = "E-METRICS-OUTDIR";
  public readonly hint = "check that the parent directory exists and is writable";
  public readonly details: { outDir: string };

  constructor(outDir: string, cause: unknown) {
    super(`unable to prepare output directory '${outDir}'`, { cause });
    this.name = "OutputDirectoryError";
    this.details = { outDir };
  }
}

/** Raised when the CLI receives incomplete or malformed flags. */
export class CliUsageError extends MetricsError {
  public readonly code = "E-METRICS-USAGE";
  public readonly hint = "usage: summarizeMetrics --run-id <id> --out-dir <dir> [--repo-root <dir>] [--log <file>]";
  public readonly details: { flag: string };

  constructor(message: string, flag: string) {
    super(message);
    this.name = "CliUsageError";
    this.details = { flag };
  }
}
