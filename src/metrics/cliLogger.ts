import { format } from "node:util";

import { StructuredLogger } from "../logger.js";

/**
 * Structured representation of a console-style log entry emitted by the
 * summarizer CLI. Collecting these entries allows tests to assert on the
 * formatted content without scraping stdout.
 */
export interface CliLogEntry {
  /** Identifier describing the stage emitting the entry. */
  readonly stage: string;
  /** Severity level matching the underlying {@link StructuredLogger} call. */
  readonly level: "info" | "warn" | "error";
  /** `util.format` rendering of the console arguments. */
  readonly text: string;
}

/** Console-like facade consumed by the CLI executor. */
export interface CliConsole {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/** Structured logging utilities returned by {@link createCliStructuredLogger}. */
export interface CliStructuredLogger {
  /** Shared structured logger emitting JSON entries for machine consumption. */
  readonly logger: StructuredLogger;
  readonly console: CliConsole;
  /** Captured entries mirroring the emitted structured events. */
  readonly entries: readonly CliLogEntry[];
}

/** Message identifier attached to console bridge events. */
const CONSOLE_EVENT_MESSAGE = "metrics_cli_console";

/**
 * Creates a console facade that mirrors every call to a {@link StructuredLogger}
 * while keeping the formatted text for assertions.
 *
 * @param stage Identifier describing the CLI stage (used in payloads).
 */
export function createCliStructuredLogger(
  stage: string,
  options: { logger?: StructuredLogger } = {},
): CliStructuredLogger {
  const logger = options.logger ?? new StructuredLogger();
  const capturedEntries: CliLogEntry[] = [];

  function emit(level: "info" | "warn" | "error", args: unknown[]): void {
    const text = format(...args);
    capturedEntries.push({ stage, level, text });
    const payload = { stage, text };
    if (level === "error") {
      logger.error(CONSOLE_EVENT_MESSAGE, payload);
    } else if (level === "warn") {
      logger.warn(CONSOLE_EVENT_MESSAGE, payload);
    } else {
      logger.info(CONSOLE_EVENT_MESSAGE, payload);
    }
  }

  return {
    logger,
    console: {
      log: (...args: unknown[]) => emit("info", args),
      warn: (...args: unknown[]) => emit("warn", args),
      error: (...args: unknown[]) => emit("error", args),
    },
    entries: capturedEntries,
  };
}
