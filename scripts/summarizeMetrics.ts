#!/usr/bin/env node
import process from "node:process";

import { loadMetricsConfig } from "../src/config/metricsConfig.js";
import { StructuredLogger } from "../src/logger.js";
import { createCliStructuredLogger } from "../src/metrics/cliLogger.js";
import { executeSummarizeCli, parseSummarizeCliOptions } from "../src/metrics/summarizeCli.js";

/**
 * CLI entrypoint summarizing one telemetry run into
 * `<out-dir>/{events.jsonl,summary.md}` and the cumulative run index.
 */
async function main(): Promise<void> {
  const config = loadMetricsConfig(process.env);
  const logger = new StructuredLogger({
    logFile: config.logFile,
    maxFileSizeBytes: config.logRotateSizeBytes,
    maxFileCount: config.logRotateKeep,
  });
  const bridge = createCliStructuredLogger("summarize_metrics", { logger });

  try {
    const options = parseSummarizeCliOptions(process.argv.slice(2));
    await executeSummarizeCli(options, process.env, bridge.console, { logger });
  } catch (error) {
    bridge.console.error("✖ metrics summary failed:", error);
    process.exitCode = 1;
  } finally {
    await logger.flush();
  }
}

void main();
