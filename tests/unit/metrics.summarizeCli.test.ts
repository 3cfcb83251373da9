import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { readFile, rm } from "node:fs/promises";
import path from "node:path";

import { CliUsageError } from "../../src/metrics/errors.js";
import {
  executeSummarizeCli,
  parseSummarizeCliOptions,
  resolveGeneratedAt,
} from "../../src/metrics/summarizeCli.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";
import { createTempRepo, toJsonl, writePerfLog } from "../helpers/telemetry.js";

function recordingConsole(): { lines: string[]; warnings: string[]; log: (...args: unknown[]) => void; warn: (...args: unknown[]) => void; error: (...args: unknown[]) => void } {
  const lines: string[] = [];
  const warnings: string[] = [];
  return {
    lines,
    warnings,
    log: (...args: unknown[]) => lines.push(args.map(String).join(" ")),
    warn: (...args: unknown[]) => warnings.push(args.map(String).join(" ")),
    error: () => undefined,
  };
}

/**
 * Flag parsing and the CLI executor, including the progress lines printed
 * through the console facade.
 */
describe("metrics summarize CLI", () => {
  let workingDir: string;

  beforeEach(async () => {
    workingDir = await createTempRepo("metrics-cli-");
  });

  afterEach(async () => {
    await rm(workingDir, { recursive: true, force: true });
  });

  it("parses every recognised flag", () => {
    const options = parseSummarizeCliOptions([
      "--run-id",
      "20260105-1",
      "--out-dir",
      "test_outputs/metrics/20260105-1",
      "--repo-root",
      "/repo",
      "--log",
      "logs/perf.jsonl",
      "--generated-at",
      "now",
      "--unknown",
    ]);

    expect(options).to.deep.equal({
      runId: "20260105-1",
      outDir: "test_outputs/metrics/20260105-1",
      repoRoot: "/repo",
      logPath: "logs/perf.jsonl",
      generatedAt: "now",
    });
  });

  it("ignores a trailing flag without value", () => {
    expect(parseSummarizeCliOptions(["--run-id"])).to.deep.equal({});
  });

  it("rejects a missing run identifier", async () => {
    let caught: unknown;
    try {
      await executeSummarizeCli({ outDir: "out" }, {}, recordingConsole(), { cwd: workingDir });
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(CliUsageError);
    if (caught instanceof CliUsageError) {
      expect(caught.code).to.equal("E-METRICS-USAGE");
      expect(caught.details.flag).to.equal("--run-id");
    }
  });

  it("normalises --generated-at values", () => {
    const fixed = () => new Date("2026-03-04T05:06:07.890Z");

    expect(resolveGeneratedAt("now", fixed)).to.equal("2026-03-04T05:06:07Z");
    expect(resolveGeneratedAt("2026-01-02T03:04:05Z")).to.equal("2026-01-02T03:04:05Z");
    expect(() => resolveGeneratedAt("yesterday")).to.throw(CliUsageError, "invalid --generated-at value 'yesterday'");
  });

  it("summarizes the run using the environment for the repository root", async () => {
    await writePerfLog(workingDir, `garbage\n${toJsonl([{ runID: "R", label: "hd", avgMs: 1, peakRSSDeltaMB: 2 }])}`);
    const output = recordingConsole();
    const logger = new RecordingLogger();
    const outDir = path.join(workingDir, "test_outputs", "metrics", "R");

    const result = await executeSummarizeCli(
      { runId: "R", outDir, generatedAt: "2026-01-02T03:04:05Z" },
      { METRICS_REPO_ROOT: workingDir },
      output,
      { logger, cwd: "/nonexistent" },
    );

    expect(result.eventCount).to.equal(1);
    expect(output.lines).to.deep.equal([
      "→ Metrics run: R (1 events, 1 probes)",
      "   rows: performance=1 memory=1 color=0 lut=0 bake=0",
      `wrote: ${path.join(outDir, "summary.md")}`,
      `wrote: ${path.join(outDir, "events.jsonl")}`,
      `updated: ${path.join(workingDir, "test_outputs", "metrics", "README.md")}`,
    ]);
    expect(output.warnings).to.deep.equal([
      `   skipped 1 malformed line(s) in ${path.join(workingDir, "test_outputs", "perf", "perf.jsonl")}`,
    ]);
    const summary = await readFile(path.join(outDir, "summary.md"), "utf8");
    expect(summary).to.contain("- generatedUTC: `2026-01-02T03:04:05Z`\n");
  });
});
