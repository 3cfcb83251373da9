import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import { readdir, readFile, rm } from "node:fs/promises";
import path from "node:path";

import { StructuredLogger, parseRedactionDirectives, type LogEntry } from "../../src/logger.js";
import { createTempRepo } from "../helpers/telemetry.js";

/**
 * Unit tests for the JSON-lines logger. File mirroring and rotation run
 * against a temporary directory; the other cases capture the stdout sink.
 */
describe("StructuredLogger", () => {
  const tempFolders: string[] = [];

  afterEach(async () => {
    await Promise.all(
      tempFolders.splice(0).map(async (folder) => {
        await rm(folder, { recursive: true, force: true });
      }),
    );
  });

  it("writes one JSON line per entry to the sink and listener", () => {
    const lines: string[] = [];
    const seen: LogEntry[] = [];
    const logger = new StructuredLogger({ write: (line) => lines.push(line), onEntry: (entry) => seen.push(entry) });

    logger.warn("metrics_index_marker_missing", { index_path: "README.md" });

    expect(lines).to.have.length(1);
    const parsed = JSON.parse(lines[0] ?? "");
    expect(parsed.level).to.equal("warn");
    expect(parsed.message).to.equal("metrics_index_marker_missing");
    expect(parsed.payload).to.deep.equal({ index_path: "README.md" });
    expect(seen[0]?.message).to.equal("metrics_index_marker_missing");
  });

  it("mirrors entries to the log file once flushed", async () => {
    const root = await createTempRepo("metrics-logger-file-");
    tempFolders.push(root);
    const logFile = path.join(root, "logs", "metrics.log");
    const logger = new StructuredLogger({ logFile, write: () => undefined });

    logger.info("first");
    logger.info("second");
    await logger.flush();

    const content = await readFile(logFile, "utf8");
    expect(content.trim().split("\n").map((line) => JSON.parse(line).message)).to.deep.equal(["first", "second"]);
  });

  it("rotates the log file when it exceeds the size limit", async () => {
    const root = await createTempRepo("metrics-logger-rotate-");
    tempFolders.push(root);
    const logFile = path.join(root, "metrics.log");
    const logger = new StructuredLogger({ logFile, maxFileSizeBytes: 10, maxFileCount: 2, write: () => undefined });

    logger.info("first");
    logger.info("second");
    logger.info("third");
    await logger.flush();

    expect((await readdir(root)).sort()).to.deep.equal(["metrics.log", "metrics.log.1"]);
    expect(JSON.parse((await readFile(logFile, "utf8")).trim()).message).to.equal("third");
    expect(JSON.parse((await readFile(`${logFile}.1`, "utf8")).trim()).message).to.equal("second");
  });

  it("redacts sensitive keys and configured tokens when enabled", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({
      redactionEnabled: true,
      redactSecrets: ["test-secret"],
      write: (line) => lines.push(line),
    });

    logger.info("metrics_cli_console", { token: "abc", text: "uses test-secret here" });

    expect(JSON.parse(lines[0] ?? "").payload).to.deep.equal({
      token: "[REDACTED]",
      text: "uses [REDACTED] here",
    });
  });

  it("parses redaction directives", () => {
    expect(parseRedactionDirectives(undefined)).to.deep.equal({ enabled: false, tokens: [] });
    expect(parseRedactionDirectives("on,abc,abc")).to.deep.equal({ enabled: true, tokens: ["abc"] });
    expect(parseRedactionDirectives("abc")).to.deep.equal({ enabled: true, tokens: ["abc"] });
    expect(parseRedactionDirectives("off,abc")).to.deep.equal({ enabled: false, tokens: ["abc"] });
  });
});
