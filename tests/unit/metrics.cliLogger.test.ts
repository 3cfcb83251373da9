import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { createCliStructuredLogger } from "../../src/metrics/cliLogger.js";

/**
 * The console bridge used by `scripts/summarizeMetrics.ts`. Each console call
 * must become one structured entry on stdout with a matching severity.
 */
describe("createCliStructuredLogger", () => {
  let stdoutStub: sinon.SinonStub;

  beforeEach(() => {
    stdoutStub = sinon.stub(process.stdout, "write");
  });

  afterEach(() => {
    stdoutStub.restore();
  });

  it("mirrors console.log calls as structured info entries", async () => {
    const bridge = createCliStructuredLogger("summarize_metrics");

    bridge.console.log("wrote:", "summary.md");
    await bridge.logger.flush();

    expect(bridge.entries).to.deep.equal([
      { stage: "summarize_metrics", level: "info", text: "wrote: summary.md" },
    ]);
    expect(stdoutStub.callCount).to.equal(1);
    const parsed = JSON.parse(String(stdoutStub.getCall(0).args[0]));
    expect(parsed.message).to.equal("metrics_cli_console");
    expect(parsed.payload).to.deep.equal({ stage: "summarize_metrics", text: "wrote: summary.md" });
  });

  it("uses warning severity for console.warn entries", () => {
    const bridge = createCliStructuredLogger("summarize_metrics");

    bridge.console.warn("skipped 2 malformed line(s)");

    expect(bridge.entries[0]?.level).to.equal("warn");
    expect(JSON.parse(String(stdoutStub.getCall(0).args[0])).level).to.equal("warn");
  });

  it("records errors with descriptive text", () => {
    const bridge = createCliStructuredLogger("summarize_metrics");

    bridge.console.error("✖ metrics summary failed:", new Error("disk full"));

    expect(bridge.entries[0]?.text).to.contain("disk full");
    expect(JSON.parse(String(stdoutStub.getCall(0).args[0])).level).to.equal("error");
  });
});
