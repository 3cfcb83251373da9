import { describe, it } from "mocha";
import { expect } from "chai";

import { categorizeEvents, countRows } from "../../src/metrics/categories.js";
import { makeEvent } from "../helpers/telemetry.js";

/**
 * Category gates applied to deduplicated events. A single event may feed
 * several sections, and fields that are not finite numbers never open a gate.
 */
describe("metrics/categories", () => {
  it("routes an event with only avgMs to the performance category", () => {
    const rows = categorizeEvents([makeEvent({ suite: "S", label: "hd", avgMs: 12.3 })]);

    expect(countRows(rows)).to.deep.equal({ performance: 1, memory: 0, color: 0, lut: 0, bake: 0 });
    expect(rows.performance[0]?.avgMs).to.equal(12.3);
    expect(rows.performance[0]?.width).to.equal(undefined);
    expect(rows.performance[0]?.frames).to.equal(undefined);
  });

  it("lets one event feed several categories", () => {
    const rows = categorizeEvents([
      makeEvent({ suite: "S", label: "hd", test: "t", avgMs: 5, peakRSSDeltaMB: 1.5, message: "steady" }),
    ]);

    expect(countRows(rows)).to.deep.equal({ performance: 1, memory: 1, color: 0, lut: 0, bake: 0 });
    expect(rows.memory[0]?.message).to.equal("steady");
    expect(rows.memory[0]?.peakRSSDeltaMB).to.equal(1.5);
  });

  it("opens the color, LUT and bake gates on either of their two fields", () => {
    const rows = categorizeEvents([
      makeEvent({ label: "a", deltaE2000Max: 2.5, deltaE2000WorstPatch: "skin" }),
      makeEvent({ label: "b", lutMeanAbsErr: 0.01, lutWorstPatch: "p7" }),
      makeEvent({ label: "c", ocioBakeMaxAbsErr: 0.002, ocioBakeName: "aces-to-srgb" }),
    ]);

    expect(countRows(rows)).to.deep.equal({ performance: 0, memory: 0, color: 1, lut: 1, bake: 1 });
    expect(rows.color[0]?.deltaE2000Avg).to.equal(undefined);
    expect(rows.color[0]?.deltaE2000Max).to.equal(2.5);
    expect(rows.color[0]?.worstPatch).to.equal("skin");
    expect(rows.lut[0]?.meanAbsErr).to.equal(0.01);
    expect(rows.lut[0]?.maxAbsErr).to.equal(undefined);
    expect(rows.lut[0]?.worstPatch).to.equal("p7");
    expect(rows.bake[0]?.name).to.equal("aces-to-srgb");
    expect(rows.bake[0]?.maxAbsErr).to.equal(0.002);
  });

  it("falls back to the legacy worst patch field for color rows", () => {
    const rows = categorizeEvents([makeEvent({ deltaE2000Avg: 1, deltaEWorstPatch: "legacy" })]);

    expect(rows.color[0]?.worstPatch).to.equal("legacy");
  });

  it("treats null and non-numeric measurements as absent", () => {
    const rows = categorizeEvents([makeEvent({ avgMs: null, peakRSSDeltaMB: "3", deltaE2000Avg: null })]);

    expect(countRows(rows)).to.deep.equal({ performance: 0, memory: 0, color: 0, lut: 0, bake: 0 });
  });
});
