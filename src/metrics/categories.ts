import { readNumberField, readTextField, type TelemetryEvent } from "./events.js";

/** Row rendered in the Performance section. */
export interface PerformanceRow {
  readonly suite?: string;
  readonly label?: string;
  readonly width?: number;
  readonly height?: number;
  readonly frames?: string;
  readonly avgMs: number;
  readonly test?: string;
}

/** Row rendered in the Memory section. */
export interface MemoryRow {
  readonly suite?: string;
  readonly label?: string;
  readonly peakRSSDeltaMB: number;
  readonly message?: string;
  readonly test?: string;
}

/** Row rendered in the Color (ΔE2000) section. */
export interface ColorRow {
  readonly suite?: string;
  readonly label?: string;
  readonly deltaE2000Avg?: number;
  readonly deltaE2000Max?: number;
  readonly worstPatch?: string;
  readonly test?: string;
}

/** Row rendered in the Reference LUT Match section. */
export interface LutRow {
  readonly suite?: string;
  readonly label?: string;
  readonly meanAbsErr?: number;
  readonly maxAbsErr?: number;
  readonly worstPatch?: string;
  readonly test?: string;
}

/** Row rendered in the External Bake Match section. */
export interface BakeRow {
  readonly name?: string;
  readonly suite?: string;
  readonly label?: string;
  readonly meanAbsErr?: number;
  readonly maxAbsErr?: number;
  readonly test?: string;
}

/** Rows grouped by report category. */
export interface CategorizedRows {
  readonly performance: PerformanceRow[];
  readonly memory: MemoryRow[];
  readonly color: ColorRow[];
  readonly lut: LutRow[];
  readonly bake: BakeRow[];
}

export type ReportCategory = keyof CategorizedRows;

/** Section order used by the renderer and the row counters. */
export const REPORT_CATEGORIES: readonly ReportCategory[] = ["performance", "memory", "color", "lut", "bake"];

/**
 * Routes each event to every category whose gate it satisfies. Gates are
 * independent, so a probe reporting timing and memory yields two rows.
 */
export function categorizeEvents(events: readonly TelemetryEvent[]): CategorizedRows {
  const rows: CategorizedRows = { performance: [], memory: [], color: [], lut: [], bake: [] };

  for (const event of events) {
    const suite = readTextField(event, "suite");
    const label = readTextField(event, "label");
    const test = readTextField(event, "test");

    const avgMs = readNumberField(event, "avgMs");
    if (avgMs !== undefined) {
      rows.performance.push({
        suite,
        label,
        width: readNumberField(event, "width"),
        height: readNumberField(event, "height"),
        frames: readTextField(event, "frames"),
        avgMs,
        test,
      });
    }

    const peakRSSDeltaMB = readNumberField(event, "peakRSSDeltaMB");
    if (peakRSSDeltaMB !== undefined) {
      rows.memory.push({ suite, label, peakRSSDeltaMB, message: readTextField(event, "message"), test });
    }

    const deltaE2000Avg = readNumberField(event, "deltaE2000Avg");
    const deltaE2000Max = readNumberField(event, "deltaE2000Max");
    if (deltaE2000Avg !== undefined || deltaE2000Max !== undefined) {
      rows.color.push({
        suite,
        label,
        deltaE2000Avg,
        deltaE2000Max,
        // Older producers wrote the patch under `deltaEWorstPatch`.
        worstPatch: readTextField(event, "deltaE2000WorstPatch") ?? readTextField(event, "deltaEWorstPatch"),
        test,
      });
    }

    const lutMean = readNumberField(event, "lutMeanAbsErr");
    const lutMax = readNumberField(event, "lutMaxAbsErr");
    if (lutMean !== undefined || lutMax !== undefined) {
      rows.lut.push({
        suite,
        label,
        meanAbsErr: lutMean,
        maxAbsErr: lutMax,
        worstPatch: readTextField(event, "lutWorstPatch"),
        test,
      });
    }

    const bakeMean = readNumberField(event, "ocioBakeMeanAbsErr");
    const bakeMax = readNumberField(event, "ocioBakeMaxAbsErr");
    if (bakeMean !== undefined || bakeMax !== undefined) {
      rows.bake.push({
        name: readTextField(event, "ocioBakeName"),
        suite,
        label,
        meanAbsErr: bakeMean,
        maxAbsErr: bakeMax,
        test,
      });
    }
  }

  return rows;
}

/** Counts rows per category, in section order. */
export function countRows(rows: CategorizedRows): Record<ReportCategory, number> {
  return {
    performance: rows.performance.length,
    memory: rows.memory.length,
    color: rows.color.length,
    lut: rows.lut.length,
    bake: rows.bake.length,
  };
}
