import { readKeyComponent, type KeyComponent, type TelemetryEvent } from "./events.js";

/** Fields identifying one logical measurement point, in key order. */
export const PROBE_KEY_FIELDS = ["suite", "label", "width", "height", "test"] as const;

export type ProbeKey = readonly KeyComponent[];

/** Builds the `(suite, label, width, height, test)` tuple of an event. */
export function computeProbeKey(event: TelemetryEvent): ProbeKey {
  return PROBE_KEY_FIELDS.map((field) => readKeyComponent(event, field));
}

/**
 * Collapses repeated measurements onto the last event logged for each probe
 * key. Keys keep the position of their first occurrence; only the value is
 * replaced. Events lacking key fields still participate with `null`
 * components, so two events without `width`/`height` share a key.
 */
export function dedupeProbes(events: readonly TelemetryEvent[]): TelemetryEvent[] {
  const lastByKey = new Map<string, TelemetryEvent>();
  for (const event of events) {
    // JSON keeps `1` and `"1"` apart, which a joined string would not.
    lastByKey.set(JSON.stringify(computeProbeKey(event)), event);
  }
  return Array.from(lastByKey.values());
}
