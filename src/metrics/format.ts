/** Fixed decimal places applied to each rendered measurement. */
export const DECIMAL_PLACES = {
  avgMs: 2,
  memoryMB: 3,
  deltaE: 4,
  lutError: 8,
  bakeError: 10,
} as const;

/**
 * Formats a number with fixed decimals; a missing value renders as `""`.
 *
 * Exact ties round half to even and `-0` keeps its sign, so `1.125` renders
 * as `1.12` and large magnitudes print every integer digit.
 */
export function formatFixed(value: number | undefined, places: number): string {
  if (value === undefined) {
    return "";
  }
  const sign = value < 0 || Object.is(value, -0) ? "-" : "";
  return `${sign}${formatMagnitude(Math.abs(value), places)}`;
}

function formatMagnitude(magnitude: number, places: number): string {
  // toFixed switches to exponent notation from 1e21; such doubles are integers.
  if (magnitude >= 1e21) {
    const fraction = places > 0 ? `.${"0".repeat(places)}` : "";
    return `${BigInt(magnitude).toString()}${fraction}`;
  }

  const exact = magnitude.toFixed(100);
  const dot = exact.indexOf(".");
  const cut = dot + 1 + places;
  if (!/^50*$/.test(exact.slice(cut))) {
    return magnitude.toFixed(places);
  }

  // Exact tie: toFixed rounds up, so only an even kept digit needs truncation.
  const truncated = places > 0 ? exact.slice(0, cut) : exact.slice(0, dot);
  const lastDigit = Number(truncated.charAt(truncated.length - 1));
  return lastDigit % 2 === 0 ? truncated : magnitude.toFixed(places);
}

/** Replaces a missing text value with the empty string. */
export function formatText(value: string | undefined): string {
  return value ?? "";
}

/** Escape markdown table delimiters in free-form text. */
export function escapeMarkdownTable(value: string): string {
  return value.replaceAll("|", "\\|");
}

/** Renders one markdown table row from already formatted cells. */
export function formatTableRow(cells: readonly string[]): string {
  return `| ${cells.map(escapeMarkdownTable).join(" | ")} |`;
}
