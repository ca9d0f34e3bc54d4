/** Round to a fixed number of decimal places; exact halves go to the even neighbour */
export function roundTo(value: number, digits: number): number {
  const factor = Math.pow(10, digits);
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
  }
  return Math.round(scaled) / factor;
}

/** Arithmetic mean; null for an empty list */
export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Share of `part` in `whole` as a percentage rounded to one decimal.
 * Null when either side is missing or the denominator is not positive.
 */
export function percentOf(part: number | null, whole: number | null): number | null {
  if (part === null || whole === null || whole <= 0) return null;
  return roundTo(part / whole * 100, 1);
}
