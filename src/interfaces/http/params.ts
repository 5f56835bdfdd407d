/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values and `NaN` for non-integers.
 */
export function safeInt(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/** Positive integer id from a path or query value, or `null` if malformed. */
export function parseId(value: string): number | null {
  if (!/^[1-9]\d*$/.test(value)) return null;
  const n = Number(value);
  return Number.isSafeInteger(n) ? n : null;
}
