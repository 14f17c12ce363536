export function roundTo2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/**
 * Parses decimals written with either a dot or a locale comma ("92,5000").
 * Returns NaN for anything that is not a plain decimal.
 */
export function parseLocaleNumber(raw: string): number {
  const normalized = raw.trim().replace(/\s+/g, '').replace(',', '.');
  if (!/^-?\d+(\.\d+)?$/.test(normalized)) return NaN;
  return parseFloat(normalized);
}
