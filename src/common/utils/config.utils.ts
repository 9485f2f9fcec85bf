/**
 * Coerce a configuration value to a finite number
 */
export function toNumber(value: unknown, defaultValue: number): number {
  if (value === undefined || value === null || value === '') {
    return defaultValue;
  }
  const n = Number(value);
  return Number.isFinite(n) ? n : defaultValue;
}

/**
 * Coerce a configuration value to a positive integer (at least `min`)
 */
export function toPositiveInt(
  value: unknown,
  defaultValue: number,
  min = 1,
): number {
  return Math.max(min, Math.floor(toNumber(value, defaultValue)));
}
