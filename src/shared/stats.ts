/**
 * Clamp a value into [min, max].
 */
export function clip(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Sum an array of numbers.
 */
export function sum(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

/**
 * Root mean square of an array of numbers.
 */
export function rms(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return Math.sqrt(sum(values.map((v) => v * v)) / values.length);
}

/**
 * Round to specified decimal places.
 */
export function round(value: number, decimals: number = 4): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
