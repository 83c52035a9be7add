/** Floor applied to a spread before it is used as a divisor. */
export const EPSILON = 1e-6;

/** Arithmetic mean of an array. Returns 0 for empty input. */
export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < values.length; i++) sum += values[i];
  return sum / values.length;
}

/** Population variance. Returns 0 for empty input. */
export function variance(values: number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  let sumSq = 0;
  for (let i = 0; i < values.length; i++) {
    const d = values[i] - m;
    sumSq += d * d;
  }
  return sumSq / values.length;
}

/** Population standard deviation. Returns 0 for fewer than 2 values. */
export function stddev(values: number[]): number {
  if (values.length < 2) return 0;
  return Math.sqrt(variance(values));
}

/** Clamp a number to [min, max]. */
export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

/** Absolute deviation of `value` from `center`, in units of `spread`. */
export function zScore(value: number, center: number, spread: number): number {
  return Math.abs(value - center) / Math.max(EPSILON, spread);
}

/**
 * Map a z-score onto [0, 1], saturating at three standard deviations.
 * Every scorer's deviation components go through this.
 */
export function deviationComponent(z: number): number {
  return Math.min(1, z / 3);
}

/** Euclidean distance between two points. */
export function distance(x1: number, y1: number, x2: number, y2: number): number {
  return Math.sqrt((x2 - x1) ** 2 + (y2 - y1) ** 2);
}

/**
 * Perpendicular distance from (px, py) to the line through (x1, y1)–(x2, y2).
 * Returns 0 when the two line points coincide.
 */
export function distanceToLine(
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  px: number,
  py: number,
): number {
  const lineLength = distance(x1, y1, x2, y2);
  if (lineLength === 0) return 0;
  return Math.abs((y2 - y1) * px - (x2 - x1) * py + x2 * y1 - y2 * x1) / lineLength;
}
