export const I32_MIN = -2147483648;
export const I32_MAX = 2147483647;

export function isI32(v: number): boolean {
  return Number.isInteger(v) && v >= I32_MIN && v <= I32_MAX;
}

/** Non-negative int32, the only valid shape for a measured extent. */
export function isI32NonNegative(v: number): boolean {
  return isI32(v) && v >= 0;
}

/**
 * Clamp `v` into [min, max]. When the range is inverted the lower bound wins,
 * so callers never see a value below `min`.
 */
export function clampWithin(v: number, min: number, max: number): number {
  if (v > max) v = max;
  if (v < min) v = min;
  return v;
}
