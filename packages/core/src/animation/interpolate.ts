/**
 * packages/core/src/animation/interpolate.ts — Primitive interpolation helpers.
 */

import { roundCell } from "../layout/alignment.js";
import type { Offset } from "../layout/types.js";

/** Clamp a number into [0, 1]. */
export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

/** Linear interpolation between two numeric values. */
export function interpolateNumber(from: number, to: number, t: number): number {
  return from + (to - from) * clamp01(t);
}

/**
 * Linear interpolation between two cell offsets. The delta is scaled and
 * rounded per axis before it is added to `from`, so both endpoints are exact.
 */
export function interpolateOffset(from: Offset, to: Offset, t: number): Offset {
  const p = clamp01(t);
  return {
    x: from.x + roundCell((to.x - from.x) * p),
    y: from.y + roundCell((to.y - from.y) * p),
  };
}
