/**
 * packages/core/src/layout/alignment.ts — Alignment primitive.
 *
 * An alignment maps a child size and the space it sits in to the child's
 * offset. Bias alignments place the child along each axis by a bias in
 * [-1, 1]: -1 is start/top, 0 is center, 1 is end/bottom. Offsets are rounded
 * to whole cells with Math.round, so a half cell rounds toward +infinity.
 */

import type { LayoutDirection, Offset, Size } from "./types.js";

export interface Alignment {
  align(size: Size, space: Size, direction: LayoutDirection): Offset;
}

export type BiasAlignment = Alignment &
  Readonly<{
    horizontalBias: number;
    verticalBias: number;
  }>;

/** Round to a whole cell; never yields -0. */
export function roundCell(v: number): number {
  const r = Math.round(v);
  return r === 0 ? 0 : r;
}

function normalizeBias(bias: number): number {
  if (!Number.isFinite(bias)) return 0;
  if (bias < -1) return -1;
  if (bias > 1) return 1;
  return bias;
}

/**
 * Create an alignment from a horizontal and vertical bias. Horizontal bias is
 * mirrored under "rtl", so start/end follow the reading direction.
 */
export function biasAlignment(horizontalBias: number, verticalBias: number): BiasAlignment {
  const h = normalizeBias(horizontalBias);
  const v = normalizeBias(verticalBias);
  return Object.freeze({
    horizontalBias: h,
    verticalBias: v,
    align(size: Size, space: Size, direction: LayoutDirection): Offset {
      const centerX = (space.w - size.w) / 2;
      const centerY = (space.h - size.h) / 2;
      const resolvedH = direction === "ltr" ? h : -h;
      return {
        x: roundCell(centerX * (1 + resolvedH)),
        y: roundCell(centerY * (1 + v)),
      };
    },
  });
}

/** Named bias alignments. */
export const Alignments = Object.freeze({
  topStart: biasAlignment(-1, -1),
  topCenter: biasAlignment(0, -1),
  topEnd: biasAlignment(1, -1),
  centerStart: biasAlignment(-1, 0),
  center: biasAlignment(0, 0),
  centerEnd: biasAlignment(1, 0),
  bottomStart: biasAlignment(-1, 1),
  bottomCenter: biasAlignment(0, 1),
  bottomEnd: biasAlignment(1, 1),
});

export type AlignmentName = keyof typeof Alignments;
