/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the fundamental geometric types shared by the constraint model,
 * the alignment primitive and the collapsing toolbar. All values are integer
 * layout cells.
 */

/** Rectangle with position (x,y) and dimensions (w,h) in cells. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Size dimensions (width and height) in cells. */
export type Size = Readonly<{ w: number; h: number }>;

/** Placement offset of a child relative to its container origin. */
export type Offset = Readonly<{ x: number; y: number }>;

/** Horizontal resolution order used by alignments that distinguish start/end. */
export type LayoutDirection = "ltr" | "rtl";

export const ZERO_OFFSET: Offset = Object.freeze({ x: 0, y: 0 });
