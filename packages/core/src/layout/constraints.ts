/**
 * packages/core/src/layout/constraints.ts — Size constraint model.
 *
 * Why: A parent hands each layout node a range per axis; the node answers with
 * a concrete size inside that range. Max extents may be UNBOUNDED, which is
 * how the collapsing toolbar measures children independent of its own height.
 *
 * Invariants (after validateConstraints):
 *   - minW/minH are int32 >= 0
 *   - maxW/maxH are int32 >= their min, or UNBOUNDED
 */

import { clampWithin, isI32NonNegative } from "./engine/bounds.js";
import { fatal, ok } from "./engine/result.js";
import type { Size } from "./types.js";
import type { LayoutResult } from "./validateProps.js";

/** Max extent meaning "no limit on this axis". */
export const UNBOUNDED = Number.POSITIVE_INFINITY;

/** Inclusive size range per axis, in cells. */
export type Constraints = Readonly<{ minW: number; maxW: number; minH: number; maxH: number }>;

/** Constraint range contributed by a container's own size props. */
export type SizeModifier = Constraints;

export function constraints(minW: number, maxW: number, minH: number, maxH: number): Constraints {
  return Object.freeze({ minW, maxW, minH, maxH });
}

/** Exactly `w` x `h`. */
export function tightConstraints(w: number, h: number): Constraints {
  return constraints(w, w, h, h);
}

/** Anything from zero up to `maxW` x `maxH`. */
export function looseConstraints(maxW: number, maxH: number): Constraints {
  return constraints(0, maxW, 0, maxH);
}

export function isBounded(extent: number): boolean {
  return extent !== UNBOUNDED;
}

function isValidMax(max: number, min: number): boolean {
  return max === UNBOUNDED || (isI32NonNegative(max) && max >= min);
}

export function validateConstraints(c: Constraints): LayoutResult<Constraints> {
  if (!isI32NonNegative(c.minW) || !isI32NonNegative(c.minH)) {
    return fatal(
      "FOLDBAR_INVALID_PROPS",
      `constraints: minW/minH must be int32 >= 0 (got ${String(c.minW)}, ${String(c.minH)})`,
    );
  }
  if (!isValidMax(c.maxW, c.minW) || !isValidMax(c.maxH, c.minH)) {
    return fatal(
      "FOLDBAR_INVALID_PROPS",
      `constraints: maxW/maxH must be int32 >= min or UNBOUNDED (got ${String(c.maxW)}, ${String(c.maxH)})`,
    );
  }
  return ok(c);
}

/** Keep the width range; accept any height from 0 up. */
export function relaxHeight(c: Constraints): Constraints {
  return constraints(c.minW, c.maxW, 0, UNBOUNDED);
}

/**
 * Narrow `outer` by `inner`, never leaving `outer`'s range: each bound of
 * `inner` is clamped into the matching axis of `outer`.
 */
export function constrainConstraints(outer: Constraints, inner: Constraints): Constraints {
  return constraints(
    clampWithin(inner.minW, outer.minW, outer.maxW),
    clampWithin(inner.maxW, outer.minW, outer.maxW),
    clampWithin(inner.minH, outer.minH, outer.maxH),
    clampWithin(inner.maxH, outer.minH, outer.maxH),
  );
}

/** Clamp each axis of `size` into the constraint range. */
export function constrainSize(c: Constraints, size: Size): Size {
  return Object.freeze({
    w: clampWithin(size.w, c.minW, c.maxW),
    h: clampWithin(size.h, c.minH, c.maxH),
  });
}
