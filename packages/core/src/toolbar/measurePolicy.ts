/**
 * packages/core/src/toolbar/measurePolicy.ts — Collapsing toolbar layout pass.
 *
 * Why: Position of a road child depends on the toolbar's own size, which
 * depends on every child's height. The pass therefore runs in two phases
 * inside one synchronous call:
 *
 *   1. Measure: every child is measured with the incoming width range and an
 *      unbounded height, so its natural height is known regardless of how far
 *      the toolbar is collapsed. Width/height and the collapse bounds
 *      (min/max child height, over all children whatever their strategy)
 *      are aggregated, clamped into the incoming constraints, and written to
 *      the toolbar state. Listeners fire before the write, only on change.
 *   2. Place: each child is offset by its placement strategy, reading the
 *      progress of the state just written.
 *
 * Invariants:
 *   - A pass that fails validation (constraints, child sizes) leaves the
 *     state untouched
 *   - Listener failures do not interrupt the pass; they are reported after
 *     the state is written and children are placed
 *   - Alignments are always resolved left-to-right
 *
 * @see packages/core/src/toolbar/state.ts
 */

import { interpolateOffset } from "../animation/interpolate.js";
import { warnDev } from "../debug/devWarnings.js";
import { describeThrown } from "../errors.js";
import { type Constraints, relaxHeight, validateConstraints } from "../layout/constraints.js";
import { I32_MAX, clampWithin, isI32, isI32NonNegative } from "../layout/engine/bounds.js";
import { fatal, ok } from "../layout/engine/result.js";
import { type Offset, type Rect, type Size, ZERO_OFFSET } from "../layout/types.js";
import type { LayoutResult } from "../layout/validateProps.js";
import { resolvePlacement } from "./placement.js";
import type { ToolbarState } from "./state.js";
import type {
  PlacementStrategy,
  ToolbarChild,
  ToolbarLayout,
  ToolbarLayoutNode,
} from "./types.js";

/** Indirection to the toolbar's current state, read at the start of each pass. */
export type ToolbarStateRef = Readonly<{ current: ToolbarState }>;

export type ToolbarMeasurePolicy = Readonly<{
  measure: (
    children: readonly ToolbarChild[],
    constraints: Constraints,
  ) => LayoutResult<ToolbarLayout>;
}>;

type MeasuredChild = Readonly<{
  child: ToolbarChild;
  placement: PlacementStrategy;
  size: Size;
}>;

function isMeasuredSize(size: Size): boolean {
  return (
    typeof size === "object" &&
    size !== null &&
    isI32NonNegative(size.w) &&
    isI32NonNegative(size.h)
  );
}

function describeSize(size: Size): string {
  if (typeof size !== "object" || size === null) return String(size);
  return `${String(size.w)}x${String(size.h)}`;
}

function placeChild(measured: MeasuredChild, space: Size, progress: number): Offset {
  const placement = measured.placement;
  switch (placement.kind) {
    case "road": {
      const collapsed = placement.whenCollapsed.align(measured.size, space, "ltr");
      const expanded = placement.whenExpanded.align(measured.size, space, "ltr");
      return interpolateOffset(collapsed, expanded, progress);
    }
    // Parallax motion is not implemented; parallax children sit where pinned ones do.
    case "parallax":
    case "pin":
    case "none":
      return ZERO_OFFSET;
  }
}

export function createToolbarMeasurePolicy(stateRef: ToolbarStateRef): ToolbarMeasurePolicy {
  let measuring = false;
  let warnedParallax = false;

  function runPass(
    children: readonly ToolbarChild[],
    incoming: Constraints,
  ): LayoutResult<ToolbarLayout> {
    const constraintsRes = validateConstraints(incoming);
    if (!constraintsRes.ok) return constraintsRes;
    const c = constraintsRes.value;
    const childConstraints = relaxHeight(c);

    /* --- Phase 1: measure and aggregate --- */
    const measured: MeasuredChild[] = [];
    let width = 0;
    let height = 0;
    let minHeight = I32_MAX;
    let maxHeight = 0;

    for (let i = 0; i < children.length; i++) {
      const child = children[i];
      if (!child) continue;

      let size: Size;
      try {
        size = child.measure(childConstraints);
      } catch (e: unknown) {
        return fatal(
          "FOLDBAR_USER_CODE_THROW",
          `collapsingToolbar: child[${String(i)}] measure threw: ${describeThrown(e)}`,
        );
      }
      if (!isMeasuredSize(size)) {
        return fatal(
          "FOLDBAR_INVALID_MEASURE",
          `collapsingToolbar: child[${String(i)}] measured ${describeSize(size)}, expected int32 cells >= 0`,
        );
      }

      // A child reporting a width outside its range occupies the nearest allowed width.
      const placedSize: Size = { w: clampWithin(size.w, c.minW, c.maxW), h: size.h };
      const placement = resolvePlacement(child);
      if (placement.kind === "parallax" && !warnedParallax) {
        warnedParallax = true;
        warnDev("collapsingToolbar: parallax() is not implemented; the child is placed at (0, 0)");
      }
      measured.push({ child, placement, size: placedSize });

      width = Math.max(width, placedSize.w);
      height = Math.max(height, placedSize.h);
      minHeight = Math.min(minHeight, placedSize.h);
      maxHeight = Math.max(maxHeight, placedSize.h);
    }

    if (measured.length === 0) minHeight = 0;

    width = clampWithin(width, c.minW, c.maxW);
    height = clampWithin(height, c.minH, c.maxH);

    const state = stateRef.current;
    const listenerErrors: string[] = [];

    if (state.minHeight !== minHeight || state.maxHeight !== maxHeight) {
      const onHeightChange = state.onHeightChange;
      if (onHeightChange) {
        try {
          onHeightChange(minHeight, maxHeight);
        } catch (e: unknown) {
          listenerErrors.push(`onHeightChange threw: ${describeThrown(e)}`);
        }
      }
    }

    if (state.height !== height) {
      const onVisibleHeightChange = state.onVisibleHeightChange;
      if (onVisibleHeightChange) {
        try {
          onVisibleHeightChange(height);
        } catch (e: unknown) {
          listenerErrors.push(`onVisibleHeightChange threw: ${describeThrown(e)}`);
        }
      }
    }

    state.minHeight = minHeight;
    state.maxHeight = maxHeight;
    state.height = height;

    /* --- Phase 2: place --- */
    const space: Size = { w: width, h: height };
    const progress = state.progress;
    const nodes: ToolbarLayoutNode[] = [];

    for (let i = 0; i < measured.length; i++) {
      const m = measured[i];
      if (!m) continue;

      let offset: Offset;
      try {
        offset = placeChild(m, space, progress);
      } catch (e: unknown) {
        return fatal(
          "FOLDBAR_USER_CODE_THROW",
          `collapsingToolbar: child[${String(i)}] alignment threw: ${describeThrown(e)}`,
        );
      }
      if (!isI32(offset.x) || !isI32(offset.y)) {
        return fatal(
          "FOLDBAR_INVALID_PROPS",
          `collapsingToolbar: child[${String(i)}] alignment produced a non-int32 offset (${String(offset.x)}, ${String(offset.y)})`,
        );
      }

      const rect: Rect = { x: offset.x, y: offset.y, w: m.size.w, h: m.size.h };
      nodes.push(Object.freeze({ child: m.child, placement: m.placement, rect }));
    }

    if (listenerErrors.length > 0) {
      return fatal("FOLDBAR_USER_CODE_THROW", `collapsingToolbar: ${listenerErrors.join("; ")}`);
    }

    return ok(
      Object.freeze({
        rect: { x: 0, y: 0, w: width, h: height },
        minHeight,
        maxHeight,
        progress,
        children: Object.freeze(nodes),
      }),
    );
  }

  return Object.freeze({
    measure: (children, constraints) => {
      if (measuring) {
        warnDev("collapsingToolbar: measure() called from inside its own layout pass; ignored");
        return fatal(
          "FOLDBAR_REENTRANT_CALL",
          "collapsingToolbar: measure called during its own layout pass",
        );
      }
      measuring = true;
      try {
        return runPass(children, constraints);
      } finally {
        measuring = false;
      }
    },
  });
}
