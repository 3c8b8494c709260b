/**
 * packages/core/src/toolbar/types.ts — Collapsing toolbar type definitions.
 *
 * Why: Declares the closed set of per-child placement strategies, the child
 * declaration shape consumed by the layout pass, and the container props.
 */

import type { Alignment } from "../layout/alignment.js";
import type { Constraints } from "../layout/constraints.js";
import type { Rect, Size } from "../layout/types.js";
import type { ToolbarState, ToolbarStateSnapshot } from "./state.js";

/* ========== Placement Strategies ========== */

/** Interpolate between two alignment-derived offsets as progress goes 0 -> 1. */
export type RoadPlacement = Readonly<{
  kind: "road";
  whenCollapsed: Alignment;
  whenExpanded: Alignment;
}>;

/** Reserved. Placed at the origin, like `none`. */
export type ParallaxPlacement = Readonly<{ kind: "parallax" }>;

/** Does not move with collapse. Placed at the origin. */
export type PinPlacement = Readonly<{ kind: "pin" }>;

export type NoPlacement = Readonly<{ kind: "none" }>;

export type PlacementStrategy = RoadPlacement | ParallaxPlacement | PinPlacement | NoPlacement;

/* ========== Children ========== */

/** Measure a child inside `constraints` and report its size in cells. */
export type MeasureFn = (constraints: Constraints) => Size;

export type ToolbarChildProps = Readonly<{
  key?: string | number;
  id?: string;
  /** Absent means `none`. */
  placement?: PlacementStrategy;
}>;

export type ToolbarChild<P extends ToolbarChildProps = ToolbarChildProps> = Readonly<{
  props: P;
  measure: MeasureFn;
}>;

/** `P` with its placement slot replaced by `X`. */
export type Placed<P, X extends PlacementStrategy> = Omit<P, "placement"> &
  Readonly<{ placement: X }>;

/**
 * Child annotations available inside a toolbar's content block. Each returns
 * a copy of `props` with the placement slot set; other props pass through and
 * the slot holds only the last strategy applied.
 */
export interface ToolbarScope {
  road<P extends ToolbarChildProps>(
    props: P,
    whenCollapsed: Alignment,
    whenExpanded: Alignment,
  ): Placed<P, RoadPlacement>;
  parallax<P extends ToolbarChildProps>(props: P): Placed<P, ParallaxPlacement>;
  pin<P extends ToolbarChildProps>(props: P): Placed<P, PinPlacement>;
}

export type ToolbarContent = (scope: ToolbarScope) => readonly ToolbarChild[];

/* ========== Layout Output ========== */

export type ToolbarLayoutNode = Readonly<{
  child: ToolbarChild;
  placement: PlacementStrategy;
  /** Placed offset and measured size, relative to the toolbar origin. */
  rect: Rect;
}>;

export type ToolbarLayout = Readonly<{
  /** Toolbar rect at the origin with the container's own size. */
  rect: Rect;
  minHeight: number;
  maxHeight: number;
  progress: number;
  children: readonly ToolbarLayoutNode[];
}>;

export type ToolbarLayoutSnapshot = Readonly<{
  id: string | null;
  state: ToolbarStateSnapshot;
  rect: Rect;
  childRects: readonly Rect[];
}>;

/* ========== Container ========== */

export type CollapsingToolbarProps = Readonly<{
  id?: string;
  /** Externally owned state. Defaults to one created with the container. */
  state?: ToolbarState;
  /** Fixed width; overrides minWidth/maxWidth. */
  width?: number;
  /** Fixed height; overrides minHeight/maxHeight. */
  height?: number;
  minWidth?: number;
  maxWidth?: number;
  minHeight?: number;
  maxHeight?: number;
  /** Called after every successful measure with the resulting state and rects. */
  internal_onLayout?: (snapshot: ToolbarLayoutSnapshot) => void;
}>;
