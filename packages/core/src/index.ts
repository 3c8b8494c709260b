/**
 * @foldbar/core
 *
 * Runtime-agnostic TypeScript core for the collapsing toolbar layout.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors & results
// =============================================================================

export { FoldbarError, unwrapLayout } from "./errors.js";
export type {
  LayoutFatal,
  LayoutFatalCode,
  LayoutResult,
  ValidatedCollapsingToolbarProps,
} from "./layout/validateProps.js";
export { validateCollapsingToolbarProps } from "./layout/validateProps.js";

// =============================================================================
// Geometry, constraints & alignment
// =============================================================================

export type { LayoutDirection, Offset, Rect, Size } from "./layout/types.js";
export { ZERO_OFFSET } from "./layout/types.js";
export {
  UNBOUNDED,
  type Constraints,
  type SizeModifier,
  constrainConstraints,
  constrainSize,
  constraints,
  isBounded,
  looseConstraints,
  relaxHeight,
  tightConstraints,
  validateConstraints,
} from "./layout/constraints.js";
export {
  Alignments,
  type Alignment,
  type AlignmentName,
  type BiasAlignment,
  biasAlignment,
  roundCell,
} from "./layout/alignment.js";
export { clamp01, interpolateNumber, interpolateOffset } from "./animation/interpolate.js";

// =============================================================================
// Collapsing toolbar
// =============================================================================

export type {
  CollapsingToolbarProps,
  MeasureFn,
  NoPlacement,
  ParallaxPlacement,
  PinPlacement,
  Placed,
  PlacementStrategy,
  RoadPlacement,
  ToolbarChild,
  ToolbarChildProps,
  ToolbarContent,
  ToolbarLayout,
  ToolbarLayoutNode,
  ToolbarLayoutSnapshot,
  ToolbarScope,
} from "./toolbar/types.js";
export {
  NO_PLACEMENT,
  fixedSize,
  parallax,
  pin,
  resolvePlacement,
  road,
  toolbarChild,
  toolbarScope,
} from "./toolbar/placement.js";
export {
  type HeightChangeListener,
  type ToolbarState,
  type ToolbarStateSnapshot,
  type VisibleHeightChangeListener,
  computeProgress,
  createToolbarState,
  snapshotToolbarState,
} from "./toolbar/state.js";
export { type ToolbarStateStore, createToolbarStateStore } from "./toolbar/stateStore.js";
export {
  type ToolbarMeasurePolicy,
  type ToolbarStateRef,
  createToolbarMeasurePolicy,
} from "./toolbar/measurePolicy.js";
export {
  type CollapsingToolbar,
  createCollapsingToolbar,
  layoutCollapsingToolbar,
} from "./toolbar/collapsingToolbar.js";

// =============================================================================
// Dev mode
// =============================================================================

export { DEV_MODE } from "./debug/devWarnings.js";
