/**
 * packages/core/src/toolbar/state.ts — Collapsing toolbar sizing state.
 *
 * Why: The toolbar publishes its height range so a scroll coordinator can
 * drive its height, and reads the resulting progress back when it places
 * children. One state object lives as long as its container; the layout
 * pass mutates it in place so holders of the reference observe updates.
 */

import { clamp01 } from "../animation/interpolate.js";

/** Called with the new bounds while the old bounds are still stored. */
export type HeightChangeListener = (minHeight: number, maxHeight: number) => void;

/** Called with the new visible height while the old height is still stored. */
export type VisibleHeightChangeListener = (height: number) => void;

export interface ToolbarState {
  /** Height when fully collapsed. */
  minHeight: number;
  /** Height when fully expanded. */
  maxHeight: number;
  /** Current visible height. Not clamped into [minHeight, maxHeight]. */
  height: number;
  onHeightChange?: HeightChangeListener | undefined;
  onVisibleHeightChange?: VisibleHeightChangeListener | undefined;
  /**
   * 0 when collapsed (height at minHeight), 1 when expanded (height at
   * maxHeight). Recomputed from the fields on every read.
   */
  readonly progress: number;
}

export type ToolbarStateSnapshot = Readonly<{
  minHeight: number;
  maxHeight: number;
  height: number;
  progress: number;
}>;

/**
 * Collapse progress for a height within [minHeight, maxHeight].
 * A range with no extent (maxHeight <= minHeight) reports 0.
 */
export function computeProgress(height: number, minHeight: number, maxHeight: number): number {
  const range = maxHeight - minHeight;
  if (!(range > 0)) return 0;
  return clamp01((height - minHeight) / range);
}

/**
 * Create a state seeded at zero bounds. Only the bounds listener can be given
 * here; assign `onVisibleHeightChange` on the returned object.
 */
export function createToolbarState(listener?: HeightChangeListener): ToolbarState {
  const state: ToolbarState = {
    minHeight: 0,
    maxHeight: 0,
    height: 0,
    onHeightChange: listener,
    onVisibleHeightChange: undefined,
    get progress(): number {
      return computeProgress(state.height, state.minHeight, state.maxHeight);
    },
  };
  return state;
}

export function snapshotToolbarState(state: ToolbarState): ToolbarStateSnapshot {
  return Object.freeze({
    minHeight: state.minHeight,
    maxHeight: state.maxHeight,
    height: state.height,
    progress: state.progress,
  });
}
