/**
 * packages/core/src/testing/toolbar.ts — Collapsing toolbar test fixtures.
 *
 * Why: Toolbar tests need children with known sizes, children that record the
 * constraints they were measured with, and a log of listener calls that also
 * captures what the state held at call time.
 */

import type { Constraints } from "../layout/constraints.js";
import type { Size } from "../layout/types.js";
import { fixedSize, toolbarChild } from "../toolbar/placement.js";
import type { ToolbarState } from "../toolbar/state.js";
import type { ToolbarChild, ToolbarChildProps } from "../toolbar/types.js";

/** Child with a preferred size, clamped into whatever constraints it receives. */
export function sizedChild(w: number, h: number, props: ToolbarChildProps = {}): ToolbarChild {
  return toolbarChild(props, fixedSize(w, h));
}

export type RecordingChild = Readonly<{
  child: ToolbarChild;
  calls: readonly Constraints[];
}>;

/** Child that reports `size` verbatim and records every constraint it was measured with. */
export function recordingChild(size: Size, props: ToolbarChildProps = {}): RecordingChild {
  const calls: Constraints[] = [];
  const child = toolbarChild(props, (c) => {
    calls.push(c);
    return size;
  });
  return { child, calls };
}

export function throwingChild(message: string, props: ToolbarChildProps = {}): ToolbarChild {
  return toolbarChild(props, () => {
    throw new Error(message);
  });
}

export type HeightChangeCall = Readonly<{
  minHeight: number;
  maxHeight: number;
  /** State bounds at the moment the listener ran. */
  storedMinHeight: number;
  storedMaxHeight: number;
}>;

export type VisibleHeightChangeCall = Readonly<{
  height: number;
  /** State height at the moment the listener ran. */
  storedHeight: number;
}>;

export type ListenerLog = Readonly<{
  heightChanges: readonly HeightChangeCall[];
  visibleHeightChanges: readonly VisibleHeightChangeCall[];
}>;

/** Install both listeners on `state`, replacing any already set. */
export function attachListenerLog(state: ToolbarState): ListenerLog {
  const heightChanges: HeightChangeCall[] = [];
  const visibleHeightChanges: VisibleHeightChangeCall[] = [];
  state.onHeightChange = (minHeight, maxHeight) => {
    heightChanges.push({
      minHeight,
      maxHeight,
      storedMinHeight: state.minHeight,
      storedMaxHeight: state.maxHeight,
    });
  };
  state.onVisibleHeightChange = (height) => {
    visibleHeightChanges.push({ height, storedHeight: state.height });
  };
  return { heightChanges, visibleHeightChanges };
}
