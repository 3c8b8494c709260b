/**
 * packages/core/src/toolbar/stateStore.ts — Toolbar state retention.
 *
 * Why: Hosts that rebuild their container objects on every render still need
 * one state object per logical toolbar. The store keys states by a stable
 * container id; the first `remember` creates, later calls return the same
 * object, and `delete` drops it when the toolbar unmounts.
 */

import {
  type HeightChangeListener,
  type ToolbarState,
  createToolbarState,
} from "./state.js";

/** Store interface for per-toolbar retained state. */
export type ToolbarStateStore = Readonly<{
  /**
   * Get or create the state for `key`. `listener` seeds `onHeightChange` on
   * creation only; it never replaces the listener of an existing state.
   */
  remember: (key: string, listener?: HeightChangeListener) => ToolbarState;
  get: (key: string) => ToolbarState | undefined;
  delete: (key: string) => void;
  size: () => number;
}>;

/** Create a new toolbar state store instance. */
export function createToolbarStateStore(): ToolbarStateStore {
  const table = new Map<string, ToolbarState>();

  return Object.freeze({
    remember: (key, listener) => {
      const hit = table.get(key);
      if (hit) return hit;
      const created = createToolbarState(listener);
      table.set(key, created);
      return created;
    },
    get: (key) => table.get(key),
    delete: (key) => {
      table.delete(key);
    },
    size: () => table.size,
  });
}
