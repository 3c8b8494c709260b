/**
 * packages/core/src/layout/validateProps.ts — Container props validation.
 *
 * Why: Validates collapsing toolbar props before layout, ensuring all values
 * are within expected ranges and types. Returns structured fatal errors for
 * invalid props rather than throwing, enabling deterministic error reporting.
 *
 * Validation rules:
 *   - Size modifier props must be int32 >= 0 (numeric strings are coerced)
 *   - `width`/`height` pin both bounds of their axis
 *   - `minWidth <= maxWidth` and `minHeight <= maxHeight` when both are set
 *   - `id` must be a non-empty string when present
 *   - `internal_onLayout` must be a function when present
 */

import type { CollapsingToolbarProps } from "../toolbar/types.js";
import { I32_MAX } from "./engine/bounds.js";
import { type SizeModifier, UNBOUNDED } from "./constraints.js";

export type LayoutFatalCode =
  | "FOLDBAR_INVALID_PROPS"
  | "FOLDBAR_INVALID_MEASURE"
  | "FOLDBAR_USER_CODE_THROW"
  | "FOLDBAR_REENTRANT_CALL";

/** Fatal error produced by a layout pass or by props validation. */
export type LayoutFatal = Readonly<{ code: LayoutFatalCode; detail: string }>;

/**
 * Layout operation result: success with value, or failure with fatal error.
 * Used throughout the layout system to propagate failures upward.
 */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: LayoutFatal }>;

export type ValidatedCollapsingToolbarProps = Readonly<{
  id?: string;
  modifier: SizeModifier;
}>;

function invalid(detail: string): LayoutResult<never> {
  return { ok: false, fatal: { code: "FOLDBAR_INVALID_PROPS", detail } };
}

function describeReceivedType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function invalidProp(name: string, expected: string, received: unknown): LayoutResult<never> {
  return invalid(
    `Invalid prop "${name}" on <collapsingToolbar>: expected ${expected}, ` +
      `got ${describeReceivedType(received)} (${String(received)})`,
  );
}

function parseFiniteNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.length === 0) return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function optionalIntNonNegative(name: string, v: unknown): LayoutResult<number | undefined> {
  if (v === undefined) return { ok: true, value: undefined };
  const n = parseFiniteNumber(v);
  if (n === undefined || n < 0 || Math.trunc(n) > I32_MAX) {
    return invalidProp(name, "an int32 >= 0", v);
  }
  return { ok: true, value: Math.trunc(n) };
}

type AxisModifier = Readonly<{ min: number; max: number }>;

function resolveAxis(
  minName: string,
  maxName: string,
  fixed: number | undefined,
  min: number | undefined,
  max: number | undefined,
): LayoutResult<AxisModifier> {
  if (fixed !== undefined) {
    return { ok: true, value: { min: fixed, max: fixed } };
  }
  const lo = min ?? 0;
  const hi = max ?? UNBOUNDED;
  if (lo > hi) {
    return invalid(
      `Invalid props on <collapsingToolbar>: ${minName} (${String(lo)}) exceeds ${maxName} (${String(hi)})`,
    );
  }
  return { ok: true, value: { min: lo, max: hi } };
}

export function validateCollapsingToolbarProps(
  props: CollapsingToolbarProps | undefined,
): LayoutResult<ValidatedCollapsingToolbarProps> {
  const p = props ?? {};

  const id = p.id;
  if (id !== undefined && (typeof id !== "string" || id.length === 0)) {
    return invalidProp("id", "a non-empty string", id);
  }

  const state = p.state;
  if (state !== undefined && (typeof state !== "object" || state === null)) {
    return invalidProp("state", "a ToolbarState", state);
  }

  const onLayout = p.internal_onLayout;
  if (onLayout !== undefined && typeof onLayout !== "function") {
    return invalidProp("internal_onLayout", "a function", onLayout);
  }

  const width = optionalIntNonNegative("width", p.width);
  if (!width.ok) return width;
  const height = optionalIntNonNegative("height", p.height);
  if (!height.ok) return height;
  const minWidth = optionalIntNonNegative("minWidth", p.minWidth);
  if (!minWidth.ok) return minWidth;
  const maxWidth = optionalIntNonNegative("maxWidth", p.maxWidth);
  if (!maxWidth.ok) return maxWidth;
  const minHeight = optionalIntNonNegative("minHeight", p.minHeight);
  if (!minHeight.ok) return minHeight;
  const maxHeight = optionalIntNonNegative("maxHeight", p.maxHeight);
  if (!maxHeight.ok) return maxHeight;

  // A fixed width/height takes precedence over the range props of its axis.
  const w = resolveAxis("minWidth", "maxWidth", width.value, minWidth.value, maxWidth.value);
  if (!w.ok) return w;
  const h = resolveAxis("minHeight", "maxHeight", height.value, minHeight.value, maxHeight.value);
  if (!h.ok) return h;

  const modifier: SizeModifier = Object.freeze({
    minW: w.value.min,
    maxW: w.value.max,
    minH: h.value.min,
    maxH: h.value.max,
  });
  return { ok: true, value: id === undefined ? { modifier } : { id, modifier } };
}
