/**
 * packages/core/src/toolbar/collapsingToolbar.ts — Collapsing toolbar container.
 *
 * Why: Wires a retained toolbar state and the layout pass into one layout
 * node. The container is created once per mounted toolbar; each host render
 * calls `render()` with fresh props and content, and each host layout calls
 * `measure()`.
 *
 * The measure policy is created with the container and never rebuilt. It
 * reads the state through a reference that `render()` repoints, so swapping
 * `props.state` between renders takes effect on the next pass while the
 * policy object stays the same.
 *
 * @example
 * ```ts
 * const toolbar = createCollapsingToolbar();
 * toolbar.render({ maxWidth: 80 }, (scope) => [
 *   toolbarChild({ key: "bg" }, fixedSize(80, 12)),
 *   toolbarChild(scope.road({ key: "title" }, Alignments.centerStart, Alignments.bottomStart), fixedSize(20, 1)),
 * ]);
 * const res = toolbar.measure(looseConstraints(80, 8));
 * ```
 */

import { warnDev } from "../debug/devWarnings.js";
import { FoldbarError, describeThrown } from "../errors.js";
import {
  type Constraints,
  constrainConstraints,
  validateConstraints,
} from "../layout/constraints.js";
import { fatal, ok } from "../layout/engine/result.js";
import {
  type LayoutResult,
  type ValidatedCollapsingToolbarProps,
  validateCollapsingToolbarProps,
} from "../layout/validateProps.js";
import { type ToolbarMeasurePolicy, createToolbarMeasurePolicy } from "./measurePolicy.js";
import { toolbarScope } from "./placement.js";
import { type ToolbarState, createToolbarState, snapshotToolbarState } from "./state.js";
import type {
  CollapsingToolbarProps,
  ToolbarChild,
  ToolbarContent,
  ToolbarLayout,
  ToolbarLayoutSnapshot,
} from "./types.js";

export type CollapsingToolbar = Readonly<{
  /** State read by the next layout pass. */
  readonly state: ToolbarState;
  /** Stable for the lifetime of the container. */
  policy: ToolbarMeasurePolicy;
  /**
   * Apply new props and content. Invalid props or a throwing content block
   * leave the previous render in place.
   */
  render: (props: CollapsingToolbarProps | undefined, content: ToolbarContent) => LayoutResult<void>;
  /** Run a layout pass over the last rendered children. */
  measure: (constraints: Constraints) => LayoutResult<ToolbarLayout>;
}>;

type RenderedToolbar = Readonly<{
  props: CollapsingToolbarProps;
  validated: ValidatedCollapsingToolbarProps;
  children: readonly ToolbarChild[];
}>;

const NO_CHILDREN: readonly ToolbarChild[] = Object.freeze([]);

/**
 * Create a container. Throws FoldbarError when the initial props are invalid;
 * later `render()` calls report invalid props as results instead.
 */
export function createCollapsingToolbar(props?: CollapsingToolbarProps): CollapsingToolbar {
  const initial = validateCollapsingToolbarProps(props);
  if (!initial.ok) throw FoldbarError.fromFatal(initial.fatal);

  const defaultState = createToolbarState();
  const stateRef: { current: ToolbarState } = { current: props?.state ?? defaultState };
  const policy = createToolbarMeasurePolicy(stateRef);

  let rendered: RenderedToolbar = {
    props: props ?? {},
    validated: initial.value,
    children: NO_CHILDREN,
  };

  function render(
    nextProps: CollapsingToolbarProps | undefined,
    content: ToolbarContent,
  ): LayoutResult<void> {
    const propsRes = validateCollapsingToolbarProps(nextProps);
    if (!propsRes.ok) {
      warnDev(`collapsingToolbar: render rejected props: ${propsRes.fatal.detail}`);
      return propsRes;
    }

    let children: readonly ToolbarChild[];
    try {
      children = content(toolbarScope);
    } catch (e: unknown) {
      return fatal("FOLDBAR_USER_CODE_THROW", `collapsingToolbar: content threw: ${describeThrown(e)}`);
    }
    if (!Array.isArray(children)) {
      return fatal("FOLDBAR_INVALID_PROPS", "collapsingToolbar: content must return an array of children");
    }

    stateRef.current = nextProps?.state ?? defaultState;
    rendered = {
      props: nextProps ?? {},
      validated: propsRes.value,
      children: Object.freeze(children.slice()),
    };
    return ok(undefined);
  }

  function measure(constraints: Constraints): LayoutResult<ToolbarLayout> {
    const outerRes = validateConstraints(constraints);
    if (!outerRes.ok) return outerRes;

    const current = rendered;
    const res = policy.measure(
      current.children,
      constrainConstraints(outerRes.value, current.validated.modifier),
    );
    if (!res.ok) return res;

    const onLayout = current.props.internal_onLayout;
    if (onLayout) {
      const snapshot: ToolbarLayoutSnapshot = Object.freeze({
        id: current.validated.id ?? null,
        state: snapshotToolbarState(stateRef.current),
        rect: res.value.rect,
        childRects: Object.freeze(res.value.children.map((node) => node.rect)),
      });
      try {
        onLayout(snapshot);
      } catch (e: unknown) {
        return fatal(
          "FOLDBAR_USER_CODE_THROW",
          `collapsingToolbar: internal_onLayout threw: ${describeThrown(e)}`,
        );
      }
    }
    return res;
  }

  return Object.freeze({
    get state(): ToolbarState {
      return stateRef.current;
    },
    policy,
    render,
    measure,
  });
}

/** Render and measure a throwaway container in one call. */
export function layoutCollapsingToolbar(
  props: CollapsingToolbarProps | undefined,
  content: ToolbarContent,
  constraints: Constraints,
): LayoutResult<ToolbarLayout> {
  const propsRes = validateCollapsingToolbarProps(props);
  if (!propsRes.ok) return propsRes;

  const toolbar = createCollapsingToolbar(props);
  const renderRes = toolbar.render(props, content);
  if (!renderRes.ok) return renderRes;
  return toolbar.measure(constraints);
}
