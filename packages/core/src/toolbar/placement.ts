import type { Alignment } from "../layout/alignment.js";
import { constrainSize } from "../layout/constraints.js";
import type {
  MeasureFn,
  NoPlacement,
  ParallaxPlacement,
  PinPlacement,
  Placed,
  PlacementStrategy,
  RoadPlacement,
  ToolbarChild,
  ToolbarChildProps,
  ToolbarScope,
} from "./types.js";

export const NO_PLACEMENT: NoPlacement = Object.freeze({ kind: "none" });

const PARALLAX: ParallaxPlacement = Object.freeze({ kind: "parallax" });
const PIN: PinPlacement = Object.freeze({ kind: "pin" });

export function road(whenCollapsed: Alignment, whenExpanded: Alignment): RoadPlacement {
  return Object.freeze({ kind: "road", whenCollapsed, whenExpanded });
}

export function parallax(): ParallaxPlacement {
  return PARALLAX;
}

export function pin(): PinPlacement {
  return PIN;
}

/** Shared scope handed to every toolbar content block. */
export const toolbarScope: ToolbarScope = Object.freeze({
  road<P extends ToolbarChildProps>(
    props: P,
    whenCollapsed: Alignment,
    whenExpanded: Alignment,
  ): Placed<P, RoadPlacement> {
    return { ...props, placement: road(whenCollapsed, whenExpanded) };
  },
  parallax<P extends ToolbarChildProps>(props: P): Placed<P, ParallaxPlacement> {
    return { ...props, placement: PARALLAX };
  },
  pin<P extends ToolbarChildProps>(props: P): Placed<P, PinPlacement> {
    return { ...props, placement: PIN };
  },
});

export function resolvePlacement(child: ToolbarChild): PlacementStrategy {
  return child.props.placement ?? NO_PLACEMENT;
}

export function toolbarChild<P extends ToolbarChildProps>(
  props: P,
  measure: MeasureFn,
): ToolbarChild<P> {
  return Object.freeze({ props, measure });
}

/** Measure function for a child with a preferred size, clamped into its constraints. */
export function fixedSize(w: number, h: number): MeasureFn {
  return (c) => constrainSize(c, { w, h });
}
