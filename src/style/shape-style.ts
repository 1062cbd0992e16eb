import type { BorderSide, Rect, StyleSnapshot } from "../schema/source.js";
import type { Fill, Outline, OutlineSides, Shadow } from "../schema/primitive.js";
import { parseCssLength, pxToPoints, resolveLength } from "../units/converter.js";
import { parseCssColor } from "./colors.js";
import { mapShadow, parseBoxShadow } from "./shadow.js";

export interface ShapeStyle {
  fill?: Fill;
  outline?: Outline;
  cornerRadius: number;
  shadow?: Shadow;
}

type SideName = keyof OutlineSides;

const SIDES: readonly SideName[] = ["top", "right", "bottom", "left"];

function borderSide(style: StyleSnapshot, side: SideName): BorderSide | undefined {
  switch (side) {
    case "top":
      return style.borderTop;
    case "right":
      return style.borderRight;
    case "bottom":
      return style.borderBottom;
    case "left":
      return style.borderLeft;
  }
}

function isVisibleBorder(side: BorderSide | undefined): side is BorderSide {
  if (!side) return false;
  if (side.width <= 0) return false;
  if (side.style === "none" || side.style === "hidden") return false;
  const color = parseCssColor(side.color);
  return color !== undefined && color.alpha > 0;
}

function hasBackgroundColor(style: StyleSnapshot): boolean {
  const color = parseCssColor(style.backgroundColor);
  return color !== undefined && color.alpha > 0;
}

function hasBackgroundImage(style: StyleSnapshot): boolean {
  const img = style.backgroundImage?.trim();
  return img !== undefined && img !== "" && img !== "none";
}

function hasCornerRadius(style: StyleSnapshot): boolean {
  const radius = parseCssLength(style.borderRadius);
  return radius !== null && radius.value > 0;
}

/**
 * Shape-only properties present on a snapshot, in CSS names. Empty when the
 * element is visually insignificant.
 */
export function shapeStyleProperties(style: StyleSnapshot): string[] {
  const props: string[] = [];
  if (hasBackgroundColor(style)) props.push("background-color");
  if (hasBackgroundImage(style)) props.push("background-image");
  if (SIDES.some((side) => isVisibleBorder(borderSide(style, side)))) {
    props.push("border");
  }
  if (parseBoxShadow(style.boxShadow).length > 0) props.push("box-shadow");
  if (hasCornerRadius(style)) props.push("border-radius");
  return props;
}

export function mapFill(style: StyleSnapshot): Fill | undefined {
  const color = parseCssColor(style.backgroundColor);
  if (!color || color.alpha === 0) return undefined;
  return { color: color.hex, transparency: (1 - color.alpha) * 100 };
}

/** Outline from the visible border sides; color and width come from the first one */
export function mapOutline(style: StyleSnapshot): Outline | undefined {
  const sides: OutlineSides = { top: false, right: false, bottom: false, left: false };
  let first: BorderSide | undefined;
  for (const name of SIDES) {
    const side = borderSide(style, name);
    if (isVisibleBorder(side)) {
      sides[name] = true;
      first ??= side;
    }
  }
  if (!first) return undefined;
  const color = parseCssColor(first.color);
  return {
    color: color?.hex ?? "000000",
    width: pxToPoints(first.width),
    sides,
  };
}

/**
 * Corner radius in inches. A percentage resolves against the smaller side of
 * the element's own box.
 */
export function mapCornerRadius(style: StyleSnapshot, box: Rect): number {
  const radius = parseCssLength(style.borderRadius);
  if (!radius || radius.value <= 0) return 0;
  return resolveLength(radius, Math.min(box.w, box.h));
}

export function mapShapeStyle(
  style: StyleSnapshot,
  box: Rect,
  onInsetDropped?: () => void
): ShapeStyle {
  const result: ShapeStyle = { cornerRadius: mapCornerRadius(style, box) };
  const fill = mapFill(style);
  if (fill) result.fill = fill;
  const outline = mapOutline(style);
  if (outline) result.outline = outline;
  const shadow = mapShadow(style.boxShadow, onInsetDropped);
  if (shadow) result.shadow = shadow;
  return result;
}
