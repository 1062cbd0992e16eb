import { PX_PER_INCH, PT_PER_PX } from "../constants.js";
import type { Rect } from "../schema/source.js";

/** CSS px → in */
export function pxToInches(px: number): number {
  return px / PX_PER_INCH;
}

/** CSS px → pt */
export function pxToPoints(px: number): number {
  return px * PT_PER_PX;
}

export function rectPxToInches(r: Rect): Rect {
  return {
    x: pxToInches(r.x),
    y: pxToInches(r.y),
    w: pxToInches(r.w),
    h: pxToInches(r.h),
  };
}

/** A parsed CSS length: absolute px or a percentage */
export type CssLength =
  | { unit: "px"; value: number }
  | { unit: "%"; value: number };

/**
 * Parse the first component of a resolved CSS length ("12px", "25%",
 * "8px 4px"). Returns null for anything else.
 */
export function parseCssLength(raw: string | undefined): CssLength | null {
  if (!raw) return null;
  const first = raw.trim().split(/\s+/)[0] ?? "";
  const match = first.match(/^(-?\d*\.?\d+)(px|%)?$/);
  if (!match) return null;
  const value = parseFloat(match[1] ?? "");
  if (Number.isNaN(value)) return null;
  return match[2] === "%" ? { unit: "%", value } : { unit: "px", value };
}

/**
 * Resolve a length to inches. Percentages resolve against `reference`
 * (already in inches); px values convert at the fixed ratio.
 */
export function resolveLength(length: CssLength, reference: number): number {
  switch (length.unit) {
    case "px":
      return pxToInches(length.value);
    case "%":
      return (length.value / 100) * reference;
  }
}

/** Round once, at output */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = Math.round(value * factor) / factor;
  // normalise -0
  return rounded === 0 ? 0 : rounded;
}

export function roundRect(r: Rect, decimals: number): Rect {
  return {
    x: roundTo(r.x, decimals),
    y: roundTo(r.y, decimals),
    w: roundTo(r.w, decimals),
    h: roundTo(r.h, decimals),
  };
}
