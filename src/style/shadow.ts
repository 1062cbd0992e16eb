import type { Shadow } from "../schema/primitive.js";
import { pxToPoints } from "../units/converter.js";
import { parseCssColor } from "./colors.js";

/** One layer of a box-shadow declaration, lengths in px */
export interface ShadowLayer {
  inset: boolean;
  offsetX: number;
  offsetY: number;
  blur: number;
  spread: number;
  color: string | undefined;
}

const COLOR_RE = /rgba?\([^)]*\)|#[0-9a-f]{3,8}\b|\btransparent\b/i;

/** Split on commas that are not inside parentheses */
function splitTopLevel(value: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = "";
  for (const ch of value) {
    if (ch === "(") depth++;
    if (ch === ")") depth--;
    if (ch === "," && depth === 0) {
      parts.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

function parseLayer(raw: string): ShadowLayer | null {
  const colorMatch = raw.match(COLOR_RE);
  const color = colorMatch?.[0];
  const rest = color ? raw.replace(color, " ") : raw;

  let inset = false;
  const lengths: number[] = [];
  for (const token of rest.trim().split(/\s+/)) {
    if (token === "") continue;
    if (token.toLowerCase() === "inset") {
      inset = true;
      continue;
    }
    const m = token.match(/^(-?\d*\.?\d+)(px)?$/);
    if (!m) return null;
    lengths.push(parseFloat(m[1] ?? "0"));
  }
  if (lengths.length < 2) return null;

  return {
    inset,
    offsetX: lengths[0] ?? 0,
    offsetY: lengths[1] ?? 0,
    blur: lengths[2] ?? 0,
    spread: lengths[3] ?? 0,
    color,
  };
}

/** Parse a resolved box-shadow value into its layers. "none" yields []. */
export function parseBoxShadow(value: string | undefined): ShadowLayer[] {
  if (!value || value.trim() === "none") return [];
  const layers: ShadowLayer[] = [];
  for (const part of splitTopLevel(value)) {
    const layer = parseLayer(part);
    if (layer) layers.push(layer);
  }
  return layers;
}

/**
 * Map the first outer shadow layer. Inset layers have no counterpart in the
 * target format and are dropped; `onInsetDropped` is told when that happens.
 */
export function mapShadow(
  value: string | undefined,
  onInsetDropped?: () => void
): Shadow | undefined {
  const layers = parseBoxShadow(value);
  if (layers.some((l) => l.inset)) onInsetDropped?.();

  const outer = layers.find((l) => !l.inset);
  if (!outer) return undefined;

  const color = parseCssColor(outer.color ?? "#000000");
  if (!color || color.alpha === 0) return undefined;

  const angle = (Math.atan2(outer.offsetY, outer.offsetX) * 180) / Math.PI;
  return {
    type: "outer",
    angle: (angle + 360) % 360,
    blur: pxToPoints(outer.blur),
    offset: pxToPoints(Math.hypot(outer.offsetX, outer.offsetY)),
    color: color.hex,
    opacity: color.alpha,
  };
}
