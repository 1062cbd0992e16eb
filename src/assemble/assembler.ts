import type { CanvasSize } from "../schema/source.js";
import type { ConversionWarning, ValidationIssue } from "../schema/issue.js";
import type { PlaceholderRegion, Primitive, ShapePrimitive } from "../schema/primitive.js";
import type { ConversionResult } from "../schema/result.js";
import type { MappedPrimitive } from "../style/style-mapper.js";
import { roundRect, roundTo } from "../units/converter.js";
import { clampToCanvas } from "../utils/geometry.js";

/**
 * Round every length of a primitive once, and give it its final z. Overflow
 * within tolerance passed validation; such a box is trimmed to the canvas
 * so emitted geometry never leaves it.
 */
function finalize(
  primitive: Primitive,
  z: number,
  canvas: CanvasSize,
  precision: number
): Primitive {
  const box = clampToCanvas(roundRect(primitive.box, precision), canvas);
  const r = (v: number) => roundTo(v, precision);

  switch (primitive.kind) {
    case "text":
      return {
        ...primitive,
        box,
        z,
        runs: primitive.runs.map((run) => ({ ...run, fontSize: r(run.fontSize) })),
      };
    case "shape": {
      const shape: ShapePrimitive = { ...primitive, box, z, cornerRadius: r(primitive.cornerRadius) };
      if (primitive.fill) {
        shape.fill = { ...primitive.fill, transparency: r(primitive.fill.transparency) };
      }
      if (primitive.outline) {
        shape.outline = { ...primitive.outline, width: r(primitive.outline.width) };
      }
      if (primitive.shadow) {
        shape.shadow = {
          ...primitive.shadow,
          angle: r(primitive.shadow.angle),
          blur: r(primitive.shadow.blur),
          offset: r(primitive.shadow.offset),
          opacity: r(primitive.shadow.opacity),
        };
      }
      return shape;
    }
    case "image":
      return { ...primitive, box, z };
    case "placeholder":
      return { ...primitive, box, z };
  }
}

/**
 * Merge mapped primitives into the result. Any issue fails the whole run
 * and no primitive is emitted.
 */
export function assemble(
  mapped: MappedPrimitive[],
  warnings: ConversionWarning[],
  issues: ValidationIssue[],
  canvas: CanvasSize,
  precision: number
): ConversionResult {
  if (issues.length > 0) {
    return { ok: false, issues };
  }

  const primitives = mapped.map(({ primitive }, i) => finalize(primitive, i, canvas, precision));

  const placeholders: PlaceholderRegion[] = [];
  for (const p of primitives) {
    if (p.kind !== "placeholder") continue;
    placeholders.push({ id: p.id, x: p.box.x, y: p.box.y, w: p.box.w, h: p.box.h });
  }

  return {
    ok: true,
    canvas: { width: canvas.width, height: canvas.height },
    primitives,
    placeholders,
    warnings,
  };
}

/** Look up a placeholder region by identifier */
export function findPlaceholder(
  placeholders: PlaceholderRegion[],
  id: string
): PlaceholderRegion | undefined {
  return placeholders.find((p) => p.id === id);
}
