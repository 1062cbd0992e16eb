import type { CanvasSize } from "../../schema/source.js";
import type { DimensionMismatchIssue, NodeRef } from "../../schema/issue.js";

export function canvasMatches(
  declared: CanvasSize,
  requested: CanvasSize,
  tolerance: number
): boolean {
  return (
    Math.abs(declared.width - requested.width) <= tolerance &&
    Math.abs(declared.height - requested.height) <= tolerance
  );
}

/**
 * Detect a declared canvas that differs from the requested one beyond
 * tolerance.
 */
export function detectDimensionMismatch(
  declared: CanvasSize,
  requested: CanvasSize,
  tolerance: number,
  root: NodeRef
): DimensionMismatchIssue | null {
  if (canvasMatches(declared, requested, tolerance)) return null;
  return {
    kind: "DimensionMismatch",
    nodes: [root],
    detail: `document canvas ${declared.width}in × ${declared.height}in does not match requested ${requested.width}in × ${requested.height}in`,
    declared: { width: declared.width, height: declared.height },
    requested: { width: requested.width, height: requested.height },
  };
}
