import type { CanvasSize } from "../../schema/source.js";
import type { OverflowIssue } from "../../schema/issue.js";
import type { MappedPrimitive } from "../../style/style-mapper.js";
import { overflowEdges } from "../../utils/geometry.js";
import { roundTo } from "../../units/converter.js";

/**
 * Detect a primitive extending past the canvas beyond eps.
 * Returns one issue per violated edge, with the exact overage.
 */
export function detectOverflow(
  { primitive, ref }: MappedPrimitive,
  canvas: CanvasSize,
  eps: number,
  precision: number
): OverflowIssue[] {
  return overflowEdges(primitive.box, canvas, eps).map(({ edge, by }) => {
    const amount = roundTo(by, precision);
    return {
      kind: "Overflow",
      nodes: [ref],
      detail: `${primitive.kind} extends ${amount}in past the ${edge} edge`,
      edge,
      amount,
    };
  });
}
