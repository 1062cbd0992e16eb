import type { ClassifiedNode } from "../../classify/classifier.js";
import type { UnsupportedGradientIssue } from "../../schema/issue.js";
import { isGradient } from "../../style/colors.js";

/**
 * Detect a gradient background on an element whose box style is consulted.
 * Gradients are never flattened to a solid fill.
 */
export function detectUnsupportedGradient(
  node: ClassifiedNode
): UnsupportedGradientIssue | null {
  if (node.role !== "ShapeContainer" && node.role !== "TextBlock") return null;
  if (!isGradient(node.element.style.backgroundImage)) return null;
  return {
    kind: "UnsupportedGradient",
    nodes: [node.ref],
    detail: "CSS gradients are not supported; pre-render the gradient to an image",
  };
}
