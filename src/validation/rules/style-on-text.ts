import type { ClassifiedNode } from "../../classify/classifier.js";
import type { StyleOnTextElementIssue } from "../../schema/issue.js";
import { shapeStyleProperties } from "../../style/shape-style.js";

/** Detect box styling set directly on a text-bearing element */
export function detectStyleOnText(
  node: ClassifiedNode
): StyleOnTextElementIssue | null {
  if (node.role !== "TextBlock") return null;
  const properties = shapeStyleProperties(node.element.style);
  if (properties.length === 0) return null;
  return {
    kind: "StyleOnTextElement",
    nodes: [node.ref],
    detail: `<${node.element.tag}> has ${properties.join(", ")}; move box styling to a wrapping <div>`,
    properties,
  };
}
