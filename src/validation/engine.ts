import type { ClassifiedNode } from "../classify/classifier.js";
import type { CanvasSize } from "../schema/source.js";
import type { NodeRef, ValidationIssue } from "../schema/issue.js";
import type { MappedPrimitive } from "../style/style-mapper.js";
import { detectDimensionMismatch } from "./rules/dimension-mismatch.js";
import { detectStyleOnText } from "./rules/style-on-text.js";
import { detectUnsupportedGradient } from "./rules/unsupported-gradient.js";
import { detectOverflow } from "./rules/overflow.js";
import { detectDuplicatePlaceholders } from "./rules/duplicate-placeholder.js";

export interface ValidationInput {
  declared: CanvasSize;
  requested: CanvasSize;
  root: NodeRef;
  /** Classified nodes in document order */
  nodes: ClassifiedNode[];
  mapped: MappedPrimitive[];
}

export interface ValidationSettings {
  dimensionTolerance: number;
  overflowTolerance: number;
  precision: number;
}

/**
 * Run every rule against every node and collect all issues.
 * Rules run in order: dimension → style on text → gradient → overflow →
 * duplicate placeholder. No rule suppresses another.
 */
export function validate(
  input: ValidationInput,
  settings: ValidationSettings
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  // 1. dimension_mismatch (cross-check; extraction already refused a mismatch)
  const mismatch = detectDimensionMismatch(
    input.declared,
    input.requested,
    settings.dimensionTolerance,
    input.root
  );
  if (mismatch) issues.push(mismatch);

  // 2. style_on_text_element
  for (const node of input.nodes) {
    const issue = detectStyleOnText(node);
    if (issue) issues.push(issue);
  }

  // 3. unsupported_gradient
  for (const node of input.nodes) {
    const issue = detectUnsupportedGradient(node);
    if (issue) issues.push(issue);
  }

  // 4. overflow, against the requested canvas, once per node and edge
  const reported = new Set<string>();
  for (const mapped of input.mapped) {
    for (const issue of detectOverflow(
      mapped,
      input.requested,
      settings.overflowTolerance,
      settings.precision
    )) {
      const key = `${mapped.ref.path}|${issue.edge}`;
      if (reported.has(key)) continue;
      reported.add(key);
      issues.push(issue);
    }
  }

  // 5. duplicate_placeholder_id
  issues.push(...detectDuplicatePlaceholders(input.mapped));

  return issues;
}
