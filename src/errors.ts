import type { ValidationIssue } from "./schema/issue.js";
import { formatIssues } from "./validation/report.js";

export type LayoutFailureReason =
  | "dimension_mismatch"
  | "timeout"
  | "render_failed"
  | "malformed_layout";

/**
 * Setup error: the rendering pass could not produce a usable layout.
 * Raised before any node is processed.
 */
export class LayoutUnavailableError extends Error {
  constructor(
    message: string,
    public readonly reason: LayoutFailureReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "LayoutUnavailableError";
  }
}

/** Content errors of one run, raised together by unwrapConversion() */
export class ConversionFailedError extends Error {
  constructor(public readonly issues: ValidationIssue[]) {
    super(
      `Conversion failed with ${issues.length} issue(s):\n${formatIssues(issues)}`
    );
    this.name = "ConversionFailedError";
  }
}
