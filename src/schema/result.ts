import type { CanvasSize, Primitive, PlaceholderRegion } from "./primitive.js";
import type { ConversionWarning, ValidationIssue } from "./issue.js";

export interface ConversionSuccess {
  ok: true;
  canvas: CanvasSize;
  /** Document order; the first primitive is drawn at the bottom */
  primitives: Primitive[];
  placeholders: PlaceholderRegion[];
  warnings: ConversionWarning[];
}

export interface ConversionFailure {
  ok: false;
  /** Every issue found in the run */
  issues: ValidationIssue[];
}

export type ConversionResult = ConversionSuccess | ConversionFailure;
