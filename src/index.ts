// Constants
export {
  PX_PER_INCH,
  PT_PER_INCH,
  PT_PER_PX,
  CANVAS_W,
  CANVAS_H,
  DIMENSION_EPS_IN,
  OVERFLOW_EPS_IN,
  OUTPUT_PRECISION,
  LAYOUT_TIMEOUT_MS,
  PLACEHOLDER_CLASS,
  TEXT_TAGS,
  INLINE_TAGS,
  IMAGE_TAGS,
} from "./constants.js";

// Schema types
export type {
  Rect,
  BorderSide,
  StyleSnapshot,
  SourceText,
  SourceElement,
  SourceNode,
  CanvasSize,
  SourceDocument,
} from "./schema/source.js";
export { parseSourceDocument, SourceDocumentSchema } from "./schema/source.js";

export type {
  TextAlign,
  RunBullet,
  TextRun,
  OutlineSides,
  Outline,
  Fill,
  Shadow,
  TextPrimitive,
  ShapePrimitive,
  ImagePrimitive,
  PlaceholderPrimitive,
  Primitive,
  PrimitiveKind,
  PlaceholderRegion,
} from "./schema/primitive.js";

export type {
  NodeRef,
  IssueKind,
  Edge,
  ValidationIssue,
  DimensionMismatchIssue,
  OverflowIssue,
  UnsupportedGradientIssue,
  StyleOnTextElementIssue,
  DuplicatePlaceholderIdIssue,
  WarningKind,
  ConversionWarning,
} from "./schema/issue.js";

export type {
  ConversionSuccess,
  ConversionFailure,
  ConversionResult,
} from "./schema/result.js";

export type { ConvertOptions, ConvertOptionsInput, Logger } from "./schema/options.js";
export { parseOptions, ConvertOptionsSchema } from "./schema/options.js";

// Errors
export { LayoutUnavailableError, ConversionFailedError } from "./errors.js";
export type { LayoutFailureReason } from "./errors.js";

// Core functions
export { convertDocument, convertHtml, unwrapConversion } from "./convert.js";
export { extractLayout, buildSourceDocument } from "./extraction/layout-extractor.js";
export type { LayoutPage } from "./extraction/layout-extractor.js";
export { classifyTree, classifyElement, flattenClassified } from "./classify/classifier.js";
export type { Role, ClassifiedNode } from "./classify/classifier.js";
export { mapPrimitives, mapNode } from "./style/style-mapper.js";
export type { MappedPrimitive } from "./style/style-mapper.js";
export { mapShapeStyle, shapeStyleProperties } from "./style/shape-style.js";
export { collectTextRuns } from "./style/text-runs.js";
export { parseBoxShadow, mapShadow } from "./style/shadow.js";
export { parseCssColor, cssColorToHex } from "./style/colors.js";
export { validate } from "./validation/engine.js";
export { formatIssues, reportBatch } from "./validation/report.js";
export type { BatchReport } from "./validation/report.js";
export { assemble, findPlaceholder } from "./assemble/assembler.js";

// Unit conversion
export {
  pxToInches,
  pxToPoints,
  parseCssLength,
  resolveLength,
  roundTo,
} from "./units/converter.js";

// Browser launch helpers
export { launchBrowser, openRenderingPage } from "./utils/browser.js";

// PPTX assembly
export {
  buildPresentation,
  presentationBuffer,
  writePresentation,
} from "./pptx/primitives-to-pptx.js";
export type { PptxSlide, PptxPresentation, BuildOptions } from "./pptx/primitives-to-pptx.js";
