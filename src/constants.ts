/** CSS reference pixels per inch (exact) */
export const PX_PER_INCH = 96;

/** Points per inch (exact) */
export const PT_PER_INCH = 72;

/** Font and stroke conversion: CSS px → pt */
export const PT_PER_PX = PT_PER_INCH / PX_PER_INCH; // 0.75

/** Default canvas: 16:9 slide (in) */
export const CANVAS_W = 10;
export const CANVAS_H = 5.625;

/** Canvas equality tolerance (in) */
export const DIMENSION_EPS_IN = 0.01;

/** Overflow tolerance before an edge is reported (in) */
export const OVERFLOW_EPS_IN = 0.01;

/** Decimals kept when geometry is rounded at output */
export const OUTPUT_PRECISION = 4;

/** Bounded wait for the rendering pass to settle (ms) */
export const LAYOUT_TIMEOUT_MS = 30_000;

/** Class that marks a reserved placeholder region */
export const PLACEHOLDER_CLASS = "placeholder";

/** Block tags whose content becomes text runs */
export const TEXT_TAGS: ReadonlySet<string> = new Set([
  "p",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "ul",
  "ol",
]);

/** Inline tags; standalone ones holding only text are text blocks too */
export const INLINE_TAGS: ReadonlySet<string> = new Set([
  "span",
  "a",
  "b",
  "strong",
  "i",
  "em",
  "u",
  "small",
  "label",
]);

/** Tags that reference external bitmap content */
export const IMAGE_TAGS: ReadonlySet<string> = new Set(["img"]);

/** Leading symbols that indicate a hand-typed bullet */
export const MANUAL_BULLET_SYMBOLS = ["•", "●", "○"] as const;

/** Fallback font when the snapshot names none */
export const DEFAULT_FONT_FACE = "Arial";

/** Fallback font size (px) when the snapshot names none */
export const DEFAULT_FONT_SIZE_PX = 16;
