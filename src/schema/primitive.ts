import type { CanvasSize, Rect } from "./source.js";

export type TextAlign = "left" | "center" | "right" | "justify";

/** List marker for a run that opens a list item */
export interface RunBullet {
  type: "bullet" | "number";
  /** Nesting depth, 0 for a top-level item */
  indent: number;
}

/** A contiguous span of uniformly formatted text */
export interface TextRun {
  text: string;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  /** 6-digit hex without '#' */
  color?: string;
  align: TextAlign;
  /** pt */
  fontSize: number;
  fontFace: string;
  /** A paragraph or line break follows this run */
  breakLine: boolean;
  bullet?: RunBullet;
}

/** Outline sides that are drawn */
export interface OutlineSides {
  top: boolean;
  right: boolean;
  bottom: boolean;
  left: boolean;
}

export interface Outline {
  color: string;
  /** pt */
  width: number;
  sides: OutlineSides;
}

export interface Fill {
  color: string;
  /** 0 (opaque) – 100 (invisible) */
  transparency: number;
}

/** Outer shadow; inset shadows have no counterpart */
export interface Shadow {
  type: "outer";
  /** Degrees clockwise from the positive x axis */
  angle: number;
  /** pt */
  blur: number;
  /** pt */
  offset: number;
  color: string;
  /** 0 – 1 */
  opacity: number;
}

interface PrimitiveBase {
  /** Stable identifier (document path, or the placeholder's own id) */
  id: string;
  /** Absolute geometry in target units */
  box: Rect;
  /** Document order */
  z: number;
}

export interface TextPrimitive extends PrimitiveBase {
  kind: "text";
  runs: TextRun[];
}

export interface ShapePrimitive extends PrimitiveBase {
  kind: "shape";
  fill?: Fill;
  outline?: Outline;
  /** Target units */
  cornerRadius: number;
  shadow?: Shadow;
}

export interface ImagePrimitive extends PrimitiveBase {
  kind: "image";
  src: string;
}

export interface PlaceholderPrimitive extends PrimitiveBase {
  kind: "placeholder";
}

export type Primitive =
  | TextPrimitive
  | ShapePrimitive
  | ImagePrimitive
  | PlaceholderPrimitive;

export type PrimitiveKind = Primitive["kind"];

/** A named region for an external collaborator to fill */
export interface PlaceholderRegion {
  id: string;
  x: number;
  y: number;
  w: number;
  h: number;
}

export type { CanvasSize };
