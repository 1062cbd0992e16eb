import { z } from "zod";

/** A rectangle; boxes in a SourceDocument are in target units (in) */
export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

export const RectSchema = z.object({
  x: z.number(),
  y: z.number(),
  w: z.number().nonnegative(),
  h: z.number().nonnegative(),
});

export const BorderSideSchema = z.object({
  /** Resolved width in source px */
  width: z.number().nonnegative(),
  style: z.string(),
  color: z.string(),
});
export type BorderSide = z.infer<typeof BorderSideSchema>;

/**
 * Resolved (post-cascade) style for one element. Every field is optional so
 * a hand-built tree may carry only what it needs; unknown properties pass
 * through untouched.
 */
export const StyleSnapshotSchema = z
  .object({
    backgroundColor: z.string().optional(),
    backgroundImage: z.string().optional(),
    borderTop: BorderSideSchema.optional(),
    borderRight: BorderSideSchema.optional(),
    borderBottom: BorderSideSchema.optional(),
    borderLeft: BorderSideSchema.optional(),
    borderRadius: z.string().optional(),
    boxShadow: z.string().optional(),
    color: z.string().optional(),
    fontWeight: z.union([z.string(), z.number()]).optional(),
    fontStyle: z.string().optional(),
    textDecoration: z.string().optional(),
    textAlign: z.string().optional(),
    fontSize: z.number().positive().optional(),
    fontFamily: z.string().optional(),
  })
  .passthrough();
export type StyleSnapshot = z.infer<typeof StyleSnapshotSchema>;

export interface SourceText {
  kind: "text";
  text: string;
}

export interface SourceElement {
  kind: "element";
  tag: string;
  id?: string;
  classes?: string[];
  /** Bitmap reference for image tags */
  src?: string;
  /** Intrinsic bitmap size (px), when known */
  naturalSize?: { w: number; h: number };
  box: Rect;
  style: StyleSnapshot;
  children: SourceNode[];
}

export type SourceNode = SourceElement | SourceText;

export interface CanvasSize {
  width: number;
  height: number;
}

/** Laid-out document: declared canvas plus the element tree under <body> */
export interface SourceDocument {
  canvas: CanvasSize;
  root: SourceElement;
}

export const SourceTextSchema = z.object({
  kind: z.literal("text"),
  text: z.string(),
});

export const SourceElementSchema: z.ZodType<SourceElement, z.ZodTypeDef, unknown> =
  z.lazy(() =>
    z.object({
      kind: z.literal("element"),
      tag: z.string().min(1),
      id: z.string().optional(),
      classes: z.array(z.string()).optional(),
      src: z.string().optional(),
      naturalSize: z
        .object({ w: z.number().nonnegative(), h: z.number().nonnegative() })
        .optional(),
      box: RectSchema,
      style: StyleSnapshotSchema,
      children: z.array(SourceNodeSchema),
    })
  );

export const SourceNodeSchema: z.ZodType<SourceNode, z.ZodTypeDef, unknown> =
  z.lazy(() => z.union([SourceTextSchema, SourceElementSchema]));

export const CanvasSizeSchema = z.object({
  width: z.number().positive(),
  height: z.number().positive(),
});

export const SourceDocumentSchema = z.object({
  canvas: CanvasSizeSchema,
  root: SourceElementSchema,
});

/** Parse and validate a caller-supplied source tree. Throws ZodError on invalid input. */
export function parseSourceDocument(data: unknown): SourceDocument {
  return SourceDocumentSchema.parse(data);
}
