import type {
  ImagePrimitive,
  PlaceholderRegion,
  ShapePrimitive,
  TextPrimitive,
  TextRun,
} from "../schema/primitive.js";
import type { ConversionSuccess } from "../schema/result.js";

/** Text run as PptxGenJS takes it */
interface PptxTextRun {
  text: string;
  options: Record<string, unknown>;
}

/** The slice of a PptxGenJS slide this adapter uses */
export interface PptxSlide {
  addText(text: PptxTextRun[], options: Record<string, unknown>): unknown;
  addShape(shape: string, options: Record<string, unknown>): unknown;
  addImage(options: Record<string, unknown>): unknown;
}

/** The slice of a PptxGenJS presentation this adapter uses */
export interface PptxPresentation {
  layout: string;
  defineLayout(layout: { name: string; width: number; height: number }): void;
  addSlide(): PptxSlide;
  ShapeType: { rect: string; roundRect: string; line: string };
  write(props: { outputType: "nodebuffer" }): Promise<unknown>;
  writeFile(props: { fileName: string }): Promise<unknown>;
}

export interface BuildOptions {
  /** Draw caller-supplied content into a reserved region */
  fillPlaceholder?: (slide: PptxSlide, region: PlaceholderRegion) => void;
}

const LAYOUT_NAME = "CANVAS";

function runToPptx(run: TextRun): PptxTextRun {
  const options: Record<string, unknown> = {
    bold: run.bold,
    italic: run.italic,
    fontSize: run.fontSize,
    fontFace: run.fontFace,
    align: run.align,
    breakLine: run.breakLine,
  };
  if (run.underline) options.underline = { style: "sng" };
  if (run.color) options.color = run.color;
  if (run.bullet) {
    options.bullet = run.bullet.type === "number" ? { type: "number" } : true;
    options.indentLevel = run.bullet.indent;
  }
  return { text: run.text, options };
}

function addText(slide: PptxSlide, p: TextPrimitive): void {
  const { x, y, w, h } = p.box;
  slide.addText(p.runs.map(runToPptx), {
    x,
    y,
    w,
    h,
    valign: "top",
    margin: 0,
    wrap: true,
  });
}

function addShape(pres: PptxPresentation, slide: PptxSlide, p: ShapePrimitive): void {
  const { x, y, w, h } = p.box;
  const opts: Record<string, unknown> = { x, y, w, h };
  if (p.fill) {
    opts.fill = { color: p.fill.color, transparency: p.fill.transparency };
  }
  if (p.shadow) {
    opts.shadow = {
      type: p.shadow.type,
      angle: p.shadow.angle,
      blur: p.shadow.blur,
      offset: p.shadow.offset,
      color: p.shadow.color,
      opacity: p.shadow.opacity,
    };
  }

  const outline = p.outline;
  const uniform =
    outline !== undefined &&
    outline.sides.top &&
    outline.sides.right &&
    outline.sides.bottom &&
    outline.sides.left;
  if (outline && uniform) {
    opts.line = { color: outline.color, width: outline.width };
  }

  if (p.cornerRadius > 0) {
    opts.rectRadius = p.cornerRadius;
    slide.addShape(pres.ShapeType.roundRect, opts);
  } else {
    slide.addShape(pres.ShapeType.rect, opts);
  }

  // Partial borders become separate lines
  if (outline && !uniform) {
    const line = { color: outline.color, width: outline.width };
    if (outline.sides.top) slide.addShape(pres.ShapeType.line, { x, y, w, h: 0, line });
    if (outline.sides.bottom) slide.addShape(pres.ShapeType.line, { x, y: y + h, w, h: 0, line });
    if (outline.sides.left) slide.addShape(pres.ShapeType.line, { x, y, w: 0, h, line });
    if (outline.sides.right) slide.addShape(pres.ShapeType.line, { x: x + w, y, w: 0, h, line });
  }
}

function addImage(pres: PptxPresentation, slide: PptxSlide, p: ImagePrimitive): void {
  const { x, y, w, h } = p.box;
  const src = p.src;
  const isRemoteUrl = src.startsWith("http://") || src.startsWith("https://");

  if (src.startsWith("data:")) {
    slide.addImage({ data: src, x, y, w, h });
  } else if (src && !isRemoteUrl) {
    slide.addImage({ path: src, x, y, w, h });
  } else {
    // Remote URLs fail at writeFile() time (deferred fetch); draw a frame instead.
    slide.addShape(pres.ShapeType.rect, {
      x,
      y,
      w,
      h,
      fill: { color: "E2E8F0" },
      line: { color: "94A3B8", width: 1 },
    });
  }
}

/**
 * Build a PptxGenJS presentation with one slide per conversion result.
 * Primitives are added in order, so later ones are drawn on top.
 */
export async function buildPresentation(
  slides: ConversionSuccess[],
  options: BuildOptions = {}
): Promise<PptxPresentation> {
  // PptxGenJS has quirky type exports (namespace + default class).
  // The runtime default export IS the class constructor, but TS doesn't see it.
  const PptxGenJSModule = await import("pptxgenjs");
  const PptxGenJS = PptxGenJSModule.default as unknown as new () => PptxPresentation;

  const pres = new PptxGenJS();
  const canvas = slides[0]?.canvas;
  if (canvas) {
    pres.defineLayout({ name: LAYOUT_NAME, width: canvas.width, height: canvas.height });
    pres.layout = LAYOUT_NAME;
  }

  for (const result of slides) {
    const slide = pres.addSlide();
    for (const p of result.primitives) {
      switch (p.kind) {
        case "text":
          addText(slide, p);
          break;
        case "shape":
          addShape(pres, slide, p);
          break;
        case "image":
          addImage(pres, slide, p);
          break;
        case "placeholder":
          options.fillPlaceholder?.(slide, { id: p.id, x: p.box.x, y: p.box.y, w: p.box.w, h: p.box.h });
          break;
      }
    }
  }

  return pres;
}

/** Serialize a presentation to a Buffer */
export async function presentationBuffer(pres: PptxPresentation): Promise<Buffer> {
  const result = await pres.write({ outputType: "nodebuffer" });
  if (!Buffer.isBuffer(result)) {
    throw new Error("PptxGenJS did not return a Buffer");
  }
  return result;
}

/** Save a presentation to a .pptx file */
export async function writePresentation(
  pres: PptxPresentation,
  outputPath: string
): Promise<void> {
  await pres.writeFile({ fileName: outputPath });
}
