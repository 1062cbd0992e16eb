import type { SourceElement, StyleSnapshot } from "../schema/source.js";
import type { RunBullet, TextAlign, TextRun } from "../schema/primitive.js";
import {
  DEFAULT_FONT_FACE,
  DEFAULT_FONT_SIZE_PX,
  MANUAL_BULLET_SYMBOLS,
} from "../constants.js";
import { pxToPoints } from "../units/converter.js";
import { cssColorToHex } from "./colors.js";

/** Character formatting shared by every character of a run */
interface RunFormat {
  bold: boolean;
  italic: boolean;
  underline: boolean;
  color?: string;
  fontSize: number;
  fontFace: string;
}

interface Segment {
  text: string;
  format: RunFormat;
}

/** One output line: a paragraph, list item, or the part after a <br> */
interface Line {
  segments: Segment[];
  align: TextAlign;
  bullet?: RunBullet;
}

export interface CollectedText {
  runs: TextRun[];
  /** A line starts with a hand-typed bullet symbol */
  manualBullet: boolean;
}

/**
 * Clean font-family string (remove quotes, take first family).
 */
export function cleanFontFamily(fontFamily: string | undefined): string {
  if (!fontFamily) return DEFAULT_FONT_FACE;
  const first = fontFamily.split(",")[0]?.trim().replace(/['"]/g, "");
  return first || DEFAULT_FONT_FACE;
}

/**
 * Map CSS text-align to a run alignment hint.
 */
export function mapTextAlign(textAlign: string | undefined): TextAlign {
  switch (textAlign) {
    case "center":
      return "center";
    case "right":
    case "end":
      return "right";
    case "justify":
      return "justify";
    default:
      return "left";
  }
}

export function isBoldWeight(weight: string | number): boolean {
  if (typeof weight === "number") return weight >= 600;
  if (weight === "bold" || weight === "bolder") return true;
  const numeric = parseInt(weight, 10);
  return !Number.isNaN(numeric) && numeric >= 600;
}

function baseFormat(style: StyleSnapshot): RunFormat {
  const format: RunFormat = {
    bold: style.fontWeight !== undefined && isBoldWeight(style.fontWeight),
    italic: style.fontStyle === "italic" || style.fontStyle === "oblique",
    underline: style.textDecoration?.includes("underline") ?? false,
    fontSize: pxToPoints(style.fontSize ?? DEFAULT_FONT_SIZE_PX),
    fontFace: cleanFontFamily(style.fontFamily),
  };
  const color = cssColorToHex(style.color);
  if (color) format.color = color;
  return format;
}

/**
 * Formatting of an inline element: its own resolved value wins, then the
 * tag's default emphasis, then what it inherits. Underline accumulates,
 * since text-decoration paints through descendants without being inherited.
 */
function deriveFormat(parent: RunFormat, el: SourceElement): RunFormat {
  const { style, tag } = el;
  const format: RunFormat = { ...parent };

  if (style.fontWeight !== undefined) format.bold = isBoldWeight(style.fontWeight);
  else if (tag === "b" || tag === "strong") format.bold = true;

  if (style.fontStyle !== undefined) {
    format.italic = style.fontStyle === "italic" || style.fontStyle === "oblique";
  } else if (tag === "i" || tag === "em") {
    format.italic = true;
  }

  format.underline =
    parent.underline ||
    tag === "u" ||
    (style.textDecoration?.includes("underline") ?? false);

  const color = cssColorToHex(style.color);
  if (color) format.color = color;
  if (style.fontSize !== undefined) format.fontSize = pxToPoints(style.fontSize);
  if (style.fontFamily !== undefined) format.fontFace = cleanFontFamily(style.fontFamily);
  return format;
}

function sameFormat(a: RunFormat, b: RunFormat): boolean {
  return (
    a.bold === b.bold &&
    a.italic === b.italic &&
    a.underline === b.underline &&
    a.color === b.color &&
    a.fontSize === b.fontSize &&
    a.fontFace === b.fontFace
  );
}

class LineCollector {
  readonly lines: Line[] = [];
  private current: Line | null = null;

  open(align: TextAlign, bullet?: RunBullet): void {
    this.close();
    this.current = bullet ? { segments: [], align, bullet } : { segments: [], align };
  }

  close(): void {
    if (this.current) this.lines.push(this.current);
    this.current = null;
  }

  /** End the current line and continue on a new one with the same alignment */
  lineBreak(): void {
    const align = this.current?.align ?? "left";
    this.close();
    this.current = { segments: [], align };
  }

  push(text: string, format: RunFormat, align: TextAlign): void {
    if (!this.current) this.current = { segments: [], align };
    this.current.segments.push({ text, format });
  }
}

function walkInline(
  el: SourceElement,
  format: RunFormat,
  align: TextAlign,
  out: LineCollector,
  depth: number
): void {
  for (const child of el.children) {
    if (child.kind === "text") {
      out.push(child.text, format, align);
      continue;
    }
    if (child.tag === "br") {
      out.lineBreak();
      continue;
    }
    if (child.tag === "ul" || child.tag === "ol") {
      walkList(child, deriveFormat(format, child), align, out, depth);
      continue;
    }
    walkInline(child, deriveFormat(format, child), align, out, depth);
  }
}

function walkList(
  list: SourceElement,
  format: RunFormat,
  align: TextAlign,
  out: LineCollector,
  depth: number
): void {
  const type = list.tag === "ol" ? "number" : "bullet";
  for (const item of list.children) {
    // whitespace between <li> elements carries nothing
    if (item.kind === "text") continue;
    const itemFormat = deriveFormat(format, item);
    const itemAlign =
      item.style.textAlign !== undefined ? mapTextAlign(item.style.textAlign) : align;
    out.open(itemAlign, { type, indent: depth });
    walkInline(item, itemFormat, itemAlign, out, depth + 1);
    out.close();
  }
}

/** HTML's collapsible whitespace; U+00A0 is kept */
const COLLAPSIBLE_WS = /[ \t\n\r\f]+/g;

/** Collapse whitespace the way HTML does and drop empty segments */
function normalizeLine(line: Line): Segment[] {
  const out: Segment[] = [];
  let afterSpace = true;
  for (const seg of line.segments) {
    let text = seg.text.replace(COLLAPSIBLE_WS, " ");
    if (afterSpace && text.startsWith(" ")) text = text.slice(1);
    if (text === "") continue;
    afterSpace = text.endsWith(" ");
    out.push({ text, format: seg.format });
  }
  const last = out[out.length - 1];
  if (last && last.text.endsWith(" ")) {
    last.text = last.text.slice(0, -1);
    if (last.text === "") out.pop();
  }

  const merged: Segment[] = [];
  for (const seg of out) {
    const prev = merged[merged.length - 1];
    if (prev && sameFormat(prev.format, seg.format)) {
      prev.text += seg.text;
    } else {
      merged.push({ text: seg.text, format: seg.format });
    }
  }
  return merged;
}

function startsWithManualBullet(segments: Segment[]): boolean {
  const text = segments.map((s) => s.text).join("");
  return MANUAL_BULLET_SYMBOLS.some((symbol) => text.startsWith(`${symbol} `));
}

/** Keep the first `limit` characters, counted by code point */
function truncateRuns(runs: TextRun[], limit: number): TextRun[] {
  const kept: TextRun[] = [];
  let remaining = limit;
  for (const run of runs) {
    if (remaining <= 0) break;
    const chars = Array.from(run.text);
    if (chars.length <= remaining) {
      kept.push(run);
      remaining -= chars.length;
    } else {
      kept.push({ ...run, text: chars.slice(0, remaining).join("") });
      remaining = 0;
    }
  }
  const last = kept[kept.length - 1];
  if (last) kept[kept.length - 1] = { ...last, breakLine: false };
  return kept;
}

/**
 * Split a text block into runs of uniform formatting, in document order.
 * Each run inherits the block's base font attributes unless an inline
 * element overrides them.
 */
export function collectTextRuns(
  block: SourceElement,
  textLimit?: number
): CollectedText {
  const format = baseFormat(block.style);
  const align = mapTextAlign(block.style.textAlign);
  const collector = new LineCollector();

  if (block.tag === "ul" || block.tag === "ol") {
    walkList(block, format, align, collector, 0);
  } else {
    walkInline(block, format, align, collector, 0);
  }
  collector.close();

  const runs: TextRun[] = [];
  let manualBullet = false;
  for (const line of collector.lines) {
    const segments = normalizeLine(line);
    if (segments.length === 0) continue;
    if (startsWithManualBullet(segments)) manualBullet = true;

    segments.forEach((seg, i) => {
      const run: TextRun = {
        text: seg.text,
        bold: seg.format.bold,
        italic: seg.format.italic,
        underline: seg.format.underline,
        align: line.align,
        fontSize: seg.format.fontSize,
        fontFace: seg.format.fontFace,
        breakLine: i === segments.length - 1,
      };
      if (seg.format.color) run.color = seg.format.color;
      if (i === 0 && line.bullet) run.bullet = { ...line.bullet };
      runs.push(run);
    });
  }

  const lastRun = runs[runs.length - 1];
  if (lastRun) lastRun.breakLine = false;

  return {
    runs: textLimit !== undefined ? truncateRuns(runs, textLimit) : runs,
    manualBullet,
  };
}
