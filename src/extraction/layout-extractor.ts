import { z } from "zod";
import type { CanvasSize, SourceDocument, SourceElement, SourceNode } from "../schema/source.js";
import { SourceElementSchema } from "../schema/source.js";
import type { ConvertOptions } from "../schema/options.js";
import { LayoutUnavailableError } from "../errors.js";
import { canvasMatches } from "../validation/rules/dimension-mismatch.js";
import { pxToInches, rectPxToInches } from "../units/converter.js";
import { TimeoutError, withTimeout } from "../utils/timeout.js";

/**
 * The slice of a Playwright Page the extractor drives. A Playwright `Page`
 * satisfies it; tests supply an in-process fake.
 */
export interface LayoutPage {
  setContent(
    html: string,
    options?: { waitUntil?: "load"; timeout?: number }
  ): Promise<void>;
  evaluate(expression: string): Promise<unknown>;
  close(): Promise<void>;
}

/** Resolves once web fonts are loaded and a frame has been laid out */
export const SETTLE_SCRIPT = `(() => document.fonts.ready.then(
  () => new Promise((resolve) => requestAnimationFrame(() => resolve(true)))
))()`;

/** Declared canvas: the laid-out size of <body>, in px */
export const CANVAS_SCRIPT = `(() => {
  if (!document.body) throw new Error('No <body> element found');
  const rect = document.body.getBoundingClientRect();
  return { width: rect.width, height: rect.height };
})()`;

/**
 * JavaScript string evaluated in the browser context via page.evaluate().
 * Walks <body> and returns every element's box (px, relative to <body>),
 * resolved style, and text children in document order.
 * Wrapped as an IIFE so page.evaluate() executes and returns the result.
 */
export const TREE_SCRIPT = `(() => {
  const body = document.body;
  if (!body) throw new Error('No <body> element found');
  const origin = body.getBoundingClientRect();
  const SKIP = new Set(['script', 'style', 'template', 'noscript']);

  const side = (cs, name) => ({
    width: parseFloat(cs.getPropertyValue('border-' + name + '-width')) || 0,
    style: cs.getPropertyValue('border-' + name + '-style'),
    color: cs.getPropertyValue('border-' + name + '-color'),
  });

  const walk = (el) => {
    const rect = el.getBoundingClientRect();
    const cs = window.getComputedStyle(el);
    const node = {
      kind: 'element',
      tag: el.tagName.toLowerCase(),
      box: {
        x: rect.x - origin.x,
        y: rect.y - origin.y,
        w: rect.width,
        h: rect.height,
      },
      style: {
        backgroundColor: cs.backgroundColor,
        backgroundImage: cs.backgroundImage,
        borderTop: side(cs, 'top'),
        borderRight: side(cs, 'right'),
        borderBottom: side(cs, 'bottom'),
        borderLeft: side(cs, 'left'),
        borderRadius: cs.borderTopLeftRadius,
        boxShadow: cs.boxShadow,
        color: cs.color,
        fontWeight: cs.fontWeight,
        fontStyle: cs.fontStyle,
        textDecoration: cs.textDecorationLine,
        textAlign: cs.textAlign,
        fontSize: parseFloat(cs.fontSize) || 16,
        fontFamily: cs.fontFamily,
      },
      children: [],
    };
    if (el.id) node.id = el.id;
    if (el.classList.length > 0) node.classes = Array.from(el.classList);
    if (node.tag === 'img') {
      node.src = el.getAttribute('src') || '';
      if (el.naturalWidth > 0 && el.naturalHeight > 0) {
        node.naturalSize = { w: el.naturalWidth, h: el.naturalHeight };
      }
    }

    for (const child of el.childNodes) {
      if (child.nodeType === Node.TEXT_NODE) {
        if (child.textContent) node.children.push({ kind: 'text', text: child.textContent });
      } else if (child.nodeType === Node.ELEMENT_NODE) {
        if (SKIP.has(child.tagName.toLowerCase())) continue;
        if (window.getComputedStyle(child).display === 'none') continue;
        node.children.push(walk(child));
      }
    }
    return node;
  };

  return walk(body);
})()`;

const RawCanvasSchema = z.object({
  width: z.number().nonnegative(),
  height: z.number().nonnegative(),
});

function toTargetUnits(node: SourceElement): SourceElement {
  const children: SourceNode[] = node.children.map((child) =>
    child.kind === "text" ? child : toTargetUnits(child)
  );
  return { ...node, box: rectPxToInches(node.box), children };
}

/**
 * Convert a raw extraction result (boxes in px) into a SourceDocument
 * (boxes in inches). Pure function, no browser interaction.
 */
export function buildSourceDocument(
  rawCanvas: CanvasSize,
  rawRoot: SourceElement
): SourceDocument {
  return {
    canvas: {
      width: pxToInches(rawCanvas.width),
      height: pxToInches(rawCanvas.height),
    },
    root: toTargetUnits(rawRoot),
  };
}

async function evaluateParsed<T>(
  page: LayoutPage,
  script: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  what: string
): Promise<T> {
  let raw: unknown;
  try {
    raw = await page.evaluate(script);
  } catch (cause) {
    throw new LayoutUnavailableError(`reading ${what} failed`, "render_failed", { cause });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new LayoutUnavailableError(`malformed ${what} from the rendering pass`, "malformed_layout", {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Load the document and wait until layout has settled */
async function settle(page: LayoutPage, html: string, timeoutMs: number): Promise<void> {
  try {
    await page.setContent(html, { waitUntil: "load", timeout: timeoutMs });
    await page.evaluate(SETTLE_SCRIPT);
  } catch (cause) {
    if (cause instanceof Error && cause.name === "TimeoutError") throw cause;
    throw new LayoutUnavailableError("rendering pass failed", "render_failed", { cause });
  }
}

async function readLayout(
  page: LayoutPage,
  html: string,
  options: ConvertOptions
): Promise<SourceDocument> {
  await settle(page, html, options.timeoutMs);

  const rawCanvas = await evaluateParsed(page, CANVAS_SCRIPT, RawCanvasSchema, "canvas size");
  const declared = {
    width: pxToInches(rawCanvas.width),
    height: pxToInches(rawCanvas.height),
  };
  if (!canvasMatches(declared, options.canvas, options.dimensionTolerance)) {
    throw new LayoutUnavailableError(
      `document canvas ${declared.width}in × ${declared.height}in does not match requested ${options.canvas.width}in × ${options.canvas.height}in`,
      "dimension_mismatch"
    );
  }

  const rawRoot = await evaluateParsed(page, TREE_SCRIPT, SourceElementSchema, "element tree");
  options.logger?.debug(`layout extracted: ${declared.width}in × ${declared.height}in`);
  return buildSourceDocument(rawCanvas, rawRoot);
}

function toLayoutError(cause: unknown, timeoutMs: number): LayoutUnavailableError {
  if (cause instanceof LayoutUnavailableError) return cause;
  if (cause instanceof TimeoutError || (cause instanceof Error && cause.name === "TimeoutError")) {
    return new LayoutUnavailableError(`layout did not settle within ${timeoutMs}ms`, "timeout", { cause });
  }
  return new LayoutUnavailableError("rendering pass failed", "render_failed", { cause });
}

/**
 * Render `html` on `page`, wait for layout to settle, and read back the
 * element tree in target units. The whole pass (load, settle, canvas and
 * tree reads) shares one `options.timeoutMs` bound.
 *
 * The declared canvas is checked against `options.canvas` before any node
 * is walked. On any failure the page is closed before the error surfaces.
 */
export async function extractLayout(
  page: LayoutPage,
  html: string,
  options: ConvertOptions
): Promise<SourceDocument> {
  const { timeoutMs, logger } = options;

  try {
    return await withTimeout(readLayout(page, html, options), timeoutMs, "layout");
  } catch (cause) {
    const error = toLayoutError(cause, timeoutMs);
    await page.close().catch((closeError: unknown) => {
      logger?.warn(`closing the rendering page failed: ${String(closeError)}`);
    });
    throw error;
  }
}
