import type { CanvasSize, Rect } from "../schema/source.js";
import type { Edge } from "../schema/issue.js";

/** An edge of a rect that lies past the canvas */
export interface OverflowEdge {
  edge: Edge;
  by: number;
}

/** Check which edges of a rect exceed the canvas beyond eps tolerance */
export function overflowEdges(
  r: Rect,
  canvas: CanvasSize,
  eps: number
): OverflowEdge[] {
  const edges: OverflowEdge[] = [];
  if (r.x < -eps) {
    edges.push({ edge: "left", by: -r.x });
  }
  if (r.y < -eps) {
    edges.push({ edge: "top", by: -r.y });
  }
  if (r.x + r.w > canvas.width + eps) {
    edges.push({ edge: "right", by: r.x + r.w - canvas.width });
  }
  if (r.y + r.h > canvas.height + eps) {
    edges.push({ edge: "bottom", by: r.y + r.h - canvas.height });
  }
  return edges;
}

/**
 * Trim a rect to the canvas. Edges already inside are left where they are;
 * an edge past the canvas is moved onto it.
 */
export function clampToCanvas(r: Rect, canvas: CanvasSize): Rect {
  const x = Math.min(Math.max(r.x, 0), canvas.width);
  const y = Math.min(Math.max(r.y, 0), canvas.height);
  const right = Math.min(r.x + r.w, canvas.width);
  const bottom = Math.min(r.y + r.h, canvas.height);
  return {
    x,
    y,
    w: r.x >= 0 && right === r.x + r.w ? r.w : Math.max(0, right - x),
    h: r.y >= 0 && bottom === r.y + r.h ? r.h : Math.max(0, bottom - y),
  };
}

/**
 * Largest rect with the given aspect ratio that fits inside `box`, centred
 * (object-fit: contain). Returns `box` when the ratio is unknown.
 */
export function containRect(box: Rect, naturalW: number, naturalH: number): Rect {
  if (naturalW <= 0 || naturalH <= 0 || box.w <= 0 || box.h <= 0) return box;
  const scale = Math.min(box.w / naturalW, box.h / naturalH);
  const w = naturalW * scale;
  const h = naturalH * scale;
  return {
    x: box.x + (box.w - w) / 2,
    y: box.y + (box.h - h) / 2,
    w,
    h,
  };
}
