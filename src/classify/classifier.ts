import type { SourceElement } from "../schema/source.js";
import type { NodeRef } from "../schema/issue.js";
import { IMAGE_TAGS, INLINE_TAGS, TEXT_TAGS } from "../constants.js";
import { shapeStyleProperties } from "../style/shape-style.js";
import { backgroundImageUrl } from "../style/colors.js";

export type Role =
  | "TextBlock"
  | "ShapeContainer"
  | "Image"
  | "Placeholder"
  | "Ignorable";

/** A source element annotated with its role */
export interface ClassifiedNode {
  role: Role;
  element: SourceElement;
  ref: NodeRef;
  /** Pre-order index among all elements */
  order: number;
  /**
   * Classified element children. Empty for text blocks (their descendants
   * become runs), <img> elements and placeholders.
   */
  children: ClassifiedNode[];
  /** Direct text of a generic container, dropped from output */
  ignoredText: boolean;
}

export interface ClassifyOptions {
  placeholderClass: string;
}

function hasOnlyText(el: SourceElement): boolean {
  let text = "";
  for (const child of el.children) {
    if (child.kind === "element") return false;
    text += child.text;
  }
  return text.trim().length > 0;
}

function hasDirectText(el: SourceElement): boolean {
  return el.children.some((c) => c.kind === "text" && c.text.trim().length > 0);
}

export function isPlaceholder(el: SourceElement, marker: string): boolean {
  return el.classes?.includes(marker) ?? false;
}

/** Text-bearing: a text tag, or a standalone inline element holding only text */
export function isTextBearing(el: SourceElement): boolean {
  if (TEXT_TAGS.has(el.tag)) return true;
  return INLINE_TAGS.has(el.tag) && hasOnlyText(el);
}

/** A container painted with a bitmap through background-image: url(...) */
export function hasBitmapBackground(el: SourceElement): boolean {
  return backgroundImageUrl(el.style.backgroundImage) !== undefined;
}

/**
 * Role of a single element, ignoring its position in the tree.
 *
 * Rules (evaluated in order):
 *   1. Marker class              → "Placeholder"
 *   2. Bitmap tag                → "Image"
 *   3. Text-bearing              → "TextBlock"
 *   4. Bitmap background         → "Image"
 *   5. Shape-only style present  → "ShapeContainer"
 *   6. Fallback                  → "Ignorable"
 */
export function classifyElement(el: SourceElement, options: ClassifyOptions): Role {
  if (isPlaceholder(el, options.placeholderClass)) return "Placeholder";
  if (IMAGE_TAGS.has(el.tag)) return "Image";
  if (isTextBearing(el)) return "TextBlock";
  if (hasBitmapBackground(el)) return "Image";
  if (shapeStyleProperties(el.style).length > 0) return "ShapeContainer";
  return "Ignorable";
}

/** Containers, including one painted with a bitmap background, hold further nodes */
function walksChildren(role: Role, el: SourceElement): boolean {
  switch (role) {
    case "ShapeContainer":
    case "Ignorable":
      return true;
    case "Image":
      return !IMAGE_TAGS.has(el.tag);
    case "TextBlock":
    case "Placeholder":
      return false;
  }
}

/**
 * Classify a whole tree. A styled container holding text keeps its role as
 * a shape; its text descendants are classified on their own and land above
 * it in document order.
 */
export function classifyTree(
  root: SourceElement,
  options: ClassifyOptions
): ClassifiedNode {
  let counter = 0;

  const visit = (el: SourceElement, path: string): ClassifiedNode => {
    const role = classifyElement(el, options);
    const ref: NodeRef = el.id !== undefined ? { path, tag: el.tag, id: el.id } : { path, tag: el.tag };
    const node: ClassifiedNode = {
      role,
      element: el,
      ref,
      order: counter++,
      children: [],
      ignoredText: walksChildren(role, el) && hasDirectText(el),
    };
    if (!walksChildren(role, el)) return node;

    const seen = new Map<string, number>();
    for (const child of el.children) {
      if (child.kind !== "element") continue;
      const index = seen.get(child.tag) ?? 0;
      seen.set(child.tag, index + 1);
      node.children.push(visit(child, `${path}/${child.tag}[${index}]`));
    }
    return node;
  };

  return visit(root, root.tag);
}

/** All classified nodes in document order */
export function flattenClassified(root: ClassifiedNode): ClassifiedNode[] {
  const out: ClassifiedNode[] = [];
  const stack: ClassifiedNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    out.push(node);
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child) stack.push(child);
    }
  }
  return out;
}
