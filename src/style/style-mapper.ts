import type { ClassifiedNode } from "../classify/classifier.js";
import type { ConversionWarning, NodeRef } from "../schema/issue.js";
import type { ImagePrimitive, Primitive, ShapePrimitive } from "../schema/primitive.js";
import type { Logger } from "../schema/options.js";
import { containRect } from "../utils/geometry.js";
import { pxToInches } from "../units/converter.js";
import { IMAGE_TAGS } from "../constants.js";
import { backgroundImageUrl } from "./colors.js";
import { mapShapeStyle, shapeStyleProperties } from "./shape-style.js";
import { collectTextRuns } from "./text-runs.js";

/** A primitive before rounding, with the node it came from */
export interface MappedPrimitive {
  primitive: Primitive;
  ref: NodeRef;
}

export interface MapOptions {
  textLimit?: number;
  logger?: Logger;
}

export interface MapResult {
  mapped: MappedPrimitive[];
  warnings: ConversionWarning[];
}

function mapShape(node: ClassifiedNode, options: MapOptions): ShapePrimitive {
  const { element: el, ref } = node;
  const style = mapShapeStyle(el.style, el.box, () =>
    options.logger?.debug(`${ref.path}: inset box-shadow dropped`)
  );
  return { kind: "shape", id: ref.path, box: el.box, z: node.order, ...style };
}

/**
 * A container painted with a bitmap background: the picture, preceded by a
 * shape when the container also carries fill, border, shadow or radius.
 */
function mapBackgroundImage(
  node: ClassifiedNode,
  src: string,
  options: MapOptions
): Primitive[] {
  const { element: el, ref } = node;
  const image: ImagePrimitive = {
    kind: "image",
    id: `${ref.path}#background`,
    box: el.box,
    z: node.order,
    src,
  };
  const boxStyling = shapeStyleProperties(el.style).filter((p) => p !== "background-image");
  return boxStyling.length > 0 ? [mapShape(node, options), image] : [image];
}

/**
 * Map one classified node to the primitives it emits, in paint order.
 * Shape-only style on text blocks is never applied here; the validation
 * rules report it.
 */
export function mapNode(
  node: ClassifiedNode,
  options: MapOptions,
  warnings: ConversionWarning[]
): Primitive[] {
  const { element: el, ref } = node;
  const base = { id: ref.path, box: el.box, z: node.order };

  switch (node.role) {
    case "TextBlock": {
      const { runs, manualBullet } = collectTextRuns(el, options.textLimit);
      if (manualBullet) {
        warnings.push({
          kind: "ManualBulletSymbol",
          node: ref,
          detail: "text starts with a typed bullet symbol; use <ul> or <ol> instead",
        });
      }
      if (runs.length === 0) return [];
      return [{ kind: "text", ...base, runs }];
    }

    case "ShapeContainer":
      return [mapShape(node, options)];

    case "Image": {
      const background = IMAGE_TAGS.has(el.tag)
        ? undefined
        : backgroundImageUrl(el.style.backgroundImage);
      if (background !== undefined) return mapBackgroundImage(node, background, options);

      const natural = el.naturalSize;
      const box = natural
        ? containRect(el.box, pxToInches(natural.w), pxToInches(natural.h))
        : el.box;
      return [{ kind: "image", ...base, box, src: el.src ?? "" }];
    }

    case "Placeholder":
      return [{ kind: "placeholder", ...base, id: el.id ?? ref.path }];

    case "Ignorable":
      return [];
  }
}

/** Map every classified node in document order */
export function mapPrimitives(
  nodes: ClassifiedNode[],
  options: MapOptions
): MapResult {
  const mapped: MappedPrimitive[] = [];
  const warnings: ConversionWarning[] = [];

  for (const node of nodes) {
    if (node.ignoredText) {
      options.logger?.debug(`${node.ref.path}: untagged text ignored`);
    }
    for (const primitive of mapNode(node, options, warnings)) {
      mapped.push({ primitive, ref: node.ref });
    }
  }

  return { mapped, warnings };
}
