import type { SourceDocument } from "./schema/source.js";
import type { ConvertOptionsInput } from "./schema/options.js";
import type { ConversionResult, ConversionSuccess } from "./schema/result.js";
import { parseOptions } from "./schema/options.js";
import { ConversionFailedError } from "./errors.js";
import { classifyTree, flattenClassified } from "./classify/classifier.js";
import { mapPrimitives } from "./style/style-mapper.js";
import { validate } from "./validation/engine.js";
import { assemble } from "./assemble/assembler.js";
import { extractLayout, type LayoutPage } from "./extraction/layout-extractor.js";

/**
 * Convert an already laid-out source tree.
 * Pure function: no browser interaction, no state kept between calls.
 */
export function convertDocument(
  doc: SourceDocument,
  optionsInput: ConvertOptionsInput = {}
): ConversionResult {
  const options = parseOptions(optionsInput);

  const root = classifyTree(doc.root, { placeholderClass: options.placeholderClass });
  const nodes = flattenClassified(root);

  const { mapped, warnings } = mapPrimitives(nodes, {
    textLimit: options.textLimit,
    logger: options.logger,
  });

  const issues = validate(
    {
      declared: doc.canvas,
      requested: options.canvas,
      root: root.ref,
      nodes,
      mapped,
    },
    options
  );

  options.logger?.debug(
    `classified ${nodes.length} elements, ${mapped.length} primitives, ${issues.length} issues`
  );

  return assemble(mapped, warnings, issues, options.canvas, options.precision);
}

/**
 * Render `html` on `page` and convert it. Setup errors (canvas mismatch,
 * timeout, render failure) are thrown as LayoutUnavailableError; content
 * errors come back together in the failure result.
 */
export async function convertHtml(
  page: LayoutPage,
  html: string,
  optionsInput: ConvertOptionsInput = {}
): Promise<ConversionResult> {
  const options = parseOptions(optionsInput);
  const doc = await extractLayout(page, html, options);
  return convertDocument(doc, options);
}

/** Return the success payload, or throw every issue at once */
export function unwrapConversion(result: ConversionResult): ConversionSuccess {
  if (!result.ok) throw new ConversionFailedError(result.issues);
  return result;
}
