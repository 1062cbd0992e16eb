/**
 * CLI: Convert one or more HTML slides to a PPTX deck.
 *
 * Usage:
 *   npx tsx scripts/to-pptx.ts <slide.html...> <output.pptx> [--width 10] [--height 5.625] [--verbose]
 *
 * Exit codes:
 *   0 = success
 *   1 = validation failed (every issue of every slide is printed)
 *   2 = error (missing args, file not found, layout unavailable)
 */
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { launchBrowser, openRenderingPage } from "../src/utils/browser.js";
import { convertHtml } from "../src/convert.js";
import { reportBatch } from "../src/validation/report.js";
import { buildPresentation, writePresentation } from "../src/pptx/primitives-to-pptx.js";
import type { ConversionResult } from "../src/schema/result.js";
import { CANVAS_W, CANVAS_H } from "../src/constants.js";

interface CliArgs {
  inputs: string[];
  output: string;
  width: number;
  height: number;
  verbose: boolean;
}

function usage(): never {
  console.error(
    "Usage: npx tsx scripts/to-pptx.ts <slide.html...> <output.pptx> [--width in] [--height in] [--verbose]"
  );
  process.exit(2);
}

function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let width = CANVAS_W;
  let height = CANVAS_H;
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--verbose") {
      verbose = true;
    } else if (arg === "--width" || arg === "--height") {
      const value = Number(argv[++i]);
      if (!Number.isFinite(value) || value <= 0) usage();
      if (arg === "--width") width = value;
      else height = value;
    } else if (arg !== undefined) {
      positional.push(arg);
    }
  }

  const output = positional.pop();
  if (output === undefined || positional.length === 0) usage();
  return { inputs: positional.map((p) => resolve(p)), output: resolve(output), width, height, verbose };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const canvas = { width: args.width, height: args.height };

  const sources = args.inputs.map((path) => {
    try {
      return { path, html: readFileSync(path, "utf-8") };
    } catch {
      console.error(`Error: cannot read ${path}`);
      process.exit(2);
    }
  });

  const browser = await launchBrowser();
  let settled: PromiseSettledResult<ConversionResult>[];
  try {
    // One page per slide: separate rendering sessions, no shared state.
    settled = await Promise.allSettled(
      sources.map(async ({ html }) => {
        const page = await openRenderingPage(browser, canvas);
        return convertHtml(page, html, {
          canvas,
          logger: args.verbose ? console : undefined,
        });
      })
    );
  } finally {
    await browser.close();
  }

  const report = reportBatch(sources.map((s) => s.path), settled);
  for (const line of report.lines) console.error(line);
  if (report.exitCode !== 0) process.exit(report.exitCode);

  const pres = await buildPresentation(report.succeeded);
  await writePresentation(pres, args.output);
  console.log(`PPTX written to ${args.output}`);
}

main().catch((err: unknown) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(2);
});
