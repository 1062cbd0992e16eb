import { z } from "zod";
import {
  CANVAS_W,
  CANVAS_H,
  DIMENSION_EPS_IN,
  LAYOUT_TIMEOUT_MS,
  OUTPUT_PRECISION,
  OVERFLOW_EPS_IN,
  PLACEHOLDER_CLASS,
} from "../constants.js";

/** Sink for diagnostic output; the global console fits */
export type Logger = Pick<Console, "debug" | "warn">;

function isLogger(value: unknown): value is Logger {
  return (
    typeof value === "object" &&
    value !== null &&
    "debug" in value &&
    typeof value.debug === "function" &&
    "warn" in value &&
    typeof value.warn === "function"
  );
}

export const ConvertOptionsSchema = z.object({
  canvas: z
    .object({
      width: z.number().positive(),
      height: z.number().positive(),
    })
    .default({ width: CANVAS_W, height: CANVAS_H }),
  placeholderClass: z.string().min(1).default(PLACEHOLDER_CLASS),
  timeoutMs: z.number().int().positive().default(LAYOUT_TIMEOUT_MS),
  dimensionTolerance: z.number().nonnegative().default(DIMENSION_EPS_IN),
  overflowTolerance: z.number().nonnegative().default(OVERFLOW_EPS_IN),
  precision: z.number().int().min(0).max(10).default(OUTPUT_PRECISION),
  textLimit: z.number().int().positive().optional(),
  logger: z.custom<Logger>(isLogger, "logger must provide debug and warn").optional(),
});

export type ConvertOptions = z.infer<typeof ConvertOptionsSchema>;
export type ConvertOptionsInput = z.input<typeof ConvertOptionsSchema>;

/** Parse conversion options, filling defaults. Throws ZodError on invalid input. */
export function parseOptions(input: ConvertOptionsInput = {}): ConvertOptions {
  return ConvertOptionsSchema.parse(input);
}
