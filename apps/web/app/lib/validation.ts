import { z } from "zod";
import { MARGIN_RANGE, THRESHOLD_RANGE } from "@quietcut/cutter/options";

export const cleanOptionsSchema = z.object({
  threshold: z
    .number({ invalid_type_error: "threshold must be a number" })
    .int()
    .min(THRESHOLD_RANGE.min, `threshold must be at least ${THRESHOLD_RANGE.min}%`)
    .max(THRESHOLD_RANGE.max, `threshold must be at most ${THRESHOLD_RANGE.max}%`),
  margin: z
    .number({ invalid_type_error: "margin must be a number" })
    .int()
    .min(MARGIN_RANGE.min, `margin must be at least ${MARGIN_RANGE.min} frames`)
    .max(MARGIN_RANGE.max, `margin must be at most ${MARGIN_RANGE.max} frames`),
  autoFix: z.boolean()
});

export type CleanOptionsInput = z.infer<typeof cleanOptionsSchema>;

export const probeRequestSchema = z.object({
  path: z.string().trim().min(1, "path is required")
});

export const jobRequestSchema = z.object({
  inputPath: z.string().trim(),
  outputPath: z.string().trim(),
  options: cleanOptionsSchema,
  overwrite: z.boolean().default(false)
});

export type JobRequestInput = z.infer<typeof jobRequestSchema>;

export const browseQuerySchema = z.object({
  dir: z.string().trim().min(1).optional(),
  dialog: z.enum(["open", "save"]).default("open"),
  filter: z.string().optional()
});

export type BrowseQueryInput = z.infer<typeof browseQuerySchema>;
