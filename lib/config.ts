import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";
import {
  InvalidOptionError,
  OUTPUT_FORMATS,
  type ExtractOptionsInput,
} from "./pipeline/core/schemas";

const configSchema = z.object({
  extraction: z
    .object({
      min_size: z.number().optional(),
      filter_duplicates: z.boolean().optional(),
      filter_contained: z.boolean().optional(),
      containment_tolerance: z.number().optional(),
      overlap_threshold: z.number().optional(),
      overlap_basis: z.enum(["smaller", "larger"]).optional(),
      duplicate_threshold: z.number().optional(),
      uniform_threshold: z.number().optional(),
      discard_blank: z.boolean().optional(),
      dpi: z.number().int().optional(),
      skip_text_only_pages: z.boolean().optional(),
      output_format: z.enum(OUTPUT_FORMATS).optional(),
      force_mode: z.string().optional(),
    })
    .optional(),
  analysis: z
    .object({
      sample_pages: z.number().int().min(1).optional(),
    })
    .optional(),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Load config.yaml. Without an explicit path, a missing file in the working
 * directory yields an empty config (built-in defaults apply).
 */
export function loadConfig(configPath?: string): AppConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), "config.yaml");
  if (!configPath && !fs.existsSync(resolved)) return {};

  const raw: unknown = yaml.load(fs.readFileSync(resolved, "utf-8"));
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new InvalidOptionError(
      result.error.issues.map((issue) => `${resolved}: ${issue.path.map(String).join(".")} ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Extraction options named by the config, in option-schema form. Keys the
 * config leaves out stay undefined so later layers and defaults apply.
 */
export function getExtractDefaults(cfg: AppConfig): ExtractOptionsInput {
  const e = cfg.extraction ?? {};
  return {
    minSize: e.min_size,
    filterDuplicates: e.filter_duplicates,
    filterContained: e.filter_contained,
    containmentTolerance: e.containment_tolerance,
    overlapThreshold: e.overlap_threshold,
    overlapBasis: e.overlap_basis,
    duplicateThreshold: e.duplicate_threshold,
    uniformThreshold: e.uniform_threshold,
    discardBlank: e.discard_blank,
    dpi: e.dpi,
    skipTextOnlyPages: e.skip_text_only_pages,
    outputFormat: e.output_format,
    forceMode: e.force_mode,
    samplePages: cfg.analysis?.sample_pages,
  };
}
