import {
  InvalidOptionError,
  OUTPUT_FORMATS,
  type ExtractOptionsInput,
} from "../pipeline/core/schemas";
import type { OutputFormat } from "../images/encode";

export interface ParsedFlags {
  positional: string[];
  outDir?: string;
  configPath?: string;
  /** CLI layer of extraction options, applied over config.yaml */
  options: ExtractOptionsInput;
}

const VALUE_FLAGS = [
  "--out",
  "--config",
  "--min-size",
  "--overlap-threshold",
  "--duplicate-threshold",
  "--mode",
  "--dpi",
  "--format",
  "--start-page",
  "--end-page",
  "--sample-pages",
] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(arg: string): arg is ValueFlag {
  return VALUE_FLAGS.some((f) => f === arg);
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

/**
 * Parse command-line arguments. Numbers are passed through as parsed, so
 * range checks happen once, in resolveExtractOptions.
 */
export function parseFlags(args: string[]): ParsedFlags {
  const parsed: ParsedFlags = { positional: [], options: {} };
  const { options } = parsed;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (isValueFlag(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new InvalidOptionError([`${arg}: missing value`]);
      }
      i++;
      switch (arg) {
        case "--out":
          parsed.outDir = value;
          break;
        case "--config":
          parsed.configPath = value;
          break;
        case "--min-size":
          options.minSize = Number(value);
          break;
        case "--overlap-threshold":
          options.overlapThreshold = Number(value);
          break;
        case "--duplicate-threshold":
          options.duplicateThreshold = Number(value);
          break;
        case "--mode":
          options.forceMode = value;
          break;
        case "--dpi":
          options.dpi = Number(value);
          break;
        case "--format":
          if (!isOutputFormat(value)) {
            throw new InvalidOptionError([
              `--format: expected one of ${OUTPUT_FORMATS.join(", ")}, got "${value}"`,
            ]);
          }
          options.outputFormat = value;
          break;
        case "--start-page":
          options.startPage = Number(value);
          break;
        case "--end-page":
          options.endPage = Number(value);
          break;
        case "--sample-pages":
          options.samplePages = Number(value);
          break;
      }
    } else if (arg === "--no-duplicates") {
      options.filterDuplicates = false;
    } else if (arg === "--no-contained") {
      options.filterContained = false;
    } else if (arg === "--skip-text-pages") {
      options.skipTextOnlyPages = true;
    } else if (arg.startsWith("-")) {
      throw new InvalidOptionError([`Unknown flag: ${arg}`]);
    } else {
      parsed.positional.push(arg);
    }
  }

  return parsed;
}

export const USAGE = `Usage: npm run pipeline <command> <pdf_path> [options]

Commands:
  analyze <pdf_path>    Classify the document and print the signals
  extract <pdf_path>    Extract images

Options:
  --out <dir>                  Output directory (default: <slug>-images beside the PDF)
  --config <path>              Config file (default: ./config.yaml when present)
  --min-size <n>               Minimum image area in points (default: 100)
  --overlap-threshold <f>      Reject overlaps above this ratio (default: 0.8)
  --duplicate-threshold <f>    Pixel similarity counted as duplicate (default: 0.9)
  --no-duplicates              Keep duplicate images
  --no-contained               Skip the containment check (a contained image
                               still fails the overlap check unless
                               --overlap-threshold is 1)
  --mode <m>                   Force vector, scanned, digital or text
  --dpi <n>                    Page render resolution (default: 300)
  --skip-text-pages            Skip pages holding only text
  --format <png|jpeg|webp>     Output format (default: png)
  --start-page <n>             First page to extract (1-based)
  --end-page <n>               Last page to extract (1-based)
  --sample-pages <n>           Pages sampled for classification (default: 3)`;

