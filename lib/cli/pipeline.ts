#!/usr/bin/env node
/**
 * Pipeline CLI
 *
 * Classify a PDF and extract its images from the command line.
 *
 * Usage:
 *   npm run pipeline analyze <pdf_path>             Print the document analysis
 *   npm run pipeline extract <pdf_path> [options]   Extract images into <slug>-images/
 */

import fs from "node:fs";
import {
  createConsoleProgress,
  createOutputStorage,
  runAnalyze,
  watchExtract,
} from "../pipeline/runner";
import { resolveExtractOptions } from "../pipeline/core/schemas";
import { formatAnalysis, formatSummary, summarizeImages } from "../pipeline/report";
import { defaultOutputDir } from "../pipeline/slug";
import { getExtractDefaults, loadConfig } from "../config";
import { closeAllDbs } from "../db";
import { parseFlags, USAGE } from "./flags";
import { printWarnings, runWithProgress } from "./progress";

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    process.exit(0);
  }

  const flags = parseFlags(args.slice(1));
  const [pdfPath] = flags.positional;

  if (command !== "analyze" && command !== "extract") {
    console.error(`Unknown command: ${command}\n`);
    console.log(USAGE);
    process.exit(1);
  }

  if (!pdfPath) {
    console.error(`Usage: npm run pipeline ${command} <pdf_path>`);
    process.exit(1);
  }

  if (!fs.existsSync(pdfPath)) {
    console.error(`PDF not found: ${pdfPath}`);
    process.exit(1);
  }

  // CLI flags win over config.yaml; both validated together before any work
  const config = loadConfig(flags.configPath);
  const options = resolveExtractOptions(getExtractDefaults(config), flags.options);
  const outDir = flags.outDir ?? defaultOutputDir(pdfPath);
  const storage = createOutputStorage(outDir);

  switch (command) {
    case "analyze": {
      const analysis = await runAnalyze(pdfPath, storage, createConsoleProgress(), {
        samplePages: options.samplePages,
      });
      console.log();
      console.log(formatAnalysis(analysis));
      break;
    }

    case "extract": {
      const warnings: string[] = [];
      const last = await runWithProgress(
        watchExtract({ pdfPath, options }, storage),
        (event) => {
          if (event.type === "step-warning") {
            warnings.push(event.message);
          }
          if (event.type === "step-progress" && event.page !== undefined && event.totalPages !== undefined) {
            return { current: event.page, total: event.totalPages };
          }
          return null;
        },
        { label: "Extracting images" }
      );

      if (last?.type !== "done") {
        throw new Error("Extraction finished without a result");
      }
      const { result } = last;

      printWarnings(warnings);
      console.log();
      const forced = result.verdictOverridden ? ` (detected ${result.analysis.verdict})` : "";
      console.log(`Verdict: ${result.verdict}${forced}`);
      console.log(`Strategy: ${result.strategy}${result.usedFallback ? ", fallback used" : ""}`);
      console.log(formatSummary(summarizeImages(result.records)));
      console.log(`\nImages written to ${storage.imagePath("")}`);
      break;
    }
  }

  closeAllDbs();
}

main().catch((err: unknown) => {
  console.error("\nPipeline failed:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
