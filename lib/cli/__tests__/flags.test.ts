import { describe, it, expect } from "vitest";
import { parseFlags, USAGE } from "../flags";
import { InvalidOptionError, resolveExtractOptions } from "../../pipeline/core/schemas";

describe("parseFlags", () => {
  it("separates positional arguments from options", () => {
    expect(parseFlags(["plans.pdf", "--out", "plan-images", "--dpi", "150"])).toEqual({
      positional: ["plans.pdf"],
      outDir: "plan-images",
      options: { dpi: 150 },
    });
  });

  it("maps every extraction flag", () => {
    const { options, configPath } = parseFlags([
      "--config", "custom.yaml",
      "--min-size", "400",
      "--overlap-threshold", "0.6",
      "--duplicate-threshold", "0.95",
      "--no-duplicates",
      "--no-contained",
      "--mode", "vector",
      "--skip-text-pages",
      "--format", "webp",
      "--start-page", "2",
      "--end-page", "5",
      "--sample-pages", "4",
    ]);
    expect(configPath).toBe("custom.yaml");
    expect(options).toEqual({
      minSize: 400,
      overlapThreshold: 0.6,
      duplicateThreshold: 0.95,
      filterDuplicates: false,
      filterContained: false,
      forceMode: "vector",
      skipTextOnlyPages: true,
      outputFormat: "webp",
      startPage: 2,
      endPage: 5,
      samplePages: 4,
    });
  });

  it("rejects an unknown output format", () => {
    expect(() => parseFlags(["--format", "gif"])).toThrow(
      '--format: expected one of png, jpeg, webp, got "gif"'
    );
  });

  it("rejects a flag without its value", () => {
    expect(() => parseFlags(["--dpi"])).toThrow(InvalidOptionError);
    expect(() => parseFlags(["--out", "--dpi", "100"])).toThrow("--out: missing value");
  });

  it("rejects unknown flags", () => {
    expect(() => parseFlags(["--fast"])).toThrow("Unknown flag: --fast");
  });

  it("leaves range checks to option validation", () => {
    const { options } = parseFlags(["--dpi", "lots"]);
    expect(Number.isNaN(options.dpi)).toBe(true);
    expect(() => resolveExtractOptions(options)).toThrow(/^Invalid options: dpi: /);
  });
});

describe("USAGE", () => {
  it("says --no-contained leaves the overlap check in place", () => {
    const lines = USAGE.split("\n");
    const at = lines.findIndex((line) => line.trimStart().startsWith("--no-contained"));
    expect(lines.slice(at, at + 3).map((line) => line.trim())).toEqual([
      "--no-contained               Skip the containment check (a contained image",
      "still fails the overlap check unless",
      "--overlap-threshold is 1)",
    ]);
  });
});
