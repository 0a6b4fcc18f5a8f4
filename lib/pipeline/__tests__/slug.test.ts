import { describe, it, expect } from "vitest";
import path from "node:path";
import { defaultOutputDir, slugFromPath } from "../slug";

describe("slugFromPath", () => {
  it("keeps only the file name, lowercased", () => {
    expect(slugFromPath("/plans/2024/Floor Plan B.pdf")).toBe("floor-plan-b");
  });

  it("collapses runs of punctuation into one hyphen", () => {
    expect(slugFromPath("site__survey (rev 3).PDF")).toBe("site-survey-rev-3");
  });

  it("drops accents", () => {
    expect(slugFromPath("Élévation façade.pdf")).toBe("elevation-facade");
  });

  it("falls back when nothing usable is left", () => {
    expect(slugFromPath("/tmp/(((.pdf")).toBe("document");
  });
});

describe("defaultOutputDir", () => {
  it("places the images directory beside the PDF", () => {
    expect(defaultOutputDir("/plans/Tower A.pdf")).toBe(path.join("/plans", "tower-a-images"));
  });

  it("uses the working directory for a bare file name", () => {
    expect(defaultOutputDir("tower.pdf")).toBe("tower-images");
  });
});
