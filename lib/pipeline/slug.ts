import path from "node:path";

/**
 * Directory-safe name derived from a PDF's file name, used for the default
 * output directory. Falls back to "document" when nothing usable is left.
 */
export function slugFromPath(filePath: string): string {
  const base = path.basename(filePath, path.extname(filePath));
  const slug = base
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "document";
}

export function defaultOutputDir(pdfPath: string): string {
  return path.join(path.dirname(pdfPath), `${slugFromPath(pdfPath)}-images`);
}
