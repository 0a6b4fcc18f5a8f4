/**
 * Storage Adapter
 *
 * Implements the Storage interface using SQLite and the filesystem.
 * Layout: `<outputDir>/images.db` plus one file per image under
 * `<outputDir>/images/`.
 */

import fs from "node:fs";
import path from "node:path";
import type { RunSummary, Storage } from "./types";
import type { ExtractedImage, ImageRecord } from "../core/types";
import { fromDBImageRow, runSummarySchema, toDBImageRow } from "../core/schemas";
import { getDb } from "@/lib/db";

// ============================================================================
// Storage factory
// ============================================================================

/**
 * Create a Storage instance writing into one output directory.
 */
export function createOutputStorage(outputDir: string): Storage {
  const imagesDir = path.join(outputDir, "images");

  return {
    async putRun(summary: RunSummary): Promise<void> {
      const db = getDb(outputDir);
      db.prepare(
        "INSERT OR REPLACE INTO analysis (id, data, created_at) VALUES (1, ?, ?)"
      ).run(JSON.stringify(summary), new Date().toISOString());
    },

    async getRun(): Promise<RunSummary | null> {
      const db = getDb(outputDir);
      const row = db.prepare("SELECT data FROM analysis WHERE id = 1").get();
      if (!row || typeof row.data !== "string") return null;
      return runSummarySchema.parse(JSON.parse(row.data));
    },

    async clearImages(): Promise<void> {
      const db = getDb(outputDir);
      const rows = db.prepare("SELECT file_name FROM images").all();
      for (const row of rows) {
        if (typeof row.file_name !== "string") continue;
        fs.rmSync(path.join(imagesDir, row.file_name), { force: true });
      }
      db.prepare("DELETE FROM images").run();
    },

    async putImage(image: ExtractedImage): Promise<void> {
      fs.mkdirSync(imagesDir, { recursive: true });
      fs.writeFileSync(path.join(imagesDir, image.record.fileName), image.data);

      const row = toDBImageRow(image.record);
      const db = getDb(outputDir);
      db.prepare(
        `INSERT OR REPLACE INTO images
          (file_name, page_index, index_in_page, width, height, format, size_bytes, content_hash, bbox, extraction_method)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(
        row.file_name,
        row.page_index,
        row.index_in_page,
        row.width,
        row.height,
        row.format,
        row.size_bytes,
        row.content_hash,
        row.bbox,
        row.extraction_method
      );
    },

    async listImages(): Promise<ImageRecord[]> {
      const db = getDb(outputDir);
      return db
        .prepare("SELECT * FROM images ORDER BY page_index, index_in_page")
        .all()
        .map(fromDBImageRow);
    },

    imagePath(fileName: string): string {
      return path.resolve(imagesDir, fileName);
    },
  };
}
