/**
 * Content hashing for registry artifacts.
 *
 * Hashes cover bytes only; names, paths and timestamps never affect them.
 */

import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";
import type { Dataset } from "../types/dataset.js";

export function hashContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * SHA-256 of a file's bytes.
 *
 * @throws if the file cannot be read
 */
export function hashFile(filePath: string): string {
  return hashContent(readFileSync(filePath));
}

/**
 * SHA-256 of a dataset's canonical JSON form (columns, then rows in order).
 * Two loads of the same CSV hash identically even if the file was
 * re-encoded with different line endings.
 */
export function hashDataset(dataset: Dataset): string {
  const canonical = JSON.stringify({
    columns: dataset.columns,
    rows: dataset.rows.map((row) => dataset.columns.map((column) => row[column] ?? null)),
  });
  return hashContent(canonical);
}
