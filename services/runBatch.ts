import fs from "fs";
import { BatchSummary, RawProductRow } from "../types";
import { AssembleOptions, assemblePost } from "./assemblePost";
import { readProductSheet } from "./excelService";
import { normalizeRow } from "./normalizeProduct";

export type BatchState = "running" | "done";

export interface BatchOptions extends AssembleOptions {
  onStateChange?: (state: BatchState) => void;
}

/**
 * Builds one post per row, in sheet order. A row that throws is logged and
 * recorded in the summary; the rows after it still run.
 */
export async function runBatch(
  rows: RawProductRow[],
  outRoot: string,
  options: BatchOptions = {}
): Promise<BatchSummary> {
  const summary: BatchSummary = { total: rows.length, succeeded: 0, failed: [], posts: [] };
  options.onStateChange?.("running");

  for (const [index, row] of rows.entries()) {
    let productId: string | null = null;
    try {
      const product = normalizeRow(row);
      productId = product.productId;

      const bundle = await assemblePost(product, outRoot, options);
      summary.succeeded++;
      summary.posts.push({
        productId: bundle.productId,
        directory: bundle.directory,
        images: bundle.images
      });
      console.log(`[batch] ${bundle.productId}: ${bundle.images.length} image(s)`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[batch] row ${index + 1} failed:`, err);
      summary.failed.push({ row: index + 1, productId, error: message });
    }
  }

  options.onStateChange?.("done");
  return summary;
}

export async function generatePosts(
  excelPath: string,
  outRoot: string,
  options: BatchOptions = {}
): Promise<BatchSummary> {
  // Throws InputFileNotFoundError before the output root exists.
  const rows = readProductSheet(excelPath);
  fs.mkdirSync(outRoot, { recursive: true });

  return runBatch(rows, outRoot, options);
}
