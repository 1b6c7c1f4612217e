#!/usr/bin/env node
/**
 * Generates social post bundles from a product feed spreadsheet.
 *
 * Usage:
 *   npx tsx scripts/generate-posts.ts --excel products.xlsx --out output
 */

import { generatePosts } from "../services/runBatch";

function flag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  return idx >= 0 ? args[idx + 1] : undefined;
}

async function main() {
  const args = process.argv.slice(2);
  const excelPath = flag(args, "--excel");
  const outDir = flag(args, "--out");

  if (!excelPath || !outDir) {
    console.error("Usage: generate-posts --excel <products.xlsx> --out <output_dir>");
    process.exit(1);
  }

  const summary = await generatePosts(excelPath, outDir);

  for (const failure of summary.failed) {
    console.error(`  row ${failure.row} (${failure.productId ?? "unknown"}): ${failure.error}`);
  }
  console.log(`✅ Done. ${summary.succeeded}/${summary.total} posts written to ${outDir}`);
}

main().catch((err) => {
  console.error("❌ POST GENERATION FAILED");
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
