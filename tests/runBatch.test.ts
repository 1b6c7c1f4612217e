import assert from "node:assert/strict";
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import path from "node:path";
import { after, test } from "node:test";

import { InputFileNotFoundError } from "../services/errors";
import { buildProductWorkbook } from "../services/excelService";
import { BatchState, generatePosts, runBatch } from "../services/runBatch";
import { fakeFetcher, solidPng, tempDir } from "./helpers/images";

const dir = tempDir("run-batch");

after(() => {
  rmSync(dir, { recursive: true, force: true });
});

test("runBatch keeps going after a row fails", async () => {
  const outRoot = path.join(dir, "isolated");

  // A plain file where the product directory should go makes that row fail.
  mkdirSync(outRoot, { recursive: true });
  writeFileSync(path.join(outRoot, "blocked"), "not a directory");

  const states: BatchState[] = [];
  const summary = await runBatch(
    [{ product_id: "first", title: "First" }, { product_id: "blocked" }, { title: "Third One" }],
    outRoot,
    { fetchImage: fakeFetcher({}), onStateChange: (state) => states.push(state) }
  );

  assert.deepEqual(states, ["running", "done"]);
  assert.equal(summary.total, 3);
  assert.equal(summary.succeeded, 2);
  assert.deepEqual(
    summary.posts.map((p) => p.productId),
    ["first", "third-one"]
  );
  assert.equal(summary.failed.length, 1);
  assert.equal(summary.failed[0]?.row, 2);
  assert.equal(summary.failed[0]?.productId, "blocked");
  assert.ok(existsSync(path.join(outRoot, "third-one", "meta.json")));
});

test("generatePosts fails before creating anything when the sheet is missing", async () => {
  const outRoot = path.join(dir, "never-created");

  await assert.rejects(
    generatePosts(path.join(dir, "missing.xlsx"), outRoot),
    InputFileNotFoundError
  );
  assert.equal(existsSync(outRoot), false);
});

test("generatePosts creates the output root and one bundle per row", async () => {
  const excelPath = path.join(dir, "feed.xlsx");
  writeFileSync(
    excelPath,
    buildProductWorkbook([
      {
        product_id: "W-1",
        title: "Widget",
        image_urls_comma: "http://img.test/w1.png,http://img.test/gone.png",
        hashtags_comma: "deal,new"
      },
      { title: "Gadget Pro", price: 0, rating: 5, review_count: 3 }
    ])
  );
  const outRoot = path.join(dir, "nested", "out");

  const summary = await generatePosts(excelPath, outRoot, {
    fetchImage: fakeFetcher({ "http://img.test/w1.png": await solidPng(900, 600) })
  });

  assert.equal(summary.succeeded, 2);
  assert.deepEqual(summary.failed, []);
  assert.deepEqual(readdirSync(outRoot).sort(), ["gadget-pro", "w-1"]);

  const widgetMeta = JSON.parse(readFileSync(path.join(outRoot, "w-1", "meta.json"), "utf8"));
  assert.deepEqual(widgetMeta.images, readdirSync(path.join(outRoot, "w-1", "images")).sort());
  assert.deepEqual(widgetMeta.images, ["image_1.jpg"]);

  assert.equal(
    readFileSync(path.join(outRoot, "gadget-pro", "caption.txt"), "utf8"),
    [
      "Check out Gadget Pro!",
      "Rating: 5/5 (3 reviews)",
      "As an Amazon Associate I earn from qualifying purchases."
    ].join("\n")
  );
});
