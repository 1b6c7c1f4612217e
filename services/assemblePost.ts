import { mkdir, rm, writeFile } from "fs/promises";
import path from "path";
import { PostBundle, PostMeta, ProductRecord } from "../types";
import { generateAltText } from "./altTextService";
import { generateCaption } from "./captionService";
import { ImageFetcher, savedFilenames, transformImages } from "./imageService";
import { slugify } from "./normalizeProduct";

export const CAPTION_FILE = "caption.txt";
export const ALT_TEXT_FILE = "alt_text.txt";
export const META_FILE = "meta.json";

export interface AssembleOptions {
  fetchImage?: ImageFetcher;
}

export async function assemblePost(
  product: ProductRecord,
  outRoot: string,
  options: AssembleOptions = {}
): Promise<PostBundle> {
  const directory = path.join(outRoot, slugify(product.productId));
  const imagesDir = path.join(directory, "images");
  // Images from an earlier run must not outlive this run's meta.json.
  await rm(imagesDir, { recursive: true, force: true });
  await mkdir(imagesDir, { recursive: true });

  // 1. IMAGES
  const outcomes = await transformImages(product.imageUrls, imagesDir, options.fetchImage);
  const images = savedFilenames(outcomes);

  // 2. CAPTION
  const caption = generateCaption(product);
  await writeFile(path.join(directory, CAPTION_FILE), caption, "utf8");

  // 3. ALT TEXT
  const altText = generateAltText(product);
  await writeFile(path.join(directory, ALT_TEXT_FILE), altText, "utf8");

  // 4. META
  const meta: PostMeta = {
    product_id: product.productId,
    title: product.title ?? null,
    post_type: product.postType ?? null,
    images,
    caption_file: CAPTION_FILE,
    alt_text_file: ALT_TEXT_FILE,
    affiliate_url: product.affiliateUrl ?? null
  };
  await writeFile(path.join(directory, META_FILE), JSON.stringify(meta, null, 2), "utf8");

  return { productId: product.productId, directory, images, caption, altText, meta };
}
