// services/imageService.ts
import { writeFile } from "fs/promises";
import path from "path";
import fetch from "node-fetch";
import sharp from "sharp";
import { env } from "../config/env";
import { ImageOutcome } from "../types";
import { MAX_IMAGES } from "./normalizeProduct";

export const IMAGE_SIZE = 1080;
export const JPEG_QUALITY = 90;

export type ImageFetcher = (url: string) => Promise<Buffer>;

// The timeout covers the whole request, body included. No retries.
export async function fetchImage(
  url: string,
  timeoutMs: number = env.FETCH_TIMEOUT_MS
): Promise<Buffer> {
  const res = await fetch(url, {
    redirect: "follow",
    timeout: timeoutMs,
    headers: { "User-Agent": env.FETCH_USER_AGENT }
  });

  if (!res.ok) {
    throw new Error(`Failed ${res.status}`);
  }

  return res.buffer();
}

/**
 * Scales the image to cover a size×size box and center-crops the overflow,
 * then encodes a 3-channel sRGB JPEG. Alpha is dropped, not composited.
 */
export async function squareImage(input: Buffer, size: number = IMAGE_SIZE): Promise<Buffer> {
  return sharp(input)
    .resize(size, size, { fit: "cover", position: "centre", kernel: "lanczos3" })
    .removeAlpha()
    .toColourspace("srgb")
    .jpeg({ quality: JPEG_QUALITY })
    .toBuffer();
}

/**
 * Downloads and squares the first ten URLs in order. Successes are numbered
 * image_1.jpg, image_2.jpg, ... among themselves; failures leave no gap
 * and no file.
 */
export async function transformImages(
  urls: string[],
  imagesDir: string,
  fetchBytes: ImageFetcher = (url) => fetchImage(url)
): Promise<ImageOutcome[]> {
  const outcomes: ImageOutcome[] = [];
  let saved = 0;

  for (const url of urls.slice(0, MAX_IMAGES)) {
    try {
      const squared = await squareImage(await fetchBytes(url));
      const filename = `image_${saved + 1}.jpg`;
      await writeFile(path.join(imagesDir, filename), squared);
      saved++;
      outcomes.push({ status: "saved", sourceUrl: url, filename });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`[images] skipped ${url}: ${reason}`);
      outcomes.push({ status: "skipped", sourceUrl: url, reason });
    }
  }

  return outcomes;
}

export function savedFilenames(outcomes: ImageOutcome[]): string[] {
  return outcomes.flatMap((o) => (o.status === "saved" ? [o.filename] : []));
}
