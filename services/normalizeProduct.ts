// services/normalizeProduct.ts
import { ProductRecord, RawProductRow } from "../types";

export const MAX_IMAGES = 10;

export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "post";
}

type Cell = RawProductRow[string];

function text(value: Cell): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number" && !Number.isFinite(value)) return undefined;
  const str = String(value).trim();
  return str || undefined;
}

// Overrides are used verbatim; only empty cells count as absent.
function override(value: Cell): string | undefined {
  if (typeof value !== "string") return text(value);
  return value ? value : undefined;
}

// A numeric zero price or rating never makes it into a caption; a "0" text cell does.
function figure(value: Cell): string | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) && value !== 0 ? String(value) : undefined;
  }
  return text(value);
}

function count(value: Cell): string | undefined {
  if (typeof value === "number" && value === 0) return undefined;
  const str = text(value);
  if (str === undefined) return undefined;
  const n = Math.trunc(Number(str));
  return Number.isFinite(n) ? String(n) : undefined;
}

function list(value: Cell, separator: string): string[] {
  const str = text(value);
  if (!str) return [];
  return str
    .split(separator)
    .map((part) => part.trim())
    .filter(Boolean);
}

function hashtag(tag: string): string {
  return tag.startsWith("#") ? tag : `#${tag}`;
}

export function normalizeRow(row: RawProductRow): ProductRecord {
  const title = text(row["title"]);
  const productId = text(row["product_id"]) ?? slugify(title ?? "");

  return {
    productId,
    title,
    shortDescription: text(row["short_desc"]),
    benefits: list(row["benefits_pipe"], "|"),
    affiliateUrl: text(row["affiliate_url"]),
    imageUrls: list(row["image_urls_comma"], ",").slice(0, MAX_IMAGES),
    postType: text(row["post_type"]),
    postGroup: text(row["post_group"]),
    price: figure(row["price"]),
    rating: figure(row["rating"]),
    reviewCount: count(row["review_count"]),
    category: text(row["category"]),
    seoKeywords: list(row["seo_keywords_comma"], ","),
    hashtags: list(row["hashtags_comma"], ",").map(hashtag),
    ctaOverride: override(row["cta_override"]),
    disclosureOverride: override(row["disclosure_override"]),
    altTextOverride: override(row["alt_text_override"])
  };
}
