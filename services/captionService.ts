import { ProductRecord } from "../types";

export const DEFAULT_DISCLOSURE =
  "As an Amazon Associate I earn from qualifying purchases.";

/**
 * Renders the post caption. Every line except the disclosure is dropped
 * when its source field is absent, so the same record always yields the
 * same text.
 */
export function generateCaption(product: ProductRecord): string {
  const lines: string[] = [];

  if (product.title) {
    lines.push(`Check out ${product.title}!`);
  }

  for (const benefit of product.benefits) {
    lines.push(`• ${benefit}`);
  }

  if (product.price) {
    lines.push(`Price: ${product.price}`);
  }

  if (product.rating) {
    const reviews = product.reviewCount ? ` (${product.reviewCount} reviews)` : "";
    lines.push(`Rating: ${product.rating}/5${reviews}`);
  }

  const cta =
    product.ctaOverride ??
    (product.affiliateUrl ? `Learn more and buy here: ${product.affiliateUrl}` : "");
  if (cta) {
    lines.push(cta);
  }

  if (product.hashtags.length > 0) {
    lines.push(product.hashtags.join(" "));
  }

  lines.push(product.disclosureOverride ?? DEFAULT_DISCLOSURE);

  return lines.join("\n");
}
