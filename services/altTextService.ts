import { ProductRecord } from "../types";

export function generateAltText(product: ProductRecord): string {
  if (product.altTextOverride) return product.altTextOverride;

  const title = product.title ?? "product";
  const firstSentence = product.shortDescription?.split(".")[0] ?? "";

  return `Image of ${title}. ${firstSentence}`.trim();
}
