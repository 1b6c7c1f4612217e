// One spreadsheet row as read by xlsx. Empty cells are simply missing keys.
export type RawProductRow = Record<string, string | number | boolean | undefined>;

export interface ProductRecord {
  productId: string;
  title?: string;
  shortDescription?: string;
  benefits: string[];
  affiliateUrl?: string;
  imageUrls: string[];
  postType?: string;
  postGroup?: string;
  price?: string;
  rating?: string;
  reviewCount?: string;
  category?: string;
  seoKeywords: string[];
  hashtags: string[];
  ctaOverride?: string;
  disclosureOverride?: string;
  altTextOverride?: string;
}

export type ImageOutcome =
  | { status: "saved"; sourceUrl: string; filename: string }
  | { status: "skipped"; sourceUrl: string; reason: string };

export interface PostMeta {
  product_id: string;
  title: string | null;
  post_type: string | null;
  images: string[];
  caption_file: string;
  alt_text_file: string;
  affiliate_url: string | null;
}

export interface PostBundle {
  productId: string;
  directory: string;
  images: string[];
  caption: string;
  altText: string;
  meta: PostMeta;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: Array<{ row: number; productId: string | null; error: string }>;
  posts: Array<{ productId: string; directory: string; images: string[] }>;
}
