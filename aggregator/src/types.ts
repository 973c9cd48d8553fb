import { z } from "zod";

export const SOURCE_TAGS = {
  primary: "perplexity_sonar",
  secondary: "serper_shopping"
} as const;

export type SourceTag = (typeof SOURCE_TAGS)[keyof typeof SOURCE_TAGS];

export type RecordKind = "store" | "product";

export interface RelatedResult {
  url: string;
  title?: string;
}

/** One answer from the primary source; parsed and then dropped. */
export interface RawSourceResponse {
  text: string;
  citations: string[];
  relatedResults: RelatedResult[];
}

export interface StoreRecord {
  kind: "store";
  storeId: string;
  storeName: string;
  address?: string;
  services: string[];
  website?: string;
  status: string;
}

export interface ProductRecord {
  kind: "product";
  name: string;
  brand?: string;
  price?: number | string;
  size?: string;
  category?: string;
  availability?: string;
  description?: string;
  imageUrl?: string;
  productUrl?: string;
  deals?: string;
}

export type ParsedRecord = StoreRecord | ProductRecord;

/** A product record and the sources that contributed to it. */
export interface SourcedProduct {
  record: ProductRecord;
  sources: SourceTag[];
}

export interface CandidateStore {
  storeId: string;
  storeName: string;
}

export interface Offer {
  storeId: string;
  storeName: string;
  price?: number | string;
  availability?: string;
  productUrl?: string;
  imageUrl?: string;
  source: SourceTag[];
}

export interface CanonicalProduct {
  groupKey: string;
  displayName: string;
  brand?: string;
  size?: string;
  images: string[];
  offers: Offer[];
}

const PriceSchema = z.union([z.number(), z.string()]);

export const OfferPayloadSchema = z.object({
  storeId: z.string(),
  storeName: z.string(),
  price: PriceSchema.optional(),
  availability: z.string().optional(),
  productUrl: z.string().optional(),
  source: z.array(z.string())
});

export const AggregateResultSchema = z.object({
  groupKey: z.string(),
  canonicalProduct: z.object({
    name: z.string(),
    brand: z.string().optional(),
    size: z.string().optional(),
    images: z.array(z.string())
  }),
  offers: z.array(OfferPayloadSchema)
});

/** What the aggregation cache stores; the `cache` block is added per response. */
export const AggregatePayloadSchema = z.object({
  query: z.string(),
  location: z.string(),
  storesConsidered: z.array(z.string()),
  results: z.array(AggregateResultSchema),
  source: z.string()
});

export const StoreLocationSchema = z.object({
  storeId: z.string(),
  storeName: z.string(),
  address: z.string().optional(),
  services: z.array(z.string()),
  status: z.string(),
  website: z.string().optional(),
  location: z.object({
    zipcode: z.string(),
    city: z.string().optional(),
    state: z.string().optional()
  })
});

export const StoreDiscoveryPayloadSchema = z.object({
  zipcode: z.string(),
  storesFound: z.number().int().nonnegative(),
  stores: z.array(StoreLocationSchema),
  source: z.enum(["perplexity_sonar", "static_coverage"]),
  searchedAt: z.string()
});

export type OfferPayload = z.infer<typeof OfferPayloadSchema>;
export type AggregateResult = z.infer<typeof AggregateResultSchema>;
export type AggregatePayload = z.infer<typeof AggregatePayloadSchema>;
export type StoreLocation = z.infer<typeof StoreLocationSchema>;
export type StoreDiscoveryPayload = z.infer<typeof StoreDiscoveryPayloadSchema>;

export interface CacheStatus {
  hit: boolean;
  nearStale: boolean;
}

export type AggregateResponse = AggregatePayload & { cache: CacheStatus };
