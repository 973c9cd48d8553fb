import { ConfigurationError, errorMessage, isSourceFailure, ValidationError } from "../errors";
import { AggregationCache, isNearStale, productsKey } from "../lib/cache";
import { StoreCatalog } from "../lib/catalog";
import { mapLimit, withTimeout } from "../lib/concurrency";
import { Logger } from "../lib/logger";
import { findReconciliationTarget } from "../lib/matching";
import { groupKey, normQuery } from "../lib/normalize";
import {
  AggregatePayload,
  AggregatePayloadSchema,
  AggregateResponse,
  AggregateResult,
  CandidateStore,
  CanonicalProduct,
  ProductRecord,
  SOURCE_TAGS,
  SourcedProduct,
  SourceTag
} from "../types";
import { ZIPCODE_PATTERN } from "./locationService";
import { ProductSearchService } from "./productSearch";

export interface AggregateRequest {
  query: string;
  zipcode: string;
  stores?: readonly string[];
  enhance?: boolean;
}

export interface AggregationSettings {
  maxStores: number;
  concurrency: number;
  storeTimeoutMs: number;
  ttlSeconds: number;
  nearStaleRatio: number;
}

export interface StoreLocator {
  getNearbyStores(zipcode: string): Promise<CandidateStore[]>;
}

export interface OrchestratorDeps {
  products: ProductSearchService;
  locations: StoreLocator;
  catalog: StoreCatalog;
  cache: AggregationCache;
  settings: AggregationSettings;
  logger: Logger;
}

/** Products collected for one store, in the order stores finished. */
export interface StoreOutcome {
  store: CandidateStore;
  products: SourcedProduct[];
}

interface GroupEntry {
  store: CandidateStore;
  record: ProductRecord;
  sources: SourceTag[];
}

const SOURCE_ORDER: SourceTag[] = [SOURCE_TAGS.primary, SOURCE_TAGS.secondary];

/** Upper bound on stores per request and on calls in flight, whatever the settings say. */
export const STORE_LIMIT = 10;

/** Lowercased, trimmed, de-duplicated; caller order kept. */
export function normalizeAllowlist(stores: readonly string[] | undefined): string[] {
  const ids: string[] = [];
  for (const raw of stores ?? []) {
    const id = raw.trim().toLowerCase();
    if (id && !ids.includes(id)) {
      ids.push(id);
    }
  }
  return ids;
}

function isLooseSecondary(entry: GroupEntry): boolean {
  return !entry.sources.includes(SOURCE_TAGS.primary) && !entry.record.brand && !entry.record.size;
}

function addToGroup(groups: Map<string, CanonicalProduct>, key: string, entry: GroupEntry): void {
  const { record, store } = entry;
  let product = groups.get(key);
  if (!product) {
    product = {
      groupKey: key,
      displayName: record.name,
      ...(record.brand ? { brand: record.brand } : {}),
      ...(record.size ? { size: record.size } : {}),
      images: [],
      offers: []
    };
    groups.set(key, product);
  }

  if (record.imageUrl && !product.images.includes(record.imageUrl)) {
    product.images.push(record.imageUrl);
  }
  product.offers.push({
    storeId: store.storeId,
    storeName: store.storeName,
    ...(record.price !== undefined ? { price: record.price } : {}),
    ...(record.availability ? { availability: record.availability } : {}),
    ...(record.productUrl ? { productUrl: record.productUrl } : {}),
    ...(record.imageUrl ? { imageUrl: record.imageUrl } : {}),
    source: entry.sources
  });
}

/**
 * Groups every record into canonical products by normalized brand, name and
 * size. Secondary rows carrying neither brand nor size are placed second,
 * under the closest product built from primary records when one qualifies.
 */
export function groupOffers(outcomes: readonly StoreOutcome[]): CanonicalProduct[] {
  const entries: GroupEntry[] = outcomes.flatMap(({ store, products }) =>
    products.map(({ record, sources }) => ({ store, record, sources }))
  );
  const groups = new Map<string, CanonicalProduct>();

  for (const entry of entries.filter((candidate) => !isLooseSecondary(candidate))) {
    addToGroup(groups, groupKey(entry.record.brand, entry.record.name, entry.record.size), entry);
  }

  const identities = [...groups.values()]
    .filter((product) => product.offers.some((offer) => offer.source.includes(SOURCE_TAGS.primary)))
    .map((product) => ({ name: product.displayName, brand: product.brand, key: product.groupKey }));

  for (const entry of entries.filter(isLooseSecondary)) {
    const target = findReconciliationTarget(entry.record, identities);
    addToGroup(groups, target?.key ?? groupKey(undefined, entry.record.name, undefined), entry);
  }

  return [...groups.values()];
}

function toResult(product: CanonicalProduct): AggregateResult {
  return {
    groupKey: product.groupKey,
    canonicalProduct: {
      name: product.displayName,
      ...(product.brand ? { brand: product.brand } : {}),
      ...(product.size ? { size: product.size } : {}),
      images: product.images
    },
    offers: product.offers.map(({ imageUrl: _imageUrl, ...offer }) => offer)
  };
}

function sourceLabel(products: readonly CanonicalProduct[]): string {
  const used = new Set<SourceTag>();
  for (const product of products) {
    for (const offer of product.offers) {
      offer.source.forEach((tag) => used.add(tag));
    }
  }
  const tags = SOURCE_ORDER.filter((tag) => used.has(tag));
  return `aggregate(${tags.length > 0 ? tags.join("+") : "none"})`;
}

export class AggregationOrchestrator {
  private readonly logger: Logger;

  constructor(private readonly deps: OrchestratorDeps) {
    this.logger = deps.logger.child("pipeline");
  }

  async aggregate(request: AggregateRequest): Promise<AggregateResponse> {
    const query = request.query.trim();
    const zipcode = request.zipcode.trim();
    if (!normQuery(query)) {
      throw new ValidationError("query must not be empty", "query");
    }
    if (!ZIPCODE_PATTERN.test(zipcode)) {
      throw new ValidationError("zipcode must be five digits", "zipcode");
    }
    if (!this.deps.products.hasPrimary()) {
      throw new ConfigurationError("primary source is not configured");
    }

    const { cache, settings } = this.deps;
    const enhance = request.enhance ?? false;
    const allowlist = normalizeAllowlist(request.stores);
    const key = productsKey({ zipcode, query, allowlist, enhance });

    const cached = await cache.getJSON(key, AggregatePayloadSchema);
    if (cached) {
      const nearStale = isNearStale(await cache.ttlRemaining(key), settings.ttlSeconds, settings.nearStaleRatio);
      this.logger.info("cache_hit", { zipcode, query, near_stale: nearStale });
      return { ...cached, cache: { hit: true, nearStale } };
    }

    const stores = await this.resolveStores(zipcode, allowlist);
    const outcomes: StoreOutcome[] = [];
    const started = Date.now();
    await mapLimit(stores, Math.min(settings.concurrency, STORE_LIMIT), async (store) => {
      outcomes.push({ store, products: await this.searchStore(query, store, zipcode, enhance) });
    });

    const grouped = groupOffers(outcomes);
    const payload: AggregatePayload = {
      query,
      location: zipcode,
      storesConsidered: stores.map((store) => store.storeId),
      results: grouped.map(toResult),
      source: sourceLabel(grouped)
    };

    this.logger.info("aggregation_completed", {
      zipcode,
      query,
      stores: stores.length,
      products: payload.results.length,
      duration_ms: Date.now() - started
    });

    await cache.setJSON(key, payload, settings.ttlSeconds);
    return { ...payload, cache: { hit: false, nearStale: false } };
  }

  private async resolveStores(zipcode: string, allowlist: string[]): Promise<CandidateStore[]> {
    const maxStores = Math.min(this.deps.settings.maxStores, STORE_LIMIT);
    if (allowlist.length > 0) {
      return allowlist.slice(0, maxStores).map((storeId) => ({
        storeId,
        storeName: this.deps.catalog.displayName(storeId)
      }));
    }
    const discovered = await this.deps.locations.getNearbyStores(zipcode);
    return discovered.slice(0, maxStores);
  }

  private async searchStore(query: string, store: CandidateStore, zipcode: string, enhance: boolean): Promise<SourcedProduct[]> {
    const { products, settings } = this.deps;
    let found: SourcedProduct[] = [];

    try {
      found = await withTimeout(SOURCE_TAGS.primary, settings.storeTimeoutMs, (signal) =>
        products.searchStore(query, store, zipcode, { enhance, signal })
      );
    } catch (error) {
      this.absorb("store_search_failed", store, error);
    }

    if (found.length > 0 || !products.hasSecondary()) {
      return found;
    }

    try {
      found = await withTimeout(SOURCE_TAGS.secondary, settings.storeTimeoutMs, (signal) =>
        products.searchSecondary(query, store, zipcode, signal)
      );
      this.logger.info("secondary_fallback_used", { store_id: store.storeId, products: found.length });
    } catch (error) {
      this.absorb("secondary_fallback_failed", store, error);
    }
    return found;
  }

  private absorb(event: string, store: CandidateStore, error: unknown): void {
    if (isSourceFailure(error)) {
      this.logger.warn(event, { store_id: store.storeId, kind: error.kind, error: errorMessage(error) });
      return;
    }
    this.logger.error(event, { store_id: store.storeId, error });
  }
}
