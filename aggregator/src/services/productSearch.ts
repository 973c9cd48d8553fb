import { ConfigurationError, errorMessage } from "../errors";
import { Logger } from "../lib/logger";
import { mapLimit } from "../lib/concurrency";
import { collectProductLinks, ENHANCE_MATCH_THRESHOLD, enrichWithCitations, findBestMatch } from "../lib/matching";
import { TextRecordParser } from "../lib/parser";
import { SecondarySourceClient } from "../lib/serper";
import { PrimarySourceClient } from "../lib/sonar";
import { buildProductPrompt } from "../lib/templates";
import { CandidateStore, SOURCE_TAGS, SourcedProduct } from "../types";

export interface ProductSearchDeps {
  primary: PrimarySourceClient | null;
  secondary: SecondarySourceClient | null;
  parser: TextRecordParser;
  enhanceMaxProducts: number;
  logger: Logger;
}

export interface StoreSearchOptions {
  enhance?: boolean;
  signal?: AbortSignal;
}

/** One store, one query: primary answer parsed and enriched, or secondary rows on fallback. */
export class ProductSearchService {
  private readonly logger: Logger;

  constructor(private readonly deps: ProductSearchDeps) {
    this.logger = deps.logger.child("products");
  }

  hasPrimary(): boolean {
    return this.deps.primary !== null;
  }

  hasSecondary(): boolean {
    return this.deps.secondary !== null;
  }

  async searchStore(
    query: string,
    store: CandidateStore,
    location: string,
    options: StoreSearchOptions = {}
  ): Promise<SourcedProduct[]> {
    const { primary } = this.deps;
    if (!primary) {
      throw new ConfigurationError("primary source is not configured");
    }

    const response = await primary.query(buildProductPrompt(query, store.storeName, location), { signal: options.signal });
    const parsed = this.deps.parser.parseProducts(response.text);
    const products = enrichWithCitations(parsed, collectProductLinks(response)).map(
      (record): SourcedProduct => ({ record, sources: [primary.source] })
    );

    this.logger.debug("store_products_parsed", {
      store_id: store.storeId,
      products: products.length,
      citations: response.citations.length
    });

    if (options.enhance && products.length > 0) {
      return this.enhance(store, location, products, options.signal);
    }
    return products;
  }

  /** Secondary shopping rows for the store; empty when no secondary source is configured. */
  async searchSecondary(
    query: string,
    store: CandidateStore,
    location: string,
    signal?: AbortSignal
  ): Promise<SourcedProduct[]> {
    const { secondary } = this.deps;
    if (!secondary) {
      return [];
    }
    const rows = await secondary.searchShopping({ query, storeId: store.storeId, storeName: store.storeName, location, signal });
    return rows.map((record): SourcedProduct => ({ record, sources: [secondary.source] }));
  }

  private async enhance(
    store: CandidateStore,
    location: string,
    products: SourcedProduct[],
    signal?: AbortSignal
  ): Promise<SourcedProduct[]> {
    const { secondary } = this.deps;
    if (!secondary) {
      return products;
    }

    const targets = products
      .map((product, index) => ({ product, index }))
      .filter(({ product }) => !product.record.imageUrl || !product.record.productUrl)
      .slice(0, this.deps.enhanceMaxProducts);

    const enhanced = [...products];
    await mapLimit(targets, targets.length, async ({ product, index }) => {
      try {
        const rows = await secondary.searchShopping({
          query: product.record.name,
          storeId: store.storeId,
          storeName: store.storeName,
          location,
          signal
        });
        const match = findBestMatch(product.record, rows, (row) => row.name, ENHANCE_MATCH_THRESHOLD);
        if (!match) {
          return;
        }
        const imageUrl = product.record.imageUrl ?? match.imageUrl;
        const productUrl = product.record.productUrl ?? match.productUrl;
        if (imageUrl === product.record.imageUrl && productUrl === product.record.productUrl) {
          return;
        }
        enhanced[index] = {
          record: {
            ...product.record,
            ...(imageUrl ? { imageUrl } : {}),
            ...(productUrl ? { productUrl } : {})
          },
          sources: [...product.sources, SOURCE_TAGS.secondary]
        };
      } catch (error) {
        this.logger.warn("enhance_failed", { store_id: store.storeId, product: product.record.name, error: errorMessage(error) });
      }
    });
    return enhanced;
  }
}
