import { z } from "zod";
import { errorMessage, reasonForStatus, SourceError, SourceTimeoutError } from "../errors";
import { ProductRecord, SOURCE_TAGS } from "../types";
import { Logger } from "./logger";
import { asString, toNumericPrice } from "./normalize";
import { hostMatchesDomain } from "./url";

export interface ShoppingSearch {
  query: string;
  storeId: string;
  storeName: string;
  /** Postal code or place name the results should be near. */
  location?: string;
  signal?: AbortSignal;
}

export interface SecondarySourceClient {
  readonly source: typeof SOURCE_TAGS.secondary;
  searchShopping(search: ShoppingSearch): Promise<ProductRecord[]>;
}

export interface SerperClientConfig {
  apiKey: string;
  baseUrl: string;
  maxResults: number;
  timeoutMs: number;
  logLevel?: string;
}

const ShoppingRowSchema = z
  .object({
    title: z.string().nullish(),
    link: z.string().nullish(),
    price: z.union([z.string(), z.number()]).nullish(),
    imageUrl: z.string().nullish(),
    source: z.string().nullish()
  })
  .passthrough();

const ShoppingPayloadSchema = z
  .object({
    shopping: z.array(ShoppingRowSchema).nullish()
  })
  .passthrough();

function buildShoppingUrl(baseUrl: string): string {
  const trimmed = baseUrl.trim();
  if (/\/shopping\/?$/i.test(trimmed)) {
    return trimmed;
  }
  return `${trimmed.replace(/\/+$/, "")}/shopping`;
}

/**
 * Shopping rows as product records. With an expected domain, rows linking
 * anywhere else are dropped.
 */
export function parseShoppingResults(payload: unknown, expectedDomain?: string): ProductRecord[] {
  const parsed = ShoppingPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new SourceError(SOURCE_TAGS.secondary, "malformed_payload", parsed.error.issues[0]?.message ?? "unexpected payload");
  }

  const records: ProductRecord[] = [];
  for (const row of parsed.data.shopping ?? []) {
    const name = asString(row.title);
    if (!name) {
      continue;
    }
    const link = asString(row.link);
    if (expectedDomain && !(link && hostMatchesDomain(link, expectedDomain))) {
      continue;
    }
    const price = toNumericPrice(row.price);
    const imageUrl = asString(row.imageUrl);
    records.push({
      kind: "product",
      name,
      ...(price !== undefined ? { price } : {}),
      availability: "In Stock",
      ...(link ? { productUrl: link } : {}),
      ...(imageUrl && /^https?:\/\//i.test(imageUrl) ? { imageUrl } : {})
    });
  }
  return records;
}

export class SerperShoppingClient implements SecondarySourceClient {
  readonly source = SOURCE_TAGS.secondary;
  private readonly logger: Logger;
  private readonly shoppingUrl: string;

  constructor(
    private readonly config: SerperClientConfig,
    private readonly domainFor: (storeId: string) => string | undefined
  ) {
    this.logger = new Logger("aggregator.serper", config.logLevel);
    this.shoppingUrl = buildShoppingUrl(config.baseUrl);
  }

  async searchShopping(search: ShoppingSearch): Promise<ProductRecord[]> {
    const domain = this.domainFor(search.storeId);
    const q = domain ? `${search.query} site:${domain}` : `${search.query} ${search.storeName}`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const forwardAbort = (): void => controller.abort();
    search.signal?.addEventListener("abort", forwardAbort, { once: true });
    if (search.signal?.aborted) {
      controller.abort();
    }

    try {
      const response = await fetch(this.shoppingUrl, {
        method: "POST",
        signal: controller.signal,
        headers: {
          "content-type": "application/json",
          accept: "application/json",
          "x-api-key": this.config.apiKey
        },
        body: JSON.stringify({
          q,
          gl: "us",
          hl: "en",
          num: this.config.maxResults,
          ...(search.location ? { location: search.location } : {})
        })
      });

      if (!response.ok) {
        this.logger.warn("search_http_error", { status: response.status, store_id: search.storeId, q });
        throw new SourceError(this.source, reasonForStatus(response.status), `HTTP ${response.status}`, response.status);
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        throw new SourceError(this.source, "malformed_payload", errorMessage(error));
      }

      const records = parseShoppingResults(payload, domain);
      this.logger.debug("search_completed", { store_id: search.storeId, q, products: records.length });
      return records;
    } catch (error) {
      if (error instanceof SourceError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new SourceTimeoutError(this.source, this.config.timeoutMs);
      }
      throw new SourceError(this.source, "network_error", errorMessage(error));
    } finally {
      clearTimeout(timeout);
      search.signal?.removeEventListener("abort", forwardAbort);
    }
  }
}
