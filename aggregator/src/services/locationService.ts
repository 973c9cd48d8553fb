import { ConfigurationError, errorMessage, isSourceFailure, ValidationError } from "../errors";
import { AggregationCache, storesKey } from "../lib/cache";
import { StoreCatalog } from "../lib/catalog";
import { withTimeout } from "../lib/concurrency";
import { Logger } from "../lib/logger";
import { TextRecordParser } from "../lib/parser";
import { PrimarySourceClient } from "../lib/sonar";
import { parseStoreDetails, StoreDetails } from "../lib/storeDetails";
import { buildStoreDetailsPrompt, buildStorePrompt } from "../lib/templates";
import {
  CandidateStore,
  StoreDiscoveryPayload,
  StoreDiscoveryPayloadSchema,
  StoreLocation,
  StoreRecord
} from "../types";

export const ZIPCODE_PATTERN = /^\d{5}$/;

const CITY_STATE_PATTERN = /,\s*([^,]+?),\s*([A-Z]{2})\s+\d{5}(?:-\d{4})?\s*$/;

export interface LocationServiceDeps {
  primary: PrimarySourceClient | null;
  parser: TextRecordParser;
  catalog: StoreCatalog;
  cache: AggregationCache;
  ttlSeconds: number;
  timeoutMs: number;
  logger: Logger;
  now?: () => Date;
}

export interface StoreDiscovery {
  payload: StoreDiscoveryPayload;
  cacheHit: boolean;
}

/** `"1 Main St, Chicago, IL 60622"` → `{ city: "Chicago", state: "IL" }`. */
export function extractCityState(address: string | undefined): { city?: string; state?: string } {
  const match = address?.match(CITY_STATE_PATTERN);
  if (!match) {
    return {};
  }
  return { city: match[1].trim(), state: match[2] };
}

function toStoreLocation(record: StoreRecord, zipcode: string): StoreLocation {
  return {
    storeId: record.storeId,
    storeName: record.storeName,
    ...(record.address ? { address: record.address } : {}),
    services: record.services,
    status: record.status,
    ...(record.website ? { website: record.website } : {}),
    location: { zipcode, ...extractCityState(record.address) }
  };
}

export class LocationService {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: LocationServiceDeps) {
    this.logger = deps.logger.child("locations");
    this.now = deps.now ?? (() => new Date());
  }

  async getNearbyStores(zipcode: string): Promise<CandidateStore[]> {
    const { payload } = await this.discoverStores(zipcode);
    return payload.stores.map((store) => ({ storeId: store.storeId, storeName: store.storeName }));
  }

  async discoverStores(zipcode: string): Promise<StoreDiscovery> {
    if (!ZIPCODE_PATTERN.test(zipcode)) {
      throw new ValidationError("zipcode must be five digits", "zipcode");
    }

    const key = storesKey(zipcode);
    const cached = await this.deps.cache.getJSON(key, StoreDiscoveryPayloadSchema);
    if (cached) {
      this.logger.debug("stores_cache_hit", { zipcode, stores: cached.storesFound });
      return { payload: cached, cacheHit: true };
    }

    let stores = (await this.askPrimary(zipcode)).map((record) => toStoreLocation(record, zipcode));
    let source: StoreDiscoveryPayload["source"] = "perplexity_sonar";
    if (stores.length === 0) {
      source = "static_coverage";
      stores = this.deps.catalog.storesCovering(zipcode).map((store) => ({
        ...store,
        services: [],
        status: "active",
        location: { zipcode }
      }));
    }

    const payload: StoreDiscoveryPayload = {
      zipcode,
      storesFound: stores.length,
      stores,
      source,
      searchedAt: this.now().toISOString()
    };

    if (stores.length > 0) {
      await this.deps.cache.setJSON(key, payload, this.deps.ttlSeconds);
    }
    this.logger.info("stores_discovered", { zipcode, stores: stores.length, source });
    return { payload, cacheHit: false };
  }

  /** Hours, services and contact details for one store; source failures propagate. */
  async getStoreDetails(storeName: string, location: string): Promise<StoreDetails> {
    const { primary } = this.deps;
    if (!primary) {
      throw new ConfigurationError("primary source is not configured");
    }
    const response = await withTimeout(primary.source, this.deps.timeoutMs, (signal) =>
      primary.query(buildStoreDetailsPrompt(storeName, location), { signal })
    );
    const details = parseStoreDetails(response.text, this.deps.catalog.serviceAliases);
    this.logger.debug("store_details_parsed", {
      store_name: storeName,
      hours: Object.keys(details.hours).length,
      services: details.services.length
    });
    return details;
  }

  private async askPrimary(zipcode: string): Promise<StoreRecord[]> {
    const { primary } = this.deps;
    if (!primary) {
      return [];
    }
    try {
      const response = await withTimeout(primary.source, this.deps.timeoutMs, (signal) =>
        primary.query(buildStorePrompt(zipcode), { signal })
      );
      return this.deps.parser.parseStores(response.text);
    } catch (error) {
      if (!isSourceFailure(error)) {
        throw error;
      }
      this.logger.warn("store_discovery_failed", { zipcode, error: errorMessage(error) });
      return [];
    }
  }
}
