import { Response, Router } from "express";
import { z } from "zod";
import { SERVICE_NAME, SERVICE_VERSION } from "../config";
import { ConfigurationError, errorMessage, SourceError, SourceTimeoutError, ValidationError } from "../errors";
import { AggregationCache } from "../lib/cache";
import { Logger } from "../lib/logger";
import { slugifyStoreId } from "../lib/slugify";
import { AggregationOrchestrator, normalizeAllowlist } from "../services/aggregator";
import { LocationService } from "../services/locationService";
import { ProductSearchService } from "../services/productSearch";
import { SOURCE_TAGS, SourceTag } from "../types";

export interface SourcesStatus {
  perplexity_sonar: { configured: boolean; baseUrl: string; model: string };
  serper_shopping: { configured: boolean; baseUrl: string };
}

export interface AggregatorRouterDeps {
  orchestrator: AggregationOrchestrator;
  locations: LocationService;
  products: ProductSearchService;
  cache: AggregationCache;
  sources: SourcesStatus;
  logger: Logger;
}

const booleanParam = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const optionalParam = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().trim().min(1).optional()
);

export const storesQuerySchema = z.object({
  chains: optionalParam
});

export const detailsQuerySchema = z
  .object({
    location: optionalParam,
    zipcode: optionalParam
  })
  .refine((query) => query.location ?? query.zipcode, { message: "location or zipcode is required" });

export const searchQuerySchema = z
  .object({
    query: z.string().trim().min(1),
    store_name: z.string().trim().min(1),
    zipcode: optionalParam,
    location: optionalParam,
    enhance: booleanParam
  })
  .refine((query) => query.zipcode ?? query.location, { message: "zipcode or location is required" });

export const aggregateQuerySchema = z.object({
  query: z.string().min(1),
  zipcode: z.string().min(1),
  stores: optionalParam,
  enhance: booleanParam
});

/** `"target, whole_foods,,"` → `["target", "whole_foods"]`. */
export function parseCsv(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);
}

export function httpStatusFor(error: unknown): number {
  if (error instanceof ValidationError) {
    return 400;
  }
  if (error instanceof ConfigurationError) {
    return 503;
  }
  if (error instanceof SourceTimeoutError) {
    return 504;
  }
  if (error instanceof SourceError) {
    return 502;
  }
  return 500;
}

const ENDPOINTS = [
  "GET /health",
  "GET /stores/:zipcode",
  "GET /stores/:storeName/details",
  "GET /products/search",
  "GET /products/aggregate",
  "GET /sources/status"
];

export function createAggregatorRouter(deps: AggregatorRouterDeps): Router {
  const router = Router();
  const logger = deps.logger.child("routes");

  const fail = (response: Response, event: string, error: unknown, metadata: Record<string, unknown> = {}): void => {
    const status = httpStatusFor(error);
    if (status >= 500) {
      logger.error(event, { ...metadata, status_code: status, error });
    } else {
      logger.warn(event, { ...metadata, status_code: status, error: errorMessage(error) });
    }
    response.status(status).json({ error: status === 500 ? "internal server error" : errorMessage(error) });
  };

  router.get("/health", (_request, response) => {
    const services = {
      [SOURCE_TAGS.primary]: deps.products.hasPrimary() ? "available" : "unavailable",
      [SOURCE_TAGS.secondary]: deps.products.hasSecondary() ? "available" : "unavailable",
      cache: deps.cache.backendName
    };
    logger.debug("health_requested", services);
    response.json({
      status: deps.products.hasPrimary() ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      version: SERVICE_VERSION,
      services
    });
  });

  router.get("/", (_request, response) => {
    response.json({ service: SERVICE_NAME, version: SERVICE_VERSION, endpoints: ENDPOINTS });
  });

  router.get("/sources/status", (_request, response) => {
    response.json({ ...deps.sources, cache: { backend: deps.cache.backendName, enabled: deps.cache.isEnabled() } });
  });

  router.get("/stores/:storeName/details", async (request, response) => {
    const parsed = detailsQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      logger.warn("store_details_request_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const storeName = request.params.storeName;
    const location = parsed.data.location ?? parsed.data.zipcode ?? "";
    try {
      const details = await deps.locations.getStoreDetails(storeName, location);
      logger.info("store_details_served", { store_name: storeName, location });
      response.json({ storeName, location, ...details, source: SOURCE_TAGS.primary });
    } catch (error) {
      fail(response, "store_details_failed", error, { store_name: storeName, location });
    }
  });

  router.get("/stores/:zipcode", async (request, response) => {
    const parsed = storesQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      logger.warn("stores_request_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const zipcode = request.params.zipcode;
    try {
      const { payload, cacheHit } = await deps.locations.discoverStores(zipcode);
      const chains = normalizeAllowlist(parseCsv(parsed.data.chains));
      const stores = chains.length > 0 ? payload.stores.filter((store) => chains.includes(store.storeId)) : payload.stores;
      logger.info("stores_served", { zipcode, stores: stores.length, cache_hit: cacheHit, source: payload.source });
      response.json({ ...payload, storesFound: stores.length, stores, cache: { hit: cacheHit } });
    } catch (error) {
      fail(response, "stores_request_failed", error, { zipcode });
    }
  });

  router.get("/products/search", async (request, response) => {
    const parsed = searchQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      logger.warn("search_request_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const { query, store_name: storeName, enhance } = parsed.data;
    const location = parsed.data.zipcode ?? parsed.data.location ?? "";
    try {
      const found = await deps.products.searchStore(
        query,
        { storeId: slugifyStoreId(storeName), storeName },
        location,
        { enhance }
      );
      const used = new Set<SourceTag>(found.flatMap((product) => product.sources));
      const products = found.map(({ record, sources }) => ({ ...record, source: sources }));
      logger.info("search_served", { query, store_name: storeName, location, products: products.length, enhance });
      response.json({
        query,
        storeName,
        location,
        productsFound: products.length,
        products,
        source: [SOURCE_TAGS.primary, SOURCE_TAGS.secondary].filter((tag) => used.has(tag)).join("+") || SOURCE_TAGS.primary
      });
    } catch (error) {
      fail(response, "search_request_failed", error, { query, store_name: storeName });
    }
  });

  router.get("/products/aggregate", async (request, response) => {
    const parsed = aggregateQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      logger.warn("aggregate_request_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      const result = await deps.orchestrator.aggregate({
        query: parsed.data.query,
        zipcode: parsed.data.zipcode,
        stores: parseCsv(parsed.data.stores),
        enhance: parsed.data.enhance
      });
      response.json(result);
    } catch (error) {
      fail(response, "aggregate_request_failed", error, { query: parsed.data.query, zipcode: parsed.data.zipcode });
    }
  });

  return router;
}
