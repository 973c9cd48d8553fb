import express, { NextFunction, Request, Response } from "express";
import { config, SERVICE_VERSION } from "./config";
import { AggregationCache, CacheBackend } from "./lib/cache";
import { StoreCatalog } from "./lib/catalog";
import { PostgresCacheStore } from "./lib/db";
import { Logger } from "./lib/logger";
import { TextRecordParser } from "./lib/parser";
import { RedisCacheStore } from "./lib/redisCache";
import { SerperShoppingClient } from "./lib/serper";
import { PerplexitySonarClient } from "./lib/sonar";
import { createAggregatorRouter } from "./routes/aggregatorRoutes";
import { AggregationOrchestrator } from "./services/aggregator";
import { LocationService } from "./services/locationService";
import { ProductSearchService } from "./services/productSearch";

const app = express();
app.use(express.json({ limit: "1mb" }));
const logger = new Logger("aggregator.server", config.LOG_LEVEL);
const rootLogger = new Logger("aggregator", config.LOG_LEVEL);

function createCacheBackend(): CacheBackend | null {
  if (config.REDIS_URL) {
    return new RedisCacheStore(config.REDIS_URL, rootLogger.child("redis"));
  }
  if (config.DATABASE_URL) {
    return new PostgresCacheStore(config.DATABASE_URL);
  }
  return null;
}

const catalog = StoreCatalog.load();
const parser = new TextRecordParser(catalog);
const cache = new AggregationCache(createCacheBackend(), rootLogger.child("cache"));

const primary = config.PERPLEXITY_API_KEY
  ? new PerplexitySonarClient({
      apiKey: config.PERPLEXITY_API_KEY,
      baseUrl: config.PERPLEXITY_BASE_URL,
      model: config.PERPLEXITY_MODEL,
      timeoutMs: config.PERPLEXITY_TIMEOUT_MS,
      logLevel: config.LOG_LEVEL
    })
  : null;

const secondary = config.SERPER_API_KEY
  ? new SerperShoppingClient(
      {
        apiKey: config.SERPER_API_KEY,
        baseUrl: config.SERPER_BASE_URL,
        maxResults: config.SERPER_MAX_RESULTS,
        timeoutMs: config.SERPER_TIMEOUT_MS,
        logLevel: config.LOG_LEVEL
      },
      (storeId) => catalog.domainFor(storeId)
    )
  : null;

const products = new ProductSearchService({
  primary,
  secondary,
  parser,
  enhanceMaxProducts: config.ENHANCE_MAX_PRODUCTS,
  logger: rootLogger
});

const locations = new LocationService({
  primary,
  parser,
  catalog,
  cache,
  ttlSeconds: config.STORES_CACHE_TTL_SECONDS,
  timeoutMs: config.AGGREGATE_STORE_TIMEOUT_MS,
  logger: rootLogger
});

const orchestrator = new AggregationOrchestrator({
  products,
  locations,
  catalog,
  cache,
  settings: {
    maxStores: config.AGGREGATE_MAX_STORES,
    concurrency: config.AGGREGATE_CONCURRENCY,
    storeTimeoutMs: config.AGGREGATE_STORE_TIMEOUT_MS,
    ttlSeconds: config.PRODUCTS_CACHE_TTL_SECONDS,
    nearStaleRatio: config.NEAR_STALE_RATIO
  },
  logger: rootLogger
});

app.use((request: Request, response: Response, next: NextFunction) => {
  const started = Date.now();
  response.on("finish", () => {
    logger.info("http_request", {
      method: request.method,
      path: request.path,
      status_code: response.statusCode,
      duration_ms: Date.now() - started
    });
  });
  next();
});

app.use(
  "/",
  createAggregatorRouter({
    orchestrator,
    locations,
    products,
    cache,
    sources: {
      perplexity_sonar: { configured: primary !== null, baseUrl: config.PERPLEXITY_BASE_URL, model: primary?.model ?? config.PERPLEXITY_MODEL },
      serper_shopping: { configured: secondary !== null, baseUrl: config.SERPER_BASE_URL }
    },
    logger: rootLogger
  })
);

app.use((error: unknown, _request: Request, response: Response, _next: NextFunction) => {
  logger.error("unhandled_error", { error });
  response.status(500).json({ error: "internal server error" });
});

const server = app.listen(config.PORT, () => {
  logger.info("server_started", {
    port: config.PORT,
    version: SERVICE_VERSION,
    log_level: config.LOG_LEVEL,
    primary_source: primary ? "enabled" : "disabled",
    primary_model: config.PERPLEXITY_MODEL,
    secondary_source: secondary ? "enabled" : "disabled",
    cache_backend: cache.backendName,
    max_stores: config.AGGREGATE_MAX_STORES,
    concurrency: config.AGGREGATE_CONCURRENCY,
    store_timeout_ms: config.AGGREGATE_STORE_TIMEOUT_MS,
    products_ttl_seconds: config.PRODUCTS_CACHE_TTL_SECONDS
  });
});

const shutdown = async (): Promise<void> => {
  logger.info("shutdown_started");
  server.close();
  await cache.close();
  logger.info("shutdown_completed");
};

process.on("SIGINT", () => {
  void shutdown();
});

process.on("SIGTERM", () => {
  void shutdown();
});
