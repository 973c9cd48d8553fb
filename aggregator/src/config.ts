import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

export const SERVICE_NAME = "grocery-aggregator";
export const SERVICE_VERSION = "0.1.0";

const optionalNonEmptyString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().min(1).optional()
);

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.string().min(1).default("info"),
  PERPLEXITY_API_KEY: optionalNonEmptyString,
  PERPLEXITY_BASE_URL: z.string().url().default("https://api.perplexity.ai"),
  PERPLEXITY_MODEL: z.string().min(1).default("sonar"),
  PERPLEXITY_TIMEOUT_MS: z.coerce.number().int().positive().default(45000),
  SERPER_API_KEY: optionalNonEmptyString,
  SERPER_BASE_URL: z.string().url().default("https://google.serper.dev"),
  SERPER_MAX_RESULTS: z.coerce.number().int().positive().max(100).default(20),
  SERPER_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  REDIS_URL: optionalNonEmptyString,
  DATABASE_URL: optionalNonEmptyString,
  AGGREGATE_MAX_STORES: z.coerce.number().int().positive().max(10).default(10),
  AGGREGATE_CONCURRENCY: z.coerce.number().int().positive().max(10).default(10),
  AGGREGATE_STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  PRODUCTS_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(14400),
  STORES_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(86400),
  NEAR_STALE_RATIO: z.coerce.number().gt(0).lt(1).default(0.2),
  ENHANCE_MAX_PRODUCTS: z.coerce.number().int().nonnegative().default(5)
});

export type AppConfig = z.infer<typeof EnvSchema>;

export const config: AppConfig = EnvSchema.parse(process.env);
