import assert from "node:assert/strict";
import test from "node:test";
import { EnvSchema } from "./config";

test("EnvSchema applies defaults and treats blank secrets as unset", () => {
  const parsed = EnvSchema.parse({ PERPLEXITY_API_KEY: "  ", SERPER_API_KEY: "test-secret" });

  assert.equal(parsed.PORT, 8000);
  assert.equal(parsed.PERPLEXITY_API_KEY, undefined);
  assert.equal(parsed.SERPER_API_KEY, "test-secret");
  assert.equal(parsed.AGGREGATE_MAX_STORES, 10);
  assert.equal(parsed.AGGREGATE_CONCURRENCY, 10);
  assert.equal(parsed.NEAR_STALE_RATIO, 0.2);
});

test("EnvSchema keeps the store cap and fan-out at or below ten", () => {
  assert.equal(EnvSchema.parse({ AGGREGATE_MAX_STORES: "6", AGGREGATE_CONCURRENCY: "4" }).AGGREGATE_MAX_STORES, 6);
  assert.equal(EnvSchema.safeParse({ AGGREGATE_MAX_STORES: "25" }).success, false);
  assert.equal(EnvSchema.safeParse({ AGGREGATE_CONCURRENCY: "11" }).success, false);
});
