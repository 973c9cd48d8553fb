import { createHash } from "node:crypto";
import { promisify } from "node:util";
import { deflate, inflate } from "node:zlib";
import { z } from "zod";
import { CacheError, errorMessage } from "../errors";
import { Logger } from "./logger";
import { normQuery } from "./normalize";

const deflateAsync = promisify(deflate);
const inflateAsync = promisify(inflate);

/** Byte store behind the aggregation cache; `ttl` follows Redis: -2 missing, -1 no expiry. */
export interface CacheBackend {
  readonly name: string;
  get(key: string): Promise<Buffer | null>;
  set(key: string, value: Buffer, ttlSeconds: number): Promise<void>;
  ttl(key: string): Promise<number>;
  close(): Promise<void>;
}

export type TtlState =
  | { state: "missing" }
  | { state: "persistent" }
  | { state: "expiring"; seconds: number }
  | { state: "unknown" };

export interface ProductsKeyInput {
  zipcode: string;
  query: string;
  allowlist?: readonly string[];
  enhance: boolean;
}

function digest(value: string): string {
  return createHash("sha1").update(value).digest("hex");
}

/** Allowlist order and duplicates do not change the key. */
export function productsKey(input: ProductsKeyInput): string {
  const ids = [...new Set((input.allowlist ?? []).map((id) => id.trim().toLowerCase()).filter(Boolean))].sort();
  const allowlistPart = ids.length > 0 ? ids.join(",") : "__none__";
  return [
    "products",
    digest(input.zipcode.trim()),
    digest(normQuery(input.query)),
    digest(allowlistPart),
    input.enhance ? "1" : "0"
  ].join(":");
}

export function storesKey(zipcode: string): string {
  return `stores:${digest(zipcode.trim())}`;
}

export function toTtlState(seconds: number): TtlState {
  if (seconds === -2) {
    return { state: "missing" };
  }
  if (seconds === -1) {
    return { state: "persistent" };
  }
  return seconds >= 0 ? { state: "expiring", seconds } : { state: "unknown" };
}

/** True while an entry is still live but inside the last `ratio` of its lifetime. */
export function isNearStale(ttl: TtlState, ttlFullSeconds: number, ratio: number): boolean {
  return ttl.state === "expiring" && ttl.seconds > 0 && ttl.seconds < ttlFullSeconds * ratio;
}

/**
 * Compressed JSON entries over an optional backend. Every backend or codec
 * failure is logged once and reported as a miss or a skipped write.
 */
export class AggregationCache {
  constructor(
    private readonly backend: CacheBackend | null,
    private readonly logger: Logger
  ) {}

  get backendName(): string {
    return this.backend?.name ?? "disabled";
  }

  isEnabled(): boolean {
    return this.backend !== null;
  }

  async getJSON<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    if (!this.backend) {
      return null;
    }

    let stored: Buffer | null;
    try {
      stored = await this.backend.get(key);
    } catch (error) {
      this.report(new CacheError("get", errorMessage(error)), key);
      return null;
    }
    if (!stored) {
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse((await inflateAsync(stored)).toString("utf8"));
    } catch (error) {
      this.report(new CacheError("decode", errorMessage(error)), key);
      return null;
    }

    const parsed = schema.safeParse(decoded);
    if (!parsed.success) {
      this.report(new CacheError("decode", parsed.error.issues.map((issue) => issue.message).join("; ")), key);
      return null;
    }
    return parsed.data;
  }

  /** Resolves false when nothing was written. */
  async setJSON(key: string, value: unknown, ttlSeconds: number): Promise<boolean> {
    if (!this.backend) {
      return false;
    }

    let encoded: Buffer;
    try {
      encoded = await deflateAsync(Buffer.from(JSON.stringify(value), "utf8"));
    } catch (error) {
      this.report(new CacheError("encode", errorMessage(error)), key);
      return false;
    }

    try {
      await this.backend.set(key, encoded, ttlSeconds);
      this.logger.debug("cache_written", { key, bytes: encoded.length, ttl_seconds: ttlSeconds });
      return true;
    } catch (error) {
      this.report(new CacheError("set", errorMessage(error)), key);
      return false;
    }
  }

  async ttlRemaining(key: string): Promise<TtlState> {
    if (!this.backend) {
      return { state: "missing" };
    }
    try {
      return toTtlState(await this.backend.ttl(key));
    } catch (error) {
      this.report(new CacheError("ttl", errorMessage(error)), key);
      return { state: "unknown" };
    }
  }

  async close(): Promise<void> {
    await this.backend?.close();
  }

  private report(error: CacheError, key: string): void {
    this.logger.warn("cache_operation_failed", { key, operation: error.operation, error });
  }
}
